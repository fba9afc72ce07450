/**
 * User Repository
 *
 * telegram_users table. Users are never deleted.
 */

import { isUserRole, type TelegramUser, type UserRole } from '../../types/user.js';
import type { StoreAdapter, UpsertResult } from '../../store/types.js';
import type { DatabaseConnection } from '../client.js';
import {
  BaseRepository,
  fromDateColumn,
  toDateColumn,
  type TableMapping,
} from '../baseRepository.js';

type UserRow = {
  telegram_id: number;
  username: string;
  first_name: string;
  last_name: string;
  language_code: string;
  phone_number: string;
  avatar_file_id: string;
  role: string;
  is_authenticated: number;
  authenticated_at: string | null;
  created_at: string;
  updated_at: string;
};

function storedRole(value: string): UserRole {
  if (!isUserRole(value)) {
    throw new Error(`Unexpected stored role "${value}"`);
  }
  return value;
}

const userMapping: TableMapping<TelegramUser, number, UserRow> = {
  model: 'TelegramUser',
  table: 'telegram_users',
  keyColumn: 'telegram_id',
  columns: [
    'telegram_id',
    'username',
    'first_name',
    'last_name',
    'language_code',
    'phone_number',
    'avatar_file_id',
    'role',
    'is_authenticated',
    'authenticated_at',
    'created_at',
    'updated_at',
  ],
  immutableColumns: ['created_at'],
  orderBy: 'created_at ASC, telegram_id ASC',
  filterColumns: {
    telegramId: 'telegram_id',
    username: 'username',
    role: 'role',
    isAuthenticated: 'is_authenticated',
  },
  keyOf: (user) => user.telegramId,
  toRow: (user) => ({
    telegram_id: user.telegramId,
    username: user.username,
    first_name: user.firstName,
    last_name: user.lastName,
    language_code: user.languageCode,
    phone_number: user.phoneNumber,
    avatar_file_id: user.avatarFileId,
    role: user.role,
    is_authenticated: user.isAuthenticated ? 1 : 0,
    authenticated_at: toDateColumn(user.authenticatedAt),
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  }),
  fromRow: (row) => ({
    telegramId: row.telegram_id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    languageCode: row.language_code,
    phoneNumber: row.phone_number,
    avatarFileId: row.avatar_file_id,
    role: storedRole(row.role),
    isAuthenticated: row.is_authenticated === 1,
    authenticatedAt: fromDateColumn(row.authenticated_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  }),
};

export class UserRepository
  extends BaseRepository<TelegramUser, number, UserRow>
  implements StoreAdapter<TelegramUser, number>
{
  constructor(db: DatabaseConnection) {
    super(db, userMapping);
  }

  upsert(user: TelegramUser): Promise<UpsertResult<TelegramUser>> {
    return this.upsertRow(user);
  }
}
