/**
 * User Action Repository
 *
 * user_actions table. Append-only: the only write is an insert.
 */

import type { UserAction, UserActionInput } from '../../types/action.js';
import type { AppendOnlyStore } from '../../store/types.js';
import type { DatabaseConnection } from '../client.js';
import { BaseRepository, parseJsonColumn, type TableMapping } from '../baseRepository.js';

type UserActionRow = {
  id: number;
  telegram_id: number;
  username: string;
  first_name: string;
  last_name: string;
  action: string;
  details: string;
  created_at: string;
  raw_payload: string;
};

const userActionMapping: TableMapping<UserAction, number, UserActionRow> = {
  model: 'UserAction',
  table: 'user_actions',
  keyColumn: 'id',
  columns: [
    'id',
    'telegram_id',
    'username',
    'first_name',
    'last_name',
    'action',
    'details',
    'created_at',
    'raw_payload',
  ],
  immutableColumns: [],
  orderBy: 'id DESC',
  filterColumns: {
    telegramId: 'telegram_id',
    action: 'action',
  },
  keyOf: (action) => action.id,
  toRow: (action) => ({
    id: action.id,
    telegram_id: action.telegramId,
    username: action.username,
    first_name: action.firstName,
    last_name: action.lastName,
    action: action.action,
    details: action.details,
    created_at: action.createdAt.toISOString(),
    raw_payload: JSON.stringify(action.rawPayload),
  }),
  fromRow: (row) => ({
    id: row.id,
    telegramId: row.telegram_id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    action: row.action,
    details: row.details,
    createdAt: new Date(row.created_at),
    rawPayload: parseJsonColumn(row.raw_payload),
  }),
};

export class UserActionRepository
  extends BaseRepository<UserAction, number, UserActionRow>
  implements AppendOnlyStore<UserAction, UserActionInput>
{
  constructor(db: DatabaseConnection) {
    super(db, userActionMapping);
  }

  async append(input: UserActionInput): Promise<UserAction> {
    return this.run('append', () => {
      const { id: _unused, ...row } = userActionMapping.toRow({ ...input, id: 0 });
      const result = this.db
        .prepare<[Omit<UserActionRow, 'id'>]>(`
          INSERT INTO user_actions (telegram_id, username, first_name, last_name, action, details, created_at, raw_payload)
          VALUES (@telegram_id, @username, @first_name, @last_name, @action, @details, @created_at, @raw_payload)
        `)
        .run(row);

      const stored = this.selectByKey(Number(result.lastInsertRowid));
      if (!stored) {
        throw new Error(`UserAction ${String(result.lastInsertRowid)} missing after insert`);
      }
      return stored;
    });
  }
}
