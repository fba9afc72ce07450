/**
 * User Service
 *
 * Registration, role lookup and the explicit role-change path.
 */

import { NotFoundError } from '../errors/index.js';
import type { StoreAdapter } from '../store/types.js';
import type { TelegramUser, UserRole } from '../types/user.js';
import { parseRole, parseTelegramId } from '../validation/payloads.js';
import type { UpsertEngine, UpsertOutcome } from './upsertEngine.js';

export class UserService {
  constructor(
    private readonly engine: UpsertEngine,
    private readonly users: StoreAdapter<TelegramUser, number>,
  ) {}

  /**
   * Sync write from the bot. Never widens the stored role.
   */
  upsert(payload: unknown): Promise<UpsertOutcome<TelegramUser>> {
    return this.engine.upsertUser(payload);
  }

  async getRole(telegramId: unknown): Promise<UserRole> {
    const id = parseTelegramId(telegramId);
    const user = await this.users.get(id);
    if (!user) {
      throw new NotFoundError('TelegramUser', id);
    }
    return user.role;
  }

  /**
   * Replace the role of a known user, widening included.
   */
  async changeRole(telegramId: unknown, role: unknown): Promise<TelegramUser> {
    const id = parseTelegramId(telegramId);
    const nextRole = parseRole(role);
    const user = await this.users.get(id);
    if (!user) {
      throw new NotFoundError('TelegramUser', id);
    }

    const { entity } = await this.engine.applyUser(
      {
        telegramId: user.telegramId,
        username: user.username,
        firstName: user.firstName,
        lastName: user.lastName,
        languageCode: user.languageCode,
        phoneNumber: user.phoneNumber,
        avatarFileId: user.avatarFileId,
        role: nextRole,
        isAuthenticated: user.isAuthenticated,
        authenticatedAt: user.authenticatedAt,
      },
      { roleChange: 'explicit' },
    );
    return entity;
  }
}
