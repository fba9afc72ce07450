/**
 * User Action Types
 *
 * Actions are append-only: there is no update or delete path.
 */

export interface UserAction {
  id: number;
  /** Actor. Weak reference to TelegramUser.telegramId, no cascade. */
  telegramId: number;
  username: string;
  firstName: string;
  lastName: string;
  action: string;
  details: string;
  createdAt: Date;
  rawPayload: Record<string, unknown>;
}

export type UserActionInput = Omit<UserAction, 'id'>;
