/**
 * User Types
 */

export const USER_ROLES = ['user', 'leasing_company', 'admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];

/**
 * Privilege order used to detect role widening. Higher is wider.
 */
export const ROLE_RANK: Readonly<Record<UserRole, number>> = {
  user: 0,
  leasing_company: 1,
  admin: 2,
};

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && USER_ROLES.some((role) => role === value);
}

export interface TelegramUser {
  /** Assigned by Telegram. The only key used for upsert matching. */
  telegramId: number;
  username: string;
  firstName: string;
  lastName: string;
  languageCode: string;
  phoneNumber: string;
  avatarFileId: string;
  role: UserRole;

  isAuthenticated: boolean;
  authenticatedAt: Date | null;

  // Timestamps
  createdAt: Date;
  updatedAt: Date;
}
