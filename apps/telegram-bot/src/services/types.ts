/**
 * Telegram profile fields the bot copies into users, actions and ad authors.
 */
export interface TelegramProfile {
  id: number;
  username?: string;
  first_name: string;
  last_name?: string;
  language_code?: string;
}

export function profileFields(profile: TelegramProfile) {
  return {
    telegram_id: profile.id,
    username: profile.username ?? '',
    first_name: profile.first_name,
    last_name: profile.last_name ?? '',
  };
}
