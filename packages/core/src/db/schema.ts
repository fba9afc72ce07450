import type Database from 'better-sqlite3';

/**
 * Create the sync tables if they don't exist.
 * Relationships between them are weak references: no foreign keys.
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS telegram_users (
      telegram_id INTEGER PRIMARY KEY,
      username TEXT NOT NULL DEFAULT '',
      first_name TEXT NOT NULL DEFAULT '',
      last_name TEXT NOT NULL DEFAULT '',
      language_code TEXT NOT NULL DEFAULT '',
      phone_number TEXT NOT NULL DEFAULT '',
      avatar_file_id TEXT NOT NULL DEFAULT '',
      role TEXT NOT NULL DEFAULT 'user'
        CHECK (role IN ('user', 'leasing_company', 'admin')),
      is_authenticated INTEGER NOT NULL DEFAULT 0,
      authenticated_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_telegram_users_role ON telegram_users(role);

    CREATE TABLE IF NOT EXISTS user_actions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      telegram_id INTEGER NOT NULL,
      username TEXT NOT NULL DEFAULT '',
      first_name TEXT NOT NULL DEFAULT '',
      last_name TEXT NOT NULL DEFAULT '',
      action TEXT NOT NULL,
      details TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      raw_payload TEXT NOT NULL DEFAULT '{}'
    );

    CREATE INDEX IF NOT EXISTS idx_user_actions_telegram_id ON user_actions(telegram_id);
    CREATE INDEX IF NOT EXISTS idx_user_actions_created_at ON user_actions(created_at);

    CREATE TABLE IF NOT EXISTS ad_items (
      ad_id TEXT PRIMARY KEY,
      source_type TEXT NOT NULL DEFAULT 'manual'
        CHECK (source_type IN ('excel', 'manual')),
      external_id TEXT NOT NULL DEFAULT '',
      title TEXT NOT NULL,
      category TEXT NOT NULL DEFAULT '',
      price INTEGER NOT NULL DEFAULT 0,
      year INTEGER,
      details TEXT NOT NULL DEFAULT '',
      location TEXT NOT NULL DEFAULT '',
      image TEXT NOT NULL DEFAULT '',
      status TEXT NOT NULL DEFAULT 'active'
        CHECK (status IN ('active', 'inactive', 'archived')),
      author_telegram_id INTEGER,
      author_username TEXT NOT NULL DEFAULT '',
      author_first_name TEXT NOT NULL DEFAULT '',
      author_last_name TEXT NOT NULL DEFAULT '',
      created_at_remote TEXT,
      raw_payload TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_ad_items_author ON ad_items(author_telegram_id);
    CREATE INDEX IF NOT EXISTS idx_ad_items_status ON ad_items(status);
    CREATE INDEX IF NOT EXISTS idx_ad_items_created_at ON ad_items(created_at);
  `);
}
