/**
 * Set Role Command
 *
 * Explicit role change for a known user. This is the only path that can
 * widen a role; sync writes from the bot never do.
 */

import chalk from 'chalk';
import {
  closeDatabase,
  createGatewayServices,
  openDatabase,
  type DatabaseConnection,
  type TelegramUser,
} from '@adsync/core';
import { createServiceLogger, type Logger } from '@adsync/utils';
import { loadConfig, type CliOptions } from '../config/index.js';
import { describeError, printError, printSuccess } from '../lib/output.js';

export function setRole(
  db: DatabaseConnection,
  telegramId: string,
  role: string,
  logger: Logger,
): Promise<TelegramUser> {
  return createGatewayServices(db, { logger }).users.changeRole(telegramId, role);
}

export async function setRoleCommand(telegramId: string, role: string, options: CliOptions): Promise<void> {
  const config = loadConfig(options);
  const logger = createServiceLogger({ service: 'adsync-cli', level: config.logLevel, env: config.nodeEnv });

  let db: DatabaseConnection | undefined;
  try {
    db = openDatabase(config.databasePath);
    const user = await setRole(db, telegramId, role, logger);
    printSuccess(`${user.telegramId} (${user.username || user.firstName || 'no name'}) is now ${chalk.bold(user.role)}`);
  } catch (error) {
    printError(describeError(error));
    process.exitCode = 1;
  } finally {
    if (db) closeDatabase(db);
  }
}
