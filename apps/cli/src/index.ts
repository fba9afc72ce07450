#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Administrative commands that work directly on the gateway database.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadEnvFile } from './config/index.js';
import { importCommand } from './commands/import.js';
import { setRoleCommand } from './commands/setRole.js';

loadEnvFile();

const program = new Command();

program
  .name('adsync')
  .description('Administration for the bot and backend sync store')
  .version('1.0.0');

// ============================================
// DATA COMMANDS
// ============================================

program
  .command('import')
  .description('Load the bot\'s local JSON log into the database')
  .option('-d, --data-dir <dir>', 'Directory holding auth_users.json, users_log.json and ads_feed.json')
  .option('--database <path>', 'SQLite database file (default: DATABASE_PATH)')
  .action(importCommand);

// ============================================
// USER COMMANDS
// ============================================

program
  .command('set-role <telegramId> <role>')
  .description('Change the role of a known user (user, leasing_company, admin)')
  .option('--database <path>', 'SQLite database file (default: DATABASE_PATH)')
  .action(setRoleCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('adsync --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
