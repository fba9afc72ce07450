/**
 * Import Command
 *
 * Loads the bot's local log into the database: users with their logged
 * role, actions appended in log order, ads through the bulk orchestrator.
 * Each entity is applied on its own; a bad entry is reported and skipped.
 * Actions have no natural key, so importing the same log twice appends
 * them twice.
 */

import ora from 'ora';
import {
  bulkApply,
  closeDatabase,
  createGatewayServices,
  openDatabase,
  openLocalLog,
  summarizeBulk,
  toErrorResult,
  LOCAL_LOG_FILES,
  UserActionRepository,
  type AdInput,
  type AdItem,
  type BulkItemOutcome,
  type DatabaseConnection,
  type TelegramUser,
  type UpsertOutcome,
  type UserAction,
} from '@adsync/core';
import { createServiceLogger, type Logger } from '@adsync/utils';
import { loadConfig, type CliOptions } from '../config/index.js';
import {
  describeError,
  printError,
  printFileSummary,
  printHeader,
  printKeyValue,
  type FileSummary,
} from '../lib/output.js';

/** `error` is set when the file itself could not be read. */
export type FileReport = FileSummary;

export interface ImportOptions {
  dataDir: string;
  db: DatabaseConnection;
  logger: Logger;
  now?: () => Date;
}

function toReport<T>(file: string, outcomes: BulkItemOutcome<T>[]): FileReport {
  return {
    file,
    ...summarizeBulk(outcomes),
    failures: outcomes.flatMap((outcome) => (
      outcome.ok ? [] : [{ index: outcome.index, message: outcome.message }]
    )),
  };
}

function unreadable(file: string, error: unknown): FileReport {
  return { file, created: 0, updated: 0, failed: 0, failures: [], error: toErrorResult(error).message };
}

async function importFile<I, T>(
  file: string,
  read: () => Promise<I[]>,
  apply: (item: I) => Promise<UpsertOutcome<T>>,
): Promise<FileReport> {
  let items: I[];
  try {
    items = await read();
  } catch (error) {
    return unreadable(file, error);
  }

  const loaded = items;
  return toReport(file, await bulkApply(loaded, (_raw, index) => apply(loaded[index])));
}

export async function importLocalLog(options: ImportOptions): Promise<FileReport[]> {
  const { db, logger, now } = options;
  const log = openLocalLog(options.dataDir, logger);
  const { engine } = createGatewayServices(db, { logger, now });
  const actions = new UserActionRepository(db);

  return [
    // The logged role is authoritative here, widening included
    await importFile(LOCAL_LOG_FILES.users, () => log.users.list(), (user: TelegramUser) => (
      engine.applyUser(user, { roleChange: 'explicit' })
    )),
    // Oldest first so database ids follow log order
    await importFile(LOCAL_LOG_FILES.actions, () => log.actions.list(), async ({ id: _localId, ...input }: UserAction) => (
      { entity: await actions.append(input), created: true }
    )),
    // Existing rows keep their author
    await importFile(LOCAL_LOG_FILES.ads, () => log.ads.list(), (ad: AdItem) => engine.applyAd(toAdInput(ad))),
  ];
}

function toAdInput(ad: AdItem): AdInput {
  return {
    adId: ad.adId,
    content: {
      sourceType: ad.sourceType,
      externalId: ad.externalId,
      title: ad.title,
      category: ad.category,
      price: ad.price,
      year: ad.year,
      details: ad.details,
      location: ad.location,
      image: ad.image,
      status: ad.status,
      createdAtRemote: ad.createdAtRemote,
    },
    author: {
      telegramId: ad.authorTelegramId,
      username: ad.authorUsername,
      firstName: ad.authorFirstName,
      lastName: ad.authorLastName,
    },
    rawPayload: ad.rawPayload,
  };
}

export async function importCommand(options: CliOptions): Promise<void> {
  const config = loadConfig(options);
  const logger = createServiceLogger({ service: 'adsync-cli', level: config.logLevel, env: config.nodeEnv });
  const spinner = ora(`Importing ${config.dataDir}...`).start();

  let db: DatabaseConnection | undefined;
  try {
    db = openDatabase(config.databasePath);
    const reports = await importLocalLog({ dataDir: config.dataDir, db, logger });
    spinner.stop();

    printHeader('Import');
    printKeyValue('Data dir', config.dataDir);
    printKeyValue('Database', config.databasePath);
    console.log();

    reports.forEach(printFileSummary);

    if (reports.some((report) => report.error || report.failed > 0)) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail('Import failed');
    printError(describeError(error));
    process.exitCode = 1;
  } finally {
    if (db) closeDatabase(db);
  }
}
