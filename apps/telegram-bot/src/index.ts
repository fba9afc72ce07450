/**
 * Telegram Bot Entry Point
 *
 * Keeps its own JSON log of users, actions and ads and forwards every write
 * to the sync gateway when one is configured.
 */

import { Bot, GrammyError, HttpError } from 'grammy';
import { request } from 'undici';
import { logger as bootLogger } from '@adsync/utils';
import { ConfigError, loadConfig, loadEnvFile, type BotConfig } from './config.js';
import { registerCommands } from './commands/index.js';
import { createBotLogger } from './lib/logger.js';
import { SyncGatewayClient } from './lib/syncGatewayClient.js';
import { createBotServices } from './services/index.js';

function telegramFileDownloader(config: BotConfig) {
  return async (filePath: string): Promise<string> => {
    const { statusCode, body } = await request(
      `https://api.telegram.org/file/bot${config.botToken}/${filePath}`,
      { signal: AbortSignal.timeout(30_000) },
    );
    const text = await body.text();
    if (statusCode >= 400) {
      throw new Error(`File download failed with status ${statusCode}`);
    }
    return text;
  };
}

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const logger = createBotLogger(config);

  logger.info('Starting Telegram bot...');

  const gateway = config.sync.enabled
    ? new SyncGatewayClient({
      baseUrl: config.sync.backendUrl,
      apiKey: config.sync.apiKey,
      timeoutMs: config.sync.timeoutMs,
    })
    : null;

  if (!gateway) {
    logger.warn('SYNC_BACKEND_URL or SYNC_API_KEY not set, writes stay local');
  }

  const services = createBotServices({
    dataDir: config.dataDir,
    adminIds: config.adminIds,
    gateway,
    forwardTimeoutMs: config.sync.timeoutMs,
    logger,
  });

  const bot = new Bot(config.botToken);

  registerCommands(bot, {
    services,
    webAppUrl: config.webAppUrl,
    downloadFile: telegramFileDownloader(config),
    logger,
  });

  // Error handling
  bot.catch((err) => {
    const ctx = err.ctx;
    const e = err.error;
    if (e instanceof GrammyError) {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Error in request');
    } else if (e instanceof HttpError) {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Could not contact Telegram');
    } else {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Unknown error');
    }
  });

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down bot...');
      bot.stop()
        .then(() => services.coordinator.flush())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }

  // Start bot
  await bot.start({
    onStart: (botInfo) => {
      logger.info({
        username: botInfo.username,
        admins: config.adminIds.length,
        syncEnabled: config.sync.enabled,
        dataDir: config.dataDir,
      }, 'Bot started');
    },
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    bootLogger.fatal({ issues: error.issues }, 'Invalid configuration');
  } else {
    bootLogger.fatal({ err: error }, 'Fatal error');
  }
  process.exit(1);
});
