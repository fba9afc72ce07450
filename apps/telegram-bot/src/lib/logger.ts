import { createServiceLogger, type Logger } from '@adsync/utils';
import type { BotConfig } from '../config.js';

export function createBotLogger(config: Pick<BotConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return createServiceLogger({
    service: 'adsync-telegram-bot',
    level: config.logLevel,
    env: config.nodeEnv,
  });
}
