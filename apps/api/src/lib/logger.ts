/**
 * Pino Logger Instance
 *
 * Structured JSON logging for production observability.
 */

import { createServiceLogger, type Logger } from '@adsync/utils';
import type { ApiConfig } from '../config/index.js';

export function createApiLogger(config: Pick<ApiConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return createServiceLogger({
    service: 'adsync-api',
    level: config.logLevel,
    env: config.nodeEnv,
  });
}
