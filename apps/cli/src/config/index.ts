/**
 * CLI Configuration
 *
 * Command options win over the environment; relative paths from the
 * environment resolve against the monorepo root like the other apps.
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

export function loadEnvFile(): void {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
}

function resolvePath(p: string): string {
  if (p === ':memory:') return p;
  return resolve(monorepoRoot, p);
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  DATABASE_PATH: z.string().min(1).default('./data/adsync.db'),
  BOT_DATA_DIR: z.string().min(1).default('./data/bot'),
});

export interface CliOptions {
  database?: string;
  dataDir?: string;
}

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  databasePath: string;
  dataDir: string;
}

export function loadConfig(options: CliOptions = {}, source: NodeJS.ProcessEnv = process.env): CliConfig {
  const env = envSchema.parse(source);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    databasePath: options.database ? resolve(options.database) : resolvePath(env.DATABASE_PATH),
    dataDir: options.dataDir ? resolve(options.dataDir) : resolvePath(env.BOT_DATA_DIR),
  };
}
