/**
 * Telegram Bot Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../..');

/**
 * Load .env from monorepo root
 */
export function loadEnvFile(): void {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
}

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

const idList = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const ids: number[] = [];
    for (const part of value.split(',').map((id) => id.trim()).filter(Boolean)) {
      const id = Number(part);
      if (!Number.isInteger(id) || id <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${part}" is not a Telegram user id` });
        return z.NEVER;
      }
      ids.push(id);
    }
    return ids;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string({ required_error: 'TELEGRAM_BOT_TOKEN is required' }).min(1),
  TELEGRAM_ADMIN_IDS: idList, // Comma-separated list of admin user IDs
  WEB_APP_URL: z.string().url().optional(),

  // Local durable log (relative to monorepo root)
  BOT_DATA_DIR: z.string().default('./data/bot'),

  // Sync Gateway; sync is on only when both are set
  SYNC_BACKEND_URL: z.string().url().optional(),
  SYNC_API_KEY: z.string().min(1).optional(),
  SYNC_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment configuration:\n${issues.map((issue) => `  ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface SyncSettings {
  enabled: boolean;
  backendUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export interface BotConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  botToken: string;
  adminIds: readonly number[];
  webAppUrl: string | undefined;
  dataDir: string;
  sync: SyncSettings;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): BotConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    throw new ConfigError(
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const env = parseResult.data;
  const backendUrl = env.SYNC_BACKEND_URL?.replace(/\/+$/, '') ?? '';
  const apiKey = env.SYNC_API_KEY ?? '';

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    botToken: env.TELEGRAM_BOT_TOKEN,
    adminIds: env.TELEGRAM_ADMIN_IDS,
    webAppUrl: env.WEB_APP_URL,
    dataDir: resolvePath(env.BOT_DATA_DIR),
    sync: {
      enabled: backendUrl !== '' && apiKey !== '',
      backendUrl,
      apiKey,
      timeoutMs: env.SYNC_TIMEOUT_MS,
    },
  };
}
