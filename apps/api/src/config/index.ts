/**
 * API Configuration
 *
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

/**
 * Load .env from monorepo root. Variables already set win.
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

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TRUST_PROXY: z.string().transform(v => v === 'true').default('false'),

  // Database
  DATABASE_PATH: z.string().default('./data/adsync.db'),

  // Security
  BOT_API_KEY: z
    .string({ required_error: 'BOT_API_KEY is required' })
    .min(16, 'BOT_API_KEY must be at least 16 characters'),

  // Limits
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),

  // Features
  ENABLE_SWAGGER: z.string().transform(v => v === 'true').default('false'),
});

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment configuration:\n${issues.map((issue) => `  ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface ApiConfig {
  nodeEnv: 'development' | 'production' | 'test';
  host: string;
  port: number;
  logLevel: string;
  trustProxy: boolean;
  databasePath: string;
  apiKey: string;
  bodyLimit: number;
  enableSwagger: boolean;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    throw new ConfigError(
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const env = parseResult.data;

  return {
    nodeEnv: env.NODE_ENV,
    host: env.API_HOST,
    port: env.API_PORT,
    logLevel: env.LOG_LEVEL,
    trustProxy: env.TRUST_PROXY,
    databasePath: env.DATABASE_PATH === ':memory:' ? env.DATABASE_PATH : resolvePath(env.DATABASE_PATH),
    apiKey: env.BOT_API_KEY,
    bodyLimit: env.BODY_LIMIT_BYTES,
    enableSwagger: env.ENABLE_SWAGGER,
  };
}
