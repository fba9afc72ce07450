import type { FastifyInstance } from 'fastify';
import { createServiceLogger } from '@adsync/utils';
import { loadConfig, type ApiConfig } from '../config/index.js';

export const API_KEY = 'test-secret-key-0000';

export const silentLogger = createServiceLogger({ service: 'test', level: 'silent', pretty: false });

export function testConfig(overrides: NodeJS.ProcessEnv = {}): ApiConfig {
  return loadConfig({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    DATABASE_PATH: ':memory:',
    BOT_API_KEY: API_KEY,
    ...overrides,
  });
}

export function post(server: FastifyInstance, url: string, payload: object, apiKey: string | null = API_KEY) {
  return server.inject({
    method: 'POST',
    url,
    payload,
    headers: apiKey === null ? {} : { 'x-api-key': apiKey },
  });
}
