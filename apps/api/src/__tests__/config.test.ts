import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ BOT_API_KEY: 'test-secret-key-0000' });

    expect(config).toMatchObject({
      nodeEnv: 'development',
      host: '0.0.0.0',
      port: 8000,
      logLevel: 'info',
      trustProxy: false,
      enableSwagger: false,
      bodyLimit: 5 * 1024 * 1024,
      apiKey: 'test-secret-key-0000',
    });
    expect(config.databasePath).toMatch(/data[\\/]adsync\.db$/);
  });

  it('parses numbers and flags', () => {
    const config = loadConfig({
      BOT_API_KEY: 'test-secret-key-0000',
      API_PORT: '9001',
      TRUST_PROXY: 'true',
      ENABLE_SWAGGER: 'true',
      DATABASE_PATH: '/var/lib/adsync/sync.db',
    });

    expect(config.port).toBe(9001);
    expect(config.trustProxy).toBe(true);
    expect(config.enableSwagger).toBe(true);
    expect(config.databasePath).toBe('/var/lib/adsync/sync.db');
  });

  it('requires an API key of at least 16 characters', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);

    try {
      loadConfig({ BOT_API_KEY: 'short' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ issues: ['BOT_API_KEY: BOT_API_KEY must be at least 16 characters'] });
    }
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ BOT_API_KEY: 'test-secret-key-0000', API_PORT: 'http' })).toThrow(ConfigError);
  });
});
