import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

const base = { TELEGRAM_BOT_TOKEN: 'test-token' };

describe('loadConfig', () => {
  it('keeps sync disabled unless both url and key are set', () => {
    expect(loadConfig(base).sync.enabled).toBe(false);
    expect(loadConfig({ ...base, SYNC_BACKEND_URL: 'http://localhost:8000' }).sync.enabled).toBe(false);

    const config = loadConfig({
      ...base,
      SYNC_BACKEND_URL: 'http://localhost:8000/',
      SYNC_API_KEY: 'test-secret-key-0000',
    });
    expect(config.sync).toEqual({
      enabled: true,
      backendUrl: 'http://localhost:8000',
      apiKey: 'test-secret-key-0000',
      timeoutMs: 5000,
    });
  });

  it('parses admin ids and keeps absolute data dirs', () => {
    const config = loadConfig({ ...base, TELEGRAM_ADMIN_IDS: '1, 2,,3', BOT_DATA_DIR: '/var/lib/adsync-bot' });

    expect(config.adminIds).toEqual([1, 2, 3]);
    expect(config.dataDir).toBe('/var/lib/adsync-bot');
  });

  it('reports every invalid variable', () => {
    const error = (() => {
      try {
        loadConfig({ TELEGRAM_ADMIN_IDS: 'abc' });
      } catch (caught) {
        return caught;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      issues: [
        'TELEGRAM_BOT_TOKEN: TELEGRAM_BOT_TOKEN is required',
        'TELEGRAM_ADMIN_IDS: "abc" is not a Telegram user id',
      ],
    });
  });
});
