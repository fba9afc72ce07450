import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { UserRole } from '@adsync/core';
import { createServiceLogger } from '@adsync/utils';
import type { SyncGateway } from '../lib/syncGatewayClient.js';
import { createBotServices, type BotServices, type TelegramProfile } from '../services/index.js';

export const NOW = new Date('2024-05-01T12:00:00.000Z');

export const API_KEY = 'test-secret-key-0000';

export const silentLogger = createServiceLogger({ service: 'test', level: 'silent', pretty: false });

export const alice: TelegramProfile = { id: 42, username: 'alice', first_name: 'Alice' };
export const lessor: TelegramProfile = { id: 99, username: 'lessor', first_name: 'Lease', last_name: 'Co' };
export const admin: TelegramProfile = { id: 1, username: 'root', first_name: 'Admin' };

/**
 * In-process gateway double that accepts everything.
 */
export function fakeGateway() {
  return {
    upsertUser: vi.fn(async (payload: Record<string, unknown>) => ({
      created: true,
      telegram_id: Number(payload['telegram_id']),
      role: 'user' as const,
    })),
    getUserRole: vi.fn(async (_telegramId: number): Promise<UserRole | null> => null),
    recordAction: vi.fn(async (_payload: Record<string, unknown>) => ({ id: 1 })),
    upsertAd: vi.fn(async (payload: Record<string, unknown>) => ({ created: true, ad_id: String(payload['id']) })),
    bulkUpsertAds: vi.fn(async (_payload: Record<string, unknown>) => ({ created: 0, updated: 0, failed: 0, results: [] })),
    updateAd: vi.fn(async (payload: Record<string, unknown>) => ({ ad_id: String(payload['ad_id']) })),
    deleteAd: vi.fn(async (payload: Record<string, unknown>) => ({ ad_id: String(payload['ad_id']) })),
  } satisfies SyncGateway;
}

export type FakeGateway = ReturnType<typeof fakeGateway>;

export interface TestBot {
  dataDir: string;
  services: BotServices;
  cleanup: () => Promise<void>;
}

/**
 * Bot services over a fresh temp directory. Admin id 1, fixed clock, ad ids
 * generated as `ad-new`.
 */
export async function setupBot(gateway: SyncGateway | null): Promise<TestBot> {
  const dataDir = await mkdtemp(join(tmpdir(), 'adsync-bot-'));
  const services = createBotServices({
    dataDir,
    adminIds: [admin.id],
    gateway,
    forwardTimeoutMs: 200,
    logger: silentLogger,
    now: () => NOW,
    newAdId: () => 'ad-new',
  });

  return {
    dataDir,
    services,
    cleanup: async () => {
      await services.coordinator.flush();
      await rm(dataDir, { recursive: true, force: true });
    },
  };
}
