import { createServiceLogger } from '@adsync/utils';
import { openDatabase, type DatabaseConnection } from '../db/client.js';
import { AdItemRepository, UserActionRepository, UserRepository } from '../db/repositories/index.js';
import { UpsertEngine } from '../services/upsertEngine.js';
import type { AdItem } from '../types/ad.js';
import type { TelegramUser } from '../types/user.js';

export const NOW = new Date('2024-05-01T12:00:00.000Z');

export const silentLogger = createServiceLogger({ service: 'test', level: 'silent', pretty: false });

export interface TestStores {
  db: DatabaseConnection;
  users: UserRepository;
  ads: AdItemRepository;
  actions: UserActionRepository;
  engine: UpsertEngine;
}

/**
 * Fresh in-memory database with repositories and an engine on a fixed clock.
 */
export function setupStores(now: () => Date = () => NOW): TestStores {
  const db = openDatabase(':memory:');
  const users = new UserRepository(db);
  const ads = new AdItemRepository(db);
  const actions = new UserActionRepository(db);
  const engine = new UpsertEngine({ users, ads }, { now, logger: silentLogger });
  return { db, users, ads, actions, engine };
}

export function adPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'ad-1',
    title: 'Tractor MTZ-82',
    category: 'tractors',
    price: 1500,
    author: { id: 42, username: 'alice', first_name: 'Alice', last_name: '' },
    ...overrides,
  };
}

export function makeUser(overrides: Partial<TelegramUser> = {}): TelegramUser {
  return {
    telegramId: 42,
    username: 'alice',
    firstName: 'Alice',
    lastName: '',
    languageCode: 'en',
    phoneNumber: '',
    avatarFileId: '',
    role: 'user',
    isAuthenticated: false,
    authenticatedAt: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function makeAd(overrides: Partial<AdItem> = {}): AdItem {
  return {
    adId: 'ad-1',
    sourceType: 'manual',
    externalId: '',
    title: 'Tractor MTZ-82',
    category: 'tractors',
    price: 1500,
    year: 2015,
    details: '',
    location: 'Tashkent',
    image: '',
    status: 'active',
    createdAtRemote: null,
    authorTelegramId: 42,
    authorUsername: 'alice',
    authorFirstName: 'Alice',
    authorLastName: '',
    rawPayload: {},
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}
