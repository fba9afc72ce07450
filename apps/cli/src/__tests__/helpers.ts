import { createServiceLogger } from '@adsync/utils';
import type { AdItem, TelegramUser, UserActionInput } from '@adsync/core';

export const NOW = new Date('2024-05-01T12:00:00.000Z');

export const silentLogger = createServiceLogger({ service: 'test', level: 'silent', pretty: false });

export function makeUser(overrides: Partial<TelegramUser> = {}): TelegramUser {
  return {
    telegramId: 42,
    username: 'alice',
    firstName: 'Alice',
    lastName: '',
    languageCode: 'en',
    phoneNumber: '+10000000042',
    avatarFileId: '',
    role: 'user',
    isAuthenticated: true,
    authenticatedAt: NOW,
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
    year: 1998,
    details: '',
    location: 'Minsk',
    image: '',
    status: 'active',
    authorTelegramId: 42,
    authorUsername: 'alice',
    authorFirstName: 'Alice',
    authorLastName: '',
    createdAtRemote: null,
    rawPayload: { id: 'ad-1', title: 'Tractor MTZ-82' },
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function makeAction(overrides: Partial<UserActionInput> = {}): UserActionInput {
  return {
    telegramId: 42,
    username: 'alice',
    firstName: 'Alice',
    lastName: '',
    action: 'start',
    details: '',
    createdAt: NOW,
    rawPayload: { action: 'start' },
    ...overrides,
  };
}
