/**
 * Local Durable Log
 *
 * The producing side's copy of every entity kind, kept as JSON files in one
 * directory. The administrative import reads the same files.
 */

import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from '@adsync/utils';
import { USER_ROLES, type TelegramUser } from '../types/user.js';
import { AD_SOURCE_TYPES, AD_STATUSES, type AdItem } from '../types/ad.js';
import type { UserAction } from '../types/action.js';
import { JsonAppendLog, JsonFileStore } from './jsonFileStore.js';

export const LOCAL_LOG_FILES = {
  users: 'auth_users.json',
  ads: 'ads_feed.json',
  actions: 'users_log.json',
} as const;

/** Older actions are dropped from the local log beyond this many. */
export const ACTION_LOG_LIMIT = 1000;

const nullableDate = z.coerce.date().nullable();
const rawPayload = z.record(z.unknown());

export const storedUserSchema = z.object({
  telegramId: z.number().int(),
  username: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  languageCode: z.string(),
  phoneNumber: z.string(),
  avatarFileId: z.string(),
  role: z.enum(USER_ROLES),
  isAuthenticated: z.boolean(),
  authenticatedAt: nullableDate,
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export const storedAdSchema = z.object({
  adId: z.string().min(1),
  sourceType: z.enum(AD_SOURCE_TYPES),
  externalId: z.string(),
  title: z.string(),
  category: z.string(),
  price: z.number().int(),
  year: z.number().int().nullable(),
  details: z.string(),
  location: z.string(),
  image: z.string(),
  status: z.enum(AD_STATUSES),
  authorTelegramId: z.number().int().nullable(),
  authorUsername: z.string(),
  authorFirstName: z.string(),
  authorLastName: z.string(),
  createdAtRemote: nullableDate,
  rawPayload,
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export const storedActionSchema = z.object({
  id: z.number().int().positive(),
  telegramId: z.number().int(),
  username: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  action: z.string(),
  details: z.string(),
  createdAt: z.coerce.date(),
  rawPayload,
});

export interface LocalLog {
  users: JsonFileStore<TelegramUser, number>;
  ads: JsonFileStore<AdItem, string>;
  actions: JsonAppendLog<UserAction>;
}

export function openLocalLog(dataDir: string, logger?: Logger): LocalLog {
  return {
    users: new JsonFileStore<TelegramUser, number>({
      name: 'TelegramUser',
      filePath: join(dataDir, LOCAL_LOG_FILES.users),
      schema: storedUserSchema,
      keyOf: (user) => user.telegramId,
      logger,
    }),
    ads: new JsonFileStore<AdItem, string>({
      name: 'AdItem',
      filePath: join(dataDir, LOCAL_LOG_FILES.ads),
      schema: storedAdSchema,
      keyOf: (ad) => ad.adId,
      logger,
    }),
    actions: new JsonAppendLog<UserAction>({
      name: 'UserAction',
      filePath: join(dataDir, LOCAL_LOG_FILES.actions),
      schema: storedActionSchema,
      maxEntries: ACTION_LOG_LIMIT,
      build: (input, id) => ({ ...input, id }),
      logger,
    }),
  };
}
