/**
 * Upsert Engine
 *
 * Create-or-update by external key for users and ads. Validates the payload,
 * looks up the stored entity and either creates it or replaces its mutable
 * fields. Knows nothing about HTTP or files: the same engine runs over the
 * SQLite repositories and over the bot's JSON log.
 */

import type { Logger } from '@adsync/utils';
import { logger as coreLogger } from '../logger.js';
import { ROLE_RANK, type TelegramUser, type UserRole } from '../types/user.js';
import type { AdAuthor, AdItem } from '../types/ad.js';
import type { StoreAdapter, UpsertResult } from '../store/types.js';
import {
  parseAdPayload,
  parseUserPayload,
  type AdContentPatch,
  type AdInput,
  type UserInput,
} from '../validation/payloads.js';

export type UpsertOutcome<T> = UpsertResult<T>;

export interface EntityMap {
  user: TelegramUser;
  ad: AdItem;
}

export type EntityKind = keyof EntityMap;

export interface UpsertStores {
  users: StoreAdapter<TelegramUser, number>;
  ads: StoreAdapter<AdItem, string>;
}

export interface UpsertEngineOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * `sync`: a role in the payload may keep or narrow the stored role, a wider
 * one is ignored. `explicit`: the payload role replaces the stored one.
 */
export type RoleChange = 'sync' | 'explicit';

export interface UpsertUserOptions {
  roleChange?: RoleChange;
}

export interface UpsertAdOptions {
  /** Author to record when the ad is created. Ignored for existing ads. */
  author?: AdAuthor;
}

type UpsertHandlers = {
  [K in EntityKind]: (payload: unknown) => Promise<UpsertOutcome<EntityMap[K]>>;
};

export class UpsertEngine {
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly handlers: UpsertHandlers;

  constructor(
    private readonly stores: UpsertStores,
    options: UpsertEngineOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? coreLogger).child({ component: 'upsert-engine' });
    this.handlers = {
      user: (payload) => this.upsertUser(payload),
      ad: (payload) => this.upsertAd(payload),
    };
  }

  /**
   * Upsert any entity kind from its wire payload.
   */
  upsert<K extends EntityKind>(kind: K, payload: unknown): Promise<UpsertOutcome<EntityMap[K]>> {
    const handler: UpsertHandlers[K] = this.handlers[kind];
    return handler(payload);
  }

  async upsertUser(payload: unknown, options: UpsertUserOptions = {}): Promise<UpsertOutcome<TelegramUser>> {
    return this.applyUser(parseUserPayload(payload), options);
  }

  async upsertAd(payload: unknown, options: UpsertAdOptions = {}): Promise<UpsertOutcome<AdItem>> {
    return this.applyAd(parseAdPayload(payload), options);
  }

  /**
   * Upsert an already validated user.
   */
  async applyUser(input: UserInput, options: UpsertUserOptions = {}): Promise<UpsertOutcome<TelegramUser>> {
    const existing = await this.stores.users.get(input.telegramId);
    const now = this.now();

    const user: TelegramUser = {
      telegramId: input.telegramId,
      username: input.username,
      firstName: input.firstName,
      lastName: input.lastName,
      languageCode: input.languageCode,
      phoneNumber: input.phoneNumber,
      avatarFileId: input.avatarFileId,
      role: existing
        ? this.resolveRole(existing, input.role, options.roleChange ?? 'sync')
        : input.role ?? 'user',
      isAuthenticated: input.isAuthenticated,
      authenticatedAt: input.authenticatedAt,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    return this.stores.users.upsert(user);
  }

  /**
   * Upsert an already validated ad. Author fields and creation time of an
   * existing ad are kept whatever the payload says.
   */
  async applyAd(input: AdInput, options: UpsertAdOptions = {}): Promise<UpsertOutcome<AdItem>> {
    const existing = await this.stores.ads.get(input.adId);
    const now = this.now();
    const author = options.author ?? input.author;

    const ad: AdItem = {
      ...input.content,
      adId: input.adId,
      authorTelegramId: existing ? existing.authorTelegramId : author.telegramId,
      authorUsername: existing ? existing.authorUsername : author.username,
      authorFirstName: existing ? existing.authorFirstName : author.firstName,
      authorLastName: existing ? existing.authorLastName : author.lastName,
      rawPayload: input.rawPayload,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    return this.stores.ads.upsert(ad);
  }

  /**
   * Merge a cleaned partial update into a stored ad and write it back.
   * The update payload is kept under `rawPayload.last_update`.
   */
  async updateAd(
    existing: AdItem,
    patch: AdContentPatch,
    rawUpdate: Record<string, unknown>,
  ): Promise<UpsertOutcome<AdItem>> {
    const ad: AdItem = {
      ...existing,
      ...patch,
      rawPayload: { ...existing.rawPayload, last_update: rawUpdate },
      updatedAt: this.now(),
    };
    return this.stores.ads.upsert(ad);
  }

  private resolveRole(existing: TelegramUser, requested: UserRole | undefined, roleChange: RoleChange): UserRole {
    if (requested === undefined) {
      return existing.role;
    }
    if (roleChange === 'sync' && ROLE_RANK[requested] > ROLE_RANK[existing.role]) {
      this.log.info(
        { telegramId: existing.telegramId, stored: existing.role, requested },
        'Ignoring role widening from sync write'
      );
      return existing.role;
    }
    return requested;
  }
}
