/**
 * Ad Service
 *
 * Authorized ad mutations. Every mutation of an existing ad is checked
 * against the author stored with it, never against an author claimed by the
 * request. The bot runs this over its JSON log and the gateway over SQLite,
 * so both sides decide with the same evaluator.
 */

import { isObject } from '@adsync/utils';
import { NotFoundError } from '../errors/index.js';
import { assertAllowed } from '../permissions.js';
import type { RemovableStore } from '../store/types.js';
import type { AdAuthor, AdItem } from '../types/ad.js';
import {
  parseActor,
  parseAdKey,
  parseAdPayload,
  parseAdUpdates,
  splitActor,
  type Actor,
} from '../validation/payloads.js';
import { bulkApply, type BulkItemOutcome } from './bulkUpsert.js';
import type { UpsertEngine, UpsertOutcome } from './upsertEngine.js';

/**
 * Author recorded for an ad the actor creates. Admins may create on behalf
 * of someone else (or of nobody, as imports do); everyone else owns what
 * they create.
 */
function authorForCreate(actor: Actor, claimed: AdAuthor): AdAuthor {
  if (actor.role === 'admin') {
    return claimed;
  }
  if (claimed.telegramId === actor.telegramId) {
    return claimed;
  }
  return { telegramId: actor.telegramId, username: '', firstName: '', lastName: '' };
}

export class AdService {
  constructor(
    private readonly engine: UpsertEngine,
    private readonly ads: RemovableStore<AdItem, string>,
  ) {}

  /**
   * Create or replace one ad on behalf of the actor declared in the payload.
   */
  async upsert(payload: unknown): Promise<UpsertOutcome<AdItem>> {
    const { actor, body } = splitActor(payload);
    return this.upsertAs(actor, body);
  }

  /**
   * `{ actor_telegram_id, actor_role, items: [...] }`. A missing actor or a
   * non-list `items` fails the whole request, anything else fails per item.
   */
  async bulkUpsert(payload: unknown): Promise<BulkItemOutcome<AdItem>[]> {
    const { actor, body } = splitActor(payload);
    return bulkApply(body['items'], (item) => this.upsertAs(actor, item));
  }

  async upsertAs(actor: Actor, payload: unknown): Promise<UpsertOutcome<AdItem>> {
    const input = parseAdPayload(payload);
    const existing = await this.ads.get(input.adId);

    if (existing) {
      assertAllowed(actor.role, actor.telegramId, existing.authorTelegramId, 'update');
    } else {
      assertAllowed(actor.role, actor.telegramId, null, 'create');
    }

    // The engine keeps the stored author when the row is still there.
    return this.engine.applyAd(input, { author: authorForCreate(actor, input.author) });
  }

  /**
   * `{ ad_id, actor_telegram_id, actor_role, updates }`. Author fields in
   * `updates` are ignored.
   */
  async update(payload: unknown): Promise<AdItem> {
    const adId = parseAdKey(payload);
    const actor = parseActor(payload);
    const existing = await this.load(adId);

    assertAllowed(actor.role, actor.telegramId, existing.authorTelegramId, 'update');

    const updates = isObject(payload) ? payload['updates'] : undefined;
    const patch = parseAdUpdates(updates);
    const { entity } = await this.engine.updateAd(existing, patch, isObject(updates) ? updates : {});
    return entity;
  }

  async delete(payload: unknown): Promise<string> {
    const adId = parseAdKey(payload);
    const actor = parseActor(payload);
    const existing = await this.load(adId);

    assertAllowed(actor.role, actor.telegramId, existing.authorTelegramId, 'delete');

    if (!(await this.ads.remove(adId))) {
      throw new NotFoundError('AdItem', adId);
    }
    return adId;
  }

  private async load(adId: string): Promise<AdItem> {
    const existing = await this.ads.get(adId);
    if (!existing) {
      throw new NotFoundError('AdItem', adId);
    }
    return existing;
  }
}
