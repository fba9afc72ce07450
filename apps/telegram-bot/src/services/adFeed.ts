/**
 * Ad Feed
 *
 * Ad mutations coming from the web app and from admin imports. Each one is
 * authorized and applied against the local log with the same service the
 * gateway runs, then forwarded with the same wire payload so the gateway
 * re-checks it against its own copy.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  summarizeBulk,
  type AdItem,
  type AdService,
  type BulkItemOutcome,
  type BulkSummary,
  type UpsertOutcome,
} from '@adsync/core';
import type { SyncGateway } from '../lib/syncGatewayClient.js';
import type { DualWriteCoordinator } from '../sync/dualWrite.js';
import type { UserRegistry } from './userRegistry.js';
import type { TelegramProfile } from './types.js';

const adFields = z.record(z.unknown());

/**
 * JSON the web app sends back through `web_app_data`.
 */
export const webAppCommandSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('new_ad'), ad: adFields }),
  z.object({ action: z.literal('update_ad'), ad_id: z.union([z.string(), z.number()]), updates: adFields }),
  z.object({ action: z.literal('delete_ad'), ad_id: z.union([z.string(), z.number()]) }),
]);

export type WebAppCommand = z.infer<typeof webAppCommandSchema>;

export interface AdImportResult extends BulkSummary {
  outcomes: BulkItemOutcome<AdItem>[];
}

export interface AdFeedOptions {
  ads: AdService;
  registry: UserRegistry;
  coordinator: DualWriteCoordinator;
  gateway: SyncGateway | null;
  newId?: () => string;
}

export class AdFeed {
  private readonly newId: () => string;

  constructor(private readonly options: AdFeedOptions) {
    this.newId = options.newId ?? randomUUID;
  }

  /**
   * Publish a new ad authored by the requester.
   */
  async create(profile: TelegramProfile, fields: Record<string, unknown>): Promise<UpsertOutcome<AdItem>> {
    const payload = {
      ...fields,
      id: fields['id'] ?? fields['ad_id'] ?? this.newId(),
      source_type: fields['source_type'] ?? 'manual',
      author: {
        id: profile.id,
        username: profile.username ?? '',
        first_name: profile.first_name,
        last_name: profile.last_name ?? '',
      },
      ...(await this.actorFields(profile.id)),
    };

    return this.options.coordinator.write(
      `ad upsert ${String(payload.id)}`,
      () => this.options.ads.upsert(payload),
      async () => this.options.gateway?.upsertAd(payload),
    );
  }

  async update(profile: TelegramProfile, adId: string | number, updates: Record<string, unknown>): Promise<AdItem> {
    const payload = { ad_id: adId, updates, ...(await this.actorFields(profile.id)) };

    return this.options.coordinator.write(
      `ad update ${adId}`,
      () => this.options.ads.update(payload),
      async () => this.options.gateway?.updateAd(payload),
    );
  }

  async delete(profile: TelegramProfile, adId: string | number): Promise<string> {
    const payload = { ad_id: adId, ...(await this.actorFields(profile.id)) };

    return this.options.coordinator.write(
      `ad delete ${adId}`,
      () => this.options.ads.delete(payload),
      async () => this.options.gateway?.deleteAd(payload),
    );
  }

  /**
   * Bulk-upsert a feed of ads. A non-list feed fails before anything is
   * written; per-item failures are reported in the result.
   */
  async importFeed(profile: TelegramProfile, items: unknown): Promise<AdImportResult> {
    const payload = { items, ...(await this.actorFields(profile.id)) };

    const outcomes = await this.options.coordinator.write(
      `ad import by ${profile.id}`,
      () => this.options.ads.bulkUpsert(payload),
      async () => this.options.gateway?.bulkUpsertAds(payload),
    );
    return { ...summarizeBulk(outcomes), outcomes };
  }

  async run(profile: TelegramProfile, command: WebAppCommand): Promise<string> {
    switch (command.action) {
      case 'new_ad': {
        const { entity, created } = await this.create(profile, command.ad);
        return created ? `Ad "${entity.title}" published.` : `Ad "${entity.title}" updated.`;
      }
      case 'update_ad': {
        const ad = await this.update(profile, command.ad_id, command.updates);
        return `Ad "${ad.title}" updated.`;
      }
      case 'delete_ad': {
        const adId = await this.delete(profile, command.ad_id);
        return `Ad ${adId} deleted.`;
      }
    }
  }

  private async actorFields(telegramId: number) {
    return {
      actor_telegram_id: telegramId,
      actor_role: await this.options.registry.currentRole(telegramId),
    };
  }
}
