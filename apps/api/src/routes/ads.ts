/**
 * Ad Routes
 *
 * Authorized ad mutations. Each request declares its actor
 * (`actor_telegram_id`, `actor_role`); ownership of an existing ad is always
 * read from the database.
 */

import type { FastifyPluginAsync } from 'fastify';
import { summarizeBulk, type AdItem, type BulkItemOutcome } from '@adsync/core';
import type { SyncRouteOptions } from './types.js';

function toBulkResult(outcome: BulkItemOutcome<AdItem>) {
  return outcome.ok
    ? { index: outcome.index, ok: true, ad_id: outcome.entity.adId, created: outcome.created }
    : { index: outcome.index, ok: false, kind: outcome.kind, error: outcome.message };
}

export const adRoutes: FastifyPluginAsync<SyncRouteOptions> = async (fastify, { services }) => {
  fastify.addHook('onRequest', fastify.authenticateApiKey);

  /**
   * Create or replace one ad
   */
  fastify.post('/upsert/', {
    schema: {
      description: 'Create or replace an ad on behalf of the declared actor',
      tags: ['Ads'],
      security: [{ apiKey: [] }],
    },
  }, async (request, reply) => {
    const { entity, created } = await services.ads.upsert(request.body);
    return reply.status(created ? 201 : 200).send({ ok: true, created, ad_id: entity.adId });
  });

  /**
   * Upsert a list of ads; failures are reported per item
   */
  fastify.post('/bulk-upsert/', {
    schema: {
      description: 'Upsert many ads with per-item results',
      tags: ['Ads'],
      security: [{ apiKey: [] }],
    },
  }, async (request) => {
    const outcomes = await services.ads.bulkUpsert(request.body);
    const summary = summarizeBulk(outcomes);

    request.log.info(summary, 'Bulk ad upsert finished');

    return {
      ok: true,
      ...summary,
      results: outcomes.map(toBulkResult),
    };
  });

  /**
   * Partial update of an existing ad
   */
  fastify.post('/update/', {
    schema: {
      description: 'Update fields of an existing ad',
      tags: ['Ads'],
      security: [{ apiKey: [] }],
    },
  }, async (request) => {
    const ad = await services.ads.update(request.body);
    return { ok: true, ad_id: ad.adId };
  });

  /**
   * Remove an ad
   */
  fastify.post('/delete/', {
    schema: {
      description: 'Delete an existing ad',
      tags: ['Ads'],
      security: [{ apiKey: [] }],
    },
  }, async (request) => {
    const adId = await services.ads.delete(request.body);
    return { ok: true, ad_id: adId };
  });
};
