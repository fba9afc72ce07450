/**
 * User Routes
 *
 * Registration upsert and role lookup for the bot.
 */

import type { FastifyPluginAsync } from 'fastify';
import { parseTelegramId } from '@adsync/core';
import type { SyncRouteOptions } from './types.js';

export const userRoutes: FastifyPluginAsync<SyncRouteOptions> = async (fastify, { services }) => {
  fastify.addHook('onRequest', fastify.authenticateApiKey);

  /**
   * Create or update a user. A wider role than the stored one is ignored.
   */
  fastify.post('/upsert/', {
    schema: {
      description: 'Create or update a Telegram user',
      tags: ['Users'],
      security: [{ apiKey: [] }],
    },
  }, async (request, reply) => {
    const { entity, created } = await services.users.upsert(request.body);

    return reply.status(created ? 201 : 200).send({
      ok: true,
      created,
      telegram_id: entity.telegramId,
      role: entity.role,
    });
  });

  /**
   * Current role of a user
   */
  fastify.get<{ Params: { telegramId: string } }>('/:telegramId/role/', {
    schema: {
      description: 'Read the stored role of a Telegram user',
      tags: ['Users'],
      security: [{ apiKey: [] }],
    },
  }, async (request) => {
    const telegramId = parseTelegramId(request.params.telegramId);
    const role = await services.users.getRole(telegramId);

    return { ok: true, telegram_id: telegramId, role };
  });
};
