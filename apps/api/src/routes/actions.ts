import type { FastifyPluginAsync } from 'fastify';
import type { SyncRouteOptions } from './types.js';

/**
 * Append-only user action log.
 */
export const actionRoutes: FastifyPluginAsync<SyncRouteOptions> = async (fastify, { services }) => {
  fastify.addHook('onRequest', fastify.authenticateApiKey);

  fastify.post('/', {
    schema: {
      description: 'Record a user action',
      tags: ['Actions'],
      security: [{ apiKey: [] }],
    },
  }, async (request, reply) => {
    const action = await services.actions.record(request.body);
    return reply.status(201).send({ ok: true, id: action.id });
  });
};
