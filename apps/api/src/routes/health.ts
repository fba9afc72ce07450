/**
 * Health Routes
 *
 * Liveness and readiness probes. No authentication.
 */

import type { FastifyPluginAsync } from 'fastify';

export interface HealthRouteOptions {
  service: string;
  checkDatabase: () => boolean;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, options) => {
  // Basic liveness probe (fast, always returns 200 if running)
  fastify.get('/', {
    schema: {
      description: 'Basic liveness check',
      tags: ['Health'],
    },
  }, async () => {
    return { ok: true, service: options.service };
  });

  // Readiness probe: the database must answer
  fastify.get('/ready', {
    schema: {
      description: 'Readiness check with database status',
      tags: ['Health'],
    },
  }, async (_request, reply) => {
    const database = options.checkDatabase();
    return reply.status(database ? 200 : 503).send({
      ok: database,
      service: options.service,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      checks: { database: database ? 'pass' : 'fail' },
    });
  });
};
