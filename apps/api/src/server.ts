/**
 * Fastify Server Factory
 *
 * The Sync Gateway answers JSON only. The database and services are built
 * by the caller and handed in.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { Logger } from '@adsync/utils';

import type { ApiConfig } from './config/index.js';
import { errorHandler } from './plugins/errorHandler.js';
import { authenticate } from './plugins/authenticate.js';
import {
  healthRoutes,
  userRoutes,
  actionRoutes,
  adRoutes,
  type SyncServices,
} from './routes/index.js';

export interface CreateServerOptions {
  config: ApiConfig;
  services: SyncServices;
  logger: Logger;
  /** Readiness probe for the database. */
  checkDatabase?: () => boolean;
}

/**
 * OpenAPI description and UI under /docs. The UI serves its own scripts and
 * styles, so it runs without the gateway's CSP.
 */
async function registerDocs(server: FastifyInstance): Promise<void> {
  await server.register(swagger, {
    openapi: {
      info: {
        title: 'adsync Sync Gateway',
        description: 'User, action and ad synchronization for the Telegram bot',
        version: '1.0.0',
      },
      components: {
        securitySchemes: {
          apiKey: { type: 'apiKey', name: 'X-API-Key', in: 'header' },
        },
      },
      security: [{ apiKey: [] }],
    },
  });
  await server.register(swaggerUi, { routePrefix: '/docs' });
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config, services } = options;
  const logger: FastifyBaseLogger = options.logger;

  const server = Fastify({
    logger,
    trustProxy: config.trustProxy,
    requestTimeout: 30000,
    bodyLimit: config.bodyLimit,
    ignoreTrailingSlash: true,
  });

  // Nothing here is rendered by a browser
  await server.register(helmet, {
    contentSecurityPolicy: config.enableSwagger
      ? false
      : { useDefaults: false, directives: { defaultSrc: ["'none'"], frameAncestors: ["'none'"] } },
  });

  await server.register(authenticate, { apiKey: config.apiKey });

  if (config.enableSwagger) {
    await registerDocs(server);
  }

  await server.register(errorHandler, {
    exposeInternalErrors: config.nodeEnv !== 'production',
  });

  await server.register(healthRoutes, {
    prefix: '/health',
    service: 'adsync-api',
    checkDatabase: options.checkDatabase ?? (() => true),
  });
  await server.register(userRoutes, { prefix: '/api/users', services });
  await server.register(actionRoutes, { prefix: '/api/actions', services });
  await server.register(adRoutes, { prefix: '/api/ads', services });

  return server;
}

export { loadConfig, loadEnvFile, ConfigError, type ApiConfig } from './config/index.js';
export type { SyncServices } from './routes/index.js';
