/**
 * Authentication Plugin
 *
 * Pre-shared API key check for the bot. Registered routes add
 * `fastify.authenticateApiKey` as an onRequest hook, so a request with a
 * missing or wrong key is rejected before its body is parsed.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { AuthenticationError } from '@adsync/core';

declare module 'fastify' {
  interface FastifyInstance {
    authenticateApiKey: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

export interface AuthenticateOptions {
  apiKey: string;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Constant-time comparison. Hashing first gives equal-length buffers, so
 * the key length does not leak either.
 */
export function apiKeyMatches(provided: string, expectedDigest: Buffer): boolean {
  return timingSafeEqual(digest(provided), expectedDigest);
}

const authenticatePlugin: FastifyPluginAsync<AuthenticateOptions> = async (fastify, options) => {
  const expected = digest(options.apiKey);

  // API key only authentication
  fastify.decorate('authenticateApiKey', async (request: FastifyRequest, _reply: FastifyReply) => {
    const header = request.headers['x-api-key'];
    const apiKey = typeof header === 'string' ? header : undefined;

    if (!apiKey || !apiKeyMatches(apiKey, expected)) {
      throw new AuthenticationError();
    }
  });
};

export const authenticate = fp(authenticatePlugin, {
  name: 'authenticate',
});
