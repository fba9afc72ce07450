/**
 * Error Handler Plugin
 *
 * Global error handling for Fastify. Every failure leaves the gateway as
 * `{ ok: false, statusCode, error, kind, message, details? }` so the bot can
 * tell a retryable StoreUnavailable from a final PermissionDenied.
 */

import { STATUS_CODES } from 'node:http';
import type { FastifyPluginAsync, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { AdSyncError, type ResultKind } from '@adsync/core';

export interface ApiError {
  ok: false;
  statusCode: number;
  error: string;
  kind: ResultKind;
  message: string;
  details?: Record<string, unknown>;
}

export interface ErrorHandlerOptions {
  /** Hide messages of unexpected errors. */
  exposeInternalErrors: boolean;
}

function apiError(
  statusCode: number,
  kind: ResultKind,
  message: string,
  details?: Record<string, unknown>,
): ApiError {
  const body: ApiError = {
    ok: false,
    statusCode,
    error: STATUS_CODES[statusCode] ?? 'Error',
    kind,
    message,
  };
  return details ? { ...body, details } : body;
}

const errorHandlerPlugin: FastifyPluginAsync<ErrorHandlerOptions> = async (fastify, options) => {
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const { log } = request;

    // Domain errors from the sync core
    if (error instanceof AdSyncError) {
      const body = apiError(error.statusCode, error.kind, error.message, error.details);
      if (error.statusCode >= 500) {
        log.error({ err: error, kind: error.kind }, 'Store error');
      } else {
        log.warn({ kind: error.kind, message: error.message }, 'Request rejected');
      }
      return reply.status(error.statusCode).send(body);
    }

    // Zod validation errors
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'payload';
      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send(
        apiError(400, 'ValidationFailed', `Validation failed for ${field}: ${issue?.message ?? 'invalid'}`, {
          field,
        }),
      );
    }

    // Fastify validation errors
    if (error.validation) {
      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send(
        apiError(400, 'ValidationFailed', error.message, { validation: error.validation }),
      );
    }

    // Body parsing, size and content-type errors
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      log.warn({ err: error }, 'Client error');
      return reply.status(error.statusCode).send(
        apiError(error.statusCode, 'ValidationFailed', error.message, error.code ? { code: error.code } : undefined),
      );
    }

    // Internal server errors
    log.error({ err: error }, 'Internal server error');

    return reply.status(500).send(
      apiError(
        500,
        'Internal',
        options.exposeInternalErrors ? error.message : 'An unexpected error occurred',
      ),
    );
  });

  // Handle 404
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send(apiError(404, 'NotFound', `Route ${request.method} ${request.url} not found`));
  });
};

export const errorHandler = fp(errorHandlerPlugin, {
  name: 'error-handler',
});
