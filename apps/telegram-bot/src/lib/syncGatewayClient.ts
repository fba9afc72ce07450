/**
 * Sync Gateway Client
 *
 * HTTP client for the backend sync gateway. Payloads go out in the gateway's
 * snake_case wire format; responses are validated before they are returned.
 */

import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { isErrorKind, USER_ROLES, type ResultKind, type UserRole } from '@adsync/core';

export interface SyncGatewayClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  /** Alternate dispatcher, e.g. an undici MockAgent. */
  dispatcher?: Dispatcher;
}

export class SyncGatewayError extends Error {
  public readonly kind: ResultKind;
  public readonly statusCode: number | null;

  constructor(message: string, kind: ResultKind, statusCode: number | null) {
    super(message);
    this.name = 'SyncGatewayError';
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

const roleSchema = z.enum(USER_ROLES);

const userUpsertResponse = z.object({
  created: z.boolean(),
  telegram_id: z.number(),
  role: roleSchema,
});

const roleResponse = z.object({
  telegram_id: z.number(),
  role: roleSchema,
});

const actionResponse = z.object({
  id: z.number(),
});

const adUpsertResponse = z.object({
  created: z.boolean(),
  ad_id: z.string(),
});

const adResponse = z.object({
  ad_id: z.string(),
});

const bulkResultSchema = z.union([
  z.object({ index: z.number(), ok: z.literal(true), ad_id: z.string(), created: z.boolean() }),
  z.object({ index: z.number(), ok: z.literal(false), kind: z.string(), error: z.string() }),
]);

const bulkResponse = z.object({
  created: z.number(),
  updated: z.number(),
  failed: z.number(),
  results: z.array(bulkResultSchema),
});

const errorBody = z.object({
  kind: z.string().optional(),
  message: z.string().optional(),
});

export type UserUpsertResponse = z.infer<typeof userUpsertResponse>;
export type ActionResponse = z.infer<typeof actionResponse>;
export type AdUpsertResponse = z.infer<typeof adUpsertResponse>;
export type AdResponse = z.infer<typeof adResponse>;
export type BulkResponse = z.infer<typeof bulkResponse>;

/**
 * Operations the bot forwards to the backend.
 */
export interface SyncGateway {
  upsertUser(payload: Record<string, unknown>): Promise<UserUpsertResponse>;
  getUserRole(telegramId: number): Promise<UserRole | null>;
  recordAction(payload: Record<string, unknown>): Promise<ActionResponse>;
  upsertAd(payload: Record<string, unknown>): Promise<AdUpsertResponse>;
  bulkUpsertAds(payload: Record<string, unknown>): Promise<BulkResponse>;
  updateAd(payload: Record<string, unknown>): Promise<AdResponse>;
  deleteAd(payload: Record<string, unknown>): Promise<AdResponse>;
}

interface RawResponse {
  statusCode: number;
  data: unknown;
}

export class SyncGatewayClient implements SyncGateway {
  private readonly baseUrl: string;

  constructor(private readonly options: SyncGatewayClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async upsertUser(payload: Record<string, unknown>): Promise<UserUpsertResponse> {
    return this.post('/api/users/upsert/', payload, userUpsertResponse);
  }

  /**
   * Stored role of a user, or null when the gateway does not know them.
   */
  async getUserRole(telegramId: number): Promise<UserRole | null> {
    const response = await this.send('GET', `/api/users/${telegramId}/role/`);
    if (response.statusCode === 404) {
      return null;
    }
    return this.expect(response, roleResponse).role;
  }

  async recordAction(payload: Record<string, unknown>): Promise<ActionResponse> {
    return this.post('/api/actions/', payload, actionResponse);
  }

  async upsertAd(payload: Record<string, unknown>): Promise<AdUpsertResponse> {
    return this.post('/api/ads/upsert/', payload, adUpsertResponse);
  }

  async bulkUpsertAds(payload: Record<string, unknown>): Promise<BulkResponse> {
    return this.post('/api/ads/bulk-upsert/', payload, bulkResponse);
  }

  async updateAd(payload: Record<string, unknown>): Promise<AdResponse> {
    return this.post('/api/ads/update/', payload, adResponse);
  }

  async deleteAd(payload: Record<string, unknown>): Promise<AdResponse> {
    return this.post('/api/ads/delete/', payload, adResponse);
  }

  private async post<S extends z.ZodTypeAny>(
    path: string,
    payload: Record<string, unknown>,
    schema: S,
  ): Promise<z.output<S>> {
    const response = await this.send('POST', path, payload);
    return this.expect(response, schema);
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    payload?: Record<string, unknown>,
  ): Promise<RawResponse> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { 'x-api-key': this.options.apiKey };
    if (payload !== undefined) {
      headers['content-type'] = 'application/json';
    }

    let statusCode: number;
    let text: string;
    try {
      const response = await request(url, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        dispatcher: this.options.dispatcher,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SyncGatewayError(`${method} ${path} failed: ${reason}`, 'StoreUnavailable', null);
    }

    return { statusCode, data: parseJson(text) };
  }

  private expect<S extends z.ZodTypeAny>(response: RawResponse, schema: S): z.output<S> {
    if (response.statusCode >= 400) {
      throw toGatewayError(response);
    }

    const result = schema.safeParse(response.data);
    if (!result.success) {
      throw new SyncGatewayError(
        `Unexpected gateway response: ${result.error.issues[0]?.message ?? 'invalid body'}`,
        'Internal',
        response.statusCode,
      );
    }
    return result.data;
  }
}

function parseJson(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function toGatewayError({ statusCode, data }: RawResponse): SyncGatewayError {
  const parsed = errorBody.safeParse(data);
  const body = parsed.success ? parsed.data : {};
  const kind: ResultKind = isErrorKind(body.kind) ? body.kind : 'Internal';
  return new SyncGatewayError(body.message ?? `Gateway responded with ${statusCode}`, kind, statusCode);
}
