import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { StoreUnavailableError } from '@adsync/core';
import { createServer, type SyncServices } from '../server.js';
import { post, silentLogger, testConfig } from './helpers.js';

function spyServices() {
  return {
    users: { upsert: vi.fn(), getRole: vi.fn() },
    actions: { record: vi.fn() },
    ads: { upsert: vi.fn(), bulkUpsert: vi.fn(), update: vi.fn(), delete: vi.fn() },
  } satisfies SyncServices;
}

const PROTECTED_POSTS = [
  '/api/users/upsert/',
  '/api/actions/',
  '/api/ads/upsert/',
  '/api/ads/bulk-upsert/',
  '/api/ads/update/',
  '/api/ads/delete/',
];

describe('API key authentication', () => {
  let services: ReturnType<typeof spyServices>;
  let server: FastifyInstance;

  beforeEach(async () => {
    services = spyServices();
    server = await createServer({ config: testConfig(), services, logger: silentLogger });
  });

  afterEach(async () => {
    await server.close();
  });

  function expectNoServiceCalls(): void {
    const all = [
      services.users.upsert,
      services.users.getRole,
      services.actions.record,
      services.ads.upsert,
      services.ads.bulkUpsert,
      services.ads.update,
      services.ads.delete,
    ];
    for (const spy of all) {
      expect(spy).not.toHaveBeenCalled();
    }
  }

  it.each(PROTECTED_POSTS)('rejects POST %s without a key', async (url) => {
    const response = await post(server, url, { telegram_id: 42 }, null);

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      ok: false,
      statusCode: 401,
      error: 'Unauthorized',
      kind: 'AuthenticationFailed',
      message: 'Valid API key required',
    });
    expectNoServiceCalls();
  });

  it.each(PROTECTED_POSTS)('rejects POST %s with a wrong key', async (url) => {
    const response = await post(server, url, { telegram_id: 42 }, 'test-secret-key-0001');

    expect(response.statusCode).toBe(401);
    expectNoServiceCalls();
  });

  it('rejects the role lookup without a key', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/users/42/role/' });

    expect(response.statusCode).toBe(401);
    expectNoServiceCalls();
  });

  it('rejects before parsing the body', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/ads/upsert/',
      headers: { 'content-type': 'application/json' },
      payload: '{ not json',
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toMatchObject({ kind: 'AuthenticationFailed' });
  });

  it('passes the body through with the right key', async () => {
    services.actions.record.mockResolvedValue({ id: 5 });

    const response = await post(server, '/api/actions/', { telegram_id: 42, action: 'start' });

    expect(response.statusCode).toBe(201);
    expect(services.actions.record).toHaveBeenCalledWith({ telegram_id: 42, action: 'start' });
  });
});

describe('error mapping', () => {
  it('maps StoreUnavailable to 503', async () => {
    const services = spyServices();
    services.ads.update.mockRejectedValue(new StoreUnavailableError('AdItem', 'get', new Error('database is locked')));
    const server = await createServer({ config: testConfig(), services, logger: silentLogger });

    const response = await post(server, '/api/ads/update/', { ad_id: 'ad-1' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      ok: false,
      statusCode: 503,
      error: 'Service Unavailable',
      kind: 'StoreUnavailable',
      message: 'AdItem store unavailable during get: database is locked',
      details: { model: 'AdItem', operation: 'get' },
    });
    await server.close();
  });

  it('hides unexpected error messages in production only', async () => {
    const services = spyServices();
    services.ads.delete.mockRejectedValue(new Error('boom'));

    const testServer = await createServer({ config: testConfig(), services, logger: silentLogger });
    const productionServer = await createServer({
      config: testConfig({ NODE_ENV: 'production' }),
      services,
      logger: silentLogger,
    });

    const exposed = await post(testServer, '/api/ads/delete/', { ad_id: 'ad-1' });
    const hidden = await post(productionServer, '/api/ads/delete/', { ad_id: 'ad-1' });

    expect(exposed.statusCode).toBe(500);
    expect(exposed.json()).toMatchObject({ kind: 'Internal', message: 'boom' });
    expect(hidden.json()).toMatchObject({ kind: 'Internal', message: 'An unexpected error occurred' });

    await testServer.close();
    await productionServer.close();
  });

  it('maps a malformed JSON body to ValidationFailed', async () => {
    const server = await createServer({ config: testConfig(), services: spyServices(), logger: silentLogger });

    const response = await server.inject({
      method: 'POST',
      url: '/api/ads/upsert/',
      headers: { 'content-type': 'application/json', 'x-api-key': 'test-secret-key-0000' },
      payload: '{ not json',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ ok: false, kind: 'ValidationFailed' });
    await server.close();
  });
});
