import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import {
  AdItemRepository,
  closeDatabase,
  createGatewayServices,
  openDatabase,
  type DatabaseConnection,
} from '@adsync/core';
import { createServer } from '../server.js';
import { API_KEY, post, silentLogger, testConfig } from './helpers.js';

const ad = (overrides: Record<string, unknown> = {}) => ({
  id: 'ad-1',
  title: 'Tractor MTZ-82',
  price: 1500,
  author: { id: 42, username: 'alice' },
  ...overrides,
});

describe('Sync Gateway', () => {
  let db: DatabaseConnection;
  let server: FastifyInstance;

  beforeEach(async () => {
    db = openDatabase(':memory:');
    server = await createServer({
      config: testConfig(),
      services: createGatewayServices(db, { logger: silentLogger }),
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    await server.close();
    closeDatabase(db);
  });

  it('answers the health probe without a key', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true, service: 'adsync-api' });
  });

  it('sends a CSP that allows no content to load', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.headers['content-security-policy']).toBe("default-src 'none';frame-ancestors 'none'");
  });

  describe('users', () => {
    it('creates with 201, updates with 200', async () => {
      const first = await post(server, '/api/users/upsert/', { telegram_id: 42, username: 'alice' });
      const second = await post(server, '/api/users/upsert/', { telegram_id: 42, username: 'alice' });

      expect(first.statusCode).toBe(201);
      expect(first.json()).toEqual({ ok: true, created: true, telegram_id: 42, role: 'user' });
      expect(second.statusCode).toBe(200);
      expect(second.json()).toEqual({ ok: true, created: false, telegram_id: 42, role: 'user' });
    });

    it('rejects an unrecognized role with 400', async () => {
      const response = await post(server, '/api/users/upsert/', { telegram_id: 42, role: 'owner' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        statusCode: 400,
        error: 'Bad Request',
        kind: 'ValidationFailed',
        message: 'Validation failed for role: role must be one of: user, leasing_company, admin',
        details: { field: 'role', message: 'role must be one of: user, leasing_company, admin' },
      });
    });

    it('reads roles and reports unknown users as 404', async () => {
      await post(server, '/api/users/upsert/', { telegram_id: 42, role: 'leasing_company' });

      const found = await server.inject({ method: 'GET', url: '/api/users/42/role/', headers: { 'x-api-key': API_KEY } });
      const missing = await server.inject({ method: 'GET', url: '/api/users/7/role/', headers: { 'x-api-key': API_KEY } });
      const invalid = await server.inject({ method: 'GET', url: '/api/users/abc/role/', headers: { 'x-api-key': API_KEY } });

      expect(found.json()).toEqual({ ok: true, telegram_id: 42, role: 'leasing_company' });
      expect(missing.statusCode).toBe(404);
      expect(missing.json()).toMatchObject({ ok: false, kind: 'NotFound', message: 'TelegramUser not found: 7' });
      expect(invalid.statusCode).toBe(400);
    });
  });

  it('records actions with 201', async () => {
    const response = await post(server, '/api/actions/', { telegram_id: 42, action: 'start' });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toEqual({ ok: true, id: 1 });
  });

  describe('ads', () => {
    it('keeps ownership through the user / leasing_company / admin scenario', async () => {
      const created = await post(server, '/api/ads/upsert/', {
        actor_telegram_id: 42,
        actor_role: 'user',
        ...ad(),
      });
      expect(created.statusCode).toBe(201);
      expect(created.json()).toEqual({ ok: true, created: true, ad_id: 'ad-1' });

      const denied = await post(server, '/api/ads/update/', {
        ad_id: 'ad-1',
        actor_telegram_id: 99,
        actor_role: 'leasing_company',
        updates: { price: 1 },
      });
      expect(denied.statusCode).toBe(403);
      expect(denied.json()).toMatchObject({
        ok: false,
        error: 'Forbidden',
        kind: 'PermissionDenied',
        message: 'leasing_company can modify only own ads',
      });

      const updated = await post(server, '/api/ads/update/', {
        ad_id: 'ad-1',
        actor_telegram_id: 1,
        actor_role: 'admin',
        updates: { price: 1800 },
      });
      expect(updated.statusCode).toBe(200);
      expect(updated.json()).toEqual({ ok: true, ad_id: 'ad-1' });

      const stored = await new AdItemRepository(db).get('ad-1');
      expect(stored?.price).toBe(1800);
      expect(stored?.authorTelegramId).toBe(42);
    });

    it('reports per-item results for a bulk upsert', async () => {
      const response = await post(server, '/api/ads/bulk-upsert/', {
        actor_telegram_id: 1,
        actor_role: 'admin',
        items: [ad({ id: 'a' }), ad({ id: 'b', title: '' }), ad({ id: 'c' })],
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        created: 2,
        updated: 0,
        failed: 1,
        results: [
          { index: 0, ok: true, ad_id: 'a', created: true },
          { index: 1, ok: false, kind: 'ValidationFailed', error: 'Validation failed for title: title is required' },
          { index: 2, ok: true, ad_id: 'c', created: true },
        ],
      });
    });

    it('rejects a bulk body without a list of items', async () => {
      const response = await post(server, '/api/ads/bulk-upsert/', {
        actor_telegram_id: 1,
        actor_role: 'admin',
        items: { a: 1 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ kind: 'ValidationFailed', details: { field: 'items' } });
    });

    it('deletes once, then reports 404', async () => {
      await post(server, '/api/ads/upsert/', { actor_telegram_id: 7, actor_role: 'leasing_company', ...ad() });
      const body = { ad_id: 'ad-1', actor_telegram_id: 7, actor_role: 'leasing_company' };

      const first = await post(server, '/api/ads/delete/', body);
      const second = await post(server, '/api/ads/delete/', body);

      expect(first.statusCode).toBe(200);
      expect(first.json()).toEqual({ ok: true, ad_id: 'ad-1' });
      expect(second.statusCode).toBe(404);
      expect(second.json()).toMatchObject({ kind: 'NotFound' });
    });
  });

  it('answers unknown routes with a NotFound body', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/nothing' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      statusCode: 404,
      error: 'Not Found',
      kind: 'NotFound',
      message: 'Route GET /api/nothing not found',
    });
  });
});
