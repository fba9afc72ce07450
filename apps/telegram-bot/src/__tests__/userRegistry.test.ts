import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SyncGatewayError } from '../lib/syncGatewayClient.js';
import { admin, alice, fakeGateway, lessor, NOW, setupBot, type FakeGateway, type TestBot } from './helpers.js';

describe('UserRegistry', () => {
  let gateway: FakeGateway;
  let bot: TestBot;

  beforeEach(async () => {
    gateway = fakeGateway();
    bot = await setupBot(gateway);
  });

  afterEach(async () => {
    await bot.cleanup();
  });

  it('stores a new user locally and forwards the registration', async () => {
    const { entity, created } = await bot.services.registry.register(alice, '+10000000042');
    await bot.services.coordinator.flush();

    expect(created).toBe(true);
    expect(entity).toMatchObject({
      telegramId: 42,
      username: 'alice',
      firstName: 'Alice',
      phoneNumber: '+10000000042',
      role: 'user',
      isAuthenticated: true,
      authenticatedAt: NOW,
    });
    expect(await bot.services.log.users.get(42)).toEqual(entity);
    expect(gateway.upsertUser).toHaveBeenCalledWith({
      telegram_id: 42,
      username: 'alice',
      first_name: 'Alice',
      last_name: '',
      language_code: '',
      phone_number: '+10000000042',
      role: 'user',
      is_authenticated: true,
      authenticated_at: NOW.toISOString(),
    });
  });

  it('treats configured admin ids as admin without asking the gateway', async () => {
    await expect(bot.services.registry.resolveRole(admin.id)).resolves.toBe('admin');
    expect(gateway.getUserRole).not.toHaveBeenCalled();
  });

  it('takes the role the gateway reports', async () => {
    gateway.getUserRole.mockResolvedValue('leasing_company');

    const { entity } = await bot.services.registry.register(lessor, '+10000000099');

    expect(gateway.getUserRole).toHaveBeenCalledWith(99);
    expect(entity.role).toBe('leasing_company');
  });

  it('lets a gateway role widen the local one', async () => {
    await bot.services.registry.register(alice, '+10000000042');
    gateway.getUserRole.mockResolvedValue('leasing_company');

    const { entity, created } = await bot.services.registry.register(alice, '+10000000042');

    expect(created).toBe(false);
    expect(entity.role).toBe('leasing_company');
  });

  it('falls back to the local log when the gateway fails', async () => {
    gateway.getUserRole.mockResolvedValueOnce('leasing_company');
    await bot.services.registry.register(lessor, '+10000000099');

    gateway.getUserRole.mockRejectedValue(new SyncGatewayError('gateway down', 'StoreUnavailable', null));

    await expect(bot.services.registry.resolveRole(99)).resolves.toBe('leasing_company');
  });

  it('falls back when the lookup outlives the timeout', async () => {
    gateway.getUserRole.mockReturnValue(new Promise<null>(() => undefined));

    await expect(bot.services.registry.resolveRole(42)).resolves.toBe('user');
  });

  it('defaults unknown users to user', async () => {
    await expect(bot.services.registry.resolveRole(42)).resolves.toBe('user');
  });

  it('picks up a promotion made on the gateway after registration', async () => {
    await bot.services.registry.register(alice, '+10000000042');
    gateway.getUserRole.mockResolvedValue('leasing_company');

    await expect(bot.services.registry.currentRole(42)).resolves.toBe('leasing_company');
    expect((await bot.services.log.users.get(42))?.role).toBe('leasing_company');
  });

  it('picks up a demotion made on the gateway', async () => {
    gateway.getUserRole.mockResolvedValueOnce('leasing_company');
    await bot.services.registry.register(lessor, '+10000000099');
    gateway.getUserRole.mockResolvedValue('user');

    await expect(bot.services.registry.currentRole(99)).resolves.toBe('user');
    expect((await bot.services.log.users.get(99))?.role).toBe('user');
  });

  it('answers currentRole from the local log when the gateway fails', async () => {
    gateway.getUserRole.mockResolvedValueOnce('leasing_company');
    await bot.services.registry.register(lessor, '+10000000099');
    gateway.getUserRole.mockRejectedValue(new SyncGatewayError('gateway down', 'StoreUnavailable', null));

    await expect(bot.services.registry.currentRole(99)).resolves.toBe('leasing_company');
    await expect(bot.services.registry.currentRole(42)).resolves.toBe('user');
  });

  it('registers locally when sync is disabled', async () => {
    const offline = await setupBot(null);
    try {
      const { entity } = await offline.services.registry.register(alice, '+10000000042');
      expect(entity.role).toBe('user');
      expect(offline.services.coordinator.pendingForwards).toBe(0);
    } finally {
      await offline.cleanup();
    }
  });
});
