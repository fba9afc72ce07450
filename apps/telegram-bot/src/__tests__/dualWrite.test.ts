import { describe, it, expect, vi } from 'vitest';
import { TimeoutError } from '@adsync/utils';
import {
  DualWriteCoordinator,
  type ForwardedEvent,
  type ForwardFailedEvent,
} from '../sync/dualWrite.js';
import { silentLogger } from './helpers.js';

function coordinator(syncEnabled = true, forwardTimeoutMs = 50) {
  const instance = new DualWriteCoordinator({ syncEnabled, forwardTimeoutMs, logger: silentLogger });
  const forwarded: ForwardedEvent[] = [];
  const failed: ForwardFailedEvent[] = [];
  instance.on('forwarded', (event) => forwarded.push(event));
  instance.on('forward-failed', (event) => failed.push(event));
  return { instance, forwarded, failed };
}

describe('DualWriteCoordinator', () => {
  it('returns the local result and forwards it', async () => {
    const { instance, forwarded, failed } = coordinator();
    const forward = vi.fn(async (_result: { id: number }) => 'sent');

    const result = await instance.write('ad upsert ad-1', async () => ({ id: 7 }), forward);
    await instance.flush();

    expect(result).toEqual({ id: 7 });
    expect(forward).toHaveBeenCalledWith({ id: 7 });
    expect(forwarded.map((event) => event.description)).toEqual(['ad upsert ad-1']);
    expect(failed).toEqual([]);
  });

  it('rejects on a local failure and forwards nothing', async () => {
    const { instance } = coordinator();
    const forward = vi.fn(async () => undefined);

    await expect(
      instance.write('ad upsert ad-1', async () => { throw new Error('disk full'); }, forward),
    ).rejects.toThrow('disk full');
    await instance.flush();

    expect(forward).not.toHaveBeenCalled();
  });

  it('keeps the local result when the forward is rejected', async () => {
    const { instance, forwarded, failed } = coordinator();

    const result = await instance.write(
      'action start',
      async () => 'stored',
      async () => { throw new Error('connection refused'); },
    );
    await instance.flush();

    expect(result).toBe('stored');
    expect(forwarded).toEqual([]);
    expect(failed).toHaveLength(1);
    expect(failed[0]?.description).toBe('action start');
    expect(failed[0]?.error.message).toBe('connection refused');
  });

  it('reports a forward that throws synchronously', async () => {
    const { instance, failed } = coordinator();

    await instance.write('action start', async () => 1, () => { throw new Error('bad payload'); });
    await instance.flush();

    expect(failed[0]?.error.message).toBe('bad payload');
  });

  it('gives up on a forward that outlives the timeout', async () => {
    const { instance, failed } = coordinator(true, 20);

    await instance.write('user upsert 42', async () => 1, () => new Promise<never>(() => undefined));
    await instance.flush();

    expect(failed).toHaveLength(1);
    expect(failed[0]?.error).toBeInstanceOf(TimeoutError);
    expect(failed[0]?.error.message).toBe('Forward of user upsert 42 timed out after 20ms');
  });

  it('does not wait for the forward before resolving', async () => {
    const { instance, forwarded } = coordinator(true, 1000);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => { release = resolve; });

    const result = await instance.write('ad delete ad-1', async () => 'ad-1', () => gate);

    expect(result).toBe('ad-1');
    expect(instance.pendingForwards).toBe(1);

    release();
    await instance.flush();

    expect(instance.pendingForwards).toBe(0);
    expect(forwarded).toHaveLength(1);
  });

  it('settles the forward when a listener throws', async () => {
    const { instance, forwarded, failed } = coordinator();
    instance.on('forwarded', () => { throw new Error('listener broke'); });
    instance.on('forward-failed', () => { throw new Error('listener broke'); });

    await instance.write('action start', async () => 1, async () => 'sent');
    await instance.write('action contact', async () => 2, async () => { throw new Error('connection refused'); });
    await expect(instance.flush()).resolves.toBeUndefined();

    expect(instance.pendingForwards).toBe(0);
    expect(forwarded.map((event) => event.description)).toEqual(['action start']);
    expect(failed.map((event) => event.description)).toEqual(['action contact']);
  });

  it('skips the forward when sync is disabled', async () => {
    const { instance, forwarded, failed } = coordinator(false);
    const forward = vi.fn(async () => undefined);

    const result = await instance.write('action start', async () => 'stored', forward);
    await instance.flush();

    expect(result).toBe('stored');
    expect(forward).not.toHaveBeenCalled();
    expect(instance.pendingForwards).toBe(0);
    expect(forwarded).toEqual([]);
    expect(failed).toEqual([]);
  });
});
