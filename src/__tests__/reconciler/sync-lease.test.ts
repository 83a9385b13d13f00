import { ConflictError, NotFoundError } from '@/errors/driftless.errors';
import { InMemoryObjectStore } from '@/object-store/in-memory.object-store';
import { SyncLease, type SyncLeaseOptions } from '@/reconciler/sync-lease';
import { isObject } from '@/utils/is-object';
import type { Sleep } from '@/utils/sleep';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    dir: vi.fn(),
  },
}));

const START = Date.parse('2026-01-01T00:00:00Z');

describe('SyncLease', () => {
  let store: InMemoryObjectStore;
  let clock: number;
  let sleeps: number[];

  const sleep: Sleep = async (ms) => {
    sleeps.push(ms);
    clock += ms;
  };

  const leaseFor = (holder: string, options: SyncLeaseOptions = {}) =>
    new SyncLease(store, {
      namespace: 'driftless',
      holder,
      durationSeconds: 30,
      acquireTimeoutMs: 60_000,
      pollIntervalMs: 1000,
      sleep,
      now: () => new Date(clock),
      ...options,
    });

  const seed = (holder: string, leaseDurationSeconds: number) =>
    store.apply({
      apiVersion: 'coordination.k8s.io/v1',
      kind: 'Lease',
      metadata: { name: 'driftless-sync-demo', namespace: 'driftless' },
      spec: {
        holderIdentity: holder,
        leaseDurationSeconds,
        acquireTime: '2026-01-01T00:00:00.000000Z',
        renewTime: '2026-01-01T00:00:00.000000Z',
      },
    });

  beforeEach(() => {
    store = new InMemoryObjectStore();
    clock = START;
    sleeps = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should hold the lease while the work runs and delete it afterwards', async () => {
    const lease = leaseFor('controller');

    const result = await lease.hold('demo', async () => {
      const live = await store.get(lease.refFor('demo'));
      expect(live.spec).toEqual({
        holderIdentity: 'controller',
        leaseDurationSeconds: 30,
        acquireTime: '2026-01-01T00:00:00.000000Z',
        renewTime: '2026-01-01T00:00:00.000000Z',
      });
      return 'done';
    });

    expect(result).toBe('done');
    await expect(store.get(lease.refFor('demo'))).rejects.toThrow(NotFoundError);
  });

  it('should release the lease when the work fails', async () => {
    const lease = leaseFor('controller');

    await expect(
      lease.hold('demo', async () => {
        throw new Error('apply failed');
      }),
    ).rejects.toThrow('apply failed');

    expect(await lease.holderOf('demo')).toBeUndefined();
  });

  it('should wait for a held lease to expire and then take it over', async () => {
    await seed('cli', 10);
    const lease = leaseFor('controller');

    const holder = await lease.hold('demo', () => lease.holderOf('demo'));

    expect(holder).toBe('controller');
    expect(sleeps).toEqual([1000, 1000, 1000, 1000, 1000, 1000, 1000, 1000, 1000, 1000]);
  });

  it('should give up with a conflict once the acquire timeout elapses', async () => {
    await seed('cli', 30);
    const lease = leaseFor('controller', { acquireTimeoutMs: 2500 });
    const work = vi.fn(async () => 'done');

    await expect(lease.hold('demo', work)).rejects.toThrow(
      new ConflictError("Application 'demo' is being synced by 'cli'"),
    );

    expect(work).not.toHaveBeenCalled();
    expect(sleeps).toEqual([1000, 1000, 500]);
    expect(await lease.holderOf('demo')).toBe('cli');
  });

  it('should abort the work when another holder takes the lease', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    const lease = leaseFor('controller', { durationSeconds: 3 });
    let started = false;

    const pending = lease.hold('demo', async (signal) => {
      const live = await store.get(lease.refFor('demo'));
      await store.apply(
        { ...live, spec: { ...(isObject(live.spec) ? live.spec : {}), holderIdentity: 'cli' } },
        live.metadata.resourceVersion,
      );
      started = true;
      return new Promise<unknown>((resolve) => signal.addEventListener('abort', () => resolve(signal.reason)));
    });
    await vi.waitFor(() => expect(started).toBe(true));

    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toBeInstanceOf(ConflictError);
    expect(await lease.holderOf('demo')).toBe('cli');
  });
});
