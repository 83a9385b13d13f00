import { InMemoryObjectStore } from '@/object-store/in-memory.object-store';
import { ConfigMapImageRegistry } from '@/pipeline/config-map.image-registry';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DIGEST } from '../fixtures';

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

const OTHER_DIGEST = `sha256:${'b'.repeat(64)}`;

describe('ConfigMapImageRegistry', () => {
  let store: InMemoryObjectStore;
  let registry: ConfigMapImageRegistry;

  beforeEach(() => {
    store = new InMemoryObjectStore();
    registry = new ConfigMapImageRegistry(store, 'driftless');
  });

  it('should store digests under sanitized keys', async () => {
    await registry.put('registry.local:5000/demo-app', 'v1', DIGEST);

    const configMap = await store.get({ kind: 'ConfigMap', namespace: 'driftless', name: 'driftless-image-registry' });
    expect(configMap.data).toEqual({
      'registry.local_5000_demo-app_v1': `registry.local:5000/demo-app:v1@${DIGEST}`,
    });
    expect(await registry.resolve('registry.local:5000/demo-app', 'v1')).toBe(DIGEST);
  });

  it('should keep earlier tags when adding a new one', async () => {
    await registry.put('demo-app', 'v1', DIGEST);
    await registry.put('demo-app', 'v2', OTHER_DIGEST);

    expect(await registry.resolve('demo-app', 'v1')).toBe(DIGEST);
    expect(await registry.resolve('demo-app', 'v2')).toBe(OTHER_DIGEST);
    expect(await registry.resolve('demo-app', 'v3')).toBeUndefined();
  });

  it('should not confuse references that sanitize to the same key', async () => {
    await registry.put('team/app', 'v1', DIGEST);

    expect(await registry.resolve('team_app', 'v1')).toBeUndefined();
  });

  it('should resolve nothing before the first push', async () => {
    expect(await registry.resolve('demo-app', 'v1')).toBeUndefined();
  });
});
