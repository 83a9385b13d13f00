import { ResourceEventType } from '@/enums/resource-event-type.enum';
import { ConflictError, NotFoundError, ValidationError } from '@/errors/driftless.errors';
import type { ManifestObject } from '@/interfaces/manifest-object.interface';
import { InMemoryObjectStore } from '@/object-store/in-memory.object-store';
import { beforeEach, describe, expect, it } from 'vitest';

const ref = { kind: 'ConfigMap', namespace: 'demo', name: 'settings' };

const configMap = (data: Record<string, string>, labels?: Record<string, string>): ManifestObject => ({
  apiVersion: 'v1',
  kind: 'ConfigMap',
  metadata: { name: 'settings', namespace: 'demo', labels },
  data,
});

describe('InMemoryObjectStore', () => {
  let store: InMemoryObjectStore;

  beforeEach(() => {
    store = new InMemoryObjectStore();
  });

  describe('apply', () => {
    it('should create an object at generation 1', async () => {
      const version = await store.apply(configMap({ mode: 'a' }));
      const live = await store.get(ref);

      expect(version).toBe('1');
      expect(live.metadata.resourceVersion).toBe('1');
      expect(live.metadata.generation).toBe(1);
      expect(live.data).toEqual({ mode: 'a' });
    });

    it('should refuse to create an object twice', async () => {
      await store.apply(configMap({ mode: 'a' }));

      await expect(store.apply(configMap({ mode: 'b' }))).rejects.toThrow(ConflictError);
    });

    it('should reject a write against a stale version and keep the current object', async () => {
      await store.apply(configMap({ mode: 'a' }));
      await store.apply(configMap({ mode: 'b' }), '1');

      await expect(store.apply(configMap({ mode: 'c' }), '1')).rejects.toThrow(ConflictError);
      expect((await store.get(ref)).data).toEqual({ mode: 'b' });
    });

    it('should keep the version when the payload is already current', async () => {
      await store.apply(configMap({ mode: 'a' }));

      await expect(store.apply(configMap({ mode: 'a' }), '1')).resolves.toBe('1');
    });

    it('should bump the generation only for spec changes', async () => {
      await store.apply(configMap({ mode: 'a' }));
      const relabelled = await store.apply(configMap({ mode: 'a' }, { team: 'web' }), '1');
      expect((await store.get(ref)).metadata.generation).toBe(1);

      await store.apply(configMap({ mode: 'b' }, { team: 'web' }), relabelled);
      expect((await store.get(ref)).metadata.generation).toBe(2);
    });

    it('should fail to update a missing object', async () => {
      await expect(store.apply(configMap({ mode: 'a' }), '7')).rejects.toThrow(NotFoundError);
    });

    it('should require a namespace for namespaced kinds', async () => {
      const object = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'settings' } };

      await expect(store.apply(object)).rejects.toThrow(ValidationError);
    });

    it('should drop the namespace of cluster-scoped kinds', async () => {
      await store.apply({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'demo', namespace: 'ignored' } });

      const live = await store.get({ kind: 'Namespace', name: 'demo' });
      expect(live.metadata.namespace).toBeUndefined();
    });

    it('should reject names that are not DNS subdomains', async () => {
      const object = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'Not_Valid', namespace: 'demo' } };

      await expect(store.apply(object)).rejects.toThrow(ValidationError);
    });
  });

  describe('applyStatus', () => {
    it('should replace the status without touching the generation', async () => {
      await store.apply(configMap({ mode: 'a' }));

      const version = await store.applyStatus(ref, { ready: true }, '1');
      const live = await store.get(ref);

      expect(version).toBe('2');
      expect(live.status).toEqual({ ready: true });
      expect(live.metadata.generation).toBe(1);
    });

    it('should keep the status across a spec update', async () => {
      await store.apply(configMap({ mode: 'a' }));
      const version = await store.applyStatus(ref, { ready: true });
      await store.apply(configMap({ mode: 'b' }), version);

      expect((await store.get(ref)).status).toEqual({ ready: true });
    });
  });

  describe('list', () => {
    it('should filter by namespace and labels', async () => {
      await store.apply(configMap({ mode: 'a' }, { owner: 'demo' }));
      await store.apply({ ...configMap({}), metadata: { name: 'other', namespace: 'demo' } });
      await store.apply({ ...configMap({}), metadata: { name: 'elsewhere', namespace: 'web', labels: { owner: 'demo' } } });

      const owned = await store.list('ConfigMap', undefined, { owner: 'demo' });
      const inDemo = await store.list('ConfigMap', 'demo');

      expect(owned.map((object) => object.metadata.name).sort()).toEqual(['elsewhere', 'settings']);
      expect(inDemo.map((object) => object.metadata.name).sort()).toEqual(['other', 'settings']);
    });
  });

  describe('delete', () => {
    it('should reject a stale version', async () => {
      await store.apply(configMap({ mode: 'a' }));
      await store.applyStatus(ref, { ready: true });

      await expect(store.delete(ref, '1')).rejects.toThrow(ConflictError);
    });

    it('should remove the object', async () => {
      await store.apply(configMap({ mode: 'a' }));
      await store.delete(ref, '1');

      await expect(store.get(ref)).rejects.toThrow(NotFoundError);
      await expect(store.delete(ref)).rejects.toThrow(NotFoundError);
    });
  });

  describe('watch', () => {
    it('should stream changes of one kind until aborted', async () => {
      const controller = new AbortController();
      const events = store.watch('ConfigMap', 'demo', controller.signal)[Symbol.asyncIterator]();
      const first = events.next();

      await store.apply({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'demo' } });
      await store.apply(configMap({ mode: 'a' }));

      const { value } = await first;
      expect(value).toMatchObject({
        type: ResourceEventType.Added,
        object: { kind: 'ConfigMap', metadata: { name: 'settings', resourceVersion: '2' } },
      });

      const next = events.next();
      controller.abort();
      await expect(next).resolves.toEqual({ done: true, value: undefined });
    });
  });
});
