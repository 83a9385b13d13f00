import { ManifestObjectSchema } from '@/dtos/manifest.dto';
import { ResourceEventType } from '@/enums/resource-event-type.enum';
import { ConflictError, NotFoundError, ValidationError } from '@/errors/driftless.errors';
import type { LiveObject, ManifestObject } from '@/interfaces/manifest-object.interface';
import {
  formatRef,
  matchesSelector,
  refOf,
  type LabelSelector,
  type ObjectStore,
} from '@/interfaces/object-store.interface';
import type { ObjectRef } from '@/interfaces/object-ref.interface';
import type { ResourceEvent } from '@/interfaces/resource-event.interface';
import { canonicalStringify } from '@/utils/canonical-json';
import { isAbortError } from '@/utils/sleep';
import { EventEmitter, on } from 'node:events';
import { kindRegistry, type KindRegistry } from './kind-registry';

const SERVER_METADATA = ['resourceVersion', 'generation', 'uid', 'creationTimestamp', 'managedFields'] as const;

const keyOf = ({ kind, namespace, name }: ObjectRef): string => `${kind}/${namespace ?? ''}/${name}`;

/** Everything the client owns: server-populated metadata and status are excluded. */
const payloadOf = (object: ManifestObject): string => {
  const { status: _status, metadata, ...rest } = object;
  const clientMetadata = Object.fromEntries(
    Object.entries(metadata).filter(([key]) => !(SERVER_METADATA as readonly string[]).includes(key)),
  );
  return canonicalStringify({ ...rest, metadata: clientMetadata });
};

const specOf = (object: ManifestObject): string => {
  const { status: _status, metadata: _metadata, ...rest } = object;
  return canonicalStringify(rest);
};

/**
 * Process-local object store with the cluster API's concurrency semantics: one global,
 * monotonically increasing resourceVersion counter and compare-and-swap writes.
 */
export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, LiveObject>();
  private readonly events = new EventEmitter();
  private revision = 0;

  constructor(private readonly registry: KindRegistry = kindRegistry) {
    this.events.setMaxListeners(0);
  }

  public async get(ref: ObjectRef): Promise<LiveObject> {
    const object = this.objects.get(keyOf(this.normalizeRef(ref)));
    if (!object) {
      throw new NotFoundError(`${formatRef(ref)} not found`, ref);
    }
    return structuredClone(object);
  }

  public async list(kind: string, namespace?: string, labelSelector?: LabelSelector): Promise<LiveObject[]> {
    return [...this.objects.values()]
      .filter((object) => object.kind === kind)
      .filter((object) => namespace === undefined || object.metadata.namespace === namespace)
      .filter((object) => matchesSelector(object, labelSelector))
      .map((object) => structuredClone(object));
  }

  public async apply(object: ManifestObject, expectedVersion?: string): Promise<string> {
    const desired = this.validate(object);
    const ref = refOf(desired);
    const key = keyOf(ref);
    const current = this.objects.get(key);

    if (expectedVersion === undefined) {
      if (current) {
        throw new ConflictError(`${formatRef(ref)} already exists`, ref);
      }
      const created: LiveObject = {
        ...structuredClone(desired),
        metadata: { ...structuredClone(desired.metadata), resourceVersion: this.nextRevision(), generation: 1 },
      };
      delete created.status;
      this.objects.set(key, created);
      this.emit(ResourceEventType.Added, created);
      return created.metadata.resourceVersion;
    }

    if (!current) {
      throw new NotFoundError(`${formatRef(ref)} not found`, ref);
    }
    if (current.metadata.resourceVersion !== expectedVersion) {
      throw new ConflictError(
        `${formatRef(ref)} was modified: expected version ${expectedVersion}, found ${current.metadata.resourceVersion}`,
        ref,
      );
    }
    if (payloadOf(current) === payloadOf(desired)) {
      return current.metadata.resourceVersion;
    }

    const generation = current.metadata.generation ?? 1;
    const updated: LiveObject = {
      ...structuredClone(desired),
      metadata: {
        ...structuredClone(desired.metadata),
        resourceVersion: this.nextRevision(),
        generation: specOf(current) === specOf(desired) ? generation : generation + 1,
      },
    };
    if (current.status) {
      updated.status = current.status;
    } else {
      delete updated.status;
    }
    this.objects.set(key, updated);
    this.emit(ResourceEventType.Modified, updated);
    return updated.metadata.resourceVersion;
  }

  public async delete(ref: ObjectRef, expectedVersion?: string): Promise<void> {
    const normalized = this.normalizeRef(ref);
    const key = keyOf(normalized);
    const current = this.objects.get(key);
    if (!current) {
      throw new NotFoundError(`${formatRef(ref)} not found`, ref);
    }
    if (expectedVersion !== undefined && current.metadata.resourceVersion !== expectedVersion) {
      throw new ConflictError(
        `${formatRef(ref)} was modified: expected version ${expectedVersion}, found ${current.metadata.resourceVersion}`,
        ref,
      );
    }
    this.objects.delete(key);
    this.emit(ResourceEventType.Deleted, {
      ...current,
      metadata: { ...current.metadata, resourceVersion: this.nextRevision() },
    });
  }

  public async *watch(kind: string, namespace?: string, signal?: AbortSignal): AsyncIterable<ResourceEvent> {
    try {
      for await (const [event] of on(this.events, 'event', { signal })) {
        const { type, object }: ResourceEvent = event;
        if (object.kind !== kind || (namespace !== undefined && object.metadata.namespace !== namespace)) {
          continue;
        }
        yield { type, object: structuredClone(object) };
      }
    } catch (err) {
      if (!isAbortError(err)) {
        throw err;
      }
    }
  }

  public async applyStatus(ref: ObjectRef, status: Record<string, unknown>, expectedVersion?: string): Promise<string> {
    const key = keyOf(this.normalizeRef(ref));
    const current = this.objects.get(key);
    if (!current) {
      throw new NotFoundError(`${formatRef(ref)} not found`, ref);
    }
    if (expectedVersion !== undefined && current.metadata.resourceVersion !== expectedVersion) {
      throw new ConflictError(
        `${formatRef(ref)} was modified: expected version ${expectedVersion}, found ${current.metadata.resourceVersion}`,
        ref,
      );
    }
    const updated: LiveObject = {
      ...current,
      metadata: { ...current.metadata, resourceVersion: this.nextRevision() },
      status: structuredClone(status),
    };
    this.objects.set(key, updated);
    this.emit(ResourceEventType.Modified, updated);
    return updated.metadata.resourceVersion;
  }

  /** Simulates an out-of-band edit (e.g. `kubectl edit`) that bypasses the reconciler. */
  public async mutate(ref: ObjectRef, edit: (object: LiveObject) => void): Promise<LiveObject> {
    const current = await this.get(ref);
    edit(current);
    await this.apply(current, current.metadata.resourceVersion);
    return this.get(ref);
  }

  private validate(object: ManifestObject): ManifestObject {
    const result = ManifestObjectSchema.safeParse(object);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid ${object.kind}: ${issues.join('; ')}`, issues);
    }
    const namespaced = this.registry.isNamespaced(object.kind);
    if (namespaced && !object.metadata.namespace) {
      throw new ValidationError(`${formatRef(refOf(object))} is namespaced but has no namespace`);
    }
    if (!namespaced && object.metadata.namespace) {
      return { ...object, metadata: { ...object.metadata, namespace: undefined } };
    }
    return object;
  }

  private normalizeRef(ref: ObjectRef): ObjectRef {
    return this.registry.isNamespaced(ref.kind) ? ref : { ...ref, namespace: undefined };
  }

  private nextRevision(): string {
    this.revision += 1;
    return String(this.revision);
  }

  private emit(type: ResourceEventType, object: LiveObject): void {
    const event: ResourceEvent = { type, object: structuredClone(object) };
    this.events.emit('event', event);
  }
}
