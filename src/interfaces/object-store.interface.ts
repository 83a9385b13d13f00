import type { LiveObject, ManifestObject } from './manifest-object.interface';
import type { ObjectRef } from './object-ref.interface';
import type { ResourceEvent } from './resource-event.interface';

export type LabelSelector = Record<string, string>;

/**
 * Declarative CRUD and watch over typed objects identified by kind, namespace and name.
 * Writes carry the resourceVersion the caller last saw; a mismatch is a ConflictError and
 * is never overwritten.
 */
export interface ObjectStore {
  /** @throws NotFoundError */
  get(ref: ObjectRef): Promise<LiveObject>;

  /** Lists objects of one kind; an omitted namespace means every namespace. */
  list(kind: string, namespace?: string, labelSelector?: LabelSelector): Promise<LiveObject[]>;

  /**
   * Creates the object when `expectedVersion` is omitted, replaces it otherwise.
   * Resolves to the resulting resourceVersion, unchanged when the payload was already current.
   */
  apply(object: ManifestObject, expectedVersion?: string): Promise<string>;

  /** Replaces the status subresource only; the rest of the object is left untouched. */
  applyStatus(ref: ObjectRef, status: Record<string, unknown>, expectedVersion?: string): Promise<string>;

  delete(ref: ObjectRef, expectedVersion?: string): Promise<void>;

  /** Lazy change stream that ends only when the signal aborts. */
  watch(kind: string, namespace?: string, signal?: AbortSignal): AsyncIterable<ResourceEvent>;
}

export const refOf = (object: Pick<ManifestObject, 'kind' | 'metadata'>): ObjectRef => ({
  kind: object.kind,
  namespace: object.metadata.namespace,
  name: object.metadata.name,
});

export const formatRef = ({ kind, namespace, name }: ObjectRef): string =>
  namespace ? `${kind} '${namespace}/${name}'` : `${kind} '${name}'`;

export const matchesSelector = (object: ManifestObject, selector: LabelSelector | undefined): boolean =>
  !selector || Object.entries(selector).every(([key, value]) => object.metadata.labels?.[key] === value);
