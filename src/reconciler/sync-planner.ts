import { LAST_APPLIED_ANNOTATION, OWNER_LABEL } from '@/config/operator.config';
import { ManifestObjectSchema } from '@/dtos/manifest.dto';
import { ObjectAction } from '@/enums/object-action.enum';
import { ValidationError } from '@/errors/driftless.errors';
import type { DesiredStateSnapshot } from '@/interfaces/desired-state-snapshot.interface';
import type { LiveObject, ManifestObject } from '@/interfaces/manifest-object.interface';
import { formatRef, refOf } from '@/interfaces/object-store.interface';
import type { ObjectRef } from '@/interfaces/object-ref.interface';
import { logger } from '@/logger';
import type { KindRegistry } from '@/object-store/kind-registry';
import { canonicalStringify } from '@/utils/canonical-json';
import { filterChanges, removedFields } from '@/utils/filter-changes';
import { isObject } from '@/utils/is-object';

export type PlannedChange = {
  action: ObjectAction;
  ref: ObjectRef;
  desired?: ManifestObject;
  live?: LiveObject;
  /** Desired fields that differ from the live object; set for updates. */
  changes?: Record<string, unknown>;
  /** Fields the last apply set that are no longer desired, marked with null; set for updates. */
  removed?: Record<string, unknown>;
};

export type ObjectDiff = {
  changes: Record<string, unknown>;
  removed: Record<string, unknown>;
};

export type SyncPlan = {
  /** Creates, updates and unchanged objects in apply order. */
  apply: PlannedChange[];
  /** Owned objects no longer desired, in reverse apply order. */
  prune: PlannedChange[];
};

export const refKey = ({ kind, namespace, name }: ObjectRef): string => `${kind}/${namespace ?? ''}/${name}`;

/** Only client-owned metadata takes part in the diff; status belongs to the server. */
const comparable = (object: ManifestObject): Record<string, unknown> => {
  const { status: _status, metadata, ...rest } = object;
  const { name, namespace, labels, annotations } = metadata;
  return { ...rest, metadata: { name, namespace, labels, annotations } };
};

/** The payload recorded by the last apply, if the live object carries a readable one. */
const lastAppliedOf = (live: LiveObject): Record<string, unknown> | undefined => {
  const recorded = live.metadata.annotations?.[LAST_APPLIED_ANNOTATION];
  if (!recorded) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(recorded);
    return isObject(parsed) ? parsed : undefined;
  } catch (err) {
    logger.warn(`Ignoring unreadable ${LAST_APPLIED_ANNOTATION} on ${formatRef(refOf(live))}: ${err}`);
    return undefined;
  }
};

/**
 * Stamps the ownership label on every snapshot object and places namespaced objects without
 * a namespace into the destination namespace. Each object also records its own payload in the
 * last-applied annotation, so a later pass can tell which fields were dropped from the
 * repository. The snapshot itself is left untouched.
 */
export const prepareDesired = (
  snapshot: DesiredStateSnapshot,
  application: string,
  destinationNamespace: string,
  registry: KindRegistry,
): ManifestObject[] =>
  snapshot.objects.map((object) => {
    const copy = structuredClone(object);
    const namespaced = registry.isNamespaced(copy.kind);
    const { [LAST_APPLIED_ANNOTATION]: _stale, ...annotations } = copy.metadata.annotations ?? {};
    copy.metadata = {
      ...copy.metadata,
      namespace: namespaced ? (copy.metadata.namespace ?? destinationNamespace) : undefined,
      labels: { ...copy.metadata.labels, [OWNER_LABEL]: application },
      annotations: Object.keys(annotations).length > 0 ? annotations : undefined,
    };
    copy.metadata.annotations = { ...annotations, [LAST_APPLIED_ANNOTATION]: canonicalStringify(comparable(copy)) };
    return copy;
  });

/** Every object is checked before anything is written, so a bad snapshot never half-applies. */
export const validateDesired = (objects: readonly ManifestObject[], registry: KindRegistry): void => {
  const issues: string[] = [];
  for (const object of objects) {
    const result = ManifestObjectSchema.safeParse(object);
    if (!result.success) {
      issues.push(
        ...result.error.issues.map((issue) => `${formatRef(refOf(object))} ${issue.path.join('.')}: ${issue.message}`),
      );
    }
    if (!registry.find(object.kind)) {
      issues.push(`${formatRef(refOf(object))}: no API mapping registered for kind '${object.kind}'`);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError(`Desired state is invalid: ${issues.join('; ')}`, issues);
  }
};

/**
 * Three-way diff: desired fields that differ from the live object, plus fields the last apply
 * set that the desired object no longer declares. Fields only the live object has, and that no
 * apply ever set, belong to the server and are ignored.
 */
export const diffObject = (desired: ManifestObject, live: LiveObject): ObjectDiff => {
  const target = comparable(desired);
  const current = comparable(live);
  const lastApplied = lastAppliedOf(live);
  return {
    changes: filterChanges(target, current),
    removed: lastApplied ? removedFields(lastApplied, target, current) : {},
  };
};

export const hasDifferences = ({ changes, removed }: ObjectDiff): boolean =>
  Object.keys(changes).length > 0 || Object.keys(removed).length > 0;

export const planChange = (desired: ManifestObject, live: LiveObject | undefined): PlannedChange => {
  const ref = refOf(desired);
  if (!live) {
    return { action: ObjectAction.Create, ref, desired };
  }
  const diff = diffObject(desired, live);
  if (!hasDifferences(diff)) {
    return { action: ObjectAction.Unchanged, ref, desired, live };
  }
  const removed = Object.keys(diff.removed).length > 0 ? diff.removed : undefined;
  return { action: ObjectAction.Update, ref, desired, live, changes: diff.changes, removed };
};

export const planSync = (
  desired: readonly ManifestObject[],
  live: readonly LiveObject[],
  registry: KindRegistry,
): SyncPlan => {
  const liveByKey = new Map(live.map((object) => [refKey(refOf(object)), object]));
  const desiredKeys = new Set<string>();

  const apply = desired.map((object) => {
    const key = refKey(refOf(object));
    desiredKeys.add(key);
    return planChange(object, liveByKey.get(key));
  });

  const prune = live
    .filter((object) => !desiredKeys.has(refKey(refOf(object))))
    .sort((a, b) => registry.compare(b, a))
    .map((object): PlannedChange => ({ action: ObjectAction.Prune, ref: refOf(object), live: object }));

  return { apply, prune };
};
