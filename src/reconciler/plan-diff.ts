import { LAST_APPLIED_ANNOTATION } from '@/config/operator.config';
import { ObjectAction } from '@/enums/object-action.enum';
import type { ManifestObject } from '@/interfaces/manifest-object.interface';
import { formatRef } from '@/interfaces/object-store.interface';
import { projectOnto } from '@/utils/filter-changes';
import { isObject } from '@/utils/is-object';
import { readableDiff, type ReadableDiffOptions } from '@/utils/readable-diff';
import type { PlannedChange, SyncPlan } from './sync-planner';

const markers: Record<ObjectAction, string> = {
  [ObjectAction.Create]: '+',
  [ObjectAction.Update]: '~',
  [ObjectAction.Prune]: '-',
  [ObjectAction.Unchanged]: '=',
};

/** Status and the last-applied record are left out of the printed diff. */
const printable = (object: ManifestObject): ManifestObject => {
  const { status: _status, metadata, ...rest } = object;
  const { [LAST_APPLIED_ANNOTATION]: _lastApplied, ...annotations } = metadata.annotations ?? {};
  return {
    ...rest,
    metadata: { ...metadata, annotations: Object.keys(annotations).length > 0 ? annotations : undefined },
  };
};

/** `desired` with every removed field put back as null, so the live value shows as deleted. */
const withRemoved = (desired: unknown, removed: unknown): unknown => {
  if (!isObject(desired) || !isObject(removed)) {
    return desired;
  }
  const merged: Record<string, unknown> = { ...desired };
  for (const [key, value] of Object.entries(removed)) {
    merged[key] = value === null ? null : withRemoved(desired[key], value);
  }
  return merged;
};

const describeChange = (change: PlannedChange, pruneEnabled: boolean, options: ReadableDiffOptions): string[] => {
  const header = `${markers[change.action]} ${formatRef(change.ref)}`;
  switch (change.action) {
    case ObjectAction.Create:
      return change.desired ? [header, readableDiff(undefined, printable(change.desired), options)] : [header];
    case ObjectAction.Update: {
      if (!change.desired || !change.live) {
        return [header];
      }
      const desired = printable(change.desired);
      const before = projectOnto(withRemoved(desired, change.removed), printable(change.live));
      return [header, readableDiff(before, desired, options)];
    }
    case ObjectAction.Prune:
      return [pruneEnabled ? header : `${header} (prune disabled, kept)`];
    default:
      return [];
  }
};

/** Human-readable summary of what a sync would write; unchanged objects are left out. */
export const formatPlanDiff = (plan: SyncPlan, pruneEnabled: boolean, options: ReadableDiffOptions = {}): string =>
  [...plan.apply, ...plan.prune].flatMap((change) => describeChange(change, pruneEnabled, options)).join('\n');

export const countChanges = (plan: SyncPlan): number =>
  plan.apply.filter((change) => change.action !== ObjectAction.Unchanged).length + plan.prune.length;
