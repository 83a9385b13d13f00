import { HealthStatus } from '@/enums/health-status.enum';
import type { LiveObject } from '@/interfaces/manifest-object.interface';
import { isObject } from '@/utils/is-object';

type Condition = { type: string; status: string; reason?: string };

const numberAt = (source: Record<string, unknown> | undefined, key: string): number | undefined => {
  const value = source?.[key];
  return typeof value === 'number' ? value : undefined;
};

const conditionsOf = (status: Record<string, unknown> | undefined): Condition[] => {
  const conditions = status?.conditions;
  if (!Array.isArray(conditions)) {
    return [];
  }
  return conditions.flatMap((condition) =>
    isObject(condition) && typeof condition.type === 'string' && typeof condition.status === 'string'
      ? [
          {
            type: condition.type,
            status: condition.status,
            reason: typeof condition.reason === 'string' ? condition.reason : undefined,
          },
        ]
      : [],
  );
};

const hasCondition = (object: LiveObject, type: string, status = 'True'): Condition | undefined =>
  conditionsOf(object.status).find((condition) => condition.type === type && condition.status === status);

/** The controller of the kind has seen the latest spec. */
const isObserved = (object: LiveObject): boolean =>
  (numberAt(object.status, 'observedGeneration') ?? 0) >= (object.metadata.generation ?? 0);

const specOf = (object: LiveObject): Record<string, unknown> | undefined =>
  isObject(object.spec) ? object.spec : undefined;

const replicaWorkloadHealth = (object: LiveObject): HealthStatus => {
  const progressing = hasCondition(object, 'Progressing', 'False');
  if (progressing?.reason === 'ProgressDeadlineExceeded') {
    return HealthStatus.Degraded;
  }
  const desired = numberAt(specOf(object), 'replicas') ?? 1;
  const ready = numberAt(object.status, 'readyReplicas') ?? 0;
  return isObserved(object) && ready >= desired ? HealthStatus.Healthy : HealthStatus.Progressing;
};

const daemonSetHealth = (object: LiveObject): HealthStatus => {
  const desired = numberAt(object.status, 'desiredNumberScheduled') ?? 0;
  const ready = numberAt(object.status, 'numberReady') ?? 0;
  return isObserved(object) && ready >= desired ? HealthStatus.Healthy : HealthStatus.Progressing;
};

const jobHealth = (object: LiveObject): HealthStatus => {
  if (hasCondition(object, 'Failed')) {
    return HealthStatus.Degraded;
  }
  return hasCondition(object, 'Complete') ? HealthStatus.Healthy : HealthStatus.Progressing;
};

const podHealth = (object: LiveObject): HealthStatus => {
  switch (object.status?.phase) {
    case 'Running':
    case 'Succeeded':
      return HealthStatus.Healthy;
    case 'Failed':
      return HealthStatus.Degraded;
    default:
      return HealthStatus.Progressing;
  }
};

/** Kinds without a readiness notion are healthy as soon as they exist. */
export const assessObjectHealth = (object: LiveObject | undefined): HealthStatus => {
  if (!object) {
    return HealthStatus.Unknown;
  }
  if (object.metadata.deletionTimestamp) {
    return HealthStatus.Progressing;
  }
  switch (object.kind) {
    case 'Deployment':
    case 'StatefulSet':
      return replicaWorkloadHealth(object);
    case 'DaemonSet':
      return daemonSetHealth(object);
    case 'Job':
      return jobHealth(object);
    case 'Pod':
      return podHealth(object);
    default:
      return HealthStatus.Healthy;
  }
};

const severity: Record<HealthStatus, number> = {
  [HealthStatus.Healthy]: 0,
  [HealthStatus.Unknown]: 1,
  [HealthStatus.Progressing]: 2,
  [HealthStatus.Degraded]: 3,
};

/** Worst classification wins; an empty set is healthy. */
export const aggregateHealth = (statuses: Iterable<HealthStatus>): HealthStatus => {
  let worst = HealthStatus.Healthy;
  for (const status of statuses) {
    if (severity[status] > severity[worst]) {
      worst = status;
    }
  }
  return worst;
};
