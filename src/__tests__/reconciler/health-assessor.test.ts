import { HealthStatus } from '@/enums/health-status.enum';
import type { LiveObject } from '@/interfaces/manifest-object.interface';
import { aggregateHealth, assessObjectHealth } from '@/reconciler/health-assessor';
import { describe, expect, it } from 'vitest';

const live = (kind: string, fields: Partial<LiveObject> = {}): LiveObject => ({
  apiVersion: 'v1',
  kind,
  metadata: { name: 'demo-app', namespace: 'demo', resourceVersion: '1', generation: 1 },
  ...fields,
});

describe('assessObjectHealth', () => {
  it('should report a missing object as Unknown', () => {
    expect(assessObjectHealth(undefined)).toBe(HealthStatus.Unknown);
  });

  it('should report a Deployment as Healthy once its ready replicas are observed', () => {
    const deployment = live('Deployment', {
      spec: { replicas: 1 },
      status: { observedGeneration: 1, readyReplicas: 1 },
    });

    expect(assessObjectHealth(deployment)).toBe(HealthStatus.Healthy);
  });

  it('should report a Deployment whose controller has not caught up as Progressing', () => {
    expect(assessObjectHealth(live('Deployment', { spec: { replicas: 1 } }))).toBe(HealthStatus.Progressing);

    const stale = live('Deployment', {
      metadata: { name: 'demo-app', namespace: 'demo', resourceVersion: '3', generation: 2 },
      spec: { replicas: 1 },
      status: { observedGeneration: 1, readyReplicas: 1 },
    });
    expect(assessObjectHealth(stale)).toBe(HealthStatus.Progressing);
  });

  it('should report an exceeded progress deadline as Degraded', () => {
    const deployment = live('Deployment', {
      status: {
        observedGeneration: 1,
        conditions: [{ type: 'Progressing', status: 'False', reason: 'ProgressDeadlineExceeded' }],
      },
    });

    expect(assessObjectHealth(deployment)).toBe(HealthStatus.Degraded);
  });

  it('should classify Jobs by their conditions', () => {
    expect(assessObjectHealth(live('Job', { status: { conditions: [{ type: 'Failed', status: 'True' }] } }))).toBe(
      HealthStatus.Degraded,
    );
    expect(assessObjectHealth(live('Job', { status: { conditions: [{ type: 'Complete', status: 'True' }] } }))).toBe(
      HealthStatus.Healthy,
    );
    expect(assessObjectHealth(live('Job'))).toBe(HealthStatus.Progressing);
  });

  it('should classify Pods by phase', () => {
    expect(assessObjectHealth(live('Pod', { status: { phase: 'Running' } }))).toBe(HealthStatus.Healthy);
    expect(assessObjectHealth(live('Pod', { status: { phase: 'Failed' } }))).toBe(HealthStatus.Degraded);
    expect(assessObjectHealth(live('Pod', { status: { phase: 'Pending' } }))).toBe(HealthStatus.Progressing);
  });

  it('should report kinds without readiness as Healthy', () => {
    expect(assessObjectHealth(live('Service'))).toBe(HealthStatus.Healthy);
  });

  it('should report an object being deleted as Progressing', () => {
    const terminating = live('Service', {
      metadata: { name: 'demo-app', namespace: 'demo', resourceVersion: '2', deletionTimestamp: '2026-01-01T00:00:00Z' },
    });

    expect(assessObjectHealth(terminating)).toBe(HealthStatus.Progressing);
  });
});

describe('aggregateHealth', () => {
  it('should let the worst classification win', () => {
    expect(aggregateHealth([])).toBe(HealthStatus.Healthy);
    expect(aggregateHealth([HealthStatus.Healthy, HealthStatus.Unknown])).toBe(HealthStatus.Unknown);
    expect(aggregateHealth([HealthStatus.Healthy, HealthStatus.Progressing, HealthStatus.Unknown])).toBe(
      HealthStatus.Progressing,
    );
    expect(aggregateHealth([HealthStatus.Degraded, HealthStatus.Progressing])).toBe(HealthStatus.Degraded);
  });
});
