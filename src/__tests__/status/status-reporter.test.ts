import { ApplicationStore } from '@/applications/application.store';
import { ApplicationSpecSchema, type SyncStatus } from '@/dtos/application.dto';
import { HealthStatus, SyncState } from '@/enums/health-status.enum';
import { ObjectOutcome } from '@/enums/object-action.enum';
import { PipelineOutcome } from '@/enums/pipeline-outcome.enum';
import { ReconcilePhase } from '@/enums/reconcile-phase.enum';
import { NotFoundError } from '@/errors/driftless.errors';
import { InMemoryObjectStore } from '@/object-store/in-memory.object-store';
import { InMemoryImageRegistry } from '@/pipeline/in-memory.image-registry';
import { PipelineTrigger } from '@/pipeline/pipeline-trigger';
import { formatStatusReport, StatusReporter } from '@/status/status-reporter';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DIGEST, demoSpec, REPO } from '../fixtures';

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

const spec = ApplicationSpecSchema.parse(demoSpec());

const settled: SyncStatus = {
  phase: ReconcilePhase.Settled,
  health: HealthStatus.Healthy,
  sync: SyncState.Synced,
  lastAttemptedFingerprint: 'f'.repeat(64),
  lastSyncedFingerprint: 'f'.repeat(64),
  revision: 'c'.repeat(40),
  resources: [
    { kind: 'Namespace', name: 'demo', outcome: ObjectOutcome.Unchanged, attempts: 0, health: HealthStatus.Healthy },
    {
      kind: 'Deployment',
      namespace: 'demo',
      name: 'demo-app',
      outcome: ObjectOutcome.Created,
      attempts: 1,
      health: HealthStatus.Healthy,
    },
  ],
  reconciledAt: '2026-01-01T00:00:00.000Z',
  history: [],
};

describe('StatusReporter', () => {
  let store: InMemoryObjectStore;
  let applications: ApplicationStore;
  let pipelines: PipelineTrigger;
  let reporter: StatusReporter;

  beforeEach(async () => {
    store = new InMemoryObjectStore();
    applications = new ApplicationStore(store, 'driftless');
    pipelines = new PipelineTrigger(store, new InMemoryImageRegistry(), applications, {
      namespace: 'ci',
      newRunId: () => 'run-1',
    });
    reporter = new StatusReporter(applications, pipelines);
    await applications.create('demo', demoSpec());
  });

  it('should report an empty status before the first pass', async () => {
    const report = await reporter.getStatus('demo');

    expect(report.status).toEqual({
      phase: ReconcilePhase.Idle,
      health: HealthStatus.Unknown,
      sync: SyncState.Unknown,
      resources: [],
      history: [],
    });
    expect(report.pipeline).toBeUndefined();
  });

  it('should include the latest pipeline run', async () => {
    await applications.writeStatus('demo', settled);
    await pipelines.submit('main', 'demo-app:latest', { application: 'demo' });
    await store.applyStatus(
      { kind: 'PipelineRun', namespace: 'ci', name: 'run-1' },
      { conditions: [{ type: 'Succeeded', status: 'True' }], results: [{ name: 'IMAGE_DIGEST', value: DIGEST }] },
    );

    const report = await reporter.getStatus('demo');

    expect(report.status.phase).toBe(ReconcilePhase.Settled);
    expect(report.pipeline).toEqual({
      runId: 'run-1',
      outcome: PipelineOutcome.Succeeded,
      imageTag: 'demo-app:latest',
      digest: DIGEST,
    });
  });

  it('should report a finished run without promoting it', async () => {
    await applications.updateSpec('demo', (current) => ({ ...current, imagePromotion: { image: 'demo-app' } }));
    const before = await applications.get('demo');
    await pipelines.submit('main', 'demo-app:latest', { application: 'demo' });
    await store.applyStatus(
      { kind: 'PipelineRun', namespace: 'ci', name: 'run-1' },
      { conditions: [{ type: 'Succeeded', status: 'True' }], results: [{ name: 'IMAGE_DIGEST', value: DIGEST }] },
    );

    const report = await reporter.getStatus('demo');

    expect(report.pipeline?.outcome).toBe(PipelineOutcome.Succeeded);
    const after = await applications.get('demo');
    expect(after.metadata.resourceVersion).toBe(before.metadata.resourceVersion);
    expect(after.spec.source.images).toBeUndefined();
  });

  it('should fail for an unknown Application', async () => {
    await expect(reporter.getStatus('ghost')).rejects.toThrow(NotFoundError);
  });

  it('should list every Application', async () => {
    await applications.create('web', demoSpec());

    const reports = await reporter.listStatuses();

    expect(reports.map((report) => report.application)).toEqual(['demo', 'web']);
  });
});

describe('formatStatusReport', () => {
  it('should render a settled Application with its pipeline and resources', () => {
    const text = formatStatusReport({
      application: 'demo',
      spec,
      status: settled,
      pipeline: { runId: 'run-1', outcome: PipelineOutcome.Succeeded, imageTag: 'demo-app:latest', digest: DIGEST },
    });

    expect(text.split('\n')).toEqual([
      'Application:  demo',
      `Source:       ${REPO} apps/demo @ main`,
      'Destination:  demo',
      'Phase:        Settled',
      'Health:       Healthy',
      'Sync:         Synced',
      `Revision:     ${'c'.repeat(40)}`,
      'Synced:       ffffffffffff',
      `Pipeline:     run-1 Succeeded demo-app:latest ${DIGEST}`,
      'Resources:',
      '  Namespace demo: Unchanged, Healthy',
      '  Deployment demo/demo-app: Created, Healthy',
    ]);
  });

  it('should show the last error', () => {
    const text = formatStatusReport({
      application: 'demo',
      spec,
      status: {
        ...settled,
        phase: ReconcilePhase.Failed,
        resources: [],
        lastError: { kind: 'RenderError', message: "ParseError: 'apps/demo/x.yaml': bad indentation" },
      },
    });

    expect(text.split('\n')).toContain("Last error:   RenderError: ParseError: 'apps/demo/x.yaml': bad indentation");
    expect(text.split('\n')).not.toContain('Resources:');
  });
});
