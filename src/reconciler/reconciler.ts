import type { ApplicationStore } from '@/applications/application.store';
import { sync_config } from '@/config/app.config';
import { APPLICATION_KIND, OWNER_LABEL } from '@/config/operator.config';
import type { ApplicationDto, ResourceResult, SyncResult, SyncStatus } from '@/dtos/application.dto';
import { HealthStatus, SyncState } from '@/enums/health-status.enum';
import { ObjectAction, ObjectOutcome } from '@/enums/object-action.enum';
import { ReconcilePhase } from '@/enums/reconcile-phase.enum';
import { ResourceEventType } from '@/enums/resource-event-type.enum';
import {
  describeError,
  FatalError,
  NotFoundError,
  RenderError,
  toDriftlessError,
  type DriftlessError,
} from '@/errors/driftless.errors';
import type { DesiredStateSnapshot } from '@/interfaces/desired-state-snapshot.interface';
import type { LiveObject, ManifestObject } from '@/interfaces/manifest-object.interface';
import { formatRef, type ObjectStore } from '@/interfaces/object-store.interface';
import type { ObjectRef } from '@/interfaces/object-ref.interface';
import type { ResourceEvent } from '@/interfaces/resource-event.interface';
import { logger } from '@/logger';
import { kindRegistry, type KindRegistry } from '@/object-store/kind-registry';
import { computeBackoff, type BackoffOptions } from '@/utils/backoff';
import { KeyedMutex } from '@/utils/keyed-mutex';
import { isAbortError, sleep as defaultSleep, type Sleep } from '@/utils/sleep';
import { aggregateHealth, assessObjectHealth } from './health-assessor';
import { countChanges, formatPlanDiff } from './plan-diff';
import { ReconcileStateMachine } from './reconcile-state-machine';
import {
  diffObject,
  hasDifferences,
  planChange,
  planSync,
  prepareDesired,
  refKey,
  validateDesired,
  type PlannedChange,
  type SyncPlan,
} from './sync-planner';
import type { SyncLease } from './sync-lease';

export type SyncTrigger = 'source' | 'operator' | 'self-heal' | 'resync';

export type SyncOptions = {
  /** Prune orphans even when the Application's policy does not. */
  prune?: boolean;
  /** Plan and diff only; nothing is written. */
  dryRun?: boolean;
  signal?: AbortSignal;
  trigger?: SyncTrigger;
  /**
   * Record the snapshot as the latest arrival when the pass starts. Callers that observe
   * snapshots on arrival themselves pass false.
   */
  observe?: boolean;
};

export type SyncOutcome = 'settled' | 'failed' | 'superseded' | 'cancelled' | 'dry-run';

export type SyncReport = {
  application: string;
  fingerprint: string;
  revision: string;
  outcome: SyncOutcome;
  resources: ResourceResult[];
  plan: SyncPlan;
  /** Set for dry runs. */
  diff?: string;
  /** The status written at the end of the pass; absent when nothing was written. */
  status?: SyncStatus;
  error?: DriftlessError;
};

export type HealthChange = {
  application: ApplicationDto;
  previous: SyncStatus;
  current: SyncStatus;
  /** Changes written by the pass that caused the transition, if any. */
  plan?: SyncPlan;
};

export type HealthChangeListener = (change: HealthChange) => void | Promise<void>;

export type ReconcilerOptions = {
  registry?: KindRegistry;
  retryLimit?: number;
  backoff?: BackoffOptions;
  historyLimit?: number;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
  /** Store-level lock held around every pass that writes; without it passes only exclude each other in-process. */
  lease?: SyncLease;
};

type AppliedState = { snapshot: DesiredStateSnapshot; desired: Map<string, ManifestObject> };

/** Unwinds a pass that must stop at a step boundary; never surfaces to callers. */
class PassInterrupted extends Error {
  constructor(readonly reason: 'superseded' | 'cancelled') {
    super(`Pass ${reason}`);
  }
}

const emptyPlan = (): SyncPlan => ({ apply: [], prune: [] });

const summarize = (resources: readonly ResourceResult[]): { health: HealthStatus; sync: SyncState } => {
  const failed = resources.some((resource) => resource.outcome === ObjectOutcome.Failed);
  const blocked = resources.some((resource) => resource.outcome === ObjectOutcome.PruneSkipped);
  const present = resources
    .filter((resource) => resource.outcome !== ObjectOutcome.Pruned && resource.outcome !== ObjectOutcome.PruneSkipped)
    .map((resource) => resource.health);
  return {
    health: failed ? HealthStatus.Degraded : aggregateHealth(blocked ? [...present, HealthStatus.Progressing] : present),
    sync: failed || blocked ? SyncState.OutOfSync : SyncState.Synced,
  };
};

/**
 * Drives live objects toward a DesiredStateSnapshot, one pass at a time per Application.
 *
 * A pass lists the owned live objects, plans creates, updates and prunes, validates the whole
 * desired set, then applies in snapshot order and prunes in reverse order. Conflicts and
 * transient failures re-read and retry only the object concerned. Between every step the pass
 * checks that its fingerprint is still the latest one observed for the Application; a
 * superseded pass stops without writing status.
 */
export class Reconciler {
  private readonly registry: KindRegistry;
  private readonly retryLimit: number;
  private readonly backoff: BackoffOptions;
  private readonly historyLimit: number;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly lease?: SyncLease;

  private readonly mutex = new KeyedMutex();
  private readonly machines = new Map<string, ReconcileStateMachine>();
  private readonly latest = new Map<string, string>();
  private readonly applied = new Map<string, AppliedState>();
  private readonly listeners: HealthChangeListener[] = [];

  constructor(
    private readonly store: ObjectStore,
    private readonly applications: ApplicationStore,
    options: ReconcilerOptions = {},
  ) {
    this.registry = options.registry ?? kindRegistry;
    this.retryLimit = options.retryLimit ?? sync_config.retryLimit;
    this.backoff = options.backoff ?? { baseMs: sync_config.backoffBaseMs, capMs: sync_config.backoffCapMs };
    this.historyLimit = options.historyLimit ?? sync_config.statusHistoryLimit;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.lease = options.lease;
  }

  public onHealthChange(listener: HealthChangeListener): void {
    this.listeners.push(listener);
  }

  /** Records a snapshot arrival; any pass for an older fingerprint is superseded from now on. */
  public observe(application: string, fingerprint: string): void {
    if (this.latest.get(application) !== fingerprint) {
      logger.debug(`[${application}] Latest fingerprint is now ${fingerprint.slice(0, 12)}`);
    }
    this.latest.set(application, fingerprint);
  }

  public latestFingerprint(application: string): string | undefined {
    return this.latest.get(application);
  }

  public phaseOf(application: string): ReconcilePhase {
    return this.machineFor(application).phase;
  }

  public machineFor(application: string): ReconcileStateMachine {
    let machine = this.machines.get(application);
    if (!machine) {
      machine = new ReconcileStateMachine(application);
      this.machines.set(application, machine);
    }
    return machine;
  }

  /** The snapshot of the last settled pass, used for self-heal and periodic resync. */
  public lastSnapshot(application: string): DesiredStateSnapshot | undefined {
    return this.applied.get(application)?.snapshot;
  }

  public isBusy(application: string): boolean {
    return this.mutex.isLocked(application);
  }

  public forget(application: string): void {
    this.machines.delete(application);
    this.latest.delete(application);
    this.applied.delete(application);
  }

  public async reconcile(
    application: ApplicationDto,
    snapshot: DesiredStateSnapshot,
    options: SyncOptions = {},
  ): Promise<SyncReport> {
    const name = application.metadata.name;
    if (options.observe ?? true) {
      this.observe(name, snapshot.fingerprint);
    }
    return this.mutex.runExclusive(name, () =>
      this.lease && !options.dryRun
        ? this.lease.hold(
            name,
            (signal) => this.runPass(application, snapshot, { ...options, signal }),
            options.signal,
          )
        : this.runPass(application, snapshot, options),
    );
  }

  /**
   * True when a watch event shows an owned object that no longer matches what the last pass
   * applied, including its deletion.
   */
  public hasDrifted(application: string, event: ResourceEvent): boolean {
    const desired = this.applied.get(application)?.desired.get(refKey(this.refOf(event.object)));
    if (!desired) {
      return false;
    }
    if (event.type === ResourceEventType.Deleted) {
      return true;
    }
    return hasDifferences(diffObject(desired, event.object));
  }

  /** Records a failure that happened before a pass could start, e.g. a render error. */
  public async recordFailure(application: ApplicationDto, error: unknown, revision?: string): Promise<SyncStatus> {
    const name = application.metadata.name;
    return this.mutex.runExclusive(name, async () => {
      const failure = toDriftlessError(error);
      const machine = this.machineFor(name);
      if (machine.phase !== ReconcilePhase.Idle) {
        machine.transition(ReconcilePhase.Idle);
      }
      machine.transition(ReconcilePhase.Failed);

      const previous = await this.applications.readStatus(name);
      const status = this.failedStatus(previous, failure, { revision });
      await this.applications.writeStatus(name, status);
      logger.error(`[${name}] ${describeError(failure).message}`);
      await this.notifyIfChanged(application, previous, status);
      return status;
    });
  }

  /**
   * Re-evaluates health from the live objects without applying anything. Only settled
   * Applications are re-evaluated; a failed pass keeps its classification until the next one.
   */
  public async refreshHealth(application: ApplicationDto): Promise<SyncStatus> {
    const name = application.metadata.name;
    return this.mutex.runExclusive(name, async () => {
      const previous = await this.applications.readStatus(name);
      if (previous.phase !== ReconcilePhase.Settled) {
        return previous;
      }

      const live = await this.listOwned(name);
      const desired = this.applied.get(name)?.desired;
      let drifted = false;
      const resources = previous.resources.map((resource) => {
        if (
          resource.outcome === ObjectOutcome.Pruned ||
          resource.outcome === ObjectOutcome.PruneSkipped ||
          resource.outcome === ObjectOutcome.Failed
        ) {
          return resource;
        }
        const key = refKey(resource);
        const object = live.get(key);
        const applied = desired?.get(key);
        if (applied && (!object || hasDifferences(diffObject(applied, object)))) {
          drifted = true;
        }
        return { ...resource, health: assessObjectHealth(object) };
      });

      const summary = summarize(resources);
      const sync = drifted ? SyncState.OutOfSync : summary.sync;
      if (summary.health === previous.health && sync === previous.sync) {
        return previous;
      }

      const status: SyncStatus = { ...previous, health: summary.health, sync, resources };
      await this.applications.writeStatus(name, status);
      logger.info(`[${name}] Health ${previous.health} -> ${status.health}, sync ${previous.sync} -> ${status.sync}`);
      await this.notify({ application, previous, current: status });
      return status;
    });
  }

  /**
   * Compares a snapshot with the live objects without applying it, for Applications that
   * sync manually. Only the sync state is written; a snapshot that cannot be applied is
   * recorded as a failure.
   */
  public async assessSync(application: ApplicationDto, snapshot: DesiredStateSnapshot): Promise<SyncReport> {
    const name = application.metadata.name;
    const report = await this.reconcile(application, snapshot, { dryRun: true, trigger: 'source', observe: false });
    if (report.outcome === 'failed' && report.error) {
      const status = await this.recordFailure(application, report.error, snapshot.revision);
      return { ...report, status };
    }
    if (report.outcome !== 'dry-run') {
      return report;
    }

    const sync = countChanges(report.plan) > 0 ? SyncState.OutOfSync : SyncState.Synced;
    const status = await this.mutex.runExclusive(name, async () => {
      const previous = await this.applications.readStatus(name);
      if (previous.sync === sync || !this.isCurrent(name, snapshot.fingerprint)) {
        return previous;
      }
      const current: SyncStatus = { ...previous, sync };
      await this.applications.writeStatus(name, current);
      logger.info(`[${name}] ${snapshot.revision.slice(0, 12)} is ${sync} (manual sync policy)`);
      await this.notify({ application, previous, current });
      return current;
    });
    return { ...report, status };
  }

  private async runPass(
    application: ApplicationDto,
    snapshot: DesiredStateSnapshot,
    options: SyncOptions,
  ): Promise<SyncReport> {
    const name = application.metadata.name;
    const machine = this.machineFor(name);
    const report: SyncReport = {
      application: name,
      fingerprint: snapshot.fingerprint,
      revision: snapshot.revision,
      outcome: 'settled',
      resources: [],
      plan: emptyPlan(),
    };
    const boundary = () => this.checkBoundary(name, snapshot.fingerprint, options.signal);
    const pruneEnabled = options.prune === true || application.spec.syncPolicy.prune;

    machine.begin();
    logger.info(
      `[${name}] Syncing ${snapshot.fingerprint.slice(0, 12)} at ${snapshot.revision.slice(0, 12)}` +
        ` (${options.trigger ?? 'operator'}${options.dryRun ? ', dry run' : ''})`,
    );

    let previous: SyncStatus | undefined;
    try {
      boundary();
      previous = await this.applications.readStatus(name);

      const desired = prepareDesired(snapshot, name, application.spec.destination.namespace, this.registry);
      validateDesired(desired, this.registry);

      boundary();
      const live = await this.withRetries(`list objects owned by '${name}'`, options.signal, () => this.listOwned(name));
      report.plan = planSync(desired, [...live.values()], this.registry);

      if (options.dryRun) {
        machine.transition(ReconcilePhase.Idle);
        return { ...report, outcome: 'dry-run', diff: formatPlanDiff(report.plan, pruneEnabled) };
      }

      boundary();
      machine.transition(ReconcilePhase.Applying);

      const failures: DriftlessError[] = [];
      const settled = new Map<string, ManifestObject>();
      for (const change of report.plan.apply) {
        boundary();
        const result = await this.applyChange(name, machine, change, options.signal, boundary);
        report.resources.push(result.resource);
        if (result.error) {
          failures.push(result.error);
        } else if (change.desired) {
          settled.set(refKey(change.ref), change.desired);
        }
      }

      for (const change of report.plan.prune) {
        boundary();
        const result = pruneEnabled
          ? await this.pruneChange(name, machine, change, options.signal, boundary)
          : { resource: this.resourceResult(change.ref, ObjectOutcome.PruneSkipped, 0, HealthStatus.Unknown) };
        report.resources.push(result.resource);
        if (result.error) {
          failures.push(result.error);
        }
      }

      boundary();
      const observed = await this.withRetries(`read back objects owned by '${name}'`, options.signal, () =>
        this.listOwned(name),
      );
      report.resources = report.resources.map((resource) =>
        resource.outcome === ObjectOutcome.Failed || resource.outcome === ObjectOutcome.Pruned
          ? resource
          : { ...resource, health: assessObjectHealth(observed.get(refKey(resource))) },
      );

      const lastError = failures.at(-1);
      machine.transition(lastError ? ReconcilePhase.Failed : ReconcilePhase.Settled);
      this.applied.set(name, { snapshot, desired: settled });

      boundary();
      const status = this.completedStatus(previous, snapshot, report.resources, lastError);
      await this.applications.writeStatus(name, status);
      logger.info(`[${name}] Pass ${machine.phase}: health ${status.health}, sync ${status.sync}`);
      await this.notifyIfChanged(application, previous, status, report.plan);

      return { ...report, outcome: lastError ? 'failed' : 'settled', status, error: lastError };
    } catch (err) {
      if (err instanceof PassInterrupted || isAbortError(err)) {
        const reason =
          err instanceof PassInterrupted
            ? err.reason
            : this.isCurrent(name, snapshot.fingerprint)
              ? 'cancelled'
              : 'superseded';
        logger.info(`[${name}] Pass for ${snapshot.fingerprint.slice(0, 12)} ${reason}, status left untouched`);
        if (machine.phase !== ReconcilePhase.Idle) {
          machine.transition(ReconcilePhase.Idle);
        }
        return { ...report, outcome: reason };
      }

      const error = toDriftlessError(err);
      logger.error(`[${name}] Pass failed: ${describeError(error).message}`);
      if (machine.phase !== ReconcilePhase.Failed) {
        machine.transition(ReconcilePhase.Failed);
      }
      if (!previous || options.dryRun || !this.isCurrent(name, snapshot.fingerprint)) {
        return { ...report, outcome: 'failed', error };
      }

      const status = this.failedStatus(previous, error, {
        fingerprint: snapshot.fingerprint,
        revision: snapshot.revision,
        resources: report.resources,
      });
      await this.applications.writeStatus(name, status);
      await this.notifyIfChanged(application, previous, status, report.plan);
      return { ...report, outcome: 'failed', status, error };
    }
  }

  private async applyChange(
    application: string,
    machine: ReconcileStateMachine,
    planned: PlannedChange,
    signal: AbortSignal | undefined,
    boundary: () => void,
  ): Promise<{ resource: ResourceResult; error?: DriftlessError }> {
    const { desired, ref } = planned;
    if (!desired) {
      return { resource: this.resourceResult(ref, ObjectOutcome.Skipped, 0, HealthStatus.Unknown) };
    }

    let change = planned;
    for (let attempt = 1; ; attempt++) {
      if (change.action === ObjectAction.Unchanged) {
        return { resource: this.resourceResult(ref, ObjectOutcome.Unchanged, attempt - 1, HealthStatus.Unknown) };
      }
      try {
        await this.store.apply(desired, change.live?.metadata.resourceVersion);
        const outcome = change.action === ObjectAction.Create ? ObjectOutcome.Created : ObjectOutcome.Updated;
        logger.info(`[${application}] ${outcome} ${formatRef(ref)}`);
        return { resource: this.resourceResult(ref, outcome, attempt, HealthStatus.Unknown) };
      } catch (err) {
        const error = toDriftlessError(err);
        if (!error.retryable && !(error instanceof NotFoundError)) {
          throw error;
        }
        if (attempt >= this.retryLimit) {
          logger.error(`[${application}] Giving up on ${formatRef(ref)} after ${attempt} attempts: ${error.message}`);
          return {
            resource: this.resourceResult(ref, ObjectOutcome.Failed, attempt, HealthStatus.Degraded, error.message),
            error,
          };
        }

        machine.transition(ReconcilePhase.ConflictRetry);
        logger.warn(`[${application}] ${error.kind} on ${formatRef(ref)} (attempt ${attempt}/${this.retryLimit})`);
        await this.sleep(computeBackoff(attempt - 1, this.backoff, this.random), signal);
        boundary();
        change = planChange(desired, await this.reread(ref, change.live));
        machine.transition(ReconcilePhase.Applying);
      }
    }
  }

  private async pruneChange(
    application: string,
    machine: ReconcileStateMachine,
    planned: PlannedChange,
    signal: AbortSignal | undefined,
    boundary: () => void,
  ): Promise<{ resource: ResourceResult; error?: DriftlessError }> {
    const { ref } = planned;
    let live = planned.live;
    for (let attempt = 1; ; attempt++) {
      if (!live) {
        return { resource: this.resourceResult(ref, ObjectOutcome.Pruned, attempt - 1, HealthStatus.Healthy) };
      }
      if (live.metadata.labels?.[OWNER_LABEL] !== application) {
        return {
          resource: this.resourceResult(ref, ObjectOutcome.Skipped, attempt - 1, HealthStatus.Unknown, 'no longer owned'),
        };
      }
      try {
        await this.store.delete(ref, live.metadata.resourceVersion);
        logger.info(`[${application}] Pruned ${formatRef(ref)}`);
        return { resource: this.resourceResult(ref, ObjectOutcome.Pruned, attempt, HealthStatus.Healthy) };
      } catch (err) {
        const error = toDriftlessError(err);
        if (error instanceof NotFoundError) {
          return { resource: this.resourceResult(ref, ObjectOutcome.Pruned, attempt, HealthStatus.Healthy) };
        }
        if (!error.retryable) {
          throw error;
        }
        if (attempt >= this.retryLimit) {
          return {
            resource: this.resourceResult(ref, ObjectOutcome.Failed, attempt, HealthStatus.Degraded, error.message),
            error,
          };
        }
        machine.transition(ReconcilePhase.ConflictRetry);
        logger.warn(`[${application}] ${error.kind} pruning ${formatRef(ref)} (attempt ${attempt}/${this.retryLimit})`);
        await this.sleep(computeBackoff(attempt - 1, this.backoff, this.random), signal);
        boundary();
        live = await this.reread(ref, live);
        machine.transition(ReconcilePhase.Applying);
      }
    }
  }

  /** Fresh copy of one object; a failed read keeps the stale copy so the next attempt conflicts again. */
  private async reread(ref: ObjectRef, stale: LiveObject | undefined): Promise<LiveObject | undefined> {
    try {
      return await this.store.get(ref);
    } catch (err) {
      const error = toDriftlessError(err);
      if (error instanceof NotFoundError) {
        return undefined;
      }
      if (error.retryable) {
        return stale;
      }
      throw error;
    }
  }

  private async withRetries<T>(operation: string, signal: AbortSignal | undefined, task: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await task();
      } catch (err) {
        const error = toDriftlessError(err);
        if (!error.retryable || attempt >= this.retryLimit) {
          throw error;
        }
        logger.warn(`Failed to ${operation} (attempt ${attempt}/${this.retryLimit}): ${error.message}`);
        await this.sleep(computeBackoff(attempt - 1, this.backoff, this.random), signal);
      }
    }
  }

  /** Owned objects of every registered kind, keyed by identity. */
  private async listOwned(application: string): Promise<Map<string, LiveObject>> {
    const kinds = this.registry.kinds().filter((info) => info.kind !== APPLICATION_KIND);
    const lists = await Promise.all(
      kinds.map((info) => this.store.list(info.kind, undefined, { [OWNER_LABEL]: application })),
    );
    return new Map(lists.flat().map((object) => [refKey(this.refOf(object)), object]));
  }

  private refOf(object: ManifestObject): ObjectRef {
    const namespace = this.registry.isNamespaced(object.kind) ? object.metadata.namespace : undefined;
    return { kind: object.kind, namespace, name: object.metadata.name };
  }

  private isCurrent(application: string, fingerprint: string): boolean {
    return this.latest.get(application) === fingerprint;
  }

  private checkBoundary(application: string, fingerprint: string, signal: AbortSignal | undefined): void {
    if (!this.isCurrent(application, fingerprint)) {
      throw new PassInterrupted('superseded');
    }
    if (signal?.aborted) {
      throw new PassInterrupted('cancelled');
    }
  }

  private resourceResult(
    ref: ObjectRef,
    outcome: ObjectOutcome,
    attempts: number,
    health: HealthStatus,
    message?: string,
  ): ResourceResult {
    return { kind: ref.kind, namespace: ref.namespace, name: ref.name, outcome, attempts, health, message };
  }

  private historyEntry(status: Omit<SyncResult, 'finishedAt'>): SyncResult {
    return { ...status, finishedAt: this.now().toISOString() };
  }

  private appendHistory(previous: SyncStatus, entry: SyncResult): SyncResult[] {
    return [...previous.history, entry].slice(-this.historyLimit);
  }

  private completedStatus(
    previous: SyncStatus,
    snapshot: DesiredStateSnapshot,
    resources: ResourceResult[],
    lastError: DriftlessError | undefined,
  ): SyncStatus {
    const { health, sync } = summarize(resources);
    const phase = lastError ? ReconcilePhase.Failed : ReconcilePhase.Settled;
    const error = lastError ? describeError(lastError) : undefined;
    return {
      phase,
      health,
      sync,
      lastAttemptedFingerprint: snapshot.fingerprint,
      lastSyncedFingerprint: lastError ? previous.lastSyncedFingerprint : snapshot.fingerprint,
      revision: snapshot.revision,
      resources,
      lastError: error,
      reconciledAt: this.now().toISOString(),
      history: this.appendHistory(
        previous,
        this.historyEntry({ fingerprint: snapshot.fingerprint, revision: snapshot.revision, phase, health, sync, error }),
      ),
    };
  }

  /**
   * Fatal errors and exhausted retries degrade health. Render and validation errors leave the
   * live objects untouched, so their last known health stands.
   */
  private failedStatus(
    previous: SyncStatus,
    failure: DriftlessError,
    attempt: { fingerprint?: string; revision?: string; resources?: ResourceResult[] },
  ): SyncStatus {
    const error = describeError(failure);
    const degrading = failure instanceof FatalError || failure.retryable;
    const health = degrading ? HealthStatus.Degraded : previous.health;
    const sync = failure instanceof RenderError ? SyncState.Unknown : SyncState.OutOfSync;
    return {
      ...previous,
      phase: ReconcilePhase.Failed,
      health,
      sync,
      lastAttemptedFingerprint: attempt.fingerprint ?? previous.lastAttemptedFingerprint,
      revision: attempt.revision ?? previous.revision,
      resources: attempt.resources && attempt.resources.length > 0 ? attempt.resources : previous.resources,
      lastError: error,
      reconciledAt: this.now().toISOString(),
      history: this.appendHistory(
        previous,
        this.historyEntry({
          fingerprint: attempt.fingerprint,
          revision: attempt.revision,
          phase: ReconcilePhase.Failed,
          health,
          sync,
          error,
        }),
      ),
    };
  }

  private async notifyIfChanged(
    application: ApplicationDto,
    previous: SyncStatus,
    current: SyncStatus,
    plan?: SyncPlan,
  ): Promise<void> {
    if (previous.health !== current.health || previous.sync !== current.sync) {
      await this.notify({ application, previous, current, plan });
    }
  }

  private async notify(change: HealthChange): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(change);
      } catch (err) {
        logger.error(`Health change listener failed for '${change.application.metadata.name}': ${err}`);
      }
    }
  }
}
