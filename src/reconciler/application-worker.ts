import { sync_config } from '@/config/app.config';
import type { ApplicationDto } from '@/dtos/application.dto';
import { ReconcilePhase } from '@/enums/reconcile-phase.enum';
import { FatalError, type DriftlessError } from '@/errors/driftless.errors';
import type { DesiredStateSnapshot } from '@/interfaces/desired-state-snapshot.interface';
import type { ResourceEvent } from '@/interfaces/resource-event.interface';
import { logger } from '@/logger';
import { BoundedQueue } from '@/utils/bounded-queue';
import { canonicalStringify } from '@/utils/canonical-json';
import type { Reconciler, SyncReport, SyncTrigger } from './reconciler';

export type WorkItem =
  | { type: 'snapshot'; snapshot: DesiredStateSnapshot }
  | { type: 'render-failed'; revision: string; error: DriftlessError }
  | { type: 'object-event'; event: ResourceEvent }
  | { type: 'resync' }
  | { type: 'definition'; application: ApplicationDto };

const generationOf = (application: ApplicationDto): number | undefined => {
  const { generation } = application.metadata;
  return typeof generation === 'number' ? generation : undefined;
};

const sourceKeyOf = (application: ApplicationDto): string => canonicalStringify(application.spec.source);

/**
 * The single task of one Application. Work arrives through a bounded drop-oldest queue and is
 * handled strictly one item at a time; a newer snapshot cancels the pass in flight.
 */
export class ApplicationWorker {
  private readonly queue: BoundedQueue<WorkItem>;
  private draining?: Promise<void>;
  private controller?: AbortController;
  private passFingerprint?: string;
  private latest?: DesiredStateSnapshot;
  /** The newest snapshot was evicted from the queue before it was handled. */
  private snapshotPending = false;
  private isHalted = false;
  private cancelled = false;
  private generation?: number;

  constructor(
    private application: ApplicationDto,
    private readonly reconciler: Reconciler,
    capacity: number = sync_config.eventQueueCapacity,
  ) {
    this.queue = new BoundedQueue(capacity);
    this.generation = generationOf(application);
  }

  get name(): string {
    return this.application.metadata.name;
  }

  get halted(): boolean {
    return this.isHalted;
  }

  get pending(): number {
    return this.queue.size;
  }

  public enqueue(item: WorkItem): void {
    if (this.cancelled) {
      return;
    }
    if (item.type === 'snapshot') {
      this.reconciler.observe(this.name, item.snapshot.fingerprint);
      this.latest = item.snapshot;
      if (this.passFingerprint && this.passFingerprint !== item.snapshot.fingerprint) {
        this.controller?.abort();
      }
    }

    const evicted = this.queue.push(item);
    if (evicted) {
      logger.warn(`[${this.name}] Event queue full, dropped oldest ${evicted.type} item`);
      if (evicted.type === 'snapshot' && evicted.snapshot === this.latest) {
        this.snapshotPending = true;
      }
    }
    this.schedule();
  }

  /** Resolves once every queued item has been handled. */
  public async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Stops the pass in flight and discards queued work; used when the Application is deleted. */
  public async cancel(): Promise<void> {
    this.cancelled = true;
    this.queue.clear();
    this.controller?.abort();
    await this.whenIdle();
  }

  private schedule(): void {
    if (this.draining) {
      return;
    }
    this.draining = this.drain().finally(() => {
      this.draining = undefined;
      if (this.queue.size > 0 && !this.cancelled) {
        this.schedule();
      }
    });
  }

  private async drain(): Promise<void> {
    for (;;) {
      if (this.cancelled) {
        return;
      }
      let item: WorkItem | undefined;
      if (this.snapshotPending && this.latest) {
        this.snapshotPending = false;
        item = { type: 'snapshot', snapshot: this.latest };
      } else {
        item = this.queue.shift();
      }
      if (!item) {
        return;
      }
      try {
        await this.handle(item);
      } catch (err) {
        logger.error(`[${this.name}] Failed to handle ${item.type}: ${err}`);
      }
    }
  }

  private async handle(item: WorkItem): Promise<void> {
    switch (item.type) {
      case 'snapshot':
        await this.handleSnapshot(item.snapshot);
        break;
      case 'render-failed':
        await this.reconciler.recordFailure(this.application, item.error, item.revision);
        break;
      case 'object-event':
        await this.handleObjectEvent(item.event);
        break;
      case 'resync':
        await this.handleResync();
        break;
      case 'definition':
        await this.handleDefinition(item.application);
        break;
    }
  }

  private async handleSnapshot(snapshot: DesiredStateSnapshot): Promise<void> {
    if (snapshot.fingerprint !== this.reconciler.latestFingerprint(this.name)) {
      logger.debug(`[${this.name}] Skipping superseded snapshot ${snapshot.fingerprint.slice(0, 12)}`);
      return;
    }
    if (this.application.spec.syncPolicy.mode === 'manual') {
      await this.reconciler.assessSync(this.application, snapshot);
      return;
    }
    await this.sync(snapshot, 'source');
  }

  private async handleObjectEvent(event: ResourceEvent): Promise<void> {
    const { mode, selfHeal } = this.application.spec.syncPolicy;
    if (
      this.latest &&
      mode === 'automated' &&
      selfHeal &&
      !this.isHalted &&
      this.reconciler.hasDrifted(this.name, event)
    ) {
      logger.info(`[${this.name}] ${event.object.kind} '${event.object.metadata.name}' drifted, healing`);
      await this.sync(this.latest, 'self-heal');
      return;
    }
    await this.reconciler.refreshHealth(this.application);
  }

  private async handleResync(): Promise<void> {
    if (this.latest && this.application.spec.syncPolicy.mode === 'automated' && !this.isHalted) {
      await this.sync(this.latest, 'resync');
      return;
    }
    await this.reconciler.refreshHealth(this.application);
  }

  /**
   * A spec change (new generation) lifts a halt and re-applies the latest snapshot when the
   * source is unchanged; a changed source is re-rendered by the source watcher instead. A
   * settled status written by an operator-initiated sync also lifts a halt.
   */
  private async handleDefinition(application: ApplicationDto): Promise<void> {
    const previous = this.application;
    const generation = generationOf(application);
    const specChanged = generation !== this.generation;
    this.application = application;
    this.generation = generation;

    if (this.isHalted && (specChanged || application.status?.phase === ReconcilePhase.Settled)) {
      logger.info(`[${this.name}] Resuming after ${specChanged ? 'a definition change' : 'an operator sync'}`);
      this.isHalted = false;
    }
    if (!specChanged || !this.latest || sourceKeyOf(previous) !== sourceKeyOf(application)) {
      return;
    }
    if (application.spec.syncPolicy.mode === 'automated') {
      await this.sync(this.latest, 'operator');
    } else {
      await this.reconciler.assessSync(application, this.latest);
    }
  }

  private async sync(snapshot: DesiredStateSnapshot, trigger: SyncTrigger): Promise<SyncReport | undefined> {
    if (this.isHalted) {
      logger.warn(`[${this.name}] Halted by a fatal error, waiting for an operator sync or a definition change`);
      return undefined;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.passFingerprint = snapshot.fingerprint;
    try {
      const report = await this.reconciler.reconcile(this.application, snapshot, {
        signal: controller.signal,
        trigger,
        observe: false,
      });
      if (report.error instanceof FatalError) {
        logger.error(`[${this.name}] Halting until an operator sync or a definition change: ${report.error.message}`);
        this.isHalted = true;
      }
      return report;
    } finally {
      this.controller = undefined;
      this.passFingerprint = undefined;
    }
  }
}
