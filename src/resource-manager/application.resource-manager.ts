import type { ApplicationStore } from '@/applications/application.store';
import { sync_config } from '@/config/app.config';
import { APPLICATION_KIND, OWNER_LABEL } from '@/config/operator.config';
import type { ApplicationDto } from '@/dtos/application.dto';
import type { LiveObject } from '@/interfaces/manifest-object.interface';
import type { ObjectStore } from '@/interfaces/object-store.interface';
import type { ResourceEvent } from '@/interfaces/resource-event.interface';
import { logger } from '@/logger';
import { ApplicationWorker } from '@/reconciler/application-worker';
import type { Reconciler } from '@/reconciler/reconciler';
import type { SourceEvent, SourceWatcher } from '@/source/source-watcher';
import { BaseResourceManager } from './base.resource-manager';

/**
 * Keeps one ApplicationWorker and one source subscription per Application object and routes
 * source events and owned-object watch events to the right worker.
 */
export class ApplicationResourceManager extends BaseResourceManager {
  readonly kind = APPLICATION_KIND;
  readonly namespace: string;

  private readonly workers = new Map<string, ApplicationWorker>();
  private readonly generations = new Map<string, number | undefined>();
  private readonly removalListeners: ((name: string) => void)[] = [];

  constructor(
    store: ObjectStore,
    private readonly applications: ApplicationStore,
    private readonly reconciler: Reconciler,
    private readonly watcher: SourceWatcher,
    private readonly queueCapacity: number = sync_config.eventQueueCapacity,
  ) {
    super(store);
    this.namespace = applications.controlNamespace;
  }

  get managed(): string[] {
    return [...this.workers.keys()].sort();
  }

  /** Called after an Application has been deleted and its worker stopped. */
  public onRemoved(listener: (name: string) => void): void {
    this.removalListeners.push(listener);
  }

  public workerFor(name: string): ApplicationWorker | undefined {
    return this.workers.get(name);
  }

  public onSourceEvent(event: SourceEvent): void {
    const worker = this.workers.get(event.application);
    if (!worker) {
      logger.debug(`Dropping ${event.type} for unmanaged Application '${event.application}'`);
      return;
    }
    if (event.type === 'snapshot') {
      worker.enqueue({ type: 'snapshot', snapshot: event.snapshot });
    } else {
      worker.enqueue({ type: 'render-failed', revision: event.revision, error: event.error });
    }
  }

  /** Hands a watch event on an owned object to its Application; everything else is ignored. */
  public routeObjectEvent(event: ResourceEvent): void {
    const owner = event.object.metadata.labels?.[OWNER_LABEL];
    if (!owner) {
      return;
    }
    this.workers.get(owner)?.enqueue({ type: 'object-event', event });
  }

  public resyncAll(): void {
    logger.info(`Resyncing ${this.workers.size} Application(s)`);
    for (const worker of this.workers.values()) {
      worker.enqueue({ type: 'resync' });
    }
  }

  public async whenIdle(): Promise<void> {
    await Promise.all([...this.workers.values()].map((worker) => worker.whenIdle()));
  }

  public async stop(): Promise<void> {
    await Promise.all([...this.workers.values()].map((worker) => worker.cancel()));
    this.workers.clear();
    this.generations.clear();
  }

  /**
   * Status writes do not change the generation and are not forwarded, except to a halted
   * worker, which watches for a settled status written by an operator sync.
   */
  protected async syncResource(object: LiveObject): Promise<void> {
    let application: ApplicationDto;
    try {
      application = this.applications.parse(object);
    } catch (err) {
      logger.error(`Ignoring Application '${object.metadata.name}': ${err}`);
      return;
    }

    const { name, generation } = object.metadata;
    const worker = this.workers.get(name);
    if (!worker) {
      this.workers.set(name, new ApplicationWorker(application, this.reconciler, this.queueCapacity));
      this.generations.set(name, generation);
      logger.info(`Managing Application '${name}' (${application.spec.syncPolicy.mode} sync)`);
      this.watcher.track(application);
      return;
    }

    const specChanged = this.generations.get(name) !== generation;
    if (!specChanged && !worker.halted) {
      return;
    }
    this.generations.set(name, generation);
    worker.enqueue({ type: 'definition', application });
    if (specChanged) {
      this.watcher.track(application);
    }
  }

  protected async deleteResource(object: LiveObject): Promise<void> {
    const { name } = object.metadata;
    const worker = this.workers.get(name);
    if (!worker) {
      return;
    }
    this.workers.delete(name);
    this.generations.delete(name);
    await worker.cancel();
    await this.watcher.untrack(name);
    this.reconciler.forget(name);
    this.removalListeners.forEach((listener) => listener(name));
    logger.info(`Stopped managing Application '${name}'`);
  }
}
