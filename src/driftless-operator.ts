import { Cron, type CronOptions } from 'croner';
import { ApplicationStore } from './applications/application.store';
import { sync_config } from './config/app.config';
import { APPLICATION_KIND, LEASE_KIND, PIPELINE_RUN_KIND } from './config/operator.config';
import { CustomResourceOperator } from './custom-resource-operator/custom-resource-operator';
import type { ObjectStore } from './interfaces/object-store.interface';
import type { RepositoryClient } from './interfaces/repository-client.interface';
import { logger } from './logger';
import type { HealthChangeNotifier } from './notifications/health-change.notifier';
import { kindRegistry, type KindRegistry } from './object-store/kind-registry';
import { Reconciler, type ReconcilerOptions } from './reconciler/reconciler';
import { SyncLease } from './reconciler/sync-lease';
import { ManifestRenderer } from './renderer/manifest-renderer';
import { ApplicationResourceManager } from './resource-manager/application.resource-manager';
import { SourceWatcher, type SourceWatcherOptions } from './source/source-watcher';

export type DriftlessOperatorOptions = {
  registry?: KindRegistry;
  namespace?: string;
  notifier?: HealthChangeNotifier;
  resyncCron?: string;
  queueCapacity?: number;
  reconciler?: Omit<ReconcilerOptions, 'registry'>;
  watcher?: SourceWatcherOptions;
};

/** Kinds that are never applied for an Application and need no watch. */
const UNWATCHED_KINDS = new Set([APPLICATION_KIND, PIPELINE_RUN_KIND, LEASE_KIND]);

/**
 * The controller process: watches Application definitions in the control namespace and every
 * managed kind in the cluster, polls each Application's source and runs one worker per
 * Application.
 */
export class DriftlessOperator extends CustomResourceOperator {
  readonly applications: ApplicationStore;
  readonly reconciler: Reconciler;
  readonly watcher: SourceWatcher;
  readonly manager: ApplicationResourceManager;

  private readonly registry: KindRegistry;
  private cronJob?: Cron;

  constructor(
    store: ObjectStore,
    repository: RepositoryClient,
    private readonly options: DriftlessOperatorOptions = {},
  ) {
    super(store);
    this.registry = options.registry ?? kindRegistry;
    this.applications = new ApplicationStore(store, options.namespace, this.registry);
    this.reconciler = new Reconciler(store, this.applications, {
      ...options.reconciler,
      registry: this.registry,
      lease:
        options.reconciler?.lease ?? new SyncLease(store, { namespace: options.namespace, registry: this.registry }),
    });
    this.watcher = new SourceWatcher(
      repository,
      new ManifestRenderer(repository, this.registry),
      (event) => this.manager.onSourceEvent(event),
      options.watcher,
    );
    this.manager = new ApplicationResourceManager(
      store,
      this.applications,
      this.reconciler,
      this.watcher,
      options.queueCapacity,
    );
  }

  protected async init(): Promise<void> {
    const { notifier } = this.options;
    if (notifier) {
      this.reconciler.onHealthChange((change) => notifier.handle(change));
      this.manager.onRemoved((name) => notifier.forget(name));
    }

    this.watchResource(APPLICATION_KIND, (event) => this.manager.handleEvent(event), this.applications.controlNamespace);
    for (const { kind } of this.registry.kinds()) {
      if (!UNWATCHED_KINDS.has(kind)) {
        this.watchResource(kind, (event) => this.manager.routeObjectEvent(event));
      }
    }

    await this.manager.syncAll();
    logger.info(`Managing ${this.manager.managed.length} Application(s) in '${this.applications.controlNamespace}'`);

    this.setupResyncCronJob(this.options.resyncCron ?? sync_config.resyncCron);
  }

  protected async shutdown(): Promise<void> {
    this.cronJob?.stop();
    await this.watcher.stop();
    await this.manager.stop();
  }

  private setupResyncCronJob(cronPattern: string | undefined): void {
    if (!cronPattern) {
      logger.debug('No resync cron pattern configured');
      return;
    }

    const cronOptions: CronOptions = {
      name: 'resync',
      protect: true,
      catch: (e: unknown) => {
        logger.error(`Resync cron job encountered an error: ${e}`);
      },
    };

    logger.debug(`Scheduling resync with pattern '${cronPattern}'`);
    this.cronJob = new Cron(cronPattern, cronOptions, () => this.manager.resyncAll());
  }
}
