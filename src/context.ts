import { KubeConfig } from '@kubernetes/client-node';
import { ApplicationStore } from './applications/application.store';
import { control_config, source_config } from './config/app.config';
import type { ImageRegistry } from './interfaces/image-registry.interface';
import type { ObjectStore } from './interfaces/object-store.interface';
import type { RepositoryClient } from './interfaces/repository-client.interface';
import { kindRegistry, type KindRegistry } from './object-store/kind-registry';
import { KubernetesObjectStore } from './object-store/kubernetes.object-store';
import { ConfigMapImageRegistry } from './pipeline/config-map.image-registry';
import { PipelineTrigger, type PipelineTriggerOptions } from './pipeline/pipeline-trigger';
import { Reconciler, type ReconcilerOptions } from './reconciler/reconciler';
import { SyncLease } from './reconciler/sync-lease';
import { ManifestRenderer } from './renderer/manifest-renderer';
import { GitRepositoryClient } from './source/git.repository-client';
import { StatusReporter } from './status/status-reporter';

/** The collaborators one control-surface call needs, built over a single object store. */
export type DriftlessContext = {
  store: ObjectStore;
  repository: RepositoryClient;
  registry: KindRegistry;
  applications: ApplicationStore;
  renderer: ManifestRenderer;
  reconciler: Reconciler;
  images: ImageRegistry;
  pipelines: PipelineTrigger;
  statusReporter: StatusReporter;
};

export type ContextOptions = {
  registry?: KindRegistry;
  namespace?: string;
  reconciler?: Omit<ReconcilerOptions, 'registry'>;
  pipeline?: PipelineTriggerOptions;
};

export const createContext = (
  store: ObjectStore,
  repository: RepositoryClient,
  images: ImageRegistry,
  options: ContextOptions = {},
): DriftlessContext => {
  const registry = options.registry ?? kindRegistry;
  const applications = new ApplicationStore(store, options.namespace, registry);
  const pipelines = new PipelineTrigger(store, images, applications, options.pipeline);
  return {
    store,
    repository,
    registry,
    applications,
    renderer: new ManifestRenderer(repository, registry),
    reconciler: new Reconciler(store, applications, {
      ...options.reconciler,
      registry,
      lease: options.reconciler?.lease ?? new SyncLease(store, { namespace: options.namespace, registry }),
    }),
    images,
    pipelines,
    statusReporter: new StatusReporter(applications, pipelines),
  };
};

/** Context against the cluster from the default kubeconfig and git mirrors on local disk. */
export const createClusterContext = (): DriftlessContext => {
  const kubeConfig = new KubeConfig();
  // This method finds kubernetes connection configuration through several possible ways
  kubeConfig.loadFromDefault();
  const store = new KubernetesObjectStore(kubeConfig);
  return createContext(
    store,
    new GitRepositoryClient(source_config.repoCacheDir),
    new ConfigMapImageRegistry(store, control_config.namespace),
  );
};
