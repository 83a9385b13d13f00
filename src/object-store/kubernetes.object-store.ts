import {
  DEFAULT_BACK_OFF_FACTOR,
  DEFAULT_MAX_RESTART_TIMEOUT,
  DEFAULT_RESTART_TIMEOUT,
} from '@/config/operator.config';
import { ResourceEventType } from '@/enums/resource-event-type.enum';
import { Scope } from '@/enums/scope.enum';
import {
  ConflictError,
  FatalError,
  NotFoundError,
  toDriftlessError,
  TransientIOError,
  ValidationError,
  type DriftlessError,
} from '@/errors/driftless.errors';
import { isK8sResponseError, statusMessageOf } from '@/interfaces/k8s-response-error.interfaces';
import type { LiveObject, ManifestObject } from '@/interfaces/manifest-object.interface';
import { refOf, type LabelSelector, type ObjectStore } from '@/interfaces/object-store.interface';
import type { ObjectRef } from '@/interfaces/object-ref.interface';
import type { ResourceEvent } from '@/interfaces/resource-event.interface';
import { logger } from '@/logger';
import { isObject } from '@/utils/is-object';
import {
  CustomObjectsApi,
  KubeConfig,
  KubernetesObjectApi,
  Watch,
  type KubernetesObject,
} from '@kubernetes/client-node';
import { kindRegistry, type KindInfo, type KindRegistry } from './kind-registry';

type WatchRequest = { abort(): void };

/** Maps an API failure onto the controller's error taxonomy. */
export const toStoreError = (err: unknown, ref?: ObjectRef): DriftlessError => {
  if (!isK8sResponseError(err)) {
    return toDriftlessError(err);
  }
  const message = statusMessageOf(err);
  switch (err.statusCode) {
    case 404:
      return new NotFoundError(message, ref, { cause: err });
    case 409:
      return new ConflictError(message, ref, { cause: err });
    case 400:
    case 422:
      return new ValidationError(message, [], { cause: err });
    case 401:
    case 403:
      return new FatalError(message, { cause: err });
    default:
      return new TransientIOError(`${message} (HTTP ${err.statusCode})`, { cause: err });
  }
};

/** Discovery rejects kinds the cluster does not serve (e.g. Route outside OpenShift). */
const isUnservedKind = (err: unknown): boolean =>
  (isK8sResponseError(err) && err.statusCode === 404) ||
  (err instanceof Error && err.message.includes('Unrecognized API version and kind'));

export const toLiveObject = (raw: unknown, info?: KindInfo): LiveObject => {
  if (!isObject(raw)) {
    throw new ValidationError('API returned a non-object');
  }
  const metadata = raw.metadata;
  if (!isObject(metadata)) {
    throw new ValidationError('API returned an object without metadata');
  }
  const apiVersion = typeof raw.apiVersion === 'string' ? raw.apiVersion : info?.apiVersion;
  const kind = typeof raw.kind === 'string' ? raw.kind : info?.kind;
  if (!apiVersion || !kind || typeof metadata.name !== 'string' || typeof metadata.resourceVersion !== 'string') {
    throw new ValidationError(`API returned an incomplete ${kind ?? 'object'}`);
  }
  const status = isObject(raw.status) ? raw.status : undefined;
  const deletionTimestamp = metadata.deletionTimestamp;

  return {
    ...raw,
    apiVersion,
    kind,
    metadata: {
      ...metadata,
      name: metadata.name,
      namespace: typeof metadata.namespace === 'string' ? metadata.namespace : undefined,
      resourceVersion: metadata.resourceVersion,
      generation: typeof metadata.generation === 'number' ? metadata.generation : undefined,
      deletionTimestamp: deletionTimestamp instanceof Date ? deletionTimestamp.toISOString() : undefined,
    },
    status,
  };
};

const toKubernetesObject = (object: ManifestObject, resourceVersion?: string): KubernetesObject => {
  const { name, namespace, labels, annotations } = object.metadata;
  return { ...object, metadata: { name, namespace, labels, annotations, resourceVersion } };
};

const formatSelector = (selector: LabelSelector | undefined): string | undefined =>
  selector
    ? Object.entries(selector)
        .map(([key, value]) => `${key}=${value}`)
        .join(',')
    : undefined;

/**
 * Object store backed by the cluster API. Replace carries the caller's resourceVersion so the
 * API server enforces optimistic concurrency; delete carries it as a precondition.
 */
export class KubernetesObjectStore implements ObjectStore {
  private readonly client: KubernetesObjectApi;
  private readonly customObjectsApi: CustomObjectsApi;
  private readonly watcher: Watch;

  constructor(
    kubeConfig: KubeConfig,
    private readonly registry: KindRegistry = kindRegistry,
    private readonly restartTimeout: number = DEFAULT_RESTART_TIMEOUT,
    private readonly backOffFactor: number = DEFAULT_BACK_OFF_FACTOR,
    private readonly maxRestartTimeout: number = DEFAULT_MAX_RESTART_TIMEOUT,
  ) {
    this.client = KubernetesObjectApi.makeApiClient(kubeConfig);
    this.customObjectsApi = kubeConfig.makeApiClient(CustomObjectsApi);
    this.watcher = new Watch(kubeConfig);
  }

  public async get(ref: ObjectRef): Promise<LiveObject> {
    const info = this.registry.require(ref.kind);
    try {
      const { body } = await this.client.read({
        apiVersion: info.apiVersion,
        kind: info.kind,
        metadata: { name: ref.name, namespace: info.scope === Scope.Namespaced ? ref.namespace : undefined },
      });
      return toLiveObject(body, info);
    } catch (err) {
      throw toStoreError(err, ref);
    }
  }

  public async list(kind: string, namespace?: string, labelSelector?: LabelSelector): Promise<LiveObject[]> {
    const info = this.registry.require(kind);
    try {
      const { body } = await this.client.list(
        info.apiVersion,
        info.kind,
        info.scope === Scope.Namespaced ? namespace : undefined,
        undefined, // pretty
        undefined, // exact
        undefined, // exportt
        undefined, // fieldSelector
        formatSelector(labelSelector),
      );

      if (body.metadata?._continue) {
        logger.warn(`Listing '${info.plural}' returned a partial page; ${body.metadata.remainingItemCount} items left`);
      }

      return body.items.map((item) => toLiveObject(item, info));
    } catch (err) {
      if (isUnservedKind(err)) {
        logger.debug(`Kind '${kind}' is not served by the cluster, nothing to list`);
        return [];
      }
      throw toStoreError(err);
    }
  }

  public async apply(object: ManifestObject, expectedVersion?: string): Promise<string> {
    const ref = refOf(object);
    try {
      const { body } =
        expectedVersion === undefined
          ? await this.client.create(toKubernetesObject(object))
          : await this.client.replace(toKubernetesObject(object, expectedVersion));
      return toLiveObject(body, this.registry.find(object.kind)).metadata.resourceVersion;
    } catch (err) {
      throw toStoreError(err, ref);
    }
  }

  /** Only custom resources carry a status the controller writes itself. */
  public async applyStatus(ref: ObjectRef, status: Record<string, unknown>, expectedVersion?: string): Promise<string> {
    const info = this.registry.require(ref.kind);
    const [group, version] = info.apiVersion.split('/');
    if (!version) {
      throw new ValidationError(`Status of core kind '${ref.kind}' is owned by the cluster`);
    }
    const current = await this.get(ref);
    const body = {
      ...current,
      metadata: { ...current.metadata, resourceVersion: expectedVersion ?? current.metadata.resourceVersion },
      status,
    };
    try {
      const { body: updated } =
        info.scope === Scope.Namespaced && ref.namespace
          ? await this.customObjectsApi.replaceNamespacedCustomObjectStatus(
              group,
              version,
              ref.namespace,
              info.plural,
              ref.name,
              body,
            )
          : await this.customObjectsApi.replaceClusterCustomObjectStatus(group, version, info.plural, ref.name, body);
      return toLiveObject(updated, info).metadata.resourceVersion;
    } catch (err) {
      throw toStoreError(err, ref);
    }
  }

  public async delete(ref: ObjectRef, expectedVersion?: string): Promise<void> {
    const info = this.registry.require(ref.kind);
    try {
      await this.client.delete(
        {
          apiVersion: info.apiVersion,
          kind: info.kind,
          metadata: { name: ref.name, namespace: info.scope === Scope.Namespaced ? ref.namespace : undefined },
        },
        undefined, // pretty
        undefined, // dryRun
        undefined, // gracePeriodSeconds
        undefined, // orphanDependents
        'Background',
        expectedVersion ? { preconditions: { resourceVersion: expectedVersion } } : undefined,
      );
    } catch (err) {
      throw toStoreError(err, ref);
    }
  }

  /**
   * Streams watch events for one kind. The underlying watch is restarted with exponential
   * backoff whenever it ends or fails, until the signal aborts.
   */
  public async *watch(kind: string, namespace?: string, signal?: AbortSignal): AsyncIterable<ResourceEvent> {
    const info = this.registry.require(kind);
    const path = this.watchPath(info, namespace);
    const scope = namespace ? `namespace '${namespace}'` : 'cluster';

    const pending: ResourceEvent[] = [];
    let wake: (() => void) | undefined;
    let request: WatchRequest | undefined;
    let restartTimer: NodeJS.Timeout | undefined;
    let restartDelay = this.restartTimeout;

    const notify = () => {
      wake?.();
      wake = undefined;
    };

    const onWatchEvent = (phase: string, apiObj: unknown) => {
      const type = Object.values(ResourceEventType).find((value) => value === phase);
      if (!type) {
        logger.debug(`Ignoring '${phase}' watch event for '${info.plural}'`);
        return;
      }
      try {
        pending.push({ type, object: toLiveObject(apiObj, info) });
        notify();
      } catch (err) {
        logger.warn(`Dropping malformed ${type} event for '${info.plural}': ${err}`);
      }
    };

    const scheduleRestart = () => {
      if (signal?.aborted) {
        return;
      }
      restartTimer = setTimeout(() => void startWatch(), restartDelay);
      restartDelay = Math.min(restartDelay * this.backOffFactor, this.maxRestartTimeout);
    };

    const onWatchDone = (err?: unknown) => {
      if (err && !signal?.aborted) {
        logger.error(`Error watching '${info.plural}' in ${scope}: ${err}`);
      }
      scheduleRestart();
    };

    const startWatch = async ({ start }: { start?: boolean } = {}) => {
      try {
        request = await this.watcher.watch(path, {}, onWatchEvent, onWatchDone);
        restartDelay = this.restartTimeout;
        logger.info(`${start ? '' : '(restart) '}Watching '${info.plural}' in ${scope}...`);
      } catch (err) {
        logger.error(`Failed to (re)start watch for '${info.plural}' in ${scope}: ${err}`);
        scheduleRestart();
      }
    };

    const onAbort = () => {
      clearTimeout(restartTimer);
      request?.abort();
      notify();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    await startWatch({ start: true });
    try {
      while (!signal?.aborted) {
        const event = pending.shift();
        if (event) {
          yield event;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      clearTimeout(restartTimer);
      request?.abort();
    }
  }

  private watchPath(info: KindInfo, namespace: string | undefined): string {
    const prefix = info.apiVersion.includes('/') ? `/apis/${info.apiVersion}` : `/api/${info.apiVersion}`;
    return info.scope === Scope.Namespaced && namespace
      ? `${prefix}/namespaces/${namespace}/${info.plural}`
      : `${prefix}/${info.plural}`;
  }
}
