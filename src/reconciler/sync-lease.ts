import { control_config, lease_config } from '@/config/app.config';
import { LEASE_KIND, SYNC_LEASE_PREFIX } from '@/config/operator.config';
import { LeaseSpecSchema, type LeaseSpecDto } from '@/dtos/lease.dto';
import { Scope } from '@/enums/scope.enum';
import { ConflictError, NotFoundError } from '@/errors/driftless.errors';
import type { LiveObject } from '@/interfaces/manifest-object.interface';
import type { ObjectRef } from '@/interfaces/object-ref.interface';
import type { ObjectStore } from '@/interfaces/object-store.interface';
import { logger } from '@/logger';
import { ApplyGroup, kindRegistry, type KindRegistry } from '@/object-store/kind-registry';
import { sleep as defaultSleep, type Sleep } from '@/utils/sleep';
import { hostname } from 'node:os';

export type SyncLeaseOptions = {
  namespace?: string;
  registry?: KindRegistry;
  /** Identity written to `holderIdentity`; distinct per process. */
  holder?: string;
  durationSeconds?: number;
  acquireTimeoutMs?: number;
  pollIntervalMs?: number;
  sleep?: Sleep;
  now?: () => Date;
};

/** Lease times are MicroTime: RFC 3339 with six fractional digits. */
const microTime = (date: Date): string => date.toISOString().replace(/\.(\d{3})Z$/, '.$1000Z');

/**
 * Store-level lock on the sync of one Application, held as a `coordination.k8s.io/v1` Lease in
 * the control namespace. Every process that writes an Application's objects (the controller
 * and each CLI call) holds it for the duration of a pass, so their passes never interleave.
 *
 * Acquisition and takeover are compare-and-swap writes on the Lease's resourceVersion. A lease
 * whose `renewTime` is older than its duration is free. The holder renews it at a third of the
 * duration while the pass runs; a failed renewal aborts the pass.
 */
export class SyncLease {
  readonly holder: string;
  private readonly namespace: string;
  private readonly durationSeconds: number;
  private readonly acquireTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(
    private readonly store: ObjectStore,
    options: SyncLeaseOptions = {},
  ) {
    this.namespace = options.namespace ?? control_config.namespace;
    this.holder = options.holder ?? lease_config.holder ?? `${hostname()}-${process.pid}`;
    this.durationSeconds = options.durationSeconds ?? lease_config.durationSeconds;
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? lease_config.acquireTimeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? lease_config.pollIntervalMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());

    const registry = options.registry ?? kindRegistry;
    if (!registry.find(LEASE_KIND)) {
      registry.register({
        kind: LEASE_KIND,
        apiVersion: 'coordination.k8s.io/v1',
        plural: 'leases',
        scope: Scope.Namespaced,
        group: ApplyGroup.Other,
      });
    }
  }

  refFor(application: string): ObjectRef {
    return { kind: LEASE_KIND, namespace: this.namespace, name: `${SYNC_LEASE_PREFIX}${application}` };
  }

  /**
   * Runs `work` while holding the Application's lease. `work` receives a signal that aborts when
   * `signal` does or when the lease is lost.
   *
   * @throws ConflictError when another holder keeps the lease past the acquire timeout
   */
  public async hold<T>(
    application: string,
    work: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    await this.acquire(application, signal);

    const controller = new AbortController();
    const forward = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forward();
    }
    signal?.addEventListener('abort', forward, { once: true });

    let renewing: Promise<void> = Promise.resolve();
    const timer = setInterval(
      () => {
        renewing = this.renew(application).catch((err: unknown) => {
          logger.error(`[${application}] Lost the sync lease, aborting the pass: ${err}`);
          controller.abort(err);
        });
      },
      Math.max(1, Math.floor((this.durationSeconds * 1000) / 3)),
    );

    try {
      return await work(controller.signal);
    } finally {
      clearInterval(timer);
      signal?.removeEventListener('abort', forward);
      await renewing;
      await this.release(application);
    }
  }

  /** Current holder of the Application's lease, if it is held and not expired. */
  public async holderOf(application: string): Promise<string | undefined> {
    try {
      const spec = this.specOf(await this.store.get(this.refFor(application)));
      return this.isFree(spec) ? undefined : spec.holderIdentity;
    } catch (err) {
      if (err instanceof NotFoundError) {
        return undefined;
      }
      throw err;
    }
  }

  private async acquire(application: string, signal?: AbortSignal): Promise<void> {
    const ref = this.refFor(application);
    const deadline = this.now().getTime() + this.acquireTimeoutMs;

    for (;;) {
      const holder = await this.tryAcquire(ref);
      if (holder === this.holder) {
        logger.debug(`[${application}] Acquired the sync lease as '${this.holder}'`);
        return;
      }
      const remaining = deadline - this.now().getTime();
      if (remaining <= 0) {
        throw new ConflictError(`Application '${application}' is being synced by '${holder ?? 'another holder'}'`, ref);
      }
      logger.verbose(`[${application}] Sync lease held by '${holder}', waiting`);
      await this.sleep(Math.min(this.pollIntervalMs, remaining), signal);
    }
  }

  /** Resolves to the holder after the attempt; a lost race resolves to undefined. */
  private async tryAcquire(ref: ObjectRef): Promise<string | undefined> {
    const now = microTime(this.now());
    let live: LiveObject;
    try {
      live = await this.store.get(ref);
    } catch (err) {
      if (!(err instanceof NotFoundError)) {
        throw err;
      }
      return this.write(ref, { acquireTime: now, renewTime: now });
    }

    const spec = this.specOf(live);
    if (!this.isFree(spec) && spec.holderIdentity !== this.holder) {
      return spec.holderIdentity;
    }
    const acquireTime = spec.holderIdentity === this.holder ? (spec.acquireTime ?? now) : now;
    return this.write(ref, { acquireTime, renewTime: now }, live.metadata.resourceVersion);
  }

  private async write(
    ref: ObjectRef,
    times: { acquireTime: string; renewTime: string },
    expectedVersion?: string,
  ): Promise<string | undefined> {
    try {
      await this.store.apply(
        {
          apiVersion: 'coordination.k8s.io/v1',
          kind: LEASE_KIND,
          metadata: { name: ref.name, namespace: ref.namespace },
          spec: { holderIdentity: this.holder, leaseDurationSeconds: this.durationSeconds, ...times },
        },
        expectedVersion,
      );
      return this.holder;
    } catch (err) {
      if (err instanceof ConflictError || err instanceof NotFoundError) {
        return undefined;
      }
      throw err;
    }
  }

  private async renew(application: string): Promise<void> {
    const ref = this.refFor(application);
    const live = await this.store.get(ref);
    const spec = this.specOf(live);
    if (spec.holderIdentity !== this.holder) {
      throw new ConflictError(`Sync lease of '${application}' was taken by '${spec.holderIdentity}'`, ref);
    }
    await this.store.apply(
      {
        apiVersion: live.apiVersion,
        kind: live.kind,
        metadata: live.metadata,
        spec: { ...spec, renewTime: microTime(this.now()) },
      },
      live.metadata.resourceVersion,
    );
  }

  private async release(application: string): Promise<void> {
    const ref = this.refFor(application);
    try {
      const live = await this.store.get(ref);
      if (this.specOf(live).holderIdentity !== this.holder) {
        return;
      }
      await this.store.delete(ref, live.metadata.resourceVersion);
      logger.debug(`[${application}] Released the sync lease`);
    } catch (err) {
      if (err instanceof NotFoundError || err instanceof ConflictError) {
        return;
      }
      logger.warn(`[${application}] Could not release the sync lease, it expires on its own: ${err}`);
    }
  }

  private specOf(live: LiveObject): LeaseSpecDto {
    const parsed = LeaseSpecSchema.safeParse(live.spec ?? {});
    return parsed.success ? parsed.data : {};
  }

  private isFree(spec: LeaseSpecDto): boolean {
    if (!spec.holderIdentity || !spec.renewTime) {
      return true;
    }
    const duration = (spec.leaseDurationSeconds ?? this.durationSeconds) * 1000;
    return Date.parse(spec.renewTime) + duration <= this.now().getTime();
  }
}
