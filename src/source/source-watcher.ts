import { source_config } from '@/config/app.config';
import type { ApplicationDto } from '@/dtos/application.dto';
import { RenderError, toDriftlessError, type DriftlessError } from '@/errors/driftless.errors';
import type { DesiredStateSnapshot } from '@/interfaces/desired-state-snapshot.interface';
import type { RepositoryClient } from '@/interfaces/repository-client.interface';
import { logger } from '@/logger';
import type { ManifestRenderer } from '@/renderer/manifest-renderer';
import { computeBackoff, type BackoffOptions } from '@/utils/backoff';
import { canonicalStringify } from '@/utils/canonical-json';
import { isAbortError, sleep as defaultSleep, type Sleep } from '@/utils/sleep';

export type SourceEvent =
  | { type: 'snapshot'; application: string; snapshot: DesiredStateSnapshot }
  | { type: 'render-failed'; application: string; revision: string; error: DriftlessError };

export type SourceEventHandler = (event: SourceEvent) => void | Promise<void>;

export type SourceWatcherOptions = {
  pollIntervalMs?: number;
  backoff?: BackoffOptions;
  sleep?: Sleep;
  random?: () => number;
};

type WatchState = {
  application: ApplicationDto;
  sourceKey: string;
  controller: AbortController;
  loop?: Promise<void>;
  wake?: () => void;
  /** A wake-up that arrived while a poll was running. */
  requested: boolean;
  lastCommit?: string;
  lastFingerprint?: string;
  failedRevision?: string;
  failures: number;
};

const normalizeRepoURL = (url: string): string => url.trim().replace(/\/+$/, '').replace(/\.git$/, '');

const sourceKeyOf = (application: ApplicationDto): string => canonicalStringify(application.spec.source);

/**
 * Polls each tracked Application's source revision and renders a new snapshot when the commit
 * changes. Snapshots are emitted once per distinct fingerprint and render failures once per
 * failing commit; fetch failures back off with full jitter until the next success.
 */
export class SourceWatcher {
  private readonly pollIntervalMs: number;
  private readonly backoff: BackoffOptions;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly states = new Map<string, WatchState>();

  constructor(
    private readonly repository: RepositoryClient,
    private readonly renderer: ManifestRenderer,
    private readonly onEvent: SourceEventHandler,
    options: SourceWatcherOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? source_config.pollIntervalMs;
    this.backoff = options.backoff ?? {
      baseMs: source_config.backoffBaseMs,
      capMs: source_config.backoffCapMs,
      jitter: 'full',
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  public get tracked(): string[] {
    return [...this.states.keys()].sort();
  }

  /**
   * Starts polling an Application, or picks up a changed definition. A changed source forgets
   * the last commit so the next poll renders again.
   */
  public track(application: ApplicationDto, { start = true }: { start?: boolean } = {}): void {
    const name = application.metadata.name;
    const sourceKey = sourceKeyOf(application);
    const existing = this.states.get(name);
    if (existing) {
      existing.application = application;
      if (existing.sourceKey !== sourceKey) {
        existing.sourceKey = sourceKey;
        existing.lastCommit = undefined;
        existing.failedRevision = undefined;
        this.wakeUp(existing);
      }
      return;
    }

    const state: WatchState = {
      application,
      sourceKey,
      controller: new AbortController(),
      failures: 0,
      requested: false,
    };
    this.states.set(name, state);
    logger.debug(`Tracking source of '${name}': ${application.spec.source.repoURL} ${application.spec.source.path}`);
    if (start) {
      state.loop = this.run(state);
    }
  }

  public async untrack(name: string): Promise<void> {
    const state = this.states.get(name);
    if (!state) {
      return;
    }
    this.states.delete(name);
    state.controller.abort();
    await state.loop;
    logger.debug(`Stopped tracking source of '${name}'`);
  }

  /** Push notification: polls every tracked Application of the repository right away. */
  public notify(repoURL: string, revision?: string): string[] {
    const target = normalizeRepoURL(repoURL);
    const woken: string[] = [];
    for (const [name, state] of this.states) {
      const { source } = state.application.spec;
      if (normalizeRepoURL(source.repoURL) !== target) {
        continue;
      }
      if (revision && revision !== source.targetRevision && revision !== state.lastCommit) {
        continue;
      }
      woken.push(name);
      this.wakeUp(state);
    }
    logger.debug(`Source notification for ${repoURL}${revision ? `@${revision}` : ''} woke [${woken.join(', ')}]`);
    return woken;
  }

  /**
   * One check of an Application's source. Fetch failures propagate; render failures are
   * reported as events.
   */
  public async poll(name: string): Promise<void> {
    const state = this.states.get(name);
    if (!state) {
      return;
    }
    const { repoURL, targetRevision, path, images } = state.application.spec.source;

    let commit: string;
    try {
      commit = await this.repository.resolveRevision(repoURL, targetRevision);
    } catch (err) {
      const error = toDriftlessError(err);
      if (error.retryable) {
        throw error;
      }
      await this.renderFailed(state, targetRevision, new RenderError('NotFound', error.message, { cause: error }));
      return;
    }
    if (commit === state.lastCommit) {
      return;
    }

    let snapshot: DesiredStateSnapshot;
    try {
      snapshot = await this.renderer.render(repoURL, commit, path, { images });
    } catch (err) {
      const error = toDriftlessError(err);
      if (error.retryable) {
        throw error;
      }
      state.lastCommit = commit;
      await this.renderFailed(state, commit, error);
      return;
    }

    state.lastCommit = commit;
    state.failedRevision = undefined;
    if (snapshot.fingerprint === state.lastFingerprint) {
      logger.debug(`[${name}] ${commit.slice(0, 12)} renders to the known fingerprint, nothing to do`);
      return;
    }
    state.lastFingerprint = snapshot.fingerprint;
    logger.info(`[${name}] New desired state ${snapshot.fingerprint.slice(0, 12)} at ${commit.slice(0, 12)}`);
    await this.emit({ type: 'snapshot', application: name, snapshot });
  }

  public async stop(): Promise<void> {
    await Promise.all(this.tracked.map((name) => this.untrack(name)));
  }

  private async run(state: WatchState): Promise<void> {
    const name = state.application.metadata.name;
    const { signal } = state.controller;
    while (!signal.aborted) {
      let delay = this.pollIntervalMs;
      try {
        await this.poll(name);
        state.failures = 0;
      } catch (err) {
        delay = computeBackoff(state.failures, this.backoff, this.random);
        state.failures++;
        logger.warn(`[${name}] Source fetch failed (${state.failures} in a row), retrying in ${delay}ms: ${err}`);
      }
      await this.pause(state, delay);
    }
  }

  private wakeUp(state: WatchState): void {
    if (state.wake) {
      state.wake();
    } else {
      state.requested = true;
    }
  }

  /** Waits for the delay, an early wake-up or cancellation, whichever comes first. */
  private async pause(state: WatchState, ms: number): Promise<void> {
    if (state.requested || state.controller.signal.aborted) {
      state.requested = false;
      return;
    }
    const interrupt = new AbortController();
    const stop = () => interrupt.abort();
    state.wake = stop;
    state.controller.signal.addEventListener('abort', stop, { once: true });
    try {
      await this.sleep(ms, interrupt.signal);
    } catch (err) {
      if (!isAbortError(err)) {
        throw err;
      }
    } finally {
      state.controller.signal.removeEventListener('abort', stop);
      state.wake = undefined;
    }
  }

  private async renderFailed(state: WatchState, revision: string, error: DriftlessError): Promise<void> {
    if (state.failedRevision === revision) {
      return;
    }
    state.failedRevision = revision;
    state.lastFingerprint = undefined;
    logger.error(`[${state.application.metadata.name}] Cannot render ${revision}: ${error.message}`);
    await this.emit({ type: 'render-failed', application: state.application.metadata.name, revision, error });
  }

  private async emit(event: SourceEvent): Promise<void> {
    try {
      await this.onEvent(event);
    } catch (err) {
      logger.error(`Handling ${event.type} for '${event.application}' failed: ${err}`);
    }
  }
}
