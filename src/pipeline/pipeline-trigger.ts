import type { ApplicationStore } from '@/applications/application.store';
import { pipeline_config } from '@/config/app.config';
import {
  IMAGE_DIGEST_RESULT,
  PIPELINE_APPLICATION_LABEL,
  PIPELINE_RUN_KIND,
  SUBMITTED_AT_ANNOTATION,
} from '@/config/operator.config';
import type { ImageOverride } from '@/dtos/application.dto';
import { PipelineRunStatusSchema } from '@/dtos/pipeline-run.dto';
import { PipelineOutcome } from '@/enums/pipeline-outcome.enum';
import { ValidationError } from '@/errors/driftless.errors';
import type { ImageRegistry } from '@/interfaces/image-registry.interface';
import type { LiveObject } from '@/interfaces/manifest-object.interface';
import type { ObjectStore } from '@/interfaces/object-store.interface';
import type { PipelineRunRecord } from '@/interfaces/pipeline-run.interface';
import { logger } from '@/logger';
import { parseImage } from '@/renderer/image-transformer';
import { isObject } from '@/utils/is-object';
import { sleep as defaultSleep, type Sleep } from '@/utils/sleep';
import { randomUUID } from 'node:crypto';

export type PipelineTriggerOptions = {
  namespace?: string;
  pipelineName?: string;
  pollIntervalMs?: number;
  /** Terminal records kept in memory; the least recently read is evicted first. */
  terminalCacheSize?: number;
  sleep?: Sleep;
  now?: () => Date;
  newRunId?: () => string;
};

const TERMINAL = new Set([PipelineOutcome.Succeeded, PipelineOutcome.Failed]);

type TerminalEntry = { record: PipelineRunRecord; propagated: boolean };

const paramOf = (object: LiveObject, name: string): string => {
  const params = isObject(object.spec) ? object.spec.params : undefined;
  if (!Array.isArray(params)) {
    return '';
  }
  const param = params.find((entry) => isObject(entry) && entry.name === name);
  return isObject(param) && typeof param.value === 'string' ? param.value : '';
};

/**
 * Submits build-and-push runs as `PipelineRun` objects for the pipeline engine to execute and
 * observes their outcome. A run is never written after submission; terminal records are
 * cached and returned as the same frozen object.
 *
 * Reads have no side effects. The digest of a successful run reaches the image registry and
 * the promoting Application once, when `await` first observes the run as terminal; a failed
 * propagation is logged and tried again by the next `await`.
 */
export class PipelineTrigger {
  private readonly namespace: string;
  private readonly pipelineName: string;
  private readonly pollIntervalMs: number;
  private readonly terminalCacheSize: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly newRunId: () => string;
  private readonly terminal = new Map<string, TerminalEntry>();

  constructor(
    private readonly store: ObjectStore,
    private readonly images: ImageRegistry,
    private readonly applications?: ApplicationStore,
    options: PipelineTriggerOptions = {},
  ) {
    this.namespace = options.namespace ?? pipeline_config.namespace;
    this.pipelineName = options.pipelineName ?? pipeline_config.pipelineName;
    this.pollIntervalMs = options.pollIntervalMs ?? pipeline_config.pollIntervalMs;
    this.terminalCacheSize = options.terminalCacheSize ?? pipeline_config.terminalCacheSize;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.newRunId = options.newRunId ?? (() => `${this.pipelineName}-${randomUUID().slice(0, 8)}`);
  }

  public async submit(
    sourceRef: string,
    imageTag: string,
    options: { application?: string } = {},
  ): Promise<PipelineRunRecord> {
    if (!sourceRef.trim() || !imageTag.trim()) {
      throw new ValidationError('A pipeline run needs a source reference and an image tag');
    }
    if (options.application && this.applications) {
      await this.applications.get(options.application);
    }

    const runId = this.newRunId();
    await this.store.apply({
      apiVersion: 'tekton.dev/v1',
      kind: PIPELINE_RUN_KIND,
      metadata: {
        name: runId,
        namespace: this.namespace,
        labels: options.application ? { [PIPELINE_APPLICATION_LABEL]: options.application } : undefined,
        annotations: { [SUBMITTED_AT_ANNOTATION]: this.now().toISOString() },
      },
      spec: {
        pipelineRef: { name: this.pipelineName },
        params: [
          { name: 'source-ref', value: sourceRef },
          { name: 'image-tag', value: imageTag },
        ],
      },
    });

    logger.info(`Submitted pipeline run '${runId}' for ${sourceRef} -> ${imageTag}`);
    return this.get(runId);
  }

  /** Current record of a run. */
  public async get(runId: string): Promise<PipelineRunRecord> {
    return (await this.observe(runId)).record;
  }

  /**
   * Polls until the run is terminal or `timeoutMs` elapses; on timeout the Pending record is
   * returned as observed and the call can simply be repeated.
   */
  public async await(runId: string, timeoutMs: number, signal?: AbortSignal): Promise<PipelineRunRecord> {
    const deadline = this.now().getTime() + timeoutMs;
    for (;;) {
      const entry = await this.observe(runId);
      const { record } = entry;
      if (TERMINAL.has(record.outcome)) {
        await this.settle(entry);
        return record;
      }
      const remaining = deadline - this.now().getTime();
      if (remaining <= 0) {
        return record;
      }
      logger.debug(`Pipeline run '${runId}' still ${record.outcome}, ${remaining}ms left`);
      await this.sleep(Math.min(this.pollIntervalMs, remaining), signal);
    }
  }

  /** Most recently submitted run for an Application, if any. */
  public async latestFor(application: string): Promise<PipelineRunRecord | undefined> {
    const objects = await this.store.list(PIPELINE_RUN_KIND, this.namespace, {
      [PIPELINE_APPLICATION_LABEL]: application,
    });
    const [latest] = objects
      .map((object) => this.toRecord(object))
      .sort((a, b) => b.submittedAt.localeCompare(a.submittedAt) || b.runId.localeCompare(a.runId));
    return latest ? this.get(latest.runId) : undefined;
  }

  private async observe(runId: string): Promise<TerminalEntry> {
    const cached = this.terminal.get(runId);
    if (cached) {
      this.terminal.delete(runId);
      this.terminal.set(runId, cached);
      return cached;
    }
    const object = await this.store.get({ kind: PIPELINE_RUN_KIND, namespace: this.namespace, name: runId });
    const record = this.toRecord(object);
    if (!TERMINAL.has(record.outcome)) {
      return { record, propagated: false };
    }
    const entry: TerminalEntry = { record: Object.freeze(record), propagated: false };
    this.terminal.set(runId, entry);
    for (const evicted of this.terminal.keys()) {
      if (this.terminal.size <= this.terminalCacheSize) {
        break;
      }
      this.terminal.delete(evicted);
    }
    return entry;
  }

  private async settle(entry: TerminalEntry): Promise<void> {
    if (entry.propagated) {
      return;
    }
    try {
      await this.propagate(entry.record);
      entry.propagated = true;
    } catch (err) {
      logger.error(`Could not propagate pipeline run '${entry.record.runId}', will retry: ${err}`);
    }
  }

  private toRecord(object: LiveObject): PipelineRunRecord {
    const base = {
      runId: object.metadata.name,
      application: object.metadata.labels?.[PIPELINE_APPLICATION_LABEL],
      sourceRef: paramOf(object, 'source-ref'),
      imageTag: paramOf(object, 'image-tag'),
      submittedAt: object.metadata.annotations?.[SUBMITTED_AT_ANNOTATION] ?? '',
    };

    const parsed = PipelineRunStatusSchema.safeParse(object.status ?? {});
    if (!parsed.success) {
      return { ...base, outcome: PipelineOutcome.Pending, message: 'unreadable status' };
    }
    const status = parsed.data;
    const succeeded = status.conditions.find((condition) => condition.type === 'Succeeded');
    const completedAt = status.completionTime;

    if (succeeded?.status === 'False') {
      return { ...base, outcome: PipelineOutcome.Failed, message: succeeded.message ?? succeeded.reason, completedAt };
    }
    if (succeeded?.status === 'True') {
      const result = status.results.find(({ name }) => name === IMAGE_DIGEST_RESULT);
      const digest = typeof result?.value === 'string' ? result.value.trim() : '';
      return digest
        ? { ...base, outcome: PipelineOutcome.Succeeded, digest, message: succeeded.message, completedAt }
        : {
            ...base,
            outcome: PipelineOutcome.Failed,
            message: `Run succeeded without an ${IMAGE_DIGEST_RESULT} result`,
            completedAt,
          };
    }
    return { ...base, outcome: PipelineOutcome.Pending, message: succeeded?.reason };
  }

  private async propagate(record: PipelineRunRecord): Promise<void> {
    if (record.outcome !== PipelineOutcome.Succeeded || !record.digest) {
      logger.warn(`Pipeline run '${record.runId}' failed: ${record.message ?? 'no message'}`);
      return;
    }
    const { name, tag } = parseImage(record.imageTag);
    await this.images.put(name, tag ?? 'latest', record.digest);
    logger.info(`Pipeline run '${record.runId}' produced ${name}:${tag ?? 'latest'}@${record.digest}`);

    if (record.application) {
      await this.promote(record.application, name, record.digest);
    }
  }

  /** Records the digest as an image override on Applications that opted into promotion. */
  private async promote(application: string, image: string, digest: string): Promise<void> {
    if (!this.applications) {
      return;
    }
    const current = await this.applications.get(application);
    if (current.spec.imagePromotion?.image !== image) {
      return;
    }
    if (current.spec.source.images?.some((entry) => entry.name === image && entry.digest === digest)) {
      return;
    }
    await this.applications.updateSpec(application, (spec) => {
      const override: ImageOverride = { name: image, digest };
      const images = (spec.source.images ?? []).filter((entry) => entry.name !== image);
      return { ...spec, source: { ...spec.source, images: [...images, override] } };
    });
    logger.info(`Promoted ${image}@${digest} to Application '${application}'`);
  }
}
