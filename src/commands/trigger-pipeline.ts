import type { DriftlessContext } from '@/context';
import { PipelineOutcome } from '@/enums/pipeline-outcome.enum';
import type { PipelineRunRecord } from '@/interfaces/pipeline-run.interface';
import { EXIT, failure, type CommandResult } from './exit-codes';

export type TriggerPipelineOptions = { app?: string; wait?: number };

const describeRun = (run: PipelineRunRecord): string[] => [
  `Pipeline run: ${run.runId}`,
  `Outcome:      ${run.outcome}`,
  `Image:        ${run.imageTag}${run.digest ? `@${run.digest}` : ''}`,
  ...(run.message ? [`Message:      ${run.message}`] : []),
];

/**
 * Submit a build-and-push run and, with `wait`, poll it for up to that many milliseconds.
 * A failed run exits with SYNC_FAILED; a run still pending after the wait is not an error.
 */
export async function triggerPipeline(
  context: Pick<DriftlessContext, 'pipelines'>,
  sourceRef: string,
  imageTag: string,
  opts: TriggerPipelineOptions,
): Promise<CommandResult> {
  try {
    const submitted = await context.pipelines.submit(sourceRef, imageTag, { application: opts.app });
    const run = opts.wait ? await context.pipelines.await(submitted.runId, opts.wait) : submitted;
    if (run.outcome === PipelineOutcome.Failed) {
      return {
        ok: false,
        exitCode: EXIT.SYNC_FAILED,
        error: `PipelineFailed: ${run.message ?? `run '${run.runId}' failed`}`,
        lines: describeRun(run),
      };
    }
    return { ok: true, lines: describeRun(run) };
  } catch (err) {
    return failure(err);
  }
}
