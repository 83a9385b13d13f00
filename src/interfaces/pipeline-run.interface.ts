import type { PipelineOutcome } from '@/enums/pipeline-outcome.enum';

/** One build-and-push attempt. Immutable once the outcome is terminal. */
export interface PipelineRunRecord {
  readonly runId: string;
  readonly application?: string;
  readonly sourceRef: string;
  readonly imageTag: string;
  readonly outcome: PipelineOutcome;
  readonly digest?: string;
  readonly message?: string;
  readonly submittedAt: string;
  readonly completedAt?: string;
}
