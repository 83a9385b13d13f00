export enum PipelineOutcome {
  Pending = 'Pending',
  Succeeded = 'Succeeded',
  Failed = 'Failed',
}
