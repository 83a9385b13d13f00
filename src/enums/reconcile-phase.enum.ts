export enum ReconcilePhase {
  Idle = 'Idle',
  Diffing = 'Diffing',
  Applying = 'Applying',
  ConflictRetry = 'ConflictRetry',
  Settled = 'Settled',
  Failed = 'Failed',
}
