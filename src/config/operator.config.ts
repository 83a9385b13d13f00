export const DEFAULT_RESTART_TIMEOUT = 1000;
export const DEFAULT_BACK_OFF_FACTOR = 2;
export const DEFAULT_MAX_RESTART_TIMEOUT = 60_000;

export const OWNER_LABEL = 'driftless.dev/application';
export const LAST_APPLIED_ANNOTATION = 'driftless.dev/last-applied';
export const APPLICATION_KIND = 'Application';
export const APPLICATION_PLURAL = 'applications';
export const PIPELINE_APPLICATION_LABEL = 'driftless.dev/pipeline-application';
export const SUBMITTED_AT_ANNOTATION = 'driftless.dev/submitted-at';
export const PIPELINE_RUN_KIND = 'PipelineRun';
export const IMAGE_DIGEST_RESULT = 'IMAGE_DIGEST';

export const LEASE_KIND = 'Lease';
export const SYNC_LEASE_PREFIX = 'driftless-sync-';
