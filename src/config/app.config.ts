import env from 'env-var';

export const control_config = {
  group: env.get('API_GROUP').default('driftless.dev').asString(),
  version: env.get('API_VERSION').default('v1alpha1').asString(),
  namespace: env.get('CONTROL_NAMESPACE').default('driftless').asString(),
} as const;

export const source_config = {
  pollIntervalMs: env.get('SOURCE_POLL_INTERVAL_MS').default('180000').asIntPositive(),
  backoffBaseMs: env.get('SOURCE_BACKOFF_BASE_MS').default('5000').asIntPositive(),
  backoffCapMs: env.get('SOURCE_BACKOFF_CAP_MS').default('300000').asIntPositive(),
  repoCacheDir: env.get('REPO_CACHE_DIR').default('.driftless/repos').asString(),
} as const;

export const sync_config = {
  retryLimit: env.get('SYNC_RETRY_LIMIT').default('5').asIntPositive(),
  backoffBaseMs: env.get('SYNC_BACKOFF_BASE_MS').default('200').asIntPositive(),
  backoffCapMs: env.get('SYNC_BACKOFF_CAP_MS').default('10000').asIntPositive(),
  eventQueueCapacity: env.get('EVENT_QUEUE_CAPACITY').default('64').asIntPositive(),
  statusHistoryLimit: env.get('STATUS_HISTORY_LIMIT').default('10').asIntPositive(),
  resyncCron: env.get('RESYNC_CRON').asString(),
} as const;

export const lease_config = {
  /** Defaults to `<hostname>-<pid>` when unset. */
  holder: env.get('LEASE_HOLDER').asString(),
  durationSeconds: env.get('LEASE_DURATION_SECONDS').default('30').asIntPositive(),
  acquireTimeoutMs: env.get('LEASE_ACQUIRE_TIMEOUT_MS').default('60000').asIntPositive(),
  pollIntervalMs: env.get('LEASE_POLL_INTERVAL_MS').default('1000').asIntPositive(),
} as const;

export const pipeline_config = {
  namespace: env.get('PIPELINE_NAMESPACE').default('driftless').asString(),
  pipelineName: env.get('PIPELINE_NAME').default('build-and-push').asString(),
  pollIntervalMs: env.get('PIPELINE_POLL_INTERVAL_MS').default('2000').asIntPositive(),
  terminalCacheSize: env.get('PIPELINE_TERMINAL_CACHE_SIZE').default('256').asIntPositive(),
} as const;

export const app_config = {
  healthCheckPort: env.get('HEALTH_CHECK_PORT').default('3000').asPortNumber(),
  contextDiffLinesCount: env.get('CONTEXT_DIFF_LINES_COUNT').default('2').asIntPositive(),
} as const;
