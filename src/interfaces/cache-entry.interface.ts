import type { ErrorSummary } from '@/dtos/application.dto';
import type { HealthStatus, SyncState } from '@/enums/health-status.enum';

export interface CacheEntry {
  health: HealthStatus;
  sync: SyncState;
  revision?: string;
  lastError?: ErrorSummary;
  lastMessageTs: string | undefined;
  persistentChanges: string;
  deploymentInProgress: boolean;
}
