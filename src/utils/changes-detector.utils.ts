import { HealthStatus, SyncState } from '@/enums/health-status.enum';
import type { CacheEntry } from '@/interfaces/cache-entry.interface';
import type { StatusUpdate } from '@/interfaces/resource-update.interface';
import { formatPlanDiff } from '@/reconciler/plan-diff';
import type { HealthChange } from '@/reconciler/reconciler';

export class ChangeDetector {
  constructor(
    private readonly contextDiffLinesCount: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  public hasStatusChanged(cached: CacheEntry, update: StatusUpdate): boolean {
    return cached.sync !== update.sync || cached.health !== update.health;
  }

  public isDeploymentInProgress(update: StatusUpdate): boolean {
    return update.sync !== SyncState.Synced || update.health !== HealthStatus.Healthy;
  }

  public mergeChanges(existingChanges: string, newChanges: string): string {
    if (!existingChanges || !newChanges) {
      return existingChanges || newChanges;
    }

    const timeStamp = this.now().toLocaleTimeString('en-US', {
      hour: '2-digit',
      minute: '2-digit',
      hour12: false,
    });

    return `${existingChanges}\n\n--- New changes (${timeStamp}) ---\n${newChanges}`;
  }

  /** Readable diff of what the pass behind a transition wrote; empty when nothing was written. */
  public generateChangesString({ application, plan }: HealthChange): string {
    if (!plan) {
      return '';
    }
    return formatPlanDiff(plan, application.spec.syncPolicy.prune, {
      contextLines: this.contextDiffLinesCount,
      separator: '...'.repeat(3),
    }).trim();
  }
}
