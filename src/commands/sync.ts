import type { DriftlessContext } from '@/context';
import type { ApplicationDto, ResourceResult } from '@/dtos/application.dto';
import type { DesiredStateSnapshot } from '@/interfaces/desired-state-snapshot.interface';
import { formatRef } from '@/interfaces/object-store.interface';
import { logger } from '@/logger';
import { countChanges } from '@/reconciler/plan-diff';
import { EXIT, failure, type CommandResult } from './exit-codes';

export type SyncCommandOptions = { prune?: boolean; dryRun?: boolean };

const short = (value: string): string => value.slice(0, 12);

const resourceLine = (resource: ResourceResult): string =>
  `  ${resource.outcome} ${formatRef(resource)}${resource.message ? ` (${resource.message})` : ''}`;

/**
 * Render the Application's source and run one reconciliation pass in this process. A pass
 * that does not settle exits with SYNC_FAILED.
 */
export async function sync(
  context: Pick<DriftlessContext, 'applications' | 'renderer' | 'reconciler'>,
  name: string,
  opts: SyncCommandOptions,
): Promise<CommandResult> {
  let application: ApplicationDto;
  try {
    application = await context.applications.get(name);
  } catch (err) {
    return failure(err);
  }

  const { repoURL, targetRevision, path, images } = application.spec.source;
  let snapshot: DesiredStateSnapshot;
  try {
    snapshot = await context.renderer.render(repoURL, targetRevision, path, { images });
  } catch (err) {
    if (!opts.dryRun) {
      try {
        await context.reconciler.recordFailure(application, err, targetRevision);
      } catch (recordErr) {
        logger.warn(`Could not record the render failure of '${name}': ${recordErr}`);
      }
    }
    return failure(err, EXIT.SYNC_FAILED);
  }

  try {
    const report = await context.reconciler.reconcile(application, snapshot, {
      prune: opts.prune,
      dryRun: opts.dryRun,
      trigger: 'operator',
    });
    const header = `'${name}' at ${short(snapshot.revision)} (${short(snapshot.fingerprint)})`;

    switch (report.outcome) {
      case 'dry-run':
        return {
          ok: true,
          lines: [`Dry run of ${header}: ${countChanges(report.plan)} change(s)`, report.diff || 'No changes'],
        };
      case 'settled':
        return {
          ok: true,
          lines: [
            `Synced ${header}`,
            ...report.resources.map(resourceLine),
            `Health: ${report.status?.health}, sync: ${report.status?.sync}`,
          ],
        };
      case 'failed':
        return failure(report.error ?? 'pass failed', EXIT.SYNC_FAILED, report.resources.map(resourceLine));
      default:
        return { ok: false, exitCode: EXIT.SYNC_FAILED, error: `Sync of ${header} was ${report.outcome}` };
    }
  } catch (err) {
    return failure(err, EXIT.SYNC_FAILED);
  }
}
