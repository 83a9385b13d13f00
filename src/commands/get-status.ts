import type { DriftlessContext } from '@/context';
import { formatStatusReport } from '@/status/status-reporter';
import { failure, type CommandResult } from './exit-codes';

/**
 * Print the last known classification of an Application.
 */
export async function getStatus(
  context: Pick<DriftlessContext, 'statusReporter'>,
  name: string,
  opts: { format: 'human' | 'json' },
): Promise<CommandResult> {
  try {
    const report = await context.statusReporter.getStatus(name);
    return {
      ok: true,
      lines: [opts.format === 'json' ? JSON.stringify(report) : formatStatusReport(report)],
    };
  } catch (err) {
    return failure(err);
  }
}
