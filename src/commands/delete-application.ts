import { APPLICATION_KIND, OWNER_LABEL } from '@/config/operator.config';
import type { DriftlessContext } from '@/context';
import { NotFoundError } from '@/errors/driftless.errors';
import type { LiveObject } from '@/interfaces/manifest-object.interface';
import { formatRef, refOf } from '@/interfaces/object-store.interface';
import { logger } from '@/logger';
import { failure, type CommandResult } from './exit-codes';

/**
 * Remove an Application. With `cascade`, its owned live objects are deleted first, in reverse
 * apply order; without it they are left in place, unowned by any running task.
 */
export async function deleteApplication(
  context: Pick<DriftlessContext, 'store' | 'applications' | 'registry'>,
  name: string,
  opts: { cascade?: boolean },
): Promise<CommandResult> {
  try {
    const application = await context.applications.get(name);
    const lines: string[] = [];

    if (opts.cascade) {
      const owned = await listOwned(context, application.metadata.name);
      for (const object of owned.sort((a, b) => context.registry.compare(b, a))) {
        try {
          await context.store.delete(refOf(object), object.metadata.resourceVersion);
        } catch (err) {
          if (!(err instanceof NotFoundError)) {
            throw err;
          }
        }
        logger.info(`Deleted ${formatRef(refOf(object))} owned by '${name}'`);
        lines.push(`  Deleted ${formatRef(refOf(object))}`);
      }
    }

    await context.applications.delete(name);
    return { ok: true, lines: [`Application '${name}' deleted`, ...lines] };
  } catch (err) {
    return failure(err);
  }
}

const listOwned = async (
  context: Pick<DriftlessContext, 'store' | 'registry'>,
  name: string,
): Promise<LiveObject[]> => {
  const lists = await Promise.all(
    context.registry
      .kinds()
      .filter(({ kind }) => kind !== APPLICATION_KIND)
      .map(({ kind }) => context.store.list(kind, undefined, { [OWNER_LABEL]: name })),
  );
  return lists.flat();
};
