import type { DriftlessContext } from '@/context';
import type { ApplicationSpecInput } from '@/dtos/application.dto';
import { failure, type CommandResult } from './exit-codes';

export type CreateApplicationOptions = {
  repo: string;
  path: string;
  revision: string;
  destNamespace: string;
  automated?: boolean;
  selfHeal?: boolean;
  prune?: boolean;
  imagePromotion?: string;
};

/**
 * Register an Application. The controller picks it up from its watch.
 */
export async function createApplication(
  context: Pick<DriftlessContext, 'applications'>,
  name: string,
  opts: CreateApplicationOptions,
): Promise<CommandResult> {
  const spec: ApplicationSpecInput = {
    source: { repoURL: opts.repo, path: opts.path, targetRevision: opts.revision },
    destination: { namespace: opts.destNamespace },
    syncPolicy: {
      mode: opts.automated ? 'automated' : 'manual',
      selfHeal: opts.selfHeal ?? false,
      prune: opts.prune ?? false,
    },
    imagePromotion: opts.imagePromotion ? { image: opts.imagePromotion } : undefined,
  };

  try {
    const application = await context.applications.create(name, spec);
    const { mode } = application.spec.syncPolicy;
    return {
      ok: true,
      lines: [
        `Application '${name}' created (${mode} sync)`,
        `  ${application.spec.source.repoURL} ${application.spec.source.path} @ ${application.spec.source.targetRevision}` +
          ` -> ${application.spec.destination.namespace}`,
      ],
    };
  } catch (err) {
    return failure(err);
  }
}
