import type { StatusUpdate } from '@/interfaces/resource-update.interface';
import { logger } from '@/logger';
import type { HealthChange } from '@/reconciler/reconciler';
import type { CacheManager } from '@/utils/cache-manager.utils';
import type { ChangeDetector } from '@/utils/changes-detector.utils';
import type { SlackNotifier } from '@/utils/slack-notifier.utils';

/**
 * Turns health transitions into Slack messages. A rollout that is not yet Healthy and Synced
 * keeps editing one message; the next transition after it settles starts a new one.
 */
export class HealthChangeNotifier {
  constructor(
    private readonly slackNotifier: SlackNotifier,
    private readonly cacheManager: CacheManager,
    private readonly changeDetector: ChangeDetector,
  ) {}

  public async handle(change: HealthChange): Promise<void> {
    const name = change.application.metadata.name;
    const targetNamespace = change.application.spec.destination.namespace;
    const update: StatusUpdate = {
      health: change.current.health,
      sync: change.current.sync,
      revision: change.current.revision,
      lastError: change.current.lastError,
      resources: change.current.resources,
    };

    const cached =
      this.cacheManager.get(name) ??
      this.cacheManager.initialize(name, { health: change.previous.health, sync: change.previous.sync });
    const changesString = this.changeDetector.generateChangesString(change);

    logger.verbose(
      `Processing update for ${name}: ` +
        `sync: ${cached.sync}->${update.sync}, ` +
        `health: ${cached.health}->${update.health}, ` +
        `${changesString ? 'has changes' : 'NO changes'}, ` +
        `lastMessageTs: ${cached.lastMessageTs}, ` +
        `deploymentInProgress: ${cached.deploymentInProgress}`,
    );

    if (!this.changeDetector.hasStatusChanged(cached, update)) {
      logger.debug(`No status change for '${name}'`);
      return;
    }

    if (cached.deploymentInProgress && cached.lastMessageTs) {
      await this.updateExistingDeployment(name, targetNamespace, update, changesString, cached.lastMessageTs);
    } else {
      await this.startNewDeployment(name, targetNamespace, update, changesString);
    }
  }

  public forget(name: string): void {
    this.cacheManager.delete(name);
  }

  private async startNewDeployment(
    name: string,
    targetNamespace: string,
    update: StatusUpdate,
    changesString: string,
  ): Promise<void> {
    logger.info(`Starting new deployment notification for ${name}`);
    const res = await this.slackNotifier.createMessage(name, targetNamespace, update, changesString);
    this.cacheManager.update(
      name,
      update,
      res?.ts,
      changesString,
      this.changeDetector.isDeploymentInProgress(update),
    );
  }

  private async updateExistingDeployment(
    name: string,
    targetNamespace: string,
    update: StatusUpdate,
    changesString: string,
    lastMessageTs: string,
  ): Promise<void> {
    logger.info(`Updating existing deployment notification for ${name}`);
    const cached = this.cacheManager.get(name);
    const updatedChanges = this.changeDetector.mergeChanges(cached?.persistentChanges ?? '', changesString);

    const res = await this.slackNotifier.updateMessage(name, targetNamespace, update, updatedChanges, lastMessageTs);

    this.cacheManager.update(
      name,
      update,
      res?.ts ?? lastMessageTs,
      updatedChanges,
      this.changeDetector.isDeploymentInProgress(update),
    );
  }
}
