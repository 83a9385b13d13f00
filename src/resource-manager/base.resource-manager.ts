import { RefinedEventType } from '@/enums/refined-event-type.enum';
import type { LiveObject } from '@/interfaces/manifest-object.interface';
import type { ObjectStore } from '@/interfaces/object-store.interface';
import type { ResourceEvent } from '@/interfaces/resource-event.interface';
import { logger } from '@/logger';
import { getRefinedEventType } from '@/utils/get-refined-event-type';

export abstract class BaseResourceManager {
  abstract readonly kind: string;
  abstract readonly namespace: string | undefined;

  constructor(protected readonly store: ObjectStore) {}

  public async handleEvent(event: ResourceEvent): Promise<void> {
    const refinedEventType = getRefinedEventType(event);
    logger.debug(
      `***** Handle ${refinedEventType} (K8s: ${event.type}) for ${event.object.kind} '${event.object.metadata.name}'`,
    );
    let handler: ((event: ResourceEvent) => Promise<void>) | undefined;
    switch (refinedEventType) {
      case RefinedEventType.Added:
        handler = this.handleAddedEvent;
        break;
      case RefinedEventType.Modified:
        handler = this.handleModifiedEvent;
        break;
      case RefinedEventType.Deleting:
        handler = this.handleDeletingEvent;
        break;
      case RefinedEventType.Deleted:
        handler = this.handleDeletedEvent;
        break;
      default:
        logger.warn(`Unknown event type: ${event.type}`);
        logger.dir(event);
        break;
    }
    try {
      if (typeof handler === 'function') {
        await handler.bind(this)(event);
      } else {
        logger.debug(`No handler found for ${refinedEventType} event`);
      }
    } finally {
      logger.debug(
        `***** Done ${refinedEventType} (K8s: ${event.type}) for ${event.object.kind} '${event.object.metadata.name}'`,
      );
    }
  }

  /** Brings every existing object of the kind under management, e.g. at startup. */
  public async syncAll(): Promise<void> {
    logger.debug(`Syncing all resources of kind '${this.kind}'`);

    const objects = await this.store.list(this.kind, this.namespace);

    for (const object of objects) {
      await this.syncResource(object);
    }
  }

  protected async handleAddedEvent(event: ResourceEvent): Promise<void> {
    await this.syncResource(event.object);
  }

  protected async handleModifiedEvent(event: ResourceEvent): Promise<void> {
    await this.syncResource(event.object);
  }

  protected async handleDeletingEvent(event: ResourceEvent): Promise<void> {
    await this.deleteResource(event.object);
  }

  protected async handleDeletedEvent(event: ResourceEvent): Promise<void> {
    await this.deleteResource(event.object);
  }

  protected abstract syncResource(object: LiveObject): Promise<void>;
  protected abstract deleteResource(object: LiveObject): Promise<void>;
}
