import type { ObjectStore } from '@/interfaces/object-store.interface';
import type { ResourceEvent } from '@/interfaces/resource-event.interface';
import { logger } from '@/logger';

type OnEventCallback = (event: ResourceEvent) => Promise<void> | void;
type EventQueueObject = { event: ResourceEvent; onEvent: OnEventCallback };

/**
 * Base for controllers that react to object store watch streams. Events from every watch
 * are handed to their callbacks one at a time, in arrival order.
 */
export abstract class CustomResourceOperator {
  private readonly abortControllers: AbortController[] = [];
  private readonly watches: Promise<void>[] = [];
  private readonly eventQueue: EventQueueObject[] = [];
  private processing?: Promise<void>;

  constructor(protected readonly store: ObjectStore) {}

  public async start(): Promise<void> {
    logger.info('Starting the operator...');
    try {
      await this.init();
    } catch (error) {
      logger.error(`Failed to initialize the operator: ${error}`);
      throw error;
    }
  }

  public async stop(): Promise<void> {
    logger.info('Stopping the operator...');
    this.abortControllers.forEach((controller) => controller.abort());
    this.abortControllers.length = 0;
    this.eventQueue.length = 0;
    await Promise.all(this.watches.splice(0));
    await this.processing;
    await this.shutdown();
  }

  /** Resolves once every event received so far has been handed to its callback. */
  public async drained(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  // *
  // * These methods must be implemented in the derived class
  // *
  protected abstract init(): Promise<void>;
  protected abstract shutdown(): Promise<void>;

  /**
   * Watches one kind and handles its events with the provided callback until the operator
   * stops. Restarting a broken stream is up to the object store.
   *
   * @param namespace Namespace for namespaced kinds; if omitted, watches every namespace.
   */
  protected watchResource(kind: string, onEvent: OnEventCallback, namespace?: string): void {
    const controller = new AbortController();
    this.abortControllers.push(controller);
    this.watches.push(this.consume(kind, onEvent, namespace, controller.signal));
  }

  private async consume(
    kind: string,
    onEvent: OnEventCallback,
    namespace: string | undefined,
    signal: AbortSignal,
  ): Promise<void> {
    const scope = namespace ? `namespace '${namespace}'` : 'cluster';
    logger.info(`Watching '${kind}' in ${scope}...`);
    try {
      for await (const event of this.store.watch(kind, namespace, signal)) {
        logger.debug(`Received ${event.type} event for ${event.object.kind} '${event.object.metadata.name}'`);
        this.enqueueEvent({ event, onEvent });
      }
    } catch (err) {
      if (!signal.aborted) {
        logger.error(`Watch on '${kind}' in ${scope} ended: ${err}`);
      }
    }
  }

  private enqueueEvent(eventObj: EventQueueObject): void {
    this.eventQueue.push(eventObj);
    this.scheduleQueue();
  }

  private scheduleQueue(): void {
    if (this.processing) {
      return;
    }
    this.processing = this.processQueue().finally(() => {
      this.processing = undefined;
      if (this.eventQueue.length > 0) {
        this.scheduleQueue();
      }
    });
  }

  private async processQueue(): Promise<void> {
    for (let next = this.eventQueue.shift(); next; next = this.eventQueue.shift()) {
      try {
        await next.onEvent(next.event);
      } catch (err) {
        logger.error(`Error processing ${next.event.type} event for '${next.event.object.metadata.name}': ${err}`);
      }
    }
  }
}
