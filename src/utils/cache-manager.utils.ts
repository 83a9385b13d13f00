import type { CacheEntry } from '@/interfaces/cache-entry.interface';
import type { StatusUpdate } from '@/interfaces/resource-update.interface';
import { logger } from '@/logger';

/** Last notified classification and Slack thread per Application. */
export class CacheManager {
  private readonly entries: Map<string, CacheEntry> = new Map();

  public has(name: string): boolean {
    return this.entries.has(name);
  }

  public get(name: string): CacheEntry | undefined {
    return this.entries.get(name);
  }

  public initialize(name: string, { health, sync, revision, lastError }: StatusUpdate): CacheEntry {
    logger.debug(`Initializing notification cache for '${name}'`);
    const entry: CacheEntry = {
      health,
      sync,
      revision,
      lastError,
      lastMessageTs: undefined,
      persistentChanges: '',
      deploymentInProgress: false,
    };
    this.entries.set(name, entry);
    return entry;
  }

  public update(
    name: string,
    { health, sync, revision, lastError }: StatusUpdate,
    lastMessageTs: string | undefined,
    persistentChanges: string,
    deploymentInProgress: boolean,
  ): void {
    this.entries.set(name, {
      health,
      sync,
      revision,
      lastError,
      lastMessageTs,
      persistentChanges,
      deploymentInProgress,
    });
  }

  public delete(name: string): void {
    this.entries.delete(name);
  }
}
