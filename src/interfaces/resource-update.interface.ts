import type { ResourceResult } from '@/dtos/application.dto';
import type { CacheEntry } from './cache-entry.interface';

export type StatusUpdate = Pick<CacheEntry, 'health' | 'sync' | 'revision' | 'lastError'> & {
  /** Per-object outcomes of the pass behind the update. */
  resources?: ResourceResult[];
};
