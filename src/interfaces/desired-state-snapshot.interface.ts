import type { ManifestObject } from './manifest-object.interface';

/**
 * Immutable rendering of one Application's manifests. Two snapshots with the same
 * fingerprint serialize to the same bytes.
 */
export interface DesiredStateSnapshot {
  readonly repoURL: string;
  /** Commit the snapshot was rendered from. */
  readonly revision: string;
  readonly path: string;
  readonly fingerprint: string;
  readonly objects: readonly ManifestObject[];
}
