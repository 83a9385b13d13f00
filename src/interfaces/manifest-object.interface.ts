export interface ObjectMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  resourceVersion?: string;
  generation?: number;
  deletionTimestamp?: string;
  [key: string]: unknown;
}

/** A typed desired-state object as rendered from the manifest repository. */
export interface ManifestObject {
  apiVersion: string;
  kind: string;
  metadata: ObjectMetadata;
  [key: string]: unknown;
}

/** Observed state of one object; owned by the cluster and never cached beyond one pass. */
export interface LiveObject extends ManifestObject {
  metadata: ObjectMetadata & { resourceVersion: string };
  status?: Record<string, unknown>;
}
