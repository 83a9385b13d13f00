/** Repository contents at one commit: POSIX paths relative to the repository root. */
export type RepositoryTree = ReadonlyMap<string, string>;

/** Read-only, fetch-by-revision access to a deployment-manifest repository. */
export interface RepositoryClient {
  /**
   * Resolves a branch, tag or commit to an immutable commit id.
   * @throws NotFoundError when the revision does not exist, TransientIOError when the fetch fails
   */
  resolveRevision(repoURL: string, revision: string): Promise<string>;

  /** Manifest files (`.yaml`, `.yml`, `.json`) of the whole repository at `commit`. */
  readTree(repoURL: string, commit: string): Promise<RepositoryTree>;
}

export const MANIFEST_FILE = /\.(ya?ml|json)$/;
