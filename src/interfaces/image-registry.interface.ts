/** Content-addressable image store: (repository, tag) -> digest. */
export interface ImageRegistry {
  put(repository: string, tag: string, digest: string): Promise<void>;

  /** Resolves to undefined when the tag was never pushed. */
  resolve(repository: string, tag: string): Promise<string | undefined>;
}
