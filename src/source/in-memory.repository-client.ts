import { NotFoundError } from '@/errors/driftless.errors';
import type { RepositoryClient, RepositoryTree } from '@/interfaces/repository-client.interface';
import { canonicalStringify, sha256 } from '@/utils/canonical-json';

type Repository = {
  refs: Map<string, string>;
  commits: Map<string, RepositoryTree>;
};

/** Repository stand-in: commits are content-addressed snapshots of a file map. */
export class InMemoryRepositoryClient implements RepositoryClient {
  private readonly repositories = new Map<string, Repository>();

  /** Records a commit on `ref` and returns its id. */
  public commit(repoURL: string, ref: string, files: Record<string, string>): string {
    const repository = this.repositoryFor(repoURL);
    const parent = repository.refs.get(ref) ?? '';
    const id = sha256(parent, canonicalStringify(files)).slice(0, 40);
    repository.commits.set(id, new Map(Object.entries(files)));
    repository.refs.set(ref, id);
    return id;
  }

  public async resolveRevision(repoURL: string, revision: string): Promise<string> {
    const repository = this.repositories.get(repoURL);
    if (!repository) {
      throw new NotFoundError(`Repository '${repoURL}' not found`);
    }
    const commit = repository.refs.get(revision) ?? (repository.commits.has(revision) ? revision : undefined);
    if (!commit) {
      throw new NotFoundError(`Revision '${revision}' not found in '${repoURL}'`);
    }
    return commit;
  }

  public async readTree(repoURL: string, commit: string): Promise<RepositoryTree> {
    const tree = this.repositories.get(repoURL)?.commits.get(commit);
    if (!tree) {
      throw new NotFoundError(`Commit '${commit}' not found in '${repoURL}'`);
    }
    return new Map(tree);
  }

  private repositoryFor(repoURL: string): Repository {
    let repository = this.repositories.get(repoURL);
    if (!repository) {
      repository = { refs: new Map(), commits: new Map() };
      this.repositories.set(repoURL, repository);
    }
    return repository;
  }
}
