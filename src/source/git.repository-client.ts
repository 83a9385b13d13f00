import { NotFoundError, TransientIOError } from '@/errors/driftless.errors';
import {
  MANIFEST_FILE,
  type RepositoryClient,
  type RepositoryTree,
} from '@/interfaces/repository-client.interface';
import { logger } from '@/logger';
import { sha256 } from '@/utils/canonical-json';
import { KeyedMutex } from '@/utils/keyed-mutex';
import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { simpleGit, type SimpleGit } from 'simple-git';

const UNKNOWN_REVISION = /unknown revision|bad revision|not a valid object name|needed a single revision/i;

/**
 * Git access through a bare mirror per repository URL under `cacheDir`. Every
 * `resolveRevision` fetches first, so branch heads are always current.
 */
export class GitRepositoryClient implements RepositoryClient {
  private readonly fetchLock = new KeyedMutex();

  constructor(private readonly cacheDir: string) {}

  public async resolveRevision(repoURL: string, revision: string): Promise<string> {
    const git = await this.sync(repoURL);
    try {
      const commit = await git.revparse([`${revision}^{commit}`]);
      return commit.trim();
    } catch (err) {
      if (err instanceof Error && UNKNOWN_REVISION.test(err.message)) {
        throw new NotFoundError(`Revision '${revision}' not found in '${repoURL}'`, undefined, { cause: err });
      }
      throw new TransientIOError(`Failed to resolve '${revision}' in '${repoURL}'`, { cause: err });
    }
  }

  public async readTree(repoURL: string, commit: string): Promise<RepositoryTree> {
    const git = simpleGit(this.mirrorDir(repoURL));
    try {
      const listing = await git.raw(['ls-tree', '-r', '--name-only', commit]);
      const files = listing
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => MANIFEST_FILE.test(line));

      const tree = new Map<string, string>();
      for (const file of files) {
        tree.set(file, await git.show([`${commit}:${file}`]));
      }
      return tree;
    } catch (err) {
      throw new TransientIOError(`Failed to read '${repoURL}' at ${commit}`, { cause: err });
    }
  }

  private async sync(repoURL: string): Promise<SimpleGit> {
    const dir = this.mirrorDir(repoURL);
    return this.fetchLock.runExclusive(repoURL, async () => {
      try {
        if (!existsSync(dir)) {
          logger.info(`Cloning mirror of '${repoURL}'`);
          await mkdir(path.dirname(dir), { recursive: true });
          await simpleGit().clone(repoURL, dir, ['--mirror']);
        } else {
          logger.debug(`Fetching '${repoURL}'`);
          await simpleGit(dir).fetch(['--prune', 'origin']);
        }
      } catch (err) {
        throw new TransientIOError(`Failed to fetch '${repoURL}'`, { cause: err });
      }
      return simpleGit(dir);
    });
  }

  private mirrorDir(repoURL: string): string {
    return path.join(this.cacheDir, `${sha256(repoURL).slice(0, 16)}.git`);
  }
}
