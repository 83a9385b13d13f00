import type { ImageRegistry } from '@/interfaces/image-registry.interface';

export class InMemoryImageRegistry implements ImageRegistry {
  private readonly digests = new Map<string, string>();

  public async put(repository: string, tag: string, digest: string): Promise<void> {
    this.digests.set(`${repository}:${tag}`, digest);
  }

  public async resolve(repository: string, tag: string): Promise<string | undefined> {
    return this.digests.get(`${repository}:${tag}`);
  }
}
