import { ConflictError, NotFoundError } from '@/errors/driftless.errors';
import type { ImageRegistry } from '@/interfaces/image-registry.interface';
import type { ObjectStore } from '@/interfaces/object-store.interface';
import type { ObjectRef } from '@/interfaces/object-ref.interface';
import { logger } from '@/logger';
import { isObject } from '@/utils/is-object';

const MAX_WRITE_ATTEMPTS = 5;

/** ConfigMap data keys only allow `[-._a-zA-Z0-9]`. */
const keyOf = (repository: string, tag: string): string => `${repository}:${tag}`.replace(/[^-._a-zA-Z0-9]/g, '_');

/**
 * Image digests recorded in a ConfigMap of the control namespace. Each value keeps the full
 * `repository:tag@digest` reference, so keys that sanitize to the same string never mix.
 */
export class ConfigMapImageRegistry implements ImageRegistry {
  private readonly ref: ObjectRef;

  constructor(
    private readonly store: ObjectStore,
    namespace: string,
    name = 'driftless-image-registry',
  ) {
    this.ref = { kind: 'ConfigMap', namespace, name };
  }

  public async put(repository: string, tag: string, digest: string): Promise<void> {
    const entry = { [keyOf(repository, tag)]: `${repository}:${tag}@${digest}` };
    for (let attempt = 1; ; attempt++) {
      try {
        const current = await this.read();
        if (current) {
          await this.store.apply(
            { ...current.object, data: { ...current.data, ...entry } },
            current.object.metadata.resourceVersion,
          );
        } else {
          await this.store.apply({
            apiVersion: 'v1',
            kind: 'ConfigMap',
            metadata: { name: this.ref.name, namespace: this.ref.namespace },
            data: entry,
          });
        }
        logger.debug(`Recorded ${repository}:${tag} -> ${digest}`);
        return;
      } catch (err) {
        if (!(err instanceof ConflictError) || attempt >= MAX_WRITE_ATTEMPTS) {
          throw err;
        }
      }
    }
  }

  public async resolve(repository: string, tag: string): Promise<string | undefined> {
    const current = await this.read();
    const value = current?.data[keyOf(repository, tag)];
    const prefix = `${repository}:${tag}@`;
    return value?.startsWith(prefix) ? value.slice(prefix.length) : undefined;
  }

  private async read() {
    try {
      const object = await this.store.get(this.ref);
      const data: Record<string, string> = {};
      if (isObject(object.data)) {
        for (const [key, value] of Object.entries(object.data)) {
          if (typeof value === 'string') {
            data[key] = value;
          }
        }
      }
      return { object, data };
    } catch (err) {
      if (err instanceof NotFoundError) {
        return undefined;
      }
      throw err;
    }
  }
}
