import { control_config } from '@/config/app.config';
import { APPLICATION_KIND, APPLICATION_PLURAL } from '@/config/operator.config';
import {
  ApplicationSchema,
  SyncStatusSchema,
  type ApplicationDto,
  type ApplicationSpec,
  type ApplicationSpecInput,
  type SyncStatus,
} from '@/dtos/application.dto';
import { Scope } from '@/enums/scope.enum';
import { ConflictError, NotFoundError, ValidationError } from '@/errors/driftless.errors';
import type { LiveObject } from '@/interfaces/manifest-object.interface';
import type { ObjectStore } from '@/interfaces/object-store.interface';
import type { ObjectRef } from '@/interfaces/object-ref.interface';
import { logger } from '@/logger';
import { ApplyGroup, kindRegistry, type KindRegistry } from '@/object-store/kind-registry';

const MAX_WRITE_ATTEMPTS = 5;

export const emptySyncStatus = (): SyncStatus => SyncStatusSchema.parse({});

/**
 * Application definitions and their SyncStatus, persisted as `Application` objects in the
 * control namespace of the object store itself.
 */
export class ApplicationStore {
  private readonly apiVersion: string;

  constructor(
    private readonly store: ObjectStore,
    private readonly namespace: string = control_config.namespace,
    registry: KindRegistry = kindRegistry,
  ) {
    this.apiVersion = `${control_config.group}/${control_config.version}`;
    if (!registry.find(APPLICATION_KIND)) {
      registry.register({
        kind: APPLICATION_KIND,
        apiVersion: this.apiVersion,
        plural: APPLICATION_PLURAL,
        scope: Scope.Namespaced,
        group: ApplyGroup.Other,
      });
    }
  }

  get controlNamespace(): string {
    return this.namespace;
  }

  public refFor(name: string): ObjectRef {
    return { kind: APPLICATION_KIND, namespace: this.namespace, name };
  }

  public parse(object: LiveObject): ApplicationDto {
    const result = ApplicationSchema.safeParse(object);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid Application '${object.metadata.name}': ${issues.join('; ')}`, issues);
    }
    return result.data;
  }

  public async create(name: string, specInput: ApplicationSpecInput): Promise<ApplicationDto> {
    const application = this.parseDefinition(name, specInput);
    try {
      await this.store.apply(application);
    } catch (err) {
      if (err instanceof ConflictError) {
        throw new ConflictError(`Application '${name}' already exists`, this.refFor(name), { cause: err });
      }
      throw err;
    }
    logger.info(`Created Application '${name}'`);
    return this.get(name);
  }

  public async get(name: string): Promise<ApplicationDto> {
    try {
      return this.parse(await this.store.get(this.refFor(name)));
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError(`Application '${name}' not found`, this.refFor(name), { cause: err });
      }
      throw err;
    }
  }

  /** Malformed definitions are logged and skipped so one bad object cannot hide the rest. */
  public async list(): Promise<ApplicationDto[]> {
    const objects = await this.store.list(APPLICATION_KIND, this.namespace);
    const applications: ApplicationDto[] = [];
    for (const object of objects) {
      try {
        applications.push(this.parse(object));
      } catch (err) {
        logger.error(`Skipping Application '${object.metadata.name}': ${err}`);
      }
    }
    return applications.sort((a, b) => a.metadata.name.localeCompare(b.metadata.name));
  }

  /** Read-modify-write of the spec, retried when another writer got there first. */
  public async updateSpec(name: string, edit: (spec: ApplicationSpec) => ApplicationSpecInput): Promise<ApplicationDto> {
    return this.withRetry(`update Application '${name}'`, async () => {
      const live = await this.store.get(this.refFor(name));
      const current = this.parse(live);
      const next = this.parseDefinition(name, edit(structuredClone(current.spec)));
      await this.store.apply({ ...next, metadata: live.metadata }, live.metadata.resourceVersion);
      return this.get(name);
    });
  }

  public async writeStatus(name: string, status: SyncStatus): Promise<void> {
    await this.withRetry(`write status of Application '${name}'`, async () => {
      const current = await this.store.get(this.refFor(name));
      await this.store.applyStatus(this.refFor(name), SyncStatusSchema.parse(status), current.metadata.resourceVersion);
    });
  }

  public async readStatus(name: string): Promise<SyncStatus> {
    const application = await this.get(name);
    return application.status ?? emptySyncStatus();
  }

  public async delete(name: string): Promise<void> {
    try {
      await this.store.delete(this.refFor(name));
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError(`Application '${name}' not found`, this.refFor(name), { cause: err });
      }
      throw err;
    }
    logger.info(`Deleted Application '${name}'`);
  }

  private parseDefinition(name: string, specInput: ApplicationSpecInput) {
    return this.parse({
      apiVersion: this.apiVersion,
      kind: APPLICATION_KIND,
      metadata: { name, namespace: this.namespace, resourceVersion: '' },
      spec: specInput,
    });
  }

  private async withRetry<T>(operation: string, attempt: () => Promise<T>): Promise<T> {
    for (let tries = 1; ; tries++) {
      try {
        return await attempt();
      } catch (err) {
        if (!(err instanceof ConflictError) || tries >= MAX_WRITE_ATTEMPTS) {
          throw err;
        }
        logger.debug(`Conflict on ${operation}, retrying (${tries}/${MAX_WRITE_ATTEMPTS})`);
      }
    }
  }
}
