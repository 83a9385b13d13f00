import type { ImageOverride } from '@/dtos/application.dto';
import { KUSTOMIZATION_FILE, KustomizationSchema, type Kustomization } from '@/dtos/kustomization.dto';
import { ManifestObjectSchema } from '@/dtos/manifest.dto';
import { NotFoundError, RenderError } from '@/errors/driftless.errors';
import type { DesiredStateSnapshot } from '@/interfaces/desired-state-snapshot.interface';
import type { ManifestObject } from '@/interfaces/manifest-object.interface';
import { formatRef, refOf } from '@/interfaces/object-store.interface';
import {
  MANIFEST_FILE,
  type RepositoryClient,
  type RepositoryTree,
} from '@/interfaces/repository-client.interface';
import { logger } from '@/logger';
import { kindRegistry, type KindRegistry } from '@/object-store/kind-registry';
import { canonicalStringify, sha256 } from '@/utils/canonical-json';
import path from 'node:path/posix';
import { parseAllDocuments } from 'yaml';
import type { ZodError } from 'zod';
import { applyImageOverrides } from './image-transformer';
import { mergePatch } from './merge-patch';

export type RenderOptions = {
  /** Applied after every layer, e.g. a digest recorded by a pipeline run. */
  images?: readonly ImageOverride[];
};

const formatIssues = (error: ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

const normalizeDir = (dir: string): string => {
  const normalized = path.normalize(dir.replace(/^\/+/, ''));
  return normalized === '' ? '.' : normalized.replace(/\/+$/, '');
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

/** Read access to one tree that remembers every file it served, for fingerprinting. */
class TreeReader {
  readonly consumed = new Map<string, string>();

  constructor(private readonly tree: RepositoryTree) {}

  public hasFile(file: string): boolean {
    return this.tree.has(file);
  }

  public isDirectory(dir: string): boolean {
    if (dir === '.') {
      return true;
    }
    const prefix = `${dir}/`;
    return [...this.tree.keys()].some((file) => file.startsWith(prefix));
  }

  /** Manifest files directly inside `dir`, in name order. */
  public filesIn(dir: string): string[] {
    return [...this.tree.keys()]
      .filter((file) => path.dirname(file) === dir && MANIFEST_FILE.test(file))
      .sort();
  }

  public read(file: string): string {
    const content = this.tree.get(file);
    if (content === undefined) {
      throw new RenderError('NotFound', `File '${file}' does not exist`);
    }
    this.consumed.set(file, content);
    return content;
  }
}

/**
 * Renders an Application's manifests into a canonical, dependency-ordered object list.
 *
 * A directory with a `kustomization.yaml` is a layer: its `resources` (files or other layers)
 * form the base, its `patches` are applied in declaration order as JSON merge patches, then
 * `namespace`, `commonLabels` and `images` are applied. A directory without one contributes
 * every manifest file it holds.
 */
export class ManifestRenderer {
  constructor(
    private readonly repository: RepositoryClient,
    private readonly registry: KindRegistry = kindRegistry,
  ) {}

  public async render(
    repoURL: string,
    revision: string,
    sourcePath: string,
    options: RenderOptions = {},
  ): Promise<DesiredStateSnapshot> {
    const commit = await this.resolve(repoURL, revision);
    const tree = await this.repository.readTree(repoURL, commit);
    return this.renderTree(tree, { repoURL, revision: commit, path: sourcePath }, options);
  }

  /** Pure part of rendering: same tree, path and options always give the same snapshot. */
  public renderTree(
    tree: RepositoryTree,
    source: { repoURL: string; revision: string; path: string },
    options: RenderOptions = {},
  ): DesiredStateSnapshot {
    const root = normalizeDir(source.path);
    const reader = new TreeReader(tree);

    if (!reader.isDirectory(root) && !reader.hasFile(root)) {
      throw new RenderError('NotFound', `Path '${source.path}' does not exist at ${source.revision}`);
    }

    const objects = this.renderEntry(root, reader, []);
    for (const object of objects) {
      applyImageOverrides(object, options.images ?? []);
    }
    this.assertUnique(objects);
    objects.sort((a, b) => this.registry.compare(a, b));

    const fingerprint = sha256(
      canonicalStringify({
        path: root,
        files: [...reader.consumed.entries()].sort(([a], [b]) => a.localeCompare(b)),
        images: options.images ?? [],
      }),
    );

    logger.debug(
      `Rendered ${objects.length} objects from '${root}' at ${source.revision} (fingerprint ${fingerprint.slice(0, 12)})`,
    );

    return deepFreeze({ ...source, fingerprint, objects });
  }

  private async resolve(repoURL: string, revision: string): Promise<string> {
    try {
      return await this.repository.resolveRevision(repoURL, revision);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new RenderError('NotFound', err.message, { cause: err });
      }
      throw err;
    }
  }

  private renderEntry(entry: string, reader: TreeReader, stack: string[]): ManifestObject[] {
    if (reader.hasFile(entry)) {
      return this.parseFile(entry, reader);
    }
    if (!reader.isDirectory(entry)) {
      throw new RenderError('NotFound', `Resource '${entry}' does not exist`);
    }
    if (stack.includes(entry)) {
      throw new RenderError('PatchConflict', `Layer cycle: ${[...stack, entry].join(' -> ')}`);
    }

    const kustomizationFile = path.join(entry, KUSTOMIZATION_FILE);
    if (!reader.hasFile(kustomizationFile)) {
      return reader.filesIn(entry).flatMap((file) => this.parseFile(file, reader));
    }

    const layer = this.parseKustomization(kustomizationFile, reader);
    const objects = layer.resources.flatMap((resource) =>
      this.renderEntry(path.join(entry, resource), reader, [...stack, entry]),
    );

    const patched = layer.patches.reduce(
      (current, patchFile) => this.applyPatchFile(current, path.join(entry, patchFile), reader),
      objects,
    );

    return patched.map((object) => this.applyLayerSettings(object, layer));
  }

  private parseKustomization(file: string, reader: TreeReader): Kustomization {
    const [document, ...rest] = this.parseDocuments(file, reader);
    if (rest.length > 0) {
      throw new RenderError('ParseError', `'${file}' must contain a single document`);
    }
    const result = KustomizationSchema.safeParse(document ?? {});
    if (!result.success) {
      throw new RenderError('ParseError', `'${file}': ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  private parseFile(file: string, reader: TreeReader): ManifestObject[] {
    if (path.basename(file) === KUSTOMIZATION_FILE) {
      return [];
    }
    return this.parseDocuments(file, reader).map((document, index) => this.toManifest(document, `${file}#${index}`));
  }

  private parseDocuments(file: string, reader: TreeReader): unknown[] {
    const values: unknown[] = [];
    for (const document of parseAllDocuments(reader.read(file))) {
      if (document.errors.length > 0) {
        throw new RenderError('ParseError', `'${file}': ${document.errors[0].message}`);
      }
      const value: unknown = document.toJS();
      if (value !== null && value !== undefined) {
        values.push(value);
      }
    }
    return values;
  }

  private toManifest(value: unknown, origin: string): ManifestObject {
    const result = ManifestObjectSchema.safeParse(value);
    if (!result.success) {
      throw new RenderError('ParseError', `'${origin}': ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  private applyPatchFile(objects: ManifestObject[], file: string, reader: TreeReader): ManifestObject[] {
    return this.parseDocuments(file, reader).reduce<ManifestObject[]>((current, document, index) => {
      const patch = this.toManifest(document, `${file}#${index}`);
      const matches = current.filter(
        (object) =>
          object.kind === patch.kind &&
          object.metadata.name === patch.metadata.name &&
          (patch.metadata.namespace === undefined || object.metadata.namespace === patch.metadata.namespace),
      );
      if (matches.length !== 1) {
        const problem = matches.length === 0 ? 'matches no object' : `matches ${matches.length} objects`;
        throw new RenderError('PatchConflict', `Patch '${file}' for ${formatRef(refOf(patch))} ${problem}`);
      }

      const [target] = matches;
      const merged = this.toManifest(mergePatch(target, patch), file);
      if (merged.apiVersion !== target.apiVersion) {
        throw new RenderError('PatchConflict', `Patch '${file}' changes the apiVersion of ${formatRef(refOf(target))}`);
      }
      return current.map((object) => (object === target ? merged : object));
    }, objects);
  }

  private applyLayerSettings(object: ManifestObject, layer: Kustomization): ManifestObject {
    const metadata = { ...object.metadata };
    if (layer.namespace && this.registry.isNamespaced(object.kind)) {
      metadata.namespace = layer.namespace;
    }
    if (layer.commonLabels) {
      metadata.labels = { ...metadata.labels, ...layer.commonLabels };
    }
    const result: ManifestObject = { ...object, metadata };
    applyImageOverrides(result, layer.images ?? []);
    return result;
  }

  private assertUnique(objects: ManifestObject[]): void {
    const seen = new Set<string>();
    for (const object of objects) {
      const namespace = this.registry.isNamespaced(object.kind) ? (object.metadata.namespace ?? '') : '';
      const key = `${object.kind}/${namespace}/${object.metadata.name}`;
      if (seen.has(key)) {
        throw new RenderError('PatchConflict', `${formatRef(refOf(object))} is defined more than once`);
      }
      seen.add(key);
    }
  }
}
