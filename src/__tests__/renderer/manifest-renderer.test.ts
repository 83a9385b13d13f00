import { RenderError } from '@/errors/driftless.errors';
import { ManifestRenderer } from '@/renderer/manifest-renderer';
import { InMemoryRepositoryClient } from '@/source/in-memory.repository-client';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { stringify } from 'yaml';
import { DIGEST, deploymentManifest, demoFiles, REPO, serviceManifest } from '../fixtures';

vi.mock('@/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    dir: vi.fn(),
  },
}));

const treeOf = (files: Record<string, string>) => new Map(Object.entries(files));

const source = (path: string) => ({ repoURL: REPO, revision: 'c1', path });

const configMap = (name: string) => ({ apiVersion: 'v1', kind: 'ConfigMap', metadata: { name }, data: { key: name } });

const renderError = (render: () => unknown): RenderError => {
  try {
    render();
  } catch (err) {
    if (err instanceof RenderError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected a RenderError');
};

describe('ManifestRenderer', () => {
  let repository: InMemoryRepositoryClient;
  let renderer: ManifestRenderer;

  beforeEach(() => {
    repository = new InMemoryRepositoryClient();
    renderer = new ManifestRenderer(repository);
  });

  describe('render', () => {
    it('should render the same content at two commits to the same fingerprint', async () => {
      const first = repository.commit(REPO, 'main', demoFiles());
      const firstSnapshot = await renderer.render(REPO, 'main', 'apps/demo');
      const second = repository.commit(REPO, 'main', demoFiles());
      const secondSnapshot = await renderer.render(REPO, 'main', 'apps/demo');

      expect(second).not.toBe(first);
      expect(firstSnapshot.revision).toBe(first);
      expect(secondSnapshot.revision).toBe(second);
      expect(secondSnapshot.fingerprint).toBe(firstSnapshot.fingerprint);
      expect(secondSnapshot.objects).toEqual(firstSnapshot.objects);
    });

    it('should ignore files outside the source path', async () => {
      repository.commit(REPO, 'main', demoFiles());
      const before = await renderer.render(REPO, 'main', 'apps/demo');
      repository.commit(REPO, 'main', demoFiles({ extra: { 'apps/other/cm.yaml': stringify(configMap('other')) } }));
      const after = await renderer.render(REPO, 'main', 'apps/demo');

      expect(after.fingerprint).toBe(before.fingerprint);
    });

    it('should change the fingerprint when a manifest changes', async () => {
      repository.commit(REPO, 'main', demoFiles());
      const before = await renderer.render(REPO, 'main', 'apps/demo');
      repository.commit(REPO, 'main', demoFiles({ replicas: 2 }));
      const after = await renderer.render(REPO, 'main', 'apps/demo');

      expect(after.fingerprint).not.toBe(before.fingerprint);
    });

    it('should apply image overrides after every layer and fold them into the fingerprint', async () => {
      repository.commit(REPO, 'main', demoFiles());
      const plain = await renderer.render(REPO, 'main', 'apps/demo');
      const pinned = await renderer.render(REPO, 'main', 'apps/demo', {
        images: [{ name: 'demo-app', digest: DIGEST }],
      });

      expect(pinned.fingerprint).not.toBe(plain.fingerprint);
      expect(pinned.objects[0].spec).toMatchObject({
        template: { spec: { containers: [{ name: 'app', image: `demo-app@${DIGEST}` }] } },
      });
    });

    it('should report an unknown revision as NotFound', async () => {
      repository.commit(REPO, 'main', demoFiles());

      const error = await renderer.render(REPO, 'release', 'apps/demo').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RenderError);
      expect(error).toMatchObject({ reason: 'NotFound' });
    });
  });

  describe('renderTree', () => {
    it('should order objects by apply group', () => {
      const tree = treeOf({
        ...demoFiles(),
        'apps/demo/config.yaml': stringify(configMap('demo-config')),
        'apps/demo/namespace.yaml': stringify({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'demo' } }),
      });

      const snapshot = renderer.renderTree(tree, source('apps/demo'));

      expect(snapshot.objects.map((object) => object.kind)).toEqual([
        'Namespace',
        'ConfigMap',
        'Deployment',
        'Service',
        'Route',
      ]);
    });

    it('should normalize the source path', () => {
      const tree = treeOf(demoFiles());

      expect(renderer.renderTree(tree, source('/apps/demo/')).fingerprint).toBe(
        renderer.renderTree(tree, source('apps/demo')).fingerprint,
      );
    });

    it('should read every document of a multi-document file', () => {
      const tree = treeOf({
        'apps/multi/all.yaml': `${stringify(configMap('a'))}---\n${stringify(configMap('b'))}---\n`,
      });

      const snapshot = renderer.renderTree(tree, source('apps/multi'));

      expect(snapshot.objects.map((object) => object.metadata.name)).toEqual(['a', 'b']);
    });

    it('should freeze the snapshot', () => {
      const snapshot = renderer.renderTree(treeOf(demoFiles()), source('apps/demo'));

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.objects[0].metadata)).toBe(true);
    });

    it('should apply an overlay on top of its base', () => {
      const tree = treeOf({
        'base/kustomization.yaml': stringify({ resources: ['deployment.yaml', 'service.yaml'] }),
        'base/deployment.yaml': stringify(deploymentManifest()),
        'base/service.yaml': stringify(serviceManifest()),
        'overlays/prod/kustomization.yaml': stringify({
          resources: ['../../base'],
          patches: ['replicas.yaml'],
          namespace: 'prod',
          commonLabels: { env: 'prod' },
          images: [{ name: 'demo-app', newTag: '2.0.0' }],
        }),
        'overlays/prod/replicas.yaml': stringify({
          apiVersion: 'apps/v1',
          kind: 'Deployment',
          metadata: { name: 'demo-app' },
          spec: { replicas: 3 },
        }),
      });

      const [deployment, service] = renderer.renderTree(tree, source('overlays/prod')).objects;

      expect(deployment).toEqual({
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name: 'demo-app', namespace: 'prod', labels: { env: 'prod' } },
        spec: {
          replicas: 3,
          selector: { matchLabels: { app: 'demo-app' } },
          template: {
            metadata: { labels: { app: 'demo-app' } },
            spec: { containers: [{ name: 'app', image: 'demo-app:2.0.0' }] },
          },
        },
      });
      expect(service.metadata).toEqual({ name: 'demo-app', namespace: 'prod', labels: { env: 'prod' } });
    });

    it('should report a missing path as NotFound', () => {
      const error = renderError(() => renderer.renderTree(treeOf(demoFiles()), source('apps/nope')));

      expect(error.reason).toBe('NotFound');
      expect(error.message).toBe("Path 'apps/nope' does not exist at c1");
    });

    it('should report a missing layer resource as NotFound', () => {
      const tree = treeOf({ 'base/kustomization.yaml': stringify({ resources: ['nope.yaml'] }) });

      const error = renderError(() => renderer.renderTree(tree, source('base')));

      expect(error.reason).toBe('NotFound');
      expect(error.message).toBe("Resource 'base/nope.yaml' does not exist");
    });

    it('should report malformed YAML as a ParseError', () => {
      const tree = treeOf({ 'apps/bad/x.yaml': 'kind: [oops\n' });

      const error = renderError(() => renderer.renderTree(tree, source('apps/bad')));

      expect(error.reason).toBe('ParseError');
      expect(error.message.startsWith("'apps/bad/x.yaml': ")).toBe(true);
    });

    it('should report an object without a kind as a ParseError', () => {
      const tree = treeOf({ 'apps/bad/x.yaml': stringify({ apiVersion: 'v1', metadata: { name: 'x' } }) });

      const error = renderError(() => renderer.renderTree(tree, source('apps/bad')));

      expect(error.reason).toBe('ParseError');
      expect(error.message).toBe("'apps/bad/x.yaml#0': kind: Required");
    });

    it('should reject an object defined twice', () => {
      const tree = treeOf({
        'apps/dup/a.yaml': stringify(configMap('cfg')),
        'apps/dup/b.yaml': stringify(configMap('cfg')),
      });

      const error = renderError(() => renderer.renderTree(tree, source('apps/dup')));

      expect(error.reason).toBe('PatchConflict');
      expect(error.message).toBe("ConfigMap 'cfg' is defined more than once");
    });

    it('should reject a patch that matches no object', () => {
      const tree = treeOf({
        'base/kustomization.yaml': stringify({ resources: ['deployment.yaml'], patches: ['ghost.yaml'] }),
        'base/deployment.yaml': stringify(deploymentManifest()),
        'base/ghost.yaml': stringify({ apiVersion: 'apps/v1', kind: 'Deployment', metadata: { name: 'ghost' } }),
      });

      const error = renderError(() => renderer.renderTree(tree, source('base')));

      expect(error.reason).toBe('PatchConflict');
      expect(error.message).toBe("Patch 'base/ghost.yaml' for Deployment 'ghost' matches no object");
    });

    it('should reject a patch that changes the apiVersion', () => {
      const tree = treeOf({
        'base/kustomization.yaml': stringify({ resources: ['deployment.yaml'], patches: ['v2.yaml'] }),
        'base/deployment.yaml': stringify(deploymentManifest()),
        'base/v2.yaml': stringify({ apiVersion: 'apps/v2', kind: 'Deployment', metadata: { name: 'demo-app' } }),
      });

      expect(renderError(() => renderer.renderTree(tree, source('base'))).reason).toBe('PatchConflict');
    });

    it('should reject layers that include each other', () => {
      const tree = treeOf({
        'a/kustomization.yaml': stringify({ resources: ['../b'] }),
        'b/kustomization.yaml': stringify({ resources: ['../a'] }),
      });

      const error = renderError(() => renderer.renderTree(tree, source('a')));

      expect(error.reason).toBe('PatchConflict');
      expect(error.message).toBe('Layer cycle: a -> b -> a');
    });
  });
});
