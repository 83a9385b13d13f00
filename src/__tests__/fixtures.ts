import { ApplicationSchema, type ApplicationDto, type ApplicationSpecInput } from '@/dtos/application.dto';
import type { ManifestObject } from '@/interfaces/manifest-object.interface';
import { InMemoryObjectStore } from '@/object-store/in-memory.object-store';
import type { Sleep } from '@/utils/sleep';
import { stringify } from 'yaml';

export const REPO = 'https://git.example.com/team/deploy.git';
export const DIGEST = `sha256:${'a'.repeat(64)}`;

export const deploymentManifest = (image = 'demo-app:1.0.0', replicas = 1) => ({
  apiVersion: 'apps/v1',
  kind: 'Deployment',
  metadata: { name: 'demo-app' },
  spec: {
    replicas,
    selector: { matchLabels: { app: 'demo-app' } },
    template: {
      metadata: { labels: { app: 'demo-app' } },
      spec: { containers: [{ name: 'app', image }] },
    },
  },
});

export const serviceManifest = () => ({
  apiVersion: 'v1',
  kind: 'Service',
  metadata: { name: 'demo-app' },
  spec: { selector: { app: 'demo-app' }, ports: [{ port: 80, targetPort: 8080 }] },
});

export const routeManifest = () => ({
  apiVersion: 'route.openshift.io/v1',
  kind: 'Route',
  metadata: { name: 'demo-app' },
  spec: { to: { kind: 'Service', name: 'demo-app' } },
});

/** The demo-app directory: a Deployment, its Service and a Route exposing it. */
export const demoFiles = (
  options: { image?: string; replicas?: number; extra?: Record<string, string> } = {},
): Record<string, string> => ({
  'apps/demo/deployment.yaml': stringify(deploymentManifest(options.image, options.replicas)),
  'apps/demo/service.yaml': stringify(serviceManifest()),
  'apps/demo/route.yaml': stringify(routeManifest()),
  ...options.extra,
});

export const demoSpec = (overrides: Partial<ApplicationSpecInput> = {}): ApplicationSpecInput => ({
  source: { repoURL: REPO, path: 'apps/demo', targetRevision: 'main' },
  destination: { namespace: 'demo' },
  syncPolicy: { mode: 'automated' },
  ...overrides,
});

export const demoApplication = (name = 'demo', spec: ApplicationSpecInput = demoSpec()): ApplicationDto =>
  ApplicationSchema.parse({
    apiVersion: 'driftless.dev/v1alpha1',
    kind: 'Application',
    metadata: { name, namespace: 'driftless', generation: 1 },
    spec,
  });

export const abortError = (): Error => Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });

/** Never elapses on its own; ends only when the signal aborts. */
export const sleepUntilAborted: Sleep = (_ms, signal) =>
  new Promise((_resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    signal?.addEventListener('abort', () => reject(abortError()), { once: true });
  });

/** In-memory store that records every apply and lets a test interfere with it. */
export class TestStore extends InMemoryObjectStore {
  readonly applied: string[] = [];
  onApply?: (object: ManifestObject) => void;

  override async apply(object: ManifestObject, expectedVersion?: string): Promise<string> {
    this.applied.push(object.kind);
    this.onApply?.(object);
    return super.apply(object, expectedVersion);
  }
}
