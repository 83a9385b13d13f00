import { Scope } from '@/enums/scope.enum';
import { ValidationError } from '@/errors/driftless.errors';
import type { ManifestObject } from '@/interfaces/manifest-object.interface';

/** Apply-order groups: dependencies first, exposure last. */
export enum ApplyGroup {
  Namespace = 0,
  Definition = 1,
  Rbac = 2,
  Config = 3,
  Workload = 4,
  Network = 5,
  Other = 6,
}

export type KindInfo = {
  kind: string;
  apiVersion: string;
  plural: string;
  scope: Scope;
  group: ApplyGroup;
};

const kinds: KindInfo[] = [
  { kind: 'Namespace', apiVersion: 'v1', plural: 'namespaces', scope: Scope.Cluster, group: ApplyGroup.Namespace },
  {
    kind: 'CustomResourceDefinition',
    apiVersion: 'apiextensions.k8s.io/v1',
    plural: 'customresourcedefinitions',
    scope: Scope.Cluster,
    group: ApplyGroup.Definition,
  },
  { kind: 'ServiceAccount', apiVersion: 'v1', plural: 'serviceaccounts', scope: Scope.Namespaced, group: ApplyGroup.Rbac },
  { kind: 'ClusterRole', apiVersion: 'rbac.authorization.k8s.io/v1', plural: 'clusterroles', scope: Scope.Cluster, group: ApplyGroup.Rbac },
  { kind: 'Role', apiVersion: 'rbac.authorization.k8s.io/v1', plural: 'roles', scope: Scope.Namespaced, group: ApplyGroup.Rbac },
  {
    kind: 'ClusterRoleBinding',
    apiVersion: 'rbac.authorization.k8s.io/v1',
    plural: 'clusterrolebindings',
    scope: Scope.Cluster,
    group: ApplyGroup.Rbac,
  },
  { kind: 'RoleBinding', apiVersion: 'rbac.authorization.k8s.io/v1', plural: 'rolebindings', scope: Scope.Namespaced, group: ApplyGroup.Rbac },
  { kind: 'ConfigMap', apiVersion: 'v1', plural: 'configmaps', scope: Scope.Namespaced, group: ApplyGroup.Config },
  { kind: 'Secret', apiVersion: 'v1', plural: 'secrets', scope: Scope.Namespaced, group: ApplyGroup.Config },
  { kind: 'PersistentVolumeClaim', apiVersion: 'v1', plural: 'persistentvolumeclaims', scope: Scope.Namespaced, group: ApplyGroup.Config },
  { kind: 'Deployment', apiVersion: 'apps/v1', plural: 'deployments', scope: Scope.Namespaced, group: ApplyGroup.Workload },
  { kind: 'StatefulSet', apiVersion: 'apps/v1', plural: 'statefulsets', scope: Scope.Namespaced, group: ApplyGroup.Workload },
  { kind: 'DaemonSet', apiVersion: 'apps/v1', plural: 'daemonsets', scope: Scope.Namespaced, group: ApplyGroup.Workload },
  { kind: 'Job', apiVersion: 'batch/v1', plural: 'jobs', scope: Scope.Namespaced, group: ApplyGroup.Workload },
  { kind: 'CronJob', apiVersion: 'batch/v1', plural: 'cronjobs', scope: Scope.Namespaced, group: ApplyGroup.Workload },
  { kind: 'Pod', apiVersion: 'v1', plural: 'pods', scope: Scope.Namespaced, group: ApplyGroup.Workload },
  { kind: 'Service', apiVersion: 'v1', plural: 'services', scope: Scope.Namespaced, group: ApplyGroup.Network },
  { kind: 'Ingress', apiVersion: 'networking.k8s.io/v1', plural: 'ingresses', scope: Scope.Namespaced, group: ApplyGroup.Network },
  { kind: 'Route', apiVersion: 'route.openshift.io/v1', plural: 'routes', scope: Scope.Namespaced, group: ApplyGroup.Network },
  {
    kind: 'NetworkPolicy',
    apiVersion: 'networking.k8s.io/v1',
    plural: 'networkpolicies',
    scope: Scope.Namespaced,
    group: ApplyGroup.Network,
  },
  {
    kind: 'HorizontalPodAutoscaler',
    apiVersion: 'autoscaling/v2',
    plural: 'horizontalpodautoscalers',
    scope: Scope.Namespaced,
    group: ApplyGroup.Other,
  },
  { kind: 'PipelineRun', apiVersion: 'tekton.dev/v1', plural: 'pipelineruns', scope: Scope.Namespaced, group: ApplyGroup.Other },
  { kind: 'Lease', apiVersion: 'coordination.k8s.io/v1', plural: 'leases', scope: Scope.Namespaced, group: ApplyGroup.Other },
];

export class KindRegistry {
  private readonly byKind = new Map<string, { info: KindInfo; rank: number }>();

  constructor(entries: KindInfo[] = kinds) {
    entries.forEach((info, rank) => this.register(info, rank));
  }

  public register(info: KindInfo, rank: number = this.byKind.size): void {
    this.byKind.set(info.kind, { info, rank });
  }

  public find(kind: string): KindInfo | undefined {
    return this.byKind.get(kind)?.info;
  }

  public require(kind: string): KindInfo {
    const info = this.find(kind);
    if (!info) {
      throw new ValidationError(`No API mapping registered for kind '${kind}'`);
    }
    return info;
  }

  /** Unknown kinds are assumed namespaced, as most custom resources are. */
  public isNamespaced(kind: string): boolean {
    return (this.find(kind)?.scope ?? Scope.Namespaced) === Scope.Namespaced;
  }

  /** Sort key: apply group, then position in the registry. Unknown kinds sort last. */
  public orderOf(kind: string): [ApplyGroup, number] {
    const entry = this.byKind.get(kind);
    return entry ? [entry.info.group, entry.rank] : [ApplyGroup.Other, Number.MAX_SAFE_INTEGER];
  }

  /** Canonical apply order: group, registry rank, kind, namespace, name. */
  public compare(a: ManifestObject, b: ManifestObject): number {
    const [groupA, rankA] = this.orderOf(a.kind);
    const [groupB, rankB] = this.orderOf(b.kind);
    return (
      groupA - groupB ||
      rankA - rankB ||
      a.kind.localeCompare(b.kind) ||
      (a.metadata.namespace ?? '').localeCompare(b.metadata.namespace ?? '') ||
      a.metadata.name.localeCompare(b.metadata.name)
    );
  }

  public kinds(): KindInfo[] {
    return [...this.byKind.values()].map(({ info }) => info);
  }
}

export const kindRegistry = new KindRegistry();
