export enum Scope {
  Namespaced = 'Namespaced',
  Cluster = 'Cluster',
}
