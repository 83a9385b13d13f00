export enum ObjectAction {
  Create = 'create',
  Update = 'update',
  Prune = 'prune',
  Unchanged = 'unchanged',
}

export enum ObjectOutcome {
  Created = 'Created',
  Updated = 'Updated',
  Unchanged = 'Unchanged',
  Pruned = 'Pruned',
  PruneSkipped = 'PruneSkipped',
  Failed = 'Failed',
  Skipped = 'Skipped',
}
