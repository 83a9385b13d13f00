import { ReconcilePhase } from '@/enums/reconcile-phase.enum';
import { logger } from '@/logger';

const transitions: Record<ReconcilePhase, readonly ReconcilePhase[]> = {
  [ReconcilePhase.Idle]: [ReconcilePhase.Diffing, ReconcilePhase.Failed],
  [ReconcilePhase.Diffing]: [ReconcilePhase.Applying, ReconcilePhase.Idle, ReconcilePhase.Failed],
  [ReconcilePhase.Applying]: [
    ReconcilePhase.ConflictRetry,
    ReconcilePhase.Settled,
    ReconcilePhase.Idle,
    ReconcilePhase.Failed,
  ],
  [ReconcilePhase.ConflictRetry]: [ReconcilePhase.Applying, ReconcilePhase.Idle, ReconcilePhase.Failed],
  [ReconcilePhase.Settled]: [ReconcilePhase.Idle, ReconcilePhase.Failed],
  [ReconcilePhase.Failed]: [ReconcilePhase.Idle],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: ReconcilePhase,
    readonly to: ReconcilePhase,
  ) {
    super(`Illegal reconcile transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** Per-Application reconcile phase; retries are explicit ConflictRetry round trips. */
export class ReconcileStateMachine {
  private current = ReconcilePhase.Idle;
  private trail: ReconcilePhase[] = [ReconcilePhase.Idle];

  constructor(private readonly application: string) {}

  get phase(): ReconcilePhase {
    return this.current;
  }

  /** Phases entered since the machine last returned to Idle, starting with Idle. */
  get history(): readonly ReconcilePhase[] {
    return this.trail;
  }

  public canTransition(to: ReconcilePhase): boolean {
    return transitions[this.current].includes(to);
  }

  public transition(to: ReconcilePhase): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    logger.debug(`[${this.application}] ${this.current} -> ${to}`);
    this.current = to;
    if (to === ReconcilePhase.Idle) {
      this.trail = [ReconcilePhase.Idle];
    } else {
      this.trail.push(to);
    }
  }

  /** Settled and Failed passes fall back to Idle before the next attempt begins. */
  public begin(): void {
    if (this.current !== ReconcilePhase.Idle) {
      this.transition(ReconcilePhase.Idle);
    }
    this.transition(ReconcilePhase.Diffing);
  }
}
