/**
 * Per-identity traversal budget.
 *
 * Every traversal step calls `tick()`, which is where run cancellation and
 * the per-identity deadline become observable.
 */

import { CancelledError, TimeoutError } from '../errors';

export type Clock = () => number;

export interface TraversalBudgetOptions {
  identityId: string;
  signal?: AbortSignal;
  /** No deadline when omitted or zero */
  timeoutMs?: number;
  clock?: Clock;
}

export class TraversalBudget {
  private readonly clock: Clock;
  private readonly deadline: number | null;
  private steps = 0;

  constructor(private readonly options: TraversalBudgetOptions) {
    this.clock = options.clock ?? Date.now;
    this.deadline =
      options.timeoutMs !== undefined && options.timeoutMs > 0
        ? this.clock() + options.timeoutMs
        : null;
  }

  /**
   * Record one traversal step.
   * Throws CancelledError once the run is aborted and TimeoutError once the
   * deadline has passed.
   */
  tick(): void {
    this.steps++;
    if (this.options.signal?.aborted) {
      throw new CancelledError();
    }
    if (this.deadline !== null && this.clock() > this.deadline) {
      throw new TimeoutError(this.options.identityId, this.options.timeoutMs ?? 0);
    }
  }

  get identityId(): string {
    return this.options.identityId;
  }

  get stepCount(): number {
    return this.steps;
  }
}

/**
 * A budget that never expires, for callers outside a run
 */
export function unboundedBudget(identityId = '(unbounded)'): TraversalBudget {
  return new TraversalBudget({ identityId });
}
