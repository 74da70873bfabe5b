import { performance } from 'perf_hooks';
import { ResourceLimitExceededError } from './errors.js';
import type { RunLimits } from '../config/types.js';

export type Clock = () => number;

const defaultClock: Clock = () => performance.now();

/**
 * Event and wall-clock budget for one run.
 *
 * Components call `check` at stage boundaries and inside loops that can
 * grow with the input; going over either limit aborts the run.
 */
export class RunBudget {
  private readonly startedAt: number;

  constructor(private readonly limits: RunLimits, private readonly clock: Clock = defaultClock) {
    this.startedAt = clock();
  }

  checkEventCount(count: number): void {
    if (count > this.limits.maxEvents) {
      throw new ResourceLimitExceededError('maxEvents', this.limits.maxEvents, count, 'ingestion');
    }
  }

  check(stage: string): void {
    const elapsed = this.elapsedMs();
    if (elapsed > this.limits.maxProcessingMs) {
      throw new ResourceLimitExceededError(
        'maxProcessingMs',
        this.limits.maxProcessingMs,
        Math.round(elapsed),
        stage
      );
    }
  }

  elapsedMs(): number {
    return this.clock() - this.startedAt;
  }
}
