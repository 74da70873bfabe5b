import type { NormalizedEvent } from '../types/events.js';
import type { IncidentKind } from '../types/incidents.js';
import type { ResolvedConfig } from '../config/types.js';
import type { RunBudget } from '../utils/runBudget.js';

export type DetectionThresholds = ResolvedConfig['thresholds'];

/**
 * One event that satisfies a detector's per-sample condition
 */
export interface QualifyingSample {
  eventId: string;
  timestamp: number;
  value?: number;
}

/**
 * Merged trigger window produced by the sliding-window evaluation
 */
export interface WindowTrigger {
  windowStart: number;
  windowEnd: number;
  magnitude: number;
  evidence: string[];
}

export interface DetectionTrigger extends WindowTrigger {
  description: string;
}

/**
 * A detection rule for one incident kind.
 *
 * `evaluate` sees a single service's events in time order and must not
 * keep state between calls; the detector owns merging of its own
 * overlapping triggers. Long sweeps should call `budget.check`.
 */
export interface IncidentDetector {
  readonly kind: IncidentKind;
  evaluate(
    service: string,
    events: readonly NormalizedEvent[],
    thresholds: DetectionThresholds,
    budget?: RunBudget
  ): DetectionTrigger[];
}
