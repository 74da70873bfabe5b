import { isErrorEvent, type NormalizedEvent } from '../../types/events.js';
import type { RunBudget } from '../../utils/runBudget.js';
import type { DetectionThresholds, DetectionTrigger, IncidentDetector } from '../types.js';
import { detectWindows, toSample } from '../utils.js';

export const ERROR_SPIKE_SEVERITY = 0.8;

/**
 * Detector for bursts of ERROR / CRITICAL events on one service
 */
export class ErrorSpikeDetector implements IncidentDetector {
  readonly kind = 'error_spike';

  evaluate(
    service: string,
    events: readonly NormalizedEvent[],
    thresholds: DetectionThresholds,
    budget?: RunBudget
  ): DetectionTrigger[] {
    const rule = thresholds.errorSpike;
    const samples = events.filter(isErrorEvent).map(event => toSample(event));

    return detectWindows(samples, rule, ERROR_SPIKE_SEVERITY, budget).map(trigger => ({
      ...trigger,
      description: `${trigger.evidence.length} error events on ${service} within ${rule.windowSec}s (threshold ${rule.count})`
    }));
  }
}
