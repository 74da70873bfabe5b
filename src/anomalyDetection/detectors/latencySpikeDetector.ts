import type { NormalizedEvent } from '../../types/events.js';
import type { RunBudget } from '../../utils/runBudget.js';
import type { DetectionThresholds, DetectionTrigger, IncidentDetector, QualifyingSample } from '../types.js';
import { detectWindows, matchesMetric, peakValue, toSample } from '../utils.js';

export const LATENCY_SPIKE_SEVERITY = 0.7;

/**
 * Latency of an event in ms: the explicit `latencyMs` field, else a
 * metric sample whose name looks like a latency metric
 */
function latencyOf(event: NormalizedEvent, patterns: readonly string[]): number | undefined {
  if (event.latencyMs !== undefined) {
    return event.latencyMs;
  }
  if (event.metric && matchesMetric(event.metric.name, patterns)) {
    return event.metric.value;
  }
  return undefined;
}

export class LatencySpikeDetector implements IncidentDetector {
  readonly kind = 'latency_spike';

  evaluate(
    service: string,
    events: readonly NormalizedEvent[],
    thresholds: DetectionThresholds,
    budget?: RunBudget
  ): DetectionTrigger[] {
    const rule = thresholds.latencySpike;
    const samples: QualifyingSample[] = [];

    for (const event of events) {
      const latency = latencyOf(event, rule.metricPatterns);
      if (latency !== undefined && latency > rule.ceilingMs) {
        samples.push(toSample(event, latency));
      }
    }

    return detectWindows(samples, rule, LATENCY_SPIKE_SEVERITY, budget).map(trigger => ({
      ...trigger,
      description: `${trigger.evidence.length} latency samples above ${rule.ceilingMs}ms on ${service} ` +
        `(peak ${peakValue(samples, trigger.evidence) ?? rule.ceilingMs}ms)`
    }));
  }
}
