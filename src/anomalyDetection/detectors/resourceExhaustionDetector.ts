import type { NormalizedEvent } from '../../types/events.js';
import type { RunBudget } from '../../utils/runBudget.js';
import type { DetectionThresholds, DetectionTrigger, IncidentDetector, QualifyingSample } from '../types.js';
import { detectWindows, matchesMetric, peakValue, toSample } from '../utils.js';

export const RESOURCE_EXHAUSTION_SEVERITY = 0.9;

/**
 * Detector for utilization metrics (cpu, memory, pools, ...) above a
 * percentage
 */
export class ResourceExhaustionDetector implements IncidentDetector {
  readonly kind = 'resource_exhaustion';

  evaluate(
    service: string,
    events: readonly NormalizedEvent[],
    thresholds: DetectionThresholds,
    budget?: RunBudget
  ): DetectionTrigger[] {
    const rule = thresholds.resourceExhaustion;
    const samples: QualifyingSample[] = [];
    const metrics = new Set<string>();

    for (const event of events) {
      const metric = event.metric;
      if (metric && matchesMetric(metric.name, rule.metricPatterns) && metric.value > rule.percent) {
        samples.push(toSample(event, metric.value));
        metrics.add(metric.name);
      }
    }

    return detectWindows(samples, rule, RESOURCE_EXHAUSTION_SEVERITY, budget).map(trigger => ({
      ...trigger,
      description: `${[...metrics].sort().join(', ')} above ${rule.percent}% on ${service} ` +
        `(peak ${peakValue(samples, trigger.evidence) ?? rule.percent}%)`
    }));
  }
}
