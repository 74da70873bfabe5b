import type { NormalizedEvent } from '../types/events.js';
import type { RunBudget } from '../utils/runBudget.js';
import type { QualifyingSample, WindowTrigger } from './types.js';

export interface WindowRule {
  count: number;
  windowSec: number;
}

/** Samples swept between two budget checks */
export const BUDGET_CHECK_INTERVAL = 1024;

/**
 * Evaluate a count-in-window rule over samples sorted by timestamp.
 *
 * Every sample opens a candidate window reaching `windowSec` forward; a
 * window holding at least `count` samples becomes a trigger spanning its
 * first to last sample, with magnitude `min(1, baseSeverity * n / count)`.
 * Triggers that overlap or touch are merged.
 *
 * One pass with two pointers: the window end only moves forward, and a
 * merged trigger always covers a contiguous run of samples, so its
 * evidence is sliced once when the trigger closes.
 */
export function detectWindows(
  samples: readonly QualifyingSample[],
  rule: WindowRule,
  baseSeverity: number,
  budget?: RunBudget
): WindowTrigger[] {
  const windowMs = rule.windowSec * 1000;
  const triggers: WindowTrigger[] = [];

  let last = 0;
  let current: { first: number; last: number; magnitude: number } | undefined;

  const close = (): void => {
    if (!current) {
      return;
    }
    triggers.push({
      windowStart: samples[current.first].timestamp,
      windowEnd: samples[current.last].timestamp,
      magnitude: current.magnitude,
      evidence: samples.slice(current.first, current.last + 1).map(sample => sample.eventId)
    });
    current = undefined;
  };

  for (let i = 0; i < samples.length; i++) {
    if (budget && i > 0 && i % BUDGET_CHECK_INTERVAL === 0) {
      budget.check('anomaly detection');
    }

    if (last < i) {
      last = i;
    }
    while (last + 1 < samples.length && samples[last + 1].timestamp - samples[i].timestamp <= windowMs) {
      last++;
    }

    const n = last - i + 1;
    if (n < rule.count) {
      continue;
    }

    const magnitude = Math.min(1, baseSeverity * (n / rule.count));
    if (current && samples[i].timestamp <= samples[current.last].timestamp) {
      current.last = Math.max(current.last, last);
      current.magnitude = Math.max(current.magnitude, magnitude);
    } else {
      close();
      current = { first: i, last, magnitude };
    }
  }
  close();

  return triggers;
}

/**
 * Case-insensitive substring match of a metric name against patterns
 */
export function matchesMetric(name: string, patterns: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return patterns.some(pattern => lower.includes(pattern.toLowerCase()));
}

export function toSample(event: NormalizedEvent, value?: number): QualifyingSample {
  return { eventId: event.id, timestamp: event.timestamp, value };
}

/**
 * Largest sample value among the given evidence ids
 */
export function peakValue(samples: readonly QualifyingSample[], evidence: readonly string[]): number | undefined {
  const ids = new Set(evidence);
  let peak: number | undefined;
  for (const sample of samples) {
    if (ids.has(sample.eventId) && sample.value !== undefined) {
      peak = peak === undefined ? sample.value : Math.max(peak, sample.value);
    }
  }
  return peak;
}
