import type { NormalizedEvent } from '../../types/events.js';
import type { RunBudget } from '../../utils/runBudget.js';
import type { DetectionThresholds, DetectionTrigger, IncidentDetector } from '../types.js';
import { detectWindows, toSample } from '../utils.js';

export const CONFIG_CHANGE_MAGNITUDE = 0.6;

function describeChange(event: NormalizedEvent): string {
  const change = event.configChange;
  if (!change) {
    return event.message;
  }
  const text = change.description || event.message || 'unspecified change';
  const versions = change.versionBefore || change.versionAfter
    ? ` (${change.versionBefore ?? '?'} -> ${change.versionAfter ?? '?'})`
    : '';
  return `${change.changeType}: ${text}${versions}`;
}

/**
 * Groups config and deployment changes into marker incidents. Changes
 * within one window of each other share a marker.
 */
export class ConfigChangeDetector implements IncidentDetector {
  readonly kind = 'config_change';

  evaluate(
    service: string,
    events: readonly NormalizedEvent[],
    thresholds: DetectionThresholds,
    budget?: RunBudget
  ): DetectionTrigger[] {
    const changes = events.filter(event => event.configChange !== undefined);
    const rule = { count: 1, windowSec: thresholds.configChange.windowSec };
    const byId = new Map(changes.map(event => [event.id, event]));

    return detectWindows(changes.map(event => toSample(event)), rule, CONFIG_CHANGE_MAGNITUDE, budget).map(trigger => {
      const details = trigger.evidence
        .map(id => byId.get(id))
        .filter((event): event is NormalizedEvent => event !== undefined)
        .map(describeChange);
      return {
        ...trigger,
        magnitude: CONFIG_CHANGE_MAGNITUDE,
        description: `${details.length} change(s) on ${service}: ${details.join('; ')}`
      };
    });
  }
}
