import { v5 as uuidv5 } from 'uuid';
import type { NormalizedEvent } from '../types/events.js';
import type { Incident } from '../types/incidents.js';
import type { ResolvedConfig } from '../config/types.js';
import { DetectorRegistry, createDefaultRegistry } from './registry.js';
import { byName } from '../graph/serviceGraph.js';
import { RunBudget } from '../utils/runBudget.js';
import { logger } from '../utils/logger.js';

export * from './types.js';
export * from './utils.js';
export * from './registry.js';
export { ErrorSpikeDetector } from './detectors/errorSpikeDetector.js';
export { LatencySpikeDetector } from './detectors/latencySpikeDetector.js';
export { ResourceExhaustionDetector } from './detectors/resourceExhaustionDetector.js';
export { ConfigChangeDetector } from './detectors/configChangeDetector.js';

/** Namespace for deterministic incident ids */
export const INCIDENT_ID_NAMESPACE = '3b2f7c1e-9d4a-5e6b-8c7d-1a2b3c4d5e6f';

export function incidentId(service: string, kind: string, windowStart: number, windowEnd: number): string {
  return uuidv5(`${service}|${kind}|${windowStart}|${windowEnd}`, INCIDENT_ID_NAMESPACE);
}

export function compareIncidents(a: Incident, b: Incident): number {
  return a.windowStart - b.windowStart
    || byName(a.service, b.service)
    || byName(a.kind, b.kind)
    || byName(a.id, b.id);
}

/**
 * Group events by service, keeping their time order
 */
export function partitionByService(events: readonly NormalizedEvent[]): Map<string, NormalizedEvent[]> {
  const partitions = new Map<string, NormalizedEvent[]>();
  for (const event of events) {
    const partition = partitions.get(event.service);
    if (partition) {
      partition.push(event);
    } else {
      partitions.set(event.service, [event]);
    }
  }
  return partitions;
}

/**
 * Runs every registered detector against each service's events.
 *
 * Services are evaluated independently; detectors see only one service's
 * partition at a time and never share state.
 */
export class AnomalyDetector {
  constructor(
    private readonly config: ResolvedConfig,
    private readonly registry: DetectorRegistry = createDefaultRegistry(),
    private readonly budget?: RunBudget
  ) {}

  async detect(events: readonly NormalizedEvent[]): Promise<Incident[]> {
    const partitions = partitionByService(events);
    const services = [...partitions.keys()].sort(byName);

    logger.info('[AnomalyDetector] Evaluating services', {
      services: services.length,
      detectors: this.registry.kinds
    });

    const perService = await Promise.all(
      services.map(async service => this.detectForService(service, partitions.get(service) ?? []))
    );

    const incidents = perService.flat().sort(compareIncidents);
    logger.info('[AnomalyDetector] Detection complete', { incidents: incidents.length });
    return incidents;
  }

  detectForService(service: string, events: readonly NormalizedEvent[]): Incident[] {
    const incidents: Incident[] = [];

    for (const detector of this.registry.getDetectors()) {
      const triggers = detector.evaluate(service, events, this.config.thresholds, this.budget);
      for (const trigger of triggers) {
        incidents.push({
          id: incidentId(service, detector.kind, trigger.windowStart, trigger.windowEnd),
          service,
          kind: detector.kind,
          windowStart: trigger.windowStart,
          windowEnd: trigger.windowEnd,
          magnitude: trigger.magnitude,
          evidence: [...trigger.evidence],
          description: trigger.description
        });
      }
      logger.debug('[AnomalyDetector] Detector evaluated', { service, kind: detector.kind, triggers: triggers.length });
      this.budget?.check('anomaly detection');
    }

    return incidents;
  }
}
