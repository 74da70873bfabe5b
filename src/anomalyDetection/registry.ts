import type { IncidentKind } from '../types/incidents.js';
import type { IncidentDetector } from './types.js';
import { ErrorSpikeDetector } from './detectors/errorSpikeDetector.js';
import { LatencySpikeDetector } from './detectors/latencySpikeDetector.js';
import { ResourceExhaustionDetector } from './detectors/resourceExhaustionDetector.js';
import { ConfigChangeDetector } from './detectors/configChangeDetector.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Detector registry, one detector per incident kind, kept in
 * registration order
 */
export class DetectorRegistry {
  private detectors = new Map<IncidentKind, IncidentDetector>();

  register(detector: IncidentDetector): this {
    if (this.detectors.has(detector.kind)) {
      throw new ConfigurationError([`A detector for incident kind "${detector.kind}" is already registered`]);
    }
    this.detectors.set(detector.kind, detector);
    logger.debug(`[DetectorRegistry] Registered detector ${detector.kind}`);
    return this;
  }

  registerAll(detectors: readonly IncidentDetector[]): this {
    for (const detector of detectors) {
      this.register(detector);
    }
    return this;
  }

  get(kind: IncidentKind): IncidentDetector | undefined {
    return this.detectors.get(kind);
  }

  has(kind: IncidentKind): boolean {
    return this.detectors.has(kind);
  }

  getDetectors(): IncidentDetector[] {
    return [...this.detectors.values()];
  }

  get kinds(): IncidentKind[] {
    return [...this.detectors.keys()];
  }
}

export function builtinDetectors(): IncidentDetector[] {
  return [
    new ErrorSpikeDetector(),
    new LatencySpikeDetector(),
    new ResourceExhaustionDetector(),
    new ConfigChangeDetector()
  ];
}

/**
 * Registry holding the four built-in detectors
 */
export function createDefaultRegistry(): DetectorRegistry {
  return new DetectorRegistry().registerAll(builtinDetectors());
}
