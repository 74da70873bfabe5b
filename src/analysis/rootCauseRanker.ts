import type { CausalChain, Incident, RootCauseCandidate } from '../types/incidents.js';
import { isConfigChange } from '../types/incidents.js';
import type { ResolvedConfig } from '../config/types.js';
import { byName } from '../graph/serviceGraph.js';
import { compareIncidents } from '../anomalyDetection/index.js';
import { RunBudget } from '../utils/runBudget.js';
import { logger } from '../utils/logger.js';

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export interface ScoreInputs {
  magnitude: number;
  hopCount: number;
  timeToSymptomSec: number;
  evidenceCount: number;
}

type Scored = Omit<RootCauseCandidate, 'rank'> & { order: number };

/**
 * Orders candidates: confidence desc, evidence count desc, earlier
 * incident start, service name, incident id
 */
function compareCandidates(a: Scored, b: Scored): number {
  return b.confidence - a.confidence
    || b.evidence.length - a.evidence.length
    || a.incident.windowStart - b.incident.windowStart
    || byName(a.service, b.service)
    || byName(a.incident.id, b.incident.id);
}

/**
 * Scores the tail incident of every causal chain and returns ranked root
 * cause candidates. Config change markers on the tail's service are
 * attached to the candidate as correlated changes and add to its evidence.
 */
export class RootCauseRanker {
  constructor(
    private readonly config: ResolvedConfig,
    private readonly budget?: RunBudget
  ) {}

  score(inputs: ScoreInputs): number {
    const { weights, correlationHorizonSec } = this.config;
    return clamp01(
      weights.severity * clamp01(inputs.magnitude)
      + weights.distance * (1 / (1 + inputs.hopCount))
      + weights.temporal * (1 / (1 + inputs.timeToSymptomSec / correlationHorizonSec))
      + weights.evidence * Math.log(1 + inputs.evidenceCount)
    );
  }

  rank(chains: readonly CausalChain[], anchor: Incident, incidents: readonly Incident[]): RootCauseCandidate[] {
    const best = new Map<string, Scored>();

    chains.forEach((chain, order) => {
      const tail = chain.incidents[chain.incidents.length - 1];
      if (!tail) {
        return;
      }

      const correlatedChanges = isConfigChange(tail) ? [] : this.correlatedChanges(tail, incidents);
      const evidence = [...tail.evidence];
      for (const change of correlatedChanges) {
        for (const id of change.evidence) {
          if (!evidence.includes(id)) {
            evidence.push(id);
          }
        }
      }

      const hopCount = chain.incidents.length - 1;
      const confidence = this.score({
        magnitude: tail.magnitude,
        hopCount,
        timeToSymptomSec: Math.abs(tail.windowStart - anchor.windowStart) / 1000,
        evidenceCount: evidence.length
      });

      const existing = best.get(tail.id);
      if (!existing || confidence > existing.confidence) {
        best.set(tail.id, {
          service: tail.service,
          incident: tail,
          confidence,
          evidence,
          chainRef: chain.id,
          hopCount,
          correlatedChanges,
          order
        });
      }
    });

    this.budget?.check('root cause ranking');

    const attached = new Set<string>();
    for (const candidate of best.values()) {
      candidate.correlatedChanges.forEach(change => attached.add(change.id));
    }

    const ranked = [...best.values()]
      .filter(candidate => !attached.has(candidate.incident.id))
      .sort((a, b) => compareCandidates(a, b) || a.order - b.order)
      .map(({ order: _order, ...candidate }, index) => ({ ...candidate, rank: index + 1 }));

    const topN = this.config.ranking.topN;
    const result = topN === undefined ? ranked : ranked.slice(0, topN);

    logger.info('[RootCauseRanker] Ranked root cause candidates', {
      chains: chains.length,
      candidates: result.length,
      top: result[0]?.service ?? null
    });

    return result;
  }

  private correlatedChanges(tail: Incident, incidents: readonly Incident[]): Incident[] {
    const windowMs = this.config.thresholds.configChange.windowSec * 1000;
    return incidents
      .filter(incident =>
        isConfigChange(incident)
        && incident.service === tail.service
        && Math.abs(incident.windowStart - tail.windowStart) <= windowMs)
      .sort(compareIncidents);
  }
}
