import type { CausalChain, Incident, SymptomSpec } from '../types/incidents.js';
import { isConfigChange } from '../types/incidents.js';
import type { ResolvedConfig } from '../config/types.js';
import { ServiceGraph, byName } from '../graph/serviceGraph.js';
import { compareIncidents } from '../anomalyDetection/index.js';
import { DiagnosticLog } from '../utils/errorHandling.js';
import { SymptomResolutionError } from '../utils/errors.js';
import { RunBudget } from '../utils/runBudget.js';
import { logger } from '../utils/logger.js';

export interface TraceResult {
  /** Incident the chains start from; null when the symptom could not be anchored */
  anchor: Incident | null;
  chains: CausalChain[];
}

/**
 * Most severe incident first: non-config incidents before config markers,
 * then magnitude, earliest start, kind and id
 */
function bySeverity(a: Incident, b: Incident): number {
  return Number(isConfigChange(a)) - Number(isConfigChange(b))
    || b.magnitude - a.magnitude
    || a.windowStart - b.windowStart
    || byName(a.kind, b.kind)
    || byName(a.id, b.id);
}

/**
 * Whether `upstream` can have caused `current` within the horizon
 */
export function isTemporallyConsistent(upstream: Incident, current: Incident, horizonMs: number): boolean {
  return upstream.windowStart <= current.windowStart + horizonMs
    && upstream.windowStart <= current.windowEnd
    && current.windowStart - upstream.windowStart <= horizonMs;
}

/**
 * Walks the service graph from the symptom incident toward its
 * dependencies, producing every maximal temporally-consistent chain.
 *
 * Each chain carries its own visited-service set, so cycles end a branch
 * instead of looping and no chain is longer than the node count. On a dense
 * mesh the number of maximal chains grows factorially with the node count;
 * `ranking.maxChains` stops the walk after that many chains in DFS order.
 */
export class CausalChainTracer {
  private readonly horizonMs: number;
  private readonly maxChains: number;

  constructor(
    config: ResolvedConfig,
    private readonly diagnostics: DiagnosticLog,
    private readonly budget?: RunBudget
  ) {
    this.horizonMs = config.correlationHorizonSec * 1000;
    this.maxChains = config.ranking.maxChains ?? Number.POSITIVE_INFINITY;
  }

  trace(graph: ServiceGraph, incidents: readonly Incident[], symptom: SymptomSpec): TraceResult {
    const anchor = this.resolveAnchor(incidents, symptom);
    if (!anchor) {
      return { anchor: null, chains: [] };
    }

    const byService = new Map<string, Incident[]>();
    for (const incident of [...incidents].sort(compareIncidents)) {
      const list = byService.get(incident.service);
      if (list) {
        list.push(incident);
      } else {
        byService.set(incident.service, [incident]);
      }
    }

    const paths: Incident[][] = [];
    this.extend(graph, byService, [anchor], new Set([anchor.service]), paths);

    const chains = paths.map((incidentsInChain, index) => ({
      id: `chain-${index + 1}`,
      incidents: incidentsInChain
    }));

    if (paths.length >= this.maxChains) {
      logger.warn('[CausalChainTracer] Chain limit reached', {
        maxChains: this.maxChains
      });
    }

    logger.info('[CausalChainTracer] Traced causal chains', {
      symptom: symptom.service,
      anchor: anchor.id,
      chains: chains.length
    });

    return { anchor, chains };
  }

  resolveAnchor(incidents: readonly Incident[], symptom: SymptomSpec): Incident | null {
    if (symptom.incidentId !== undefined) {
      const match = incidents.find(incident => incident.id === symptom.incidentId);
      if (!match || match.service !== symptom.service) {
        this.diagnostics.record(new SymptomResolutionError(
          `Incident ${symptom.incidentId} does not exist on service ${symptom.service}`,
          { service: symptom.service, incidentId: symptom.incidentId }
        ));
        return null;
      }
      return match;
    }

    const onService = incidents.filter(incident => incident.service === symptom.service).sort(bySeverity);
    if (onService.length === 0) {
      this.diagnostics.record(new SymptomResolutionError(
        `No incident detected on symptom service ${symptom.service}`,
        { service: symptom.service, incidentId: null }
      ));
      return null;
    }
    return onService[0];
  }

  private extend(
    graph: ServiceGraph,
    byService: ReadonlyMap<string, readonly Incident[]>,
    path: Incident[],
    visited: ReadonlySet<string>,
    out: Incident[][]
  ): void {
    this.budget?.check('causal chain tracing');
    if (out.length >= this.maxChains) {
      return;
    }

    const head = path[path.length - 1];
    const extensions: Incident[] = [];

    for (const dependency of graph.getDependencies(head.service)) {
      if (visited.has(dependency)) {
        continue;
      }
      const qualifying = (byService.get(dependency) ?? [])
        .filter(incident => isTemporallyConsistent(incident, head, this.horizonMs));
      const substantive = qualifying.filter(incident => !isConfigChange(incident));
      extensions.push(...(substantive.length > 0 ? substantive : qualifying));
    }

    if (extensions.length === 0) {
      out.push(path);
      return;
    }

    for (const next of extensions) {
      if (out.length >= this.maxChains) {
        return;
      }
      logger.debug('[CausalChainTracer] Extending chain', { from: head.id, to: next.id, service: next.service });
      this.extend(graph, byService, [...path, next], new Set([...visited, next.service]), out);
    }
  }
}
