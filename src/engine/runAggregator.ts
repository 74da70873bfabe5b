import type { CausalChain, Incident, RootCauseCandidate, SymptomSpec } from '../types/incidents.js';
import type {
  CausalChainRecord,
  Diagnostic,
  IncidentRecord,
  RootCauseRecord,
  RunMetadata,
  RunResult
} from '../types/result.js';
import { ServiceGraph, byName } from '../graph/serviceGraph.js';

export interface RunCounts {
  receivedEvents: number;
  validEvents: number;
  skippedEvents: number;
  spanHints: number;
}

export interface AggregationInput {
  graph: ServiceGraph;
  incidents: readonly Incident[];
  chains: readonly CausalChain[];
  candidates: readonly RootCauseCandidate[];
  symptom: SymptomSpec;
  anchor: Incident | null;
  diagnostics: Diagnostic[];
  counts: RunCounts;
}

export function toIncidentRecord(incident: Incident): IncidentRecord {
  return {
    id: incident.id,
    service: incident.service,
    kind: incident.kind,
    windowStart: new Date(incident.windowStart).toISOString(),
    windowEnd: new Date(incident.windowEnd).toISOString(),
    magnitude: incident.magnitude,
    evidence: [...incident.evidence],
    description: incident.description
  };
}

export function toChainRecord(chain: CausalChain): CausalChainRecord {
  return {
    id: chain.id,
    incidents: chain.incidents.map(incident => incident.id),
    services: chain.incidents.map(incident => incident.service)
  };
}

export function toRootCauseRecord(candidate: RootCauseCandidate): RootCauseRecord {
  return {
    service: candidate.service,
    incidentId: candidate.incident.id,
    kind: candidate.incident.kind,
    confidence: candidate.confidence,
    rank: candidate.rank,
    evidence: [...candidate.evidence],
    chainRef: candidate.chainRef,
    correlatedChanges: candidate.correlatedChanges.map(change => change.id)
  };
}

/**
 * Assemble the serializable result of a run
 */
export function aggregateRun(input: AggregationInput): RunResult {
  const metadata: RunMetadata = {
    ...input.counts,
    services: input.graph.nodeCount,
    dependencies: input.graph.edgeCount,
    incidents: input.incidents.length,
    chains: input.chains.length,
    candidates: input.candidates.length
  };

  return {
    serviceGraph: input.graph.toSnapshot(),
    incidents: input.incidents.map(toIncidentRecord),
    causalChains: input.chains.map(toChainRecord),
    rootCauses: input.candidates.map(toRootCauseRecord),
    primarySymptom: {
      service: input.symptom.service,
      incidentId: input.anchor?.id ?? null
    },
    diagnostics: input.diagnostics,
    metadata
  };
}

/**
 * Incidents of a run ordered by window start, then service, kind and id
 */
export function generateIncidentTimeline(result: RunResult): IncidentRecord[] {
  return [...result.incidents].sort((a, b) =>
    Date.parse(a.windowStart) - Date.parse(b.windowStart)
    || byName(a.service, b.service)
    || byName(a.kind, b.kind)
    || byName(a.id, b.id));
}
