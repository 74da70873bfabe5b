import type { ServiceGraphSnapshot } from './graph.js';
import type { IncidentKind } from './incidents.js';

export type DiagnosticKind =
  | 'InputValidationError'
  | 'GraphInconsistencyError'
  | 'SymptomResolution';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  context: Record<string, string | number | boolean | null>;
}

export interface IncidentRecord {
  id: string;
  service: string;
  kind: IncidentKind;
  windowStart: string;
  windowEnd: string;
  magnitude: number;
  evidence: string[];
  description: string;
}

export interface CausalChainRecord {
  id: string;
  incidents: string[];
  services: string[];
}

export interface RootCauseRecord {
  service: string;
  incidentId: string;
  kind: IncidentKind;
  confidence: number;
  rank: number;
  evidence: string[];
  chainRef: string;
  correlatedChanges: string[];
}

export interface RunMetadata {
  receivedEvents: number;
  validEvents: number;
  skippedEvents: number;
  spanHints: number;
  services: number;
  dependencies: number;
  incidents: number;
  chains: number;
  candidates: number;
}

export interface RunResult {
  serviceGraph: ServiceGraphSnapshot;
  incidents: IncidentRecord[];
  causalChains: CausalChainRecord[];
  rootCauses: RootCauseRecord[];
  primarySymptom: { service: string; incidentId: string | null };
  diagnostics: Diagnostic[];
  metadata: RunMetadata;
  summary?: string;
}
