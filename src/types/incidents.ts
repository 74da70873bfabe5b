export const BUILTIN_INCIDENT_KINDS = [
  'error_spike',
  'latency_spike',
  'resource_exhaustion',
  'config_change'
] as const;

export type BuiltinIncidentKind = typeof BUILTIN_INCIDENT_KINDS[number];

/**
 * Incident kinds are an open set: detectors registered beyond the built-in
 * four bring their own kind name.
 */
export type IncidentKind = BuiltinIncidentKind | (string & {});

/** Kind used for config and deployment change markers */
export const CONFIG_CHANGE_KIND: BuiltinIncidentKind = 'config_change';

export interface Incident {
  readonly id: string;
  readonly service: string;
  readonly kind: IncidentKind;
  /** UTC epoch milliseconds */
  readonly windowStart: number;
  readonly windowEnd: number;
  /** Severity scalar in [0,1] */
  readonly magnitude: number;
  /** Ids of the events supporting this incident, in time order */
  readonly evidence: readonly string[];
  readonly description: string;
}

export interface CausalChain {
  readonly id: string;
  /** Head (nearest the symptom) first, tail (most upstream) last */
  readonly incidents: readonly Incident[];
}

export interface RootCauseCandidate {
  readonly service: string;
  readonly incident: Incident;
  readonly confidence: number;
  readonly rank: number;
  readonly evidence: readonly string[];
  readonly chainRef: string;
  readonly hopCount: number;
  /** config_change incidents correlated with the candidate incident */
  readonly correlatedChanges: readonly Incident[];
}

export interface SymptomSpec {
  service: string;
  incidentId?: string;
}

export function isConfigChange(incident: Incident): boolean {
  return incident.kind === CONFIG_CHANGE_KIND;
}
