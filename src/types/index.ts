export type {
  Severity,
  ConfigChangeType,
  MetricSample,
  ConfigChangeDescriptor,
  SpanRef,
  NormalizedEvent,
  SpanHint
} from './events.js';
export { isErrorEvent } from './events.js';
export type {
  EdgeConfidence,
  DependencyEdge,
  ServiceGraphSnapshot
} from './graph.js';
export type {
  BuiltinIncidentKind,
  IncidentKind,
  Incident,
  CausalChain,
  RootCauseCandidate,
  SymptomSpec
} from './incidents.js';
export { BUILTIN_INCIDENT_KINDS, CONFIG_CHANGE_KIND, isConfigChange } from './incidents.js';
export type {
  DiagnosticKind,
  Diagnostic,
  IncidentRecord,
  CausalChainRecord,
  RootCauseRecord,
  RunMetadata,
  RunResult
} from './result.js';
