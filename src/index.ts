/**
 * Root cause analysis engine: service graph construction, threshold-based
 * incident detection, causal chain tracing and root cause ranking.
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './graph/index.js';
export * from './anomalyDetection/index.js';
export * from './analysis/index.js';
export * from './summary/index.js';
export * from './engine/index.js';
export {
  RcaError,
  ConfigurationError,
  ResourceLimitExceededError,
  RecoverableRcaError,
  InputValidationError,
  GraphInconsistencyError,
  SymptomResolutionError
} from './utils/errors.js';
export type { ResourceLimit } from './utils/errors.js';
export {
  DiagnosticLog,
  createErrorResponse,
  handleError,
  isErrorResponse,
  withErrorHandling
} from './utils/errorHandling.js';
export type { ErrorResponse } from './utils/errorHandling.js';
export { RunBudget } from './utils/runBudget.js';
export type { Clock } from './utils/runBudget.js';
export { RawEventSchema, SpanHintSchema, toEpochMs } from './schemas/eventSchemas.js';
export type { RawEvent, RawSpanHint } from './schemas/eventSchemas.js';
