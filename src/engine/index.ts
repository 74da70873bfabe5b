export { RcaEngine } from './rcaEngine.js';
export type { RcaEngineOptions, RcaRunInput } from './rcaEngine.js';
export { normalizeInput, compareEvents } from './inputNormalizer.js';
export type { NormalizedInput } from './inputNormalizer.js';
export {
  aggregateRun,
  generateIncidentTimeline,
  toIncidentRecord,
  toChainRecord,
  toRootCauseRecord
} from './runAggregator.js';
export type { AggregationInput, RunCounts } from './runAggregator.js';
