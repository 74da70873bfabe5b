export { CausalChainTracer, isTemporallyConsistent } from './causalChainTracer.js';
export type { TraceResult } from './causalChainTracer.js';
export { RootCauseRanker, clamp01 } from './rootCauseRanker.js';
export type { ScoreInputs } from './rootCauseRanker.js';
