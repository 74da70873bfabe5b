import type { CausalChain, RootCauseCandidate, SymptomSpec } from '../types/incidents.js';
import type { ServiceGraph } from '../graph/serviceGraph.js';

/**
 * Turns a finished analysis into human-readable text. Implementations
 * may call out to a language model; the engine works without one.
 */
export interface RcaSummarizer {
  summarize(
    graph: ServiceGraph,
    candidates: readonly RootCauseCandidate[],
    symptom: SymptomSpec,
    chains?: readonly CausalChain[]
  ): string | Promise<string>;
}
