import type { Incident, SymptomSpec } from '../types/incidents.js';
import type { RunResult } from '../types/result.js';
import type { ResolvedConfig } from '../config/types.js';
import { ConfigLoader } from '../config/loader.js';
import { defaultConfig } from '../config/defaults.js';
import { GraphBuilder } from '../graph/graphBuilder.js';
import { AnomalyDetector } from '../anomalyDetection/index.js';
import { DetectorRegistry, createDefaultRegistry } from '../anomalyDetection/registry.js';
import { CausalChainTracer } from '../analysis/causalChainTracer.js';
import { RootCauseRanker } from '../analysis/rootCauseRanker.js';
import type { RcaSummarizer } from '../summary/types.js';
import { normalizeInput } from './inputNormalizer.js';
import { aggregateRun } from './runAggregator.js';
import { DiagnosticLog, ErrorResponse, withErrorHandling } from '../utils/errorHandling.js';
import { GraphInconsistencyError } from '../utils/errors.js';
import { Clock, RunBudget } from '../utils/runBudget.js';
import { logger } from '../utils/logger.js';

export interface RcaRunInput {
  /** Normalized event records; validated here, invalid ones are skipped */
  events: readonly unknown[];
  spanHints?: readonly unknown[];
  symptom: SymptomSpec;
}

export interface RcaEngineOptions {
  config?: ResolvedConfig;
  registry?: DetectorRegistry;
  summarizer?: RcaSummarizer;
  clock?: Clock;
}

/**
 * Runs one root cause analysis over a fully materialized set of events.
 *
 * Fatal problems (configuration, resource limits) reject the run with no
 * result; recoverable ones end up in `diagnostics`.
 */
export class RcaEngine {
  private readonly config: ResolvedConfig;
  private readonly registry: DetectorRegistry;
  private readonly summarizer?: RcaSummarizer;
  private readonly clock?: Clock;

  constructor(options: RcaEngineOptions = {}) {
    this.config = options.config ?? defaultConfig;
    this.registry = options.registry ?? createDefaultRegistry();
    this.summarizer = options.summarizer;
    this.clock = options.clock;
  }

  async run(input: RcaRunInput): Promise<RunResult> {
    const config = ConfigLoader.validate(this.config);
    const budget = new RunBudget(config.limits, this.clock);
    budget.checkEventCount(input.events.length);

    logger.info('[RcaEngine] Starting run', {
      events: input.events.length,
      spanHints: input.spanHints?.length ?? 0,
      symptom: input.symptom.service
    });

    const diagnostics = new DiagnosticLog();
    const normalized = normalizeInput(input.events, input.spanHints ?? [], diagnostics);
    budget.check('ingestion');

    const builder = new GraphBuilder(config, diagnostics, budget);
    const detector = new AnomalyDetector(config, this.registry, budget);

    // Graph construction and detection only read the events; join both before tracing
    const [graph, detected] = await Promise.all([
      Promise.resolve().then(() => builder.build({ events: normalized.events, spanHints: normalized.spanHints })),
      detector.detect(normalized.events)
    ]);

    const incidents: Incident[] = [];
    for (const incident of detected) {
      if (graph.hasNode(incident.service)) {
        incidents.push(incident);
      } else {
        diagnostics.record(new GraphInconsistencyError(
          `Incident ${incident.id} references unknown service ${incident.service}`,
          { incidentId: incident.id, service: incident.service }
        ));
      }
    }

    const tracer = new CausalChainTracer(config, diagnostics, budget);
    const { anchor, chains } = tracer.trace(graph, incidents, input.symptom);

    const ranker = new RootCauseRanker(config, budget);
    const candidates = anchor ? ranker.rank(chains, anchor, incidents) : [];

    const result = aggregateRun({
      graph,
      incidents,
      chains,
      candidates,
      symptom: input.symptom,
      anchor,
      diagnostics: diagnostics.getEntries(),
      counts: {
        receivedEvents: input.events.length,
        validEvents: normalized.events.length,
        skippedEvents: normalized.skippedEvents,
        spanHints: normalized.spanHints.length
      }
    });

    if (this.summarizer) {
      result.summary = await this.summarizer.summarize(graph, candidates, input.symptom, chains);
    }

    budget.check('aggregation');

    logger.info('[RcaEngine] Run complete', {
      elapsedMs: Math.round(budget.elapsedMs()),
      ...result.metadata,
      diagnostics: result.diagnostics.length
    });

    return result;
  }

  /**
   * Like `run`, but reports fatal errors as an ErrorResponse value
   */
  tryRun(input: RcaRunInput): Promise<RunResult | ErrorResponse> {
    return withErrorHandling((runInput: RcaRunInput) => this.run(runInput), 'RcaEngine')(input);
  }
}
