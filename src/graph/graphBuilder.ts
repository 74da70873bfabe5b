import type { NormalizedEvent, SpanHint } from '../types/events.js';
import type { ResolvedConfig } from '../config/types.js';
import { ServiceGraph, byName } from './serviceGraph.js';
import { DiagnosticLog } from '../utils/errorHandling.js';
import { GraphInconsistencyError } from '../utils/errors.js';
import { RunBudget } from '../utils/runBudget.js';
import { logger } from '../utils/logger.js';

export interface GraphBuildInput {
  /** Validated events ordered by timestamp, then service name */
  events: readonly NormalizedEvent[];
  spanHints?: readonly SpanHint[];
}

function compareSpans(a: SpanHint, b: SpanHint): number {
  return a.timestamp - b.timestamp
    || byName(a.service, b.service)
    || byName(a.traceId, b.traceId)
    || byName(a.spanId, b.spanId);
}

/**
 * Builds the service dependency graph from events and trace span hints.
 *
 * Span parentage gives `observed` edges from the parent span's service to
 * the child's. Events without span data that share a correlation id are
 * paired in time order and give `inferred` edges from the earlier event's
 * service to the later one's.
 */
export class GraphBuilder {
  constructor(
    private readonly config: ResolvedConfig,
    private readonly diagnostics: DiagnosticLog,
    private readonly budget?: RunBudget
  ) {}

  build(input: GraphBuildInput): ServiceGraph {
    const graph = new ServiceGraph();

    for (const event of input.events) {
      graph.addNode(event.service);
    }

    const spans = this.collectSpans(input);
    const observed = this.addSpanEdges(graph, spans);
    const inferred = this.addCorrelationEdges(graph, input.events);

    logger.info('[GraphBuilder] Built service graph', {
      nodes: graph.nodeCount,
      edges: graph.edgeCount,
      observedLinks: observed,
      inferredLinks: inferred
    });

    return graph;
  }

  /**
   * Span hints given separately plus the ones carried on events
   */
  private collectSpans(input: GraphBuildInput): SpanHint[] {
    const spans: SpanHint[] = [...(input.spanHints ?? [])];

    for (const event of input.events) {
      if (event.span) {
        spans.push({
          traceId: event.span.traceId,
          spanId: event.span.spanId,
          parentSpanId: event.span.parentSpanId,
          service: event.service,
          timestamp: event.timestamp
        });
      }
    }

    return spans.sort(compareSpans);
  }

  private addSpanEdges(graph: ServiceGraph, spans: SpanHint[]): number {
    const traces = new Map<string, Map<string, SpanHint>>();
    const accepted: SpanHint[] = [];

    for (const span of spans) {
      graph.addNode(span.service);

      let trace = traces.get(span.traceId);
      if (!trace) {
        trace = new Map();
        traces.set(span.traceId, trace);
      }

      const known = trace.get(span.spanId);
      if (known) {
        if (known.service !== span.service) {
          this.diagnostics.record(new GraphInconsistencyError(
            `Span ${span.spanId} in trace ${span.traceId} is reported by both ${known.service} and ${span.service}`,
            { traceId: span.traceId, spanId: span.spanId, service: span.service }
          ));
        }
        continue;
      }

      trace.set(span.spanId, span);
      accepted.push(span);
    }

    let links = 0;
    for (const span of accepted) {
      if (!span.parentSpanId) {
        continue;
      }

      if (span.parentSpanId === span.spanId) {
        this.diagnostics.record(new GraphInconsistencyError(
          `Span ${span.spanId} in trace ${span.traceId} names itself as parent`,
          { traceId: span.traceId, spanId: span.spanId }
        ));
        continue;
      }

      const parent = traces.get(span.traceId)?.get(span.parentSpanId);
      if (!parent) {
        this.diagnostics.record(new GraphInconsistencyError(
          `Span ${span.spanId} in trace ${span.traceId} references unknown parent span ${span.parentSpanId}`,
          { traceId: span.traceId, spanId: span.spanId, parentSpanId: span.parentSpanId }
        ));
        continue;
      }

      if (parent.service !== span.service) {
        graph.recordEdge(parent.service, span.service, parent.timestamp, span.timestamp, 'observed');
        links++;
      }
    }

    this.budget?.check('graph construction');
    return links;
  }

  private addCorrelationEdges(graph: ServiceGraph, events: readonly NormalizedEvent[]): number {
    const deltaMs = this.config.graph.correlationDeltaSec * 1000;
    const groups = new Map<string, NormalizedEvent[]>();

    for (const event of events) {
      if (event.span || !event.correlationId) {
        continue;
      }
      const group = groups.get(event.correlationId);
      if (group) {
        group.push(event);
      } else {
        groups.set(event.correlationId, [event]);
      }
    }

    let links = 0;
    for (const correlationId of [...groups.keys()].sort(byName)) {
      const group = groups.get(correlationId) ?? [];

      for (let i = 1; i < group.length; i++) {
        const earlier = group[i - 1];
        const later = group[i];
        if (earlier.service === later.service) {
          continue;
        }
        if (later.timestamp - earlier.timestamp > deltaMs) {
          continue;
        }
        graph.recordEdge(earlier.service, later.service, earlier.timestamp, later.timestamp, 'inferred');
        links++;
        logger.debug('[GraphBuilder] Inferred dependency', {
          correlationId,
          source: earlier.service,
          target: later.service
        });
      }

      this.budget?.check('graph construction');
    }

    return links;
  }
}
