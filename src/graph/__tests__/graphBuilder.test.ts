import { describe, it, expect } from 'vitest';
import { GraphBuilder } from '../graphBuilder.js';
import { ConfigLoader } from '../../config/loader.js';
import { DiagnosticLog } from '../../utils/errorHandling.js';
import { compareEvents } from '../../engine/inputNormalizer.js';
import type { NormalizedEvent, SpanHint } from '../../types/events.js';

const at = (second: number): number => Date.UTC(2024, 0, 1, 10, 0, second);

function event(id: string, service: string, second: number, extra: Partial<NormalizedEvent> = {}): NormalizedEvent {
  return { id, service, timestamp: at(second), severity: 'ERROR', message: '', ...extra };
}

function build(events: NormalizedEvent[], spanHints: SpanHint[] = []) {
  const diagnostics = new DiagnosticLog();
  const builder = new GraphBuilder(ConfigLoader.load(), diagnostics);
  const graph = builder.build({ events: [...events].sort(compareEvents), spanHints });
  return { graph, diagnostics };
}

describe('GraphBuilder', () => {
  it('should create one node per distinct service', () => {
    const { graph } = build([
      event('e1', 'orders', 0),
      event('e2', 'payments', 1),
      event('e3', 'orders', 2),
      event('e4', 'inventory', 3)
    ]);
    expect(graph.getNodes()).toEqual(['inventory', 'orders', 'payments']);
    expect(graph.edgeCount).toBe(0);
  });

  it('should infer an edge from the earlier to the later correlated event', () => {
    const { graph } = build([
      event('e1', 'web', 0, { correlationId: 'req-1' }),
      event('e2', 'api', 2, { correlationId: 'req-1' })
    ]);
    expect(graph.getEdges()).toEqual([
      { source: 'web', target: 'api', evidenceCount: 1, firstSeen: at(0), lastSeen: at(2), confidence: 'inferred' }
    ]);
  });

  it('should break timestamp ties by service name', () => {
    const { graph } = build([
      event('e1', 'zeta', 0, { correlationId: 'req-1' }),
      event('e2', 'alpha', 0, { correlationId: 'req-1' })
    ]);
    expect(graph.hasEdge('alpha', 'zeta')).toBe(true);
    expect(graph.hasEdge('zeta', 'alpha')).toBe(false);
  });

  it('should not pair correlated events further apart than the delta', () => {
    const { graph } = build([
      event('e1', 'web', 0, { correlationId: 'req-1' }),
      event('e2', 'api', 6, { correlationId: 'req-1' })
    ]);
    expect(graph.edgeCount).toBe(0);
  });

  it('should only pair adjacent events of a correlation group', () => {
    const { graph } = build([
      event('e1', 'gateway', 0, { correlationId: 'req-1' }),
      event('e2', 'users', 1, { correlationId: 'req-1' }),
      event('e3', 'db', 2, { correlationId: 'req-1' })
    ]);
    expect(graph.getEdges().map(edge => `${edge.source}->${edge.target}`)).toEqual(['gateway->users', 'users->db']);
  });

  it('should merge repeated observations of the same pair', () => {
    const { graph } = build([
      event('e1', 'web', 0, { correlationId: 'req-1' }),
      event('e2', 'api', 1, { correlationId: 'req-1' }),
      event('e3', 'web', 10, { correlationId: 'req-2' }),
      event('e4', 'api', 12, { correlationId: 'req-2' })
    ]);
    expect(graph.toSnapshot().edges).toEqual([
      {
        source: 'web',
        target: 'api',
        evidenceCount: 2,
        confidence: 'inferred',
        firstSeen: '2024-01-01T10:00:00.000Z',
        lastSeen: '2024-01-01T10:00:12.000Z'
      }
    ]);
  });

  it('should record observed edges from span parentage and upgrade inferred ones', () => {
    const { graph, diagnostics } = build(
      [
        event('e1', 'gateway', 0, { correlationId: 'req-1' }),
        event('e2', 'orders', 1, { correlationId: 'req-1' })
      ],
      [
        { traceId: 't1', spanId: 's1', service: 'gateway', timestamp: at(0) },
        { traceId: 't1', spanId: 's2', parentSpanId: 's1', service: 'orders', timestamp: at(1) }
      ]
    );
    const edge = graph.getEdge('gateway', 'orders');
    expect(edge?.confidence).toBe('observed');
    expect(edge?.evidenceCount).toBe(2);
    expect(diagnostics.hasEntries()).toBe(false);
  });

  it('should read span parentage carried on events', () => {
    const { graph } = build([
      event('e1', 'orders', 0, { span: { traceId: 't1', spanId: 'a' } }),
      event('e2', 'stock', 1, { span: { traceId: 't1', spanId: 'b', parentSpanId: 'a' } })
    ]);
    expect(graph.getEdge('orders', 'stock')?.confidence).toBe('observed');
  });

  it('should drop spans whose parent is unknown', () => {
    const { graph, diagnostics } = build([], [
      { traceId: 't1', spanId: 's2', parentSpanId: 's9', service: 'orders', timestamp: at(0) }
    ]);
    expect(graph.edgeCount).toBe(0);
    expect(graph.getNodes()).toEqual(['orders']);
    expect(diagnostics.getEntries()).toEqual([
      {
        kind: 'GraphInconsistencyError',
        message: 'Span s2 in trace t1 references unknown parent span s9',
        context: { traceId: 't1', spanId: 's2', parentSpanId: 's9' }
      }
    ]);
  });

  it('should report a span id claimed by two services', () => {
    const { graph, diagnostics } = build([], [
      { traceId: 't1', spanId: 's1', service: 'orders', timestamp: at(0) },
      { traceId: 't1', spanId: 's1', service: 'stock', timestamp: at(1) },
      { traceId: 't1', spanId: 's2', parentSpanId: 's1', service: 'db', timestamp: at(2) }
    ]);
    expect(diagnostics.count('GraphInconsistencyError')).toBe(1);
    expect(diagnostics.getEntries()[0].message).toBe('Span s1 in trace t1 is reported by both orders and stock');
    expect(graph.getEdges().map(edge => `${edge.source}->${edge.target}`)).toEqual(['orders->db']);
  });

  it('should not create an edge between spans of the same service', () => {
    const { graph } = build([], [
      { traceId: 't1', spanId: 's1', service: 'orders', timestamp: at(0) },
      { traceId: 't1', spanId: 's2', parentSpanId: 's1', service: 'orders', timestamp: at(1) }
    ]);
    expect(graph.edgeCount).toBe(0);
  });
});
