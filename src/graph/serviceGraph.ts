import type { DependencyEdge, EdgeConfidence, ServiceGraphSnapshot } from '../types/graph.js';

function edgeKey(source: string, target: string): string {
  return `${source}\u0000${target}`;
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Directed service dependency graph.
 *
 * Nodes and edges live in maps keyed by service id (and by the
 * `source, target` pair for edges); adjacency is kept as id sets, so
 * traversal state never lives on the graph itself. An edge A→B means
 * "A calls B".
 */
export class ServiceGraph {
  private readonly nodes = new Set<string>();
  private readonly edges = new Map<string, DependencyEdge>();
  private readonly outgoing = new Map<string, Set<string>>();

  /**
   * Add a node the first time a service id is seen
   */
  addNode(service: string): void {
    if (!this.nodes.has(service)) {
      this.nodes.add(service);
      this.outgoing.set(service, new Set());
    }
  }

  hasNode(service: string): boolean {
    return this.nodes.has(service);
  }

  /**
   * Record one observation of `source → target`. Repeated observations of
   * the same pair merge into one edge: the counter grows, the seen range
   * widens and an `observed` sighting upgrades an `inferred` edge.
   */
  recordEdge(source: string, target: string, seenFrom: number, seenTo: number, confidence: EdgeConfidence): DependencyEdge {
    this.addNode(source);
    this.addNode(target);

    const key = edgeKey(source, target);
    const existing = this.edges.get(key);
    if (existing) {
      existing.evidenceCount += 1;
      existing.firstSeen = Math.min(existing.firstSeen, seenFrom);
      existing.lastSeen = Math.max(existing.lastSeen, seenTo);
      if (confidence === 'observed') {
        existing.confidence = 'observed';
      }
      return existing;
    }

    const edge: DependencyEdge = {
      source,
      target,
      evidenceCount: 1,
      firstSeen: Math.min(seenFrom, seenTo),
      lastSeen: Math.max(seenFrom, seenTo),
      confidence
    };
    this.edges.set(key, edge);
    this.outgoing.get(source)?.add(target);
    return edge;
  }

  getEdge(source: string, target: string): DependencyEdge | undefined {
    return this.edges.get(edgeKey(source, target));
  }

  hasEdge(source: string, target: string): boolean {
    return this.edges.has(edgeKey(source, target));
  }

  /**
   * Services `service` calls, sorted by name
   */
  getDependencies(service: string): string[] {
    return [...(this.outgoing.get(service) ?? [])].sort(byName);
  }

  getNodes(): string[] {
    return [...this.nodes].sort(byName);
  }

  getEdges(): DependencyEdge[] {
    return [...this.edges.values()]
      .sort((a, b) => byName(a.source, b.source) || byName(a.target, b.target))
      .map(edge => ({ ...edge }));
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  toSnapshot(): ServiceGraphSnapshot {
    return {
      nodes: this.getNodes(),
      edges: this.getEdges().map(edge => ({
        source: edge.source,
        target: edge.target,
        evidenceCount: edge.evidenceCount,
        confidence: edge.confidence,
        firstSeen: new Date(edge.firstSeen).toISOString(),
        lastSeen: new Date(edge.lastSeen).toISOString()
      }))
    };
  }
}

export { byName };
