export type EdgeConfidence = 'observed' | 'inferred';

export interface DependencyEdge {
  readonly source: string;
  readonly target: string;
  evidenceCount: number;
  /** UTC epoch milliseconds */
  firstSeen: number;
  lastSeen: number;
  confidence: EdgeConfidence;
}

/**
 * Serializable view of the service graph handed to reporting collaborators
 */
export interface ServiceGraphSnapshot {
  nodes: string[];
  edges: Array<{
    source: string;
    target: string;
    evidenceCount: number;
    confidence: EdgeConfidence;
    firstSeen: string;
    lastSeen: string;
  }>;
}
