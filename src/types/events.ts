/**
 * Normalized observability events consumed by the engine.
 *
 * Ingestion collaborators turn raw logs, metrics, traces and config-change
 * records into these shapes. Once the engine has validated an event it is
 * treated as immutable.
 */

export type Severity = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export type ConfigChangeType = 'config' | 'deployment' | 'scaling' | 'other';

export interface MetricSample {
  name: string;
  value: number;
  unit?: string;
}

export interface ConfigChangeDescriptor {
  changeType: ConfigChangeType;
  description: string;
  versionBefore?: string;
  versionAfter?: string;
  changedBy?: string;
}

/**
 * Trace parentage attached to an event
 */
export interface SpanRef {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
}

export interface NormalizedEvent {
  readonly id: string;
  /** UTC epoch milliseconds */
  readonly timestamp: number;
  readonly service: string;
  readonly severity: Severity;
  readonly message: string;
  readonly correlationId?: string;
  readonly latencyMs?: number;
  readonly errorCode?: string;
  readonly metric?: Readonly<MetricSample>;
  readonly configChange?: Readonly<ConfigChangeDescriptor>;
  readonly span?: Readonly<SpanRef>;
}

/**
 * A trace span reduced to what the graph builder needs
 */
export interface SpanHint {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly service: string;
  /** UTC epoch milliseconds */
  readonly timestamp: number;
}

export function isErrorEvent(event: NormalizedEvent): boolean {
  return event.severity === 'ERROR' || event.severity === 'CRITICAL';
}
