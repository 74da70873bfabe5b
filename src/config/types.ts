/**
 * Configuration types for the RCA engine
 */

export interface CountWindowThreshold {
  /** Minimum number of qualifying samples inside the window */
  count: number;
  windowSec: number;
}

export interface LatencySpikeThreshold extends CountWindowThreshold {
  ceilingMs: number;
  /** Substrings of metric names that carry latency samples in ms */
  metricPatterns: string[];
}

export interface ResourceExhaustionThreshold extends CountWindowThreshold {
  percent: number;
  /** Substrings of metric names that carry utilization samples in percent */
  metricPatterns: string[];
}

export interface ConfigChangeThreshold {
  windowSec: number;
}

export interface ThresholdConfig {
  errorSpike: CountWindowThreshold;
  latencySpike: LatencySpikeThreshold;
  resourceExhaustion: ResourceExhaustionThreshold;
  configChange: ConfigChangeThreshold;
}

export interface RankingWeights {
  severity: number;
  distance: number;
  temporal: number;
  evidence: number;
}

export interface GraphConfig {
  /** Max gap between two events sharing a correlation id to pair them */
  correlationDeltaSec: number;
}

export interface RunLimits {
  maxEvents: number;
  maxProcessingMs: number;
}

export interface RankingConfig {
  topN?: number;
  /** Stop tracing after this many chains; unset traces every branch */
  maxChains?: number;
}

export interface RcaConfig {
  thresholds: ThresholdConfig;
  weights: RankingWeights;
  correlationHorizonSec: number;
  graph: GraphConfig;
  limits: RunLimits;
  ranking: RankingConfig;
}

export type ThresholdPreset = 'normal' | 'strict' | 'relaxed';

export interface ConfigOverrides {
  thresholds?: {
    errorSpike?: Partial<CountWindowThreshold>;
    latencySpike?: Partial<LatencySpikeThreshold>;
    resourceExhaustion?: Partial<ResourceExhaustionThreshold>;
    configChange?: Partial<ConfigChangeThreshold>;
  };
  weights?: Partial<RankingWeights>;
  correlationHorizonSec?: number;
  graph?: Partial<GraphConfig>;
  limits?: Partial<RunLimits>;
  ranking?: Partial<RankingConfig>;
}

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * The immutable configuration object passed into every component of a run
 */
export type ResolvedConfig = DeepReadonly<RcaConfig>;
