import { RcaConfig, ThresholdConfig, ThresholdPreset } from './types.js';

const LATENCY_METRIC_PATTERNS = ['latency', 'duration', 'response_time'];

const RESOURCE_METRIC_PATTERNS = [
  'cpu',
  'memory',
  'disk',
  'utilization',
  'usage',
  'saturation',
  'connections',
  'pool'
];

/**
 * Default configuration values
 */
export const defaultConfig: RcaConfig = {
  thresholds: {
    errorSpike: {
      count: 3,
      windowSec: 300
    },
    latencySpike: {
      count: 2,
      windowSec: 300,
      ceilingMs: 1000,
      metricPatterns: LATENCY_METRIC_PATTERNS
    },
    resourceExhaustion: {
      count: 2,
      windowSec: 300,
      percent: 90,
      metricPatterns: RESOURCE_METRIC_PATTERNS
    },
    configChange: {
      windowSec: 600
    }
  },
  weights: {
    severity: 0.25,
    distance: 0.25,
    temporal: 0.25,
    evidence: 0.25
  },
  correlationHorizonSec: 600,
  graph: {
    correlationDeltaSec: 5
  },
  limits: {
    maxEvents: 1_000_000,
    maxProcessingMs: 30_000
  },
  ranking: {}
};

/**
 * Threshold presets. `strict` reacts to smaller anomalies, `relaxed` only
 * to larger ones.
 */
export const thresholdPresets: Record<ThresholdPreset, ThresholdConfig> = {
  normal: defaultConfig.thresholds,
  strict: {
    errorSpike: { count: 2, windowSec: 180 },
    latencySpike: { count: 1, windowSec: 300, ceilingMs: 500, metricPatterns: LATENCY_METRIC_PATTERNS },
    resourceExhaustion: { count: 1, windowSec: 300, percent: 80, metricPatterns: RESOURCE_METRIC_PATTERNS },
    configChange: { windowSec: 900 }
  },
  relaxed: {
    errorSpike: { count: 5, windowSec: 600 },
    latencySpike: { count: 3, windowSec: 300, ceilingMs: 2000, metricPatterns: LATENCY_METRIC_PATTERNS },
    resourceExhaustion: { count: 3, windowSec: 300, percent: 95, metricPatterns: RESOURCE_METRIC_PATTERNS },
    configChange: { windowSec: 300 }
  }
};
