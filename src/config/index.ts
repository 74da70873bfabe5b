/**
 * Configuration module exports
 */

export { ConfigLoader } from './loader.js';
export { defaultConfig, thresholdPresets } from './defaults.js';
export { validateConfig, validateOverrides, isConfigOverrides, ValidationErrors } from './validators.js';
export type {
  RcaConfig,
  ResolvedConfig,
  ConfigOverrides,
  ThresholdConfig,
  ThresholdPreset,
  CountWindowThreshold,
  LatencySpikeThreshold,
  ResourceExhaustionThreshold,
  ConfigChangeThreshold,
  RankingWeights,
  GraphConfig,
  RunLimits,
  RankingConfig
} from './types.js';
