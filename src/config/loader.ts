import { ConfigOverrides, RcaConfig, ResolvedConfig, ThresholdPreset } from './types.js';
import { defaultConfig, thresholdPresets } from './defaults.js';
import { isConfigOverrides, validateConfig, validateOverrides } from './validators.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Merge overrides over a base configuration, field by field. Arrays are
 * copied so the frozen result never shares storage with the defaults.
 */
function mergeConfig(base: ResolvedConfig, overrides: ConfigOverrides): RcaConfig {
  const { errorSpike, latencySpike, resourceExhaustion, configChange } = base.thresholds;
  const t = overrides.thresholds ?? {};

  return {
    thresholds: {
      errorSpike: {
        count: t.errorSpike?.count ?? errorSpike.count,
        windowSec: t.errorSpike?.windowSec ?? errorSpike.windowSec
      },
      latencySpike: {
        count: t.latencySpike?.count ?? latencySpike.count,
        windowSec: t.latencySpike?.windowSec ?? latencySpike.windowSec,
        ceilingMs: t.latencySpike?.ceilingMs ?? latencySpike.ceilingMs,
        metricPatterns: [...(t.latencySpike?.metricPatterns ?? latencySpike.metricPatterns)]
      },
      resourceExhaustion: {
        count: t.resourceExhaustion?.count ?? resourceExhaustion.count,
        windowSec: t.resourceExhaustion?.windowSec ?? resourceExhaustion.windowSec,
        percent: t.resourceExhaustion?.percent ?? resourceExhaustion.percent,
        metricPatterns: [...(t.resourceExhaustion?.metricPatterns ?? resourceExhaustion.metricPatterns)]
      },
      configChange: {
        windowSec: t.configChange?.windowSec ?? configChange.windowSec
      }
    },
    weights: {
      severity: overrides.weights?.severity ?? base.weights.severity,
      distance: overrides.weights?.distance ?? base.weights.distance,
      temporal: overrides.weights?.temporal ?? base.weights.temporal,
      evidence: overrides.weights?.evidence ?? base.weights.evidence
    },
    correlationHorizonSec: overrides.correlationHorizonSec ?? base.correlationHorizonSec,
    graph: {
      correlationDeltaSec: overrides.graph?.correlationDeltaSec ?? base.graph.correlationDeltaSec
    },
    limits: {
      maxEvents: overrides.limits?.maxEvents ?? base.limits.maxEvents,
      maxProcessingMs: overrides.limits?.maxProcessingMs ?? base.limits.maxProcessingMs
    },
    ranking: {
      topN: overrides.ranking?.topN ?? base.ranking.topN,
      maxChains: overrides.ranking?.maxChains ?? base.ranking.maxChains
    }
  };
}

function freezeDeep(value: unknown): void {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      freezeDeep(nested);
    }
  }
}

function baseFor(preset: ThresholdPreset): RcaConfig {
  const thresholds = thresholdPresets[preset];
  return mergeConfig(defaultConfig, { thresholds });
}

/**
 * Builds the immutable configuration for a run.
 *
 * Precedence, lowest first: defaults, threshold preset, explicit overrides.
 * Nothing is read from the environment or from files.
 */
export class ConfigLoader {
  /**
   * Build and validate a configuration; throws ConfigurationError listing
   * every problem found
   */
  static load(overrides: ConfigOverrides = {}, preset: ThresholdPreset = 'normal'): ResolvedConfig {
    const overrideErrors = validateOverrides(overrides);
    if (overrideErrors.hasErrors()) {
      throw new ConfigurationError(overrideErrors.getErrors());
    }

    const config = mergeConfig(baseFor(preset), overrides);

    const errors = validateConfig(config);
    if (errors.hasErrors()) {
      throw new ConfigurationError(errors.getErrors());
    }

    freezeDeep(config);

    logger.debug('Configuration resolved', { preset, correlationHorizonSec: config.correlationHorizonSec });
    return config;
  }

  /**
   * Same as `load` for overrides of unknown shape, e.g. parsed JSON
   */
  static fromUnknown(raw: unknown, preset: ThresholdPreset = 'normal'): ResolvedConfig {
    const overrideErrors = validateOverrides(raw);
    if (overrideErrors.hasErrors() || !isConfigOverrides(raw)) {
      throw new ConfigurationError(overrideErrors.getErrors());
    }
    return this.load(raw, preset);
  }

  /**
   * Validate a configuration produced elsewhere; returns it frozen
   */
  static validate(config: ResolvedConfig): ResolvedConfig {
    const errors = validateConfig(config);
    if (errors.hasErrors()) {
      throw new ConfigurationError(errors.getErrors());
    }
    const copy = mergeConfig(config, {});
    freezeDeep(copy);
    return copy;
  }
}
