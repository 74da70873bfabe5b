import { ConfigOverrides, ResolvedConfig } from './types.js';
import { ConfigOverridesSchema } from '../schemas/configSchemas.js';
import { logger } from '../utils/logger.js';

/**
 * Validation errors collection
 */
export class ValidationErrors {
  private errors: string[] = [];

  add(error: string): void {
    this.errors.push(error);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getErrors(): string[] {
    return [...this.errors];
  }

  toString(): string {
    return this.errors.join('; ');
  }
}

function requirePositive(value: number, name: string, errors: ValidationErrors): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.add(`${name} must be a positive number`);
  }
}

function requireCount(value: number, name: string, errors: ValidationErrors): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.add(`${name} must be an integer of at least 1`);
  }
}

function requirePatterns(patterns: readonly string[], name: string, errors: ValidationErrors): void {
  if (patterns.length === 0) {
    errors.add(`${name} must list at least one metric name pattern`);
  } else if (patterns.some(pattern => pattern.trim() === '')) {
    errors.add(`${name} cannot contain empty patterns`);
  }
}

/**
 * Validate per-kind detection thresholds
 */
function validateThresholds(config: ResolvedConfig, errors: ValidationErrors): void {
  const { errorSpike, latencySpike, resourceExhaustion, configChange } = config.thresholds;

  requireCount(errorSpike.count, 'thresholds.errorSpike.count', errors);
  requirePositive(errorSpike.windowSec, 'thresholds.errorSpike.windowSec', errors);

  requireCount(latencySpike.count, 'thresholds.latencySpike.count', errors);
  requirePositive(latencySpike.windowSec, 'thresholds.latencySpike.windowSec', errors);
  requirePositive(latencySpike.ceilingMs, 'thresholds.latencySpike.ceilingMs', errors);
  requirePatterns(latencySpike.metricPatterns, 'thresholds.latencySpike.metricPatterns', errors);

  requireCount(resourceExhaustion.count, 'thresholds.resourceExhaustion.count', errors);
  requirePositive(resourceExhaustion.windowSec, 'thresholds.resourceExhaustion.windowSec', errors);
  requirePatterns(resourceExhaustion.metricPatterns, 'thresholds.resourceExhaustion.metricPatterns', errors);
  if (!Number.isFinite(resourceExhaustion.percent) || resourceExhaustion.percent <= 0 || resourceExhaustion.percent > 100) {
    errors.add('thresholds.resourceExhaustion.percent must be within (0, 100]');
  }

  requirePositive(configChange.windowSec, 'thresholds.configChange.windowSec', errors);
}

/**
 * Validate ranking weights
 */
function validateWeights(config: ResolvedConfig, errors: ValidationErrors): void {
  const entries = Object.entries(config.weights);
  for (const [name, value] of entries) {
    if (!Number.isFinite(value) || value < 0) {
      errors.add(`weights.${name} must be a non-negative number`);
    }
  }

  if (entries.every(([, value]) => value === 0)) {
    errors.add('weights cannot all be zero');
  }
}

/**
 * Validate correlation settings, run limits and ranking options
 */
function validateRun(config: ResolvedConfig, errors: ValidationErrors): void {
  requirePositive(config.correlationHorizonSec, 'correlationHorizonSec', errors);

  if (!Number.isFinite(config.graph.correlationDeltaSec) || config.graph.correlationDeltaSec < 0) {
    errors.add('graph.correlationDeltaSec must be a non-negative number');
  }

  requireCount(config.limits.maxEvents, 'limits.maxEvents', errors);
  requirePositive(config.limits.maxProcessingMs, 'limits.maxProcessingMs', errors);

  if (config.ranking.topN !== undefined) {
    requireCount(config.ranking.topN, 'ranking.topN', errors);
  }
  if (config.ranking.maxChains !== undefined) {
    requireCount(config.ranking.maxChains, 'ranking.maxChains', errors);
  }
}

/**
 * Validate a complete configuration
 */
export function validateConfig(config: ResolvedConfig): ValidationErrors {
  const errors = new ValidationErrors();

  validateThresholds(config, errors);
  validateWeights(config, errors);
  validateRun(config, errors);

  if (errors.hasErrors()) {
    logger.error('Configuration validation failed', { errors: errors.getErrors() });
  }

  return errors;
}

/**
 * Validate the shape of configuration overrides: unknown keys and values of
 * the wrong type are reported before anything is merged.
 */
export function validateOverrides(overrides: unknown): ValidationErrors {
  const errors = new ValidationErrors();
  const parsed = ConfigOverridesSchema.safeParse(overrides);

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const path = issue.path.join('.');
      errors.add(path ? `${path}: ${issue.message}` : issue.message);
    }
  }

  return errors;
}

export function isConfigOverrides(overrides: unknown): overrides is ConfigOverrides {
  return ConfigOverridesSchema.safeParse(overrides).success;
}
