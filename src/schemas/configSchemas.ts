/**
 * Zod schemas describing the shape of configuration overrides.
 * Range checks live in config/validators.ts.
 */

import { z } from 'zod';

const CountWindowOverrideSchema = z.object({
  count: z.number().optional(),
  windowSec: z.number().optional()
}).strict();

export const ConfigOverridesSchema = z.object({
  thresholds: z.object({
    errorSpike: CountWindowOverrideSchema.optional(),
    latencySpike: CountWindowOverrideSchema.extend({
      ceilingMs: z.number().optional(),
      metricPatterns: z.array(z.string()).optional()
    }).strict().optional(),
    resourceExhaustion: CountWindowOverrideSchema.extend({
      percent: z.number().optional(),
      metricPatterns: z.array(z.string()).optional()
    }).strict().optional(),
    configChange: z.object({
      windowSec: z.number().optional()
    }).strict().optional()
  }).strict().optional(),
  weights: z.object({
    severity: z.number().optional(),
    distance: z.number().optional(),
    temporal: z.number().optional(),
    evidence: z.number().optional()
  }).strict().optional(),
  correlationHorizonSec: z.number().optional(),
  graph: z.object({
    correlationDeltaSec: z.number().optional()
  }).strict().optional(),
  limits: z.object({
    maxEvents: z.number().optional(),
    maxProcessingMs: z.number().optional()
  }).strict().optional(),
  ranking: z.object({
    topN: z.number().optional(),
    maxChains: z.number().optional()
  }).strict().optional()
}).strict();
