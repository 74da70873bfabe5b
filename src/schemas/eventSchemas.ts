/**
 * Zod schemas for the normalized events and span hints handed to the engine
 */

import { z } from 'zod';
import type { Severity } from '../types/events.js';

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const HAS_TIME = /T\d{2}:\d{2}/;

/**
 * Convert an ISO-8601 string, epoch milliseconds or Date to UTC epoch ms.
 * Date-time strings without a zone are read as UTC.
 */
export function toEpochMs(value: string | number | Date): number | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isFinite(ms) ? ms : null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const text = value.trim();
  if (text === '') {
    return null;
  }
  const normalized = HAS_TIME.test(text) && !ZONE_SUFFIX.test(text) ? `${text}Z` : text;
  const ms = Date.parse(normalized);
  return Number.isFinite(ms) ? ms : null;
}

export const TimestampSchema = z
  .union([z.string(), z.number(), z.date()])
  .transform((value, ctx) => {
    const ms = toEpochMs(value);
    if (ms === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
      return z.NEVER;
    }
    return ms;
  });

const SEVERITY_ALIASES: Record<string, Severity> = {
  DEBUG: 'DEBUG',
  TRACE: 'DEBUG',
  INFO: 'INFO',
  WARN: 'WARN',
  WARNING: 'WARN',
  ERROR: 'ERROR',
  CRITICAL: 'CRITICAL',
  FATAL: 'CRITICAL'
};

export const SeveritySchema = z
  .string()
  .transform((value, ctx) => {
    const severity = SEVERITY_ALIASES[value.trim().toUpperCase()];
    if (!severity) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown severity "${value}"` });
      return z.NEVER;
    }
    return severity;
  });

const NonEmptyString = z.string().trim().min(1);

export const MetricSampleSchema = z.object({
  name: NonEmptyString,
  value: z.number().finite(),
  unit: z.string().optional()
});

export const ConfigChangeSchema = z.object({
  changeType: z.enum(['config', 'deployment', 'scaling', 'other']).default('config'),
  description: z.string().default(''),
  versionBefore: z.string().optional(),
  versionAfter: z.string().optional(),
  changedBy: z.string().optional()
});

export const SpanRefSchema = z.object({
  traceId: NonEmptyString,
  spanId: NonEmptyString,
  parentSpanId: NonEmptyString.optional()
});

export const RawEventSchema = z.object({
  id: NonEmptyString.optional(),
  timestamp: TimestampSchema,
  service: NonEmptyString,
  severity: SeveritySchema.default('INFO'),
  message: z.string().default(''),
  correlationId: NonEmptyString.optional(),
  latencyMs: z.number().finite().nonnegative().optional(),
  errorCode: z.string().optional(),
  metric: MetricSampleSchema.optional(),
  configChange: ConfigChangeSchema.optional(),
  span: SpanRefSchema.optional()
});

export const SpanHintSchema = z.object({
  traceId: NonEmptyString,
  spanId: NonEmptyString,
  parentSpanId: NonEmptyString.optional(),
  service: NonEmptyString,
  timestamp: TimestampSchema
});

export type RawEvent = z.input<typeof RawEventSchema>;
export type RawSpanHint = z.input<typeof SpanHintSchema>;

/**
 * Render zod issues as `path: message` pairs joined by `; `
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
