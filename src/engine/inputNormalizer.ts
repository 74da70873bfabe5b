import type { NormalizedEvent, SpanHint } from '../types/events.js';
import { RawEventSchema, SpanHintSchema, formatIssues } from '../schemas/eventSchemas.js';
import { DiagnosticLog } from '../utils/errorHandling.js';
import { InputValidationError } from '../utils/errors.js';
import { byName } from '../graph/serviceGraph.js';
import { logger } from '../utils/logger.js';

export interface NormalizedInput {
  events: NormalizedEvent[];
  spanHints: SpanHint[];
  skippedEvents: number;
  skippedSpanHints: number;
}

export function compareEvents(a: NormalizedEvent, b: NormalizedEvent): number {
  return a.timestamp - b.timestamp || byName(a.service, b.service) || byName(a.id, b.id);
}

/**
 * Validate raw events and span hints, assign missing event ids and order
 * the events by timestamp, service and id.
 */
export function normalizeInput(
  rawEvents: readonly unknown[],
  rawSpanHints: readonly unknown[],
  diagnostics: DiagnosticLog
): NormalizedInput {
  const events: NormalizedEvent[] = [];
  const seenIds = new Set<string>();
  let skippedEvents = 0;

  rawEvents.forEach((raw, index) => {
    const parsed = RawEventSchema.safeParse(raw);
    if (!parsed.success) {
      skippedEvents++;
      diagnostics.record(new InputValidationError(
        `Event at index ${index} is invalid: ${formatIssues(parsed.error)}`,
        { index, issues: formatIssues(parsed.error) }
      ));
      return;
    }

    const { id, ...fields } = parsed.data;
    const eventId = id ?? `evt-${index}`;
    if (seenIds.has(eventId)) {
      skippedEvents++;
      diagnostics.record(new InputValidationError(
        `Event at index ${index} repeats id ${eventId}`,
        { index, id: eventId }
      ));
      return;
    }

    seenIds.add(eventId);
    events.push({ id: eventId, ...fields });
  });

  events.sort(compareEvents);

  const spanHints: SpanHint[] = [];
  let skippedSpanHints = 0;

  rawSpanHints.forEach((raw, index) => {
    const parsed = SpanHintSchema.safeParse(raw);
    if (!parsed.success) {
      skippedSpanHints++;
      diagnostics.record(new InputValidationError(
        `Span hint at index ${index} is invalid: ${formatIssues(parsed.error)}`,
        { spanHintIndex: index, issues: formatIssues(parsed.error) }
      ));
      return;
    }
    spanHints.push(parsed.data);
  });

  logger.info('[InputNormalizer] Normalized input', {
    received: rawEvents.length,
    valid: events.length,
    skipped: skippedEvents,
    spanHints: spanHints.length
  });

  return { events, spanHints, skippedEvents, skippedSpanHints };
}
