import { logger } from './logger.js';
import { RcaError, RecoverableRcaError } from './errors.js';
import type { Diagnostic } from '../types/result.js';

/**
 * Standard error response for callers that want a value instead of a throw
 */
export interface ErrorResponse {
  error: true;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
}

/**
 * Creates a standardized error response object
 * @param message Error message
 * @param details Additional error details
 * @param code Error code
 */
export function createErrorResponse(
  message: string,
  details?: Record<string, unknown>,
  code?: string
): ErrorResponse {
  return {
    error: true,
    message,
    details,
    code
  };
}

/**
 * Handles errors in a consistent way across the codebase
 * @param error Error object or string
 * @param context Additional context for the error
 */
export function handleError(error: unknown, context?: string): ErrorResponse {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const contextPrefix = context ? `[${context}] ` : '';
  const fullMessage = `${contextPrefix}${errorMessage}`;

  logger.error(fullMessage);

  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }

  if (error instanceof RcaError) {
    return createErrorResponse(fullMessage, errorDetails(error), error.code);
  }

  return createErrorResponse(
    fullMessage,
    error instanceof Error ? { stack: error.stack } : undefined
  );
}

function errorDetails(error: RcaError): Record<string, unknown> {
  const details: Record<string, unknown> = { name: error.name };
  for (const [key, value] of Object.entries(error)) {
    if (key !== 'code' && key !== 'message' && key !== 'stack') {
      details[key] = value;
    }
  }
  return details;
}

/**
 * Checks if a response is an error response
 */
export function isErrorResponse(response: unknown): response is ErrorResponse {
  return response !== null &&
         typeof response === 'object' &&
         'error' in response &&
         response.error === true;
}

/**
 * Wraps an async function with error handling
 * @param fn Async function to wrap
 * @param context Context for error logging
 */
export function withErrorHandling<T, Args extends unknown[]>(
  fn: (...args: Args) => Promise<T>,
  context?: string
): (...args: Args) => Promise<T | ErrorResponse> {
  return async (...args: Args) => {
    try {
      return await fn(...args);
    } catch (error) {
      return handleError(error, context);
    }
  };
}

/**
 * Collects recoverable problems met during a run, in discovery order
 */
export class DiagnosticLog {
  private entries: Diagnostic[] = [];

  record(error: RecoverableRcaError): void {
    logger.warn(`[Diagnostics] ${error.kind}: ${error.message}`, error.context);
    this.entries.push(error.toDiagnostic());
  }

  hasEntries(): boolean {
    return this.entries.length > 0;
  }

  count(kind?: Diagnostic['kind']): number {
    return kind ? this.entries.filter(entry => entry.kind === kind).length : this.entries.length;
  }

  getEntries(): Diagnostic[] {
    return this.entries.map(entry => ({ ...entry, context: { ...entry.context } }));
  }
}
