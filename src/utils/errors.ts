import type { Diagnostic, DiagnosticKind } from '../types/result.js';

type DiagnosticContext = Diagnostic['context'];

/**
 * Base class for every error raised by the engine
 */
export class RcaError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'RcaError';
  }
}

/**
 * Invalid thresholds, weights or limits. Raised before any processing starts.
 */
export class ConfigurationError extends RcaError {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export type ResourceLimit = 'maxEvents' | 'maxProcessingMs';

/**
 * The run went over its event or time budget. No result is produced.
 */
export class ResourceLimitExceededError extends RcaError {
  constructor(
    public readonly limit: ResourceLimit,
    public readonly allowed: number,
    public readonly observed: number,
    public readonly stage?: string
  ) {
    super(
      `Resource limit ${limit} exceeded${stage ? ` during ${stage}` : ''}: ${observed} > ${allowed}`,
      'RESOURCE_LIMIT_EXCEEDED'
    );
    this.name = 'ResourceLimitExceededError';
  }
}

/**
 * Errors the engine recovers from; they end up in the run diagnostics
 */
export abstract class RecoverableRcaError extends RcaError {
  abstract readonly kind: DiagnosticKind;

  constructor(message: string, code: string, public readonly context: DiagnosticContext = {}) {
    super(message, code);
  }

  toDiagnostic(): Diagnostic {
    return {
      kind: this.kind,
      message: this.message,
      context: { ...this.context }
    };
  }
}

/**
 * A malformed or incomplete event. The event is skipped.
 */
export class InputValidationError extends RecoverableRcaError {
  readonly kind = 'InputValidationError' as const;

  constructor(message: string, context: DiagnosticContext = {}) {
    super(message, 'INPUT_VALIDATION_ERROR', context);
    this.name = 'InputValidationError';
  }
}

/**
 * Span parentage that cannot be resolved. The offending hint is dropped.
 */
export class GraphInconsistencyError extends RecoverableRcaError {
  readonly kind = 'GraphInconsistencyError' as const;

  constructor(message: string, context: DiagnosticContext = {}) {
    super(message, 'GRAPH_INCONSISTENCY_ERROR', context);
    this.name = 'GraphInconsistencyError';
  }
}

/**
 * The declared symptom could not be anchored on an incident
 */
export class SymptomResolutionError extends RecoverableRcaError {
  readonly kind = 'SymptomResolution' as const;

  constructor(message: string, context: DiagnosticContext = {}) {
    super(message, 'SYMPTOM_RESOLUTION', context);
    this.name = 'SymptomResolutionError';
  }
}
