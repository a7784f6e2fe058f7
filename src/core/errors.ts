/**
 * @fileoverview Lineage investigator error hierarchy
 *
 * Typed, structured errors. Three of them reach the caller of an agent run:
 * `ValidationError` for bad arguments, `QueryCancelledError` and
 * `IterationLimitError`. Provider and tool failures are recovered inside the
 * loop or folded into a failed tool result.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class LineageError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderErrorReason =
  | 'timeout'
  | 'network_error'
  | 'invalid_response';

export class ProviderError extends LineageError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly provider: string,
    readonly reason: ProviderErrorReason,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`Provider ${provider} ${reason}: ${message}`);
    this.name = 'ProviderError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends LineageError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// LOOP ERRORS
// ============================================================================

/**
 * The run executed more phases than the hard transition limit allows.
 * Only a defect in the stopping rules can cause this.
 */
export class IterationLimitError extends LineageError {
  readonly code = 'ITERATION_LIMIT_EXCEEDED';
  readonly retryable = false;

  constructor(
    readonly limit: number,
    readonly lastPhase: string,
    readonly stepCount: number,
  ) {
    super(`Agent exceeded ${limit} phase transitions (last phase: ${lastPhase}, steps: ${stepCount})`);
    this.name = 'IterationLimitError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        limit: this.limit,
        lastPhase: this.lastPhase,
        stepCount: this.stepCount,
      },
    };
  }
}

export class QueryCancelledError extends LineageError {
  readonly code = 'QUERY_CANCELLED';
  readonly retryable = true;

  constructor(readonly phase: string) {
    super(`Query cancelled before phase ${phase}`);
    this.name = 'QueryCancelledError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { phase: this.phase },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isLineageError(error: unknown): error is LineageError {
  return error instanceof LineageError;
}

export function isRetryableError(error: unknown): boolean {
  return isLineageError(error) && error.retryable;
}
