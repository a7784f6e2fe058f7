/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import {
  IterationLimitError,
  ProviderError,
  QueryCancelledError,
  ValidationError,
} from '../core/errors.js';
import { TimeoutError } from '../utils/async.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'INVALID_CONFIG'
  | 'NOT_SEEDED'
  | 'PROVIDER_UNAVAILABLE'
  | 'STORAGE_ERROR'
  | 'QUERY_FAILED'
  | 'CANCELLED'
  | 'TIMEOUT';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `lineage help <command>` for usage information.',
  INVALID_CONFIG: 'Check the LINEAGE_* and OLLAMA_BASE_URL environment variables.',
  NOT_SEEDED: 'Run `lineage seed` first to load the sample lineage.',
  PROVIDER_UNAVAILABLE: 'Make sure Ollama is running and OLLAMA_BASE_URL points at it.',
  STORAGE_ERROR: 'Check that LINEAGE_DB_PATH points at a writable location.',
  QUERY_FAILED: 'Try a simpler question or lower --max-steps.',
  CANCELLED: 'The question was cancelled before an answer was produced.',
  TIMEOUT: 'Increase LINEAGE_LLM_TIMEOUT_MS or LINEAGE_TOOL_TIMEOUT_MS.',
};

/** Every CLI failure exits with this code. */
export const EXIT_FAILURE = 1;

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map a library error onto the CLI's codes; unknown errors become
 * `QUERY_FAILED`.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof ValidationError) {
    const fromEnv = /^(LINEAGE|OLLAMA)_/.test(error.field);
    return createError(fromEnv ? 'INVALID_CONFIG' : 'INVALID_ARGUMENT', message, { field: error.field });
  }
  if (error instanceof ProviderError) {
    return createError('PROVIDER_UNAVAILABLE', message, { provider: error.provider, reason: error.reason });
  }
  if (error instanceof QueryCancelledError) {
    return createError('CANCELLED', message, { phase: error.phase });
  }
  if (error instanceof TimeoutError) {
    return createError('TIMEOUT', message);
  }
  if (error instanceof IterationLimitError) {
    return createError('QUERY_FAILED', message, { limit: error.limit, lastPhase: error.lastPhase });
  }
  return createError('QUERY_FAILED', message);
}

export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    const lines = [`Error [${error.code}]: ${error.message}`];
    if (error.suggestion) {
      lines.push('', `Suggestion: ${error.suggestion}`);
    }
    return lines.join('\n');
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

export function formatErrorJson(error: CliError): string {
  return JSON.stringify({
    error: {
      code: error.code,
      message: error.message,
      suggestion: error.suggestion,
      ...(error.details ? { details: error.details } : {}),
    },
  }, null, 2);
}
