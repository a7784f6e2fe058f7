/**
 * @fileoverview Async Utilities
 *
 * Timeout helpers for the two kinds of external calls the agent makes:
 * decision-maker generations and tool invocations.
 *
 * @packageDocumentation
 */

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param timeoutMs - if <= 0 or undefined, the promise is returned as-is
 * @throws TimeoutError if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const text = await withTimeout(decisionMaker.generate(prompt, 500), 30000, {
 *   context: 'plan generation',
 * });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
