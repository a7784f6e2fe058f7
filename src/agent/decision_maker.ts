/**
 * @fileoverview Decision maker contract
 *
 * The decision maker is a text-generation service: fallible, slow and
 * non-deterministic. The loop never lets one of its failures escape;
 * `guardedGenerate` bounds each call and turns any failure into `''`.
 */

import { safeAsync } from '../core/result.js';
import type { LineageTracer } from '../debug/tracer.js';
import { createLogger } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';

const log = createLogger('decision');

export interface DecisionMaker {
  generate(prompt: string, maxTokens: number): Promise<string>;
}

export interface GuardedGenerateOptions {
  timeoutMs: number;
  /** Short label for logs and spans, e.g. `plan`. */
  purpose: string;
  tracer?: LineageTracer;
  parentSpanId?: string;
}

export interface GuardedGeneration {
  text: string;
  /** Set when the call failed and `text` is the empty fallback. */
  error?: string;
}

export async function guardedGenerate(
  decisionMaker: DecisionMaker,
  prompt: string,
  maxTokens: number,
  options: GuardedGenerateOptions
): Promise<GuardedGeneration> {
  const { tracer } = options;
  const spanId = tracer?.startSpan('llm_generate', {
    parentId: options.parentSpanId,
    attributes: { purpose: options.purpose, promptLength: prompt.length, maxTokens },
  }) ?? '';
  const startedAt = Date.now();

  const outcome = await safeAsync(() =>
    withTimeout(decisionMaker.generate(prompt, maxTokens), options.timeoutMs, {
      context: `decision maker (${options.purpose})`,
    })
  );
  const latencyMs = Date.now() - startedAt;

  let generation: GuardedGeneration;
  if (!outcome.ok) {
    log.warn('generation failed, continuing with empty text', {
      purpose: options.purpose,
      latencyMs,
      error: outcome.error.message,
    });
    generation = { text: '', error: outcome.error.message };
  } else if (typeof outcome.value !== 'string') {
    generation = { text: '', error: 'Decision maker returned a non-string response' };
  } else {
    generation = { text: outcome.value };
  }

  tracer?.setAttributes(spanId, {
    latencyMs,
    responseLength: generation.text.length,
    ...(generation.error ? { error: generation.error } : {}),
  });
  tracer?.endSpan(spanId);
  return generation;
}
