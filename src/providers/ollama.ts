/**
 * @fileoverview Ollama clients
 *
 * `OllamaDecisionMaker` calls `/api/generate` (non-streaming) and
 * `OllamaEmbedder` calls `/api/embeddings`. Transport failures and non-2xx
 * statuses raise `ProviderError('network_error')`; bodies that do not match
 * the expected shape raise `ProviderError('invalid_response')`. With
 * `timeoutMs` set, the request is aborted once it passes and the call raises
 * `ProviderError('timeout')`.
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import type { DecisionMaker } from '../agent/decision_maker.js';
import type { Embedder } from '../storage/vector_store.js';
import { getErrorMessage } from '../utils/errors.js';

const PROVIDER = 'ollama';

export interface OllamaOptions {
  baseUrl: string;
  model: string;
  temperature?: number;
  topP?: number;
  /** Abort the HTTP request after this long. Unbounded when absent or <= 0. */
  timeoutMs?: number;
}

const GenerateResponseSchema = z.object({ response: z.string() });
const EmbeddingResponseSchema = z.object({ embedding: z.array(z.number()) });

function isAbortError(error: unknown): boolean {
  // fetch rejects with the signal's DOMException reason
  return typeof error === 'object' && error !== null && 'name' in error
    && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

async function postJson(baseUrl: string, path: string, body: unknown, timeoutMs?: number): Promise<unknown> {
  const url = `${baseUrl.replace(/\/+$/, '')}${path}`;
  const bounded = timeoutMs !== undefined && timeoutMs > 0;
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: bounded ? AbortSignal.timeout(timeoutMs) : undefined,
    });
  } catch (error) {
    if (bounded && isAbortError(error)) {
      throw new ProviderError(PROVIDER, 'timeout', true, `Request to ${url} timed out after ${timeoutMs}ms`);
    }
    throw new ProviderError(PROVIDER, 'network_error', true, `Request to ${url} failed: ${getErrorMessage(error)}`);
  }
  if (!response.ok) {
    throw new ProviderError(PROVIDER, 'network_error', response.status >= 500, `${url} returned HTTP ${response.status}`);
  }
  try {
    return await response.json();
  } catch (error) {
    throw new ProviderError(PROVIDER, 'invalid_response', false, `${url} returned malformed JSON: ${getErrorMessage(error)}`);
  }
}

export class OllamaDecisionMaker implements DecisionMaker {
  private readonly temperature: number;
  private readonly topP: number;

  constructor(private readonly options: OllamaOptions) {
    this.temperature = options.temperature ?? 0.3;
    this.topP = options.topP ?? 0.9;
  }

  async generate(prompt: string, maxTokens: number): Promise<string> {
    const payload = await postJson(this.options.baseUrl, '/api/generate', {
      model: this.options.model,
      prompt,
      stream: false,
      options: {
        temperature: this.temperature,
        top_p: this.topP,
        num_predict: maxTokens,
      },
    }, this.options.timeoutMs);
    const parsed = GenerateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(PROVIDER, 'invalid_response', false, 'Generate response has no string "response" field');
    }
    return parsed.data.response;
  }
}

export class OllamaEmbedder implements Embedder {
  constructor(private readonly options: Pick<OllamaOptions, 'baseUrl' | 'model' | 'timeoutMs'>) {}

  async embed(text: string): Promise<number[]> {
    const payload = await postJson(this.options.baseUrl, '/api/embeddings', {
      model: this.options.model,
      prompt: text,
    }, this.options.timeoutMs);
    const parsed = EmbeddingResponseSchema.safeParse(payload);
    if (!parsed.success || parsed.data.embedding.length === 0) {
      throw new ProviderError(PROVIDER, 'invalid_response', false, 'Embedding response has no "embedding" vector');
    }
    return parsed.data.embedding;
  }
}
