/**
 * @fileoverview Span recording for agent runs
 *
 * Each run gets its own tracer. Spans nest via parentId:
 * - `agent_run` wraps the whole query
 * - one span per phase (`plan`, `investigate`, `act`, `synthesize`)
 * - `llm_generate` and `tool:<name>` spans beneath the phase that made the call
 */

import { randomUUID } from 'node:crypto';

// ============================================================================
// TRACE TYPES
// ============================================================================

export interface TraceEvent {
  name: string;
  timestamp: number;
  attributes: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  name: string;
  startTime: number;
  endTime?: number;
  parentId?: string;
  attributes: Record<string, unknown>;
  events: TraceEvent[];
}

export interface StartSpanOptions {
  parentId?: string;
  attributes?: Record<string, unknown>;
}

// ============================================================================
// TRACER IMPLEMENTATION
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const tracer = new LineageTracer();
 * const spanId = tracer.startSpan('act', { attributes: { step: 3 } });
 * tracer.addEvent(spanId, 'tool_selected', { tool: 'search_vector_db' });
 * tracer.endSpan(spanId);
 * const spans = tracer.exportTraces();
 * ```
 */
export class LineageTracer {
  private spans: Map<string, TraceSpan> = new Map();
  private readonly enabled: boolean;

  constructor(options: { enabled?: boolean } = {}) {
    this.enabled = options.enabled ?? true;
  }

  /**
   * Start a new trace span.
   * @returns The span ID, or `''` when tracing is disabled
   */
  startSpan(name: string, options: StartSpanOptions = {}): string {
    if (!this.enabled) {
      return '';
    }

    const id = randomUUID();
    this.spans.set(id, {
      id,
      name,
      startTime: Date.now(),
      parentId: options.parentId,
      attributes: { ...options.attributes },
      events: [],
    });
    return id;
  }

  endSpan(spanId: string): void {
    const span = this.find(spanId);
    if (span && span.endTime === undefined) {
      span.endTime = Date.now();
    }
  }

  addEvent(spanId: string, name: string, attributes?: Record<string, unknown>): void {
    this.find(spanId)?.events.push({
      name,
      timestamp: Date.now(),
      attributes: attributes ?? {},
    });
  }

  setAttribute(spanId: string, key: string, value: unknown): void {
    const span = this.find(spanId);
    if (span) {
      span.attributes[key] = value;
    }
  }

  setAttributes(spanId: string, attributes: Record<string, unknown>): void {
    const span = this.find(spanId);
    if (span) {
      Object.assign(span.attributes, attributes);
    }
  }

  /** All recorded spans, in start order. */
  exportTraces(): TraceSpan[] {
    return Array.from(this.spans.values());
  }

  private find(spanId: string): TraceSpan | undefined {
    if (!this.enabled || !spanId) {
      return undefined;
    }
    return this.spans.get(spanId);
  }
}

// ============================================================================
// TRACING UTILITIES
// ============================================================================

/**
 * Trace an async function execution. The span is closed whether `fn`
 * resolves or throws; a throw is recorded and rethrown.
 */
export async function traceAsync<T>(
  tracer: LineageTracer,
  name: string,
  fn: (spanId: string) => Promise<T>,
  options: StartSpanOptions = {}
): Promise<T> {
  const spanId = tracer.startSpan(name, options);

  try {
    const result = await fn(spanId);
    tracer.setAttribute(spanId, 'status', 'ok');
    return result;
  } catch (error) {
    tracer.setAttributes(spanId, {
      status: 'error',
      'error.message': error instanceof Error ? error.message : String(error),
      'error.type': error instanceof Error ? error.name : 'unknown',
    });
    throw error;
  } finally {
    tracer.endSpan(spanId);
  }
}
