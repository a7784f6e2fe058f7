/**
 * @fileoverview Tool dispatcher
 *
 * Resolves a tool name against the registry, invokes the tool under a
 * timeout, and normalizes every failure (unknown name, throw, rejection,
 * timeout, malformed return) into `{ success: false, error }`. `execute`
 * never rejects. It does not interpret tool-specific fields.
 */

import { safeAsync } from '../core/result.js';
import { LineageTracer } from '../debug/tracer.js';
import { createLogger } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import type { ToolRegistry } from './registry.js';
import type { ToolInput, ToolResult } from './types.js';

const log = createLogger('dispatcher');

export interface ToolDispatcherOptions {
  /** Per-call bound in milliseconds; 0 disables it. */
  timeoutMs?: number;
  tracer?: LineageTracer;
}

export interface ExecuteOptions {
  /** Parent span for the `tool:<name>` span. */
  parentSpanId?: string;
  tracer?: LineageTracer;
}

export class ToolDispatcher {
  private readonly timeoutMs: number;
  private readonly tracer: LineageTracer | undefined;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolDispatcherOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 0;
    this.tracer = options.tracer;
  }

  async execute(toolName: string, input: ToolInput, options: ExecuteOptions = {}): Promise<ToolResult> {
    const tracer = options.tracer ?? this.tracer ?? new LineageTracer({ enabled: false });
    const spanId = tracer.startSpan(`tool:${toolName}`, {
      parentId: options.parentSpanId,
      attributes: { 'tool.name': toolName, 'tool.input': input },
    });
    const startedAt = Date.now();

    const result = await this.invoke(toolName, input);

    const latencyMs = Date.now() - startedAt;
    tracer.setAttributes(spanId, {
      success: result.success,
      latencyMs,
      ...(typeof result.count === 'number' ? { resultCount: result.count } : {}),
      ...(result.error ? { error: result.error } : {}),
    });
    tracer.endSpan(spanId);

    if (result.success) {
      log.debug('tool succeeded', { tool: toolName, latencyMs });
    } else {
      log.debug('tool failed', { tool: toolName, latencyMs, error: result.error });
    }
    return result;
  }

  private async invoke(toolName: string, input: ToolInput): Promise<ToolResult> {
    const tool = this.registry.get(toolName);
    if (!tool) {
      return { success: false, error: `Tool not found: ${toolName}` };
    }

    const outcome = await safeAsync(() =>
      withTimeout(Promise.resolve(tool.invoke(input)), this.timeoutMs, { context: `tool ${tool.name}` })
    );
    if (!outcome.ok) {
      return { success: false, error: outcome.error.message };
    }
    return normalizeToolResult(outcome.value);
  }
}

/**
 * Accept any object carrying a boolean `success`; anything else becomes a
 * failed result.
 */
export function normalizeToolResult(value: unknown): ToolResult {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return { success: false, error: 'Malformed tool result: expected an object' };
  }
  if (!('success' in value) || typeof value.success !== 'boolean') {
    return { success: false, error: 'Malformed tool result: missing boolean success' };
  }
  return { ...value, success: value.success };
}

export function isSuccessfulResult(result: ToolResult | undefined): boolean {
  return result?.success === true;
}
