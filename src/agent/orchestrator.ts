/**
 * @fileoverview Lineage investigation loop
 *
 * `LineageAgent.run` drives one query through
 * plan -> investigate -> act -> {investigate | synthesize} -> done.
 *
 * Each phase handler mutates the run's own `AgentState`, increments
 * `stepCount` exactly once, and appends one assistant message. The successor
 * phase comes from `resolveTransition`, so every stopping decision lives in
 * transitions.ts. Decision-maker failures degrade to empty text and tool
 * failures to failed results; only validation, cancellation and the
 * transition safety net reject.
 */

import { z } from 'zod';
import { IterationLimitError, QueryCancelledError, ValidationError } from '../core/errors.js';
import { LineageTracer, traceAsync, type TraceSpan } from '../debug/tracer.js';
import { createLogger } from '../telemetry/logger.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import type { ToolRegistry } from '../tools/registry.js';
import { DEFAULT_TOOL, type ToolResult } from '../tools/types.js';
import { guardedGenerate, type DecisionMaker } from './decision_maker.js';
import {
  PLAN_MAX_TOKENS,
  SYNTHESIS_MAX_TOKENS,
  TOOL_CHOICE_MAX_TOKENS,
  buildFallbackAnswer,
  buildPlanPrompt,
  buildSynthesisPrompt,
  buildToolChoicePrompt,
  parseSynthesis,
  type KnownEntity,
} from './prompts.js';
import {
  DEFAULT_MAX_STEPS,
  DEFAULT_MAX_TOOLS,
  computeConfidence,
  computeFinalConfidence,
  createInitialState,
  freezeState,
  type AgentPhase,
  type AgentState,
} from './state.js';
import {
  DEFAULT_TOOL_TARGETS,
  buildToolInput,
  matchToolName,
  resolveToolTargets,
  type ToolTargets,
} from './tool_selection.js';
import { resolveTransition, type Transition, type TransitionRule } from './transitions.js';

const log = createLogger('agent');

/** Phase executions beyond `maxSteps`: plan, synthesize, and the skipped act. */
export const PHASE_OVERHEAD = 3;
export const DEFAULT_TRANSITION_LIMIT = 40;
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;
export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;

// ============================================================================
// TYPES
// ============================================================================

export interface TransitionEvent {
  from: AgentPhase;
  to: AgentPhase;
  rule: TransitionRule;
  stepCount: number;
  toolResultCount: number;
  confidence: number;
}

export interface LineageAgentOptions {
  decisionMaker: DecisionMaker;
  registry: ToolRegistry;
  /** Defaults to a dispatcher over `registry` bounded by `toolTimeoutMs`. */
  dispatcher?: ToolDispatcher;
  /** Entities the synthesis prompt lists and tool inputs resolve against. */
  vocabulary?: KnownEntity[];
  /** Ids used when the query mentions no known entity. */
  defaultTargets?: ToolTargets;
  llmTimeoutMs?: number;
  toolTimeoutMs?: number;
  transitionLimit?: number;
  /** Successor rule for each phase; defaults to `resolveTransition`. */
  resolveTransition?: (state: AgentState) => Transition;
  /** Record spans for each run; on by default. */
  tracing?: boolean;
  onTransition?: (event: TransitionEvent) => void;
}

export interface RunOptions {
  maxSteps?: number;
  maxTools?: number;
  signal?: AbortSignal;
}

export interface FinalResult {
  finalAnswer: string;
  confidence: number;
  toolsInvoked: string[];
  toolResults: Record<string, ToolResult>;
  phase: 'done';
  stepCount: number;
  plan: string | null;
  errors: string[];
  referencedEntities: string[];
  path: string[];
  trace: TraceSpan[];
}

interface RunContext {
  state: AgentState;
  tracer: LineageTracer;
  runSpanId: string;
  targets: ToolTargets;
}

const SearchHitSchema = z.object({
  id: z.string(),
  entityName: z.string(),
  similarity: z.number(),
  text: z.string(),
  sourceType: z.string(),
});

const DependencyContextSchema = z.object({
  root: z.string(),
  dependencies: z.array(
    z.object({ id: z.string(), name: z.string(), type: z.string(), depth: z.number() })
  ),
});

// ============================================================================
// AGENT
// ============================================================================

export class LineageAgent {
  private readonly decisionMaker: DecisionMaker;
  private readonly registry: ToolRegistry;
  private readonly dispatcher: ToolDispatcher;
  private readonly vocabulary: KnownEntity[];
  private readonly defaultTargets: ToolTargets;
  private readonly llmTimeoutMs: number;
  private readonly transitionLimit: number;
  private readonly resolveTransition: (state: AgentState) => Transition;
  private readonly tracing: boolean;
  private readonly onTransition?: (event: TransitionEvent) => void;

  constructor(options: LineageAgentOptions) {
    this.decisionMaker = options.decisionMaker;
    this.registry = options.registry;
    this.dispatcher = options.dispatcher ?? new ToolDispatcher(options.registry, {
      timeoutMs: options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
    });
    this.vocabulary = options.vocabulary ?? [];
    this.defaultTargets = options.defaultTargets ?? DEFAULT_TOOL_TARGETS;
    this.llmTimeoutMs = options.llmTimeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;
    this.transitionLimit = options.transitionLimit ?? DEFAULT_TRANSITION_LIMIT;
    this.resolveTransition = options.resolveTransition ?? resolveTransition;
    this.tracing = options.tracing ?? true;
    this.onTransition = options.onTransition;
  }

  /**
   * Answer one lineage question. Rejects with `ValidationError` on bad
   * arguments, `QueryCancelledError` when `signal` aborts between phases, and
   * `IterationLimitError` if the transition safety net trips.
   */
  async run(query: string, options: RunOptions = {}): Promise<FinalResult> {
    const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    const maxTools = options.maxTools ?? DEFAULT_MAX_TOOLS;
    this.validate(query, maxSteps, maxTools);

    const state = createInitialState(query.trim(), maxSteps, maxTools);
    const tracer = new LineageTracer({ enabled: this.tracing });
    const runSpanId = tracer.startSpan('agent_run', {
      attributes: { query: state.query, maxSteps, maxTools },
    });
    const context: RunContext = {
      state,
      tracer,
      runSpanId,
      targets: resolveToolTargets(state.query, this.vocabulary, this.defaultTargets),
    };

    log.info('investigation started', { maxSteps, maxTools });

    try {
      await this.loop(context, options.signal);
    } catch (error) {
      tracer.setAttributes(runSpanId, {
        status: 'error',
        'error.message': error instanceof Error ? error.message : String(error),
      });
      tracer.endSpan(runSpanId);
      throw error;
    }

    tracer.setAttributes(runSpanId, {
      status: 'ok',
      stepCount: state.stepCount,
      toolsInvoked: state.toolsInvoked.length,
      confidence: state.confidence,
    });
    tracer.endSpan(runSpanId);
    freezeState(state);

    log.info('investigation finished', {
      stepCount: state.stepCount,
      tools: state.toolsInvoked.length,
      confidence: state.confidence,
    });

    const finalAnswer = state.finalAnswer ?? '';
    const parsed = parseSynthesis(finalAnswer, this.vocabulary.map((entity) => entity.name));
    return {
      finalAnswer,
      confidence: state.confidence,
      toolsInvoked: [...state.toolsInvoked],
      toolResults: { ...state.toolResults },
      phase: 'done',
      stepCount: state.stepCount,
      plan: state.plan,
      errors: [...state.errors],
      referencedEntities: parsed.referencedEntities,
      path: parsed.path,
      trace: tracer.exportTraces(),
    };
  }

  // ==========================================================================
  // LOOP
  // ==========================================================================

  private async loop(context: RunContext, signal: AbortSignal | undefined): Promise<void> {
    const { state } = context;
    let executions = 0;

    while (state.phase !== 'done') {
      if (signal?.aborted) {
        log.warn('investigation cancelled', { phase: state.phase, stepCount: state.stepCount });
        throw new QueryCancelledError(state.phase);
      }
      executions += 1;
      if (executions > this.transitionLimit) {
        throw new IterationLimitError(this.transitionLimit, state.phase, state.stepCount);
      }

      const from = state.phase;
      const transition = await traceAsync(
        context.tracer,
        from,
        async (spanId) => {
          await this.runPhase(from, context, spanId);
          const next = this.resolveTransition(state);
          context.tracer.setAttributes(spanId, { next: next.phase, rule: next.rule });
          return next;
        },
        { parentId: context.runSpanId, attributes: { step: state.stepCount + 1 } }
      );

      log.debug('transition', { from, to: transition.phase, rule: transition.rule, step: state.stepCount });
      this.onTransition?.({
        from,
        to: transition.phase,
        rule: transition.rule,
        stepCount: state.stepCount,
        toolResultCount: Object.keys(state.toolResults).length,
        confidence: state.confidence,
      });
      state.phase = transition.phase;
    }
  }

  private async runPhase(phase: AgentPhase, context: RunContext, spanId: string): Promise<void> {
    switch (phase) {
      case 'plan':
        return this.plan(context, spanId);
      case 'investigate':
        return this.investigate(context, spanId);
      case 'act':
        return this.act(context, spanId);
      case 'synthesize':
        return this.synthesize(context, spanId);
      case 'done':
        return;
    }
  }

  // ==========================================================================
  // PHASES
  // ==========================================================================

  private async plan(context: RunContext, spanId: string): Promise<void> {
    const { state } = context;
    const prompt = buildPlanPrompt(state.query, this.registry.list());
    const text = await this.generate(context, prompt, PLAN_MAX_TOKENS, 'plan', spanId);

    state.plan = text.trim();
    state.messages.push({ role: 'assistant', content: `Plan: ${state.plan || '(none)'}` });
    state.stepCount += 1;
  }

  private async investigate(context: RunContext, spanId: string): Promise<void> {
    const { state } = context;
    const prompt = buildToolChoicePrompt(state.plan ?? '', state.query);
    const text = await this.generate(context, prompt, TOOL_CHOICE_MAX_TOKENS, 'tool_choice', spanId);

    state.pendingTool = matchToolName(text, this.registry.names(), DEFAULT_TOOL);
    context.tracer.addEvent(spanId, 'tool_selected', { reply: text, tool: state.pendingTool });
    state.messages.push({ role: 'assistant', content: `Next tool: ${state.pendingTool}` });
    state.stepCount += 1;
  }

  private async act(context: RunContext, spanId: string): Promise<void> {
    const { state } = context;

    if (state.stepCount >= state.maxSteps) {
      state.errors.push('step budget exhausted before tool execution');
      state.messages.push({ role: 'assistant', content: 'Skipped tool call: step budget exhausted' });
      state.pendingTool = null;
      state.stepCount += 1;
      return;
    }

    const toolName = state.pendingTool || DEFAULT_TOOL;
    const input = buildToolInput(toolName, state.query, context.targets);
    const result = await this.dispatcher.execute(toolName, input, {
      tracer: context.tracer,
      parentSpanId: spanId,
    });

    state.toolResults[toolName] = result;
    state.toolsInvoked.push(toolName);
    state.confidence = computeConfidence(state.toolResults);
    state.pendingTool = null;

    if (result.success) {
      this.absorbResult(state, toolName, result);
    } else {
      state.errors.push(`${toolName}: ${result.error ?? 'unknown error'}`);
    }

    state.messages.push({
      role: 'assistant',
      content: result.success ? `Called ${toolName}` : `Called ${toolName} (failed: ${result.error ?? 'unknown error'})`,
    });
    state.stepCount += 1;
  }

  private async synthesize(context: RunContext, spanId: string): Promise<void> {
    const { state } = context;
    const entityNames = this.vocabulary.map((entity) => entity.name);
    const prompt = buildSynthesisPrompt(state.query, state.toolResults, entityNames);
    const text = await this.generate(context, prompt, SYNTHESIS_MAX_TOKENS, 'synthesis', spanId);

    const answer = text.trim() || buildFallbackAnswer(state, entityNames);
    if (!text.trim()) {
      context.tracer.addEvent(spanId, 'fallback_answer');
    }
    state.finalAnswer = answer;
    state.confidence = computeFinalConfidence(state.toolResults);
    state.messages.push({ role: 'assistant', content: answer });
    state.stepCount += 1;
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private async generate(
    context: RunContext,
    prompt: string,
    maxTokens: number,
    purpose: string,
    spanId: string
  ): Promise<string> {
    const generation = await guardedGenerate(this.decisionMaker, prompt, maxTokens, {
      timeoutMs: this.llmTimeoutMs,
      purpose,
      tracer: context.tracer,
      parentSpanId: spanId,
    });
    if (generation.error) {
      context.state.errors.push(`${purpose}: ${generation.error}`);
    }
    return generation.text;
  }

  private absorbResult(state: AgentState, toolName: string, result: ToolResult): void {
    const name = toolName.toLowerCase();
    if (name.includes('search')) {
      const items = z.array(SearchHitSchema).safeParse(result.items);
      if (!items.success) {
        log.debug('search result items do not match the hit shape, evidence cleared', { tool: toolName });
      }
      state.evidence = items.success ? items.data : [];
    } else if (name.includes('dependencies')) {
      const parsed = DependencyContextSchema.safeParse(result);
      if (parsed.success) {
        state.dependencyContext = { root: parsed.data.root, dependencies: parsed.data.dependencies };
      }
    }
  }

  private validate(query: string, maxSteps: number, maxTools: number): void {
    if (!query.trim()) {
      throw new ValidationError('query', 'non-empty string', JSON.stringify(query));
    }
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
      throw new ValidationError('maxSteps', 'integer >= 1', String(maxSteps));
    }
    if (!Number.isInteger(maxTools) || maxTools < 1) {
      throw new ValidationError('maxTools', 'integer >= 1', String(maxTools));
    }
    if (maxSteps + PHASE_OVERHEAD > this.transitionLimit) {
      throw new ValidationError(
        'maxSteps',
        `at most ${this.transitionLimit - PHASE_OVERHEAD} (transition limit ${this.transitionLimit})`,
        String(maxSteps)
      );
    }
  }
}
