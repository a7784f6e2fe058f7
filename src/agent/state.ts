/**
 * @fileoverview Agent state
 *
 * The single mutable record threaded through one investigation. It is owned
 * by one run of the loop, mutated in place by the phase handlers, frozen
 * once the run reaches `done`, and discarded after the caller reads it.
 */

import type { SearchHit, ToolResult } from '../tools/types.js';
import { isSuccessfulResult } from '../tools/dispatcher.js';

// ============================================================================
// TYPES
// ============================================================================

export type AgentPhase = 'plan' | 'investigate' | 'act' | 'synthesize' | 'done';

export interface AgentMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Structured view of the last successful `*dependencies*` tool result.
 */
export interface DependencyContext {
  root: string;
  dependencies: Array<{ id: string; name: string; type: string; depth: number }>;
}

export interface AgentState {
  readonly query: string;
  phase: AgentPhase;
  plan: string | null;
  pendingTool: string | null;
  /** Latest result per tool name; a repeat call overwrites. */
  toolResults: Record<string, ToolResult>;
  /** Every call in order, repeats included. */
  toolsInvoked: string[];
  evidence: SearchHit[];
  dependencyContext: DependencyContext | null;
  confidence: number;
  stepCount: number;
  readonly maxSteps: number;
  readonly maxTools: number;
  finalAnswer: string | null;
  errors: string[];
  messages: AgentMessage[];
}

export const DEFAULT_MAX_STEPS = 8;
export const DEFAULT_MAX_TOOLS = 3;

/** Confidence reported at synthesis when no tool ever ran. */
export const NO_EVIDENCE_CONFIDENCE = 0.5;

// ============================================================================
// FACTORY
// ============================================================================

export function createInitialState(
  query: string,
  maxSteps: number = DEFAULT_MAX_STEPS,
  maxTools: number = DEFAULT_MAX_TOOLS
): AgentState {
  return {
    query,
    phase: 'plan',
    plan: null,
    pendingTool: null,
    toolResults: {},
    toolsInvoked: [],
    evidence: [],
    dependencyContext: null,
    confidence: 0,
    stepCount: 0,
    maxSteps,
    maxTools,
    finalAnswer: null,
    errors: [],
    messages: [{ role: 'user', content: query }],
  };
}

// ============================================================================
// DERIVED VALUES
// ============================================================================

export function toolResultCount(state: Pick<AgentState, 'toolResults'>): number {
  return Object.keys(state.toolResults).length;
}

export function countSuccessfulResults(toolResults: Record<string, ToolResult>): number {
  return Object.values(toolResults).filter((result) => isSuccessfulResult(result)).length;
}

/**
 * Successes over distinct tool names. Repeated calls to one tool count once,
 * with its latest result.
 */
export function computeConfidence(toolResults: Record<string, ToolResult>): number {
  const total = Object.keys(toolResults).length;
  if (total === 0) {
    return 0;
  }
  return countSuccessfulResults(toolResults) / total;
}

/** Confidence as reported at synthesis. */
export function computeFinalConfidence(toolResults: Record<string, ToolResult>): number {
  return Object.keys(toolResults).length === 0 ? NO_EVIDENCE_CONFIDENCE : computeConfidence(toolResults);
}

// ============================================================================
// LIFECYCLE
// ============================================================================

/**
 * Freeze the record and its collections. Called once the run is `done`.
 */
export function freezeState(state: AgentState): Readonly<AgentState> {
  Object.freeze(state.toolResults);
  Object.freeze(state.toolsInvoked);
  Object.freeze(state.evidence);
  Object.freeze(state.errors);
  Object.freeze(state.messages);
  if (state.dependencyContext) {
    Object.freeze(state.dependencyContext);
  }
  return Object.freeze(state);
}
