/**
 * @fileoverview lineage-investigator - answers "what feeds into X?" questions
 *
 * A bounded plan / investigate / act / synthesize loop picks lineage tools
 * one at a time, then asks the decision maker for an answer naming the
 * tables involved.
 *
 * ## Quick Start
 *
 * ```typescript
 * import Database from 'better-sqlite3';
 * import {
 *   LineageAgent, OllamaDecisionMaker, OllamaEmbedder, SqliteLineageGraph,
 *   SqliteVectorStore, ToolRegistry, VectorSearchService, createLineageTools,
 *   seedSampleLineage, vocabularyFromNodes,
 * } from 'lineage-investigator';
 *
 * const db = new Database('lineage.db');
 * const graph = new SqliteLineageGraph(db);
 * const store = new SqliteVectorStore(db);
 * const embedder = new OllamaEmbedder({ baseUrl: 'http://localhost:11434', model: 'all-minilm' });
 * await seedSampleLineage(graph, store, embedder);
 *
 * const agent = new LineageAgent({
 *   decisionMaker: new OllamaDecisionMaker({ baseUrl: 'http://localhost:11434', model: 'mistral' }),
 *   registry: new ToolRegistry(createLineageTools({ search: new VectorSearchService(embedder, store), graph })),
 *   vocabulary: vocabularyFromNodes(graph.listNodes()),
 * });
 * const result = await agent.run('What feeds into the revenue dashboard?');
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// AGENT
// ============================================================================

export {
  LineageAgent,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_TRANSITION_LIMIT,
  PHASE_OVERHEAD,
} from './agent/orchestrator.js';
export type { FinalResult, LineageAgentOptions, RunOptions, TransitionEvent } from './agent/orchestrator.js';

export {
  DEFAULT_MAX_STEPS,
  DEFAULT_MAX_TOOLS,
  NO_EVIDENCE_CONFIDENCE,
  computeConfidence,
  computeFinalConfidence,
  createInitialState,
  freezeState,
} from './agent/state.js';
export type { AgentMessage, AgentPhase, AgentState, DependencyContext } from './agent/state.js';

export {
  CONFIDENCE_STOP_THRESHOLD,
  EVIDENCE_CAP,
  decideAfterAct,
  nextPhase,
  resolveTransition,
} from './agent/transitions.js';
export type { ActDecision, ActRule, Transition, TransitionRule } from './agent/transitions.js';

export { guardedGenerate } from './agent/decision_maker.js';
export type { DecisionMaker, GuardedGeneration, GuardedGenerateOptions } from './agent/decision_maker.js';

export {
  buildFallbackAnswer,
  buildPlanPrompt,
  buildSynthesisPrompt,
  buildToolChoicePrompt,
  parseSynthesis,
} from './agent/prompts.js';
export type { KnownEntity, ParsedSynthesis } from './agent/prompts.js';

export {
  DEFAULT_TOOL_TARGETS,
  buildToolInput,
  findMentionedEntities,
  matchToolName,
  resolveToolTargets,
} from './agent/tool_selection.js';
export type { ToolTargets } from './agent/tool_selection.js';

// ============================================================================
// TOOLS
// ============================================================================

export { DEFAULT_TOOL, TOOL_NAMES } from './tools/types.js';
export type {
  DependencyGraph,
  DependencyRecord,
  DependencyTraversal,
  LineageNode,
  LineageTool,
  SearchHit,
  SemanticSearch,
  ToolInput,
  ToolName,
  ToolResult,
} from './tools/types.js';
export { ToolRegistry } from './tools/registry.js';
export { ToolDispatcher, normalizeToolResult } from './tools/dispatcher.js';
export type { ToolDispatcherOptions } from './tools/dispatcher.js';
export { createLineageTools, FULL_TRACE_DEPTH } from './tools/lineage_tools.js';
export type { LineageToolDependencies } from './tools/lineage_tools.js';

// ============================================================================
// STORAGE & PROVIDERS
// ============================================================================

export { SqliteLineageGraph, FEEDS_INTO } from './storage/lineage_graph.js';
export type { EdgeInput, NodeInput } from './storage/lineage_graph.js';
export { SqliteVectorStore, VectorSearchService } from './storage/vector_store.js';
export type { DocumentInput, Embedder } from './storage/vector_store.js';
export { loadSampleLineage, seedSampleLineage, vocabularyFromNodes } from './storage/seed.js';
export type { SampleLineage, SeedReport } from './storage/seed.js';
export { OllamaDecisionMaker, OllamaEmbedder } from './providers/ollama.js';
export type { OllamaOptions } from './providers/ollama.js';

// ============================================================================
// AMBIENT
// ============================================================================

export { DEFAULT_CONFIG, loadConfig } from './config/index.js';
export type { LineageConfig } from './config/index.js';
export {
  LineageError,
  ProviderError,
  ValidationError,
  IterationLimitError,
  QueryCancelledError,
  isLineageError,
  isRetryableError,
} from './core/errors.js';
export { Ok, Err, safeAsync } from './core/result.js';
export type { Result } from './core/result.js';
export { LineageTracer, traceAsync } from './debug/tracer.js';
export type { TraceEvent, TraceSpan } from './debug/tracer.js';
export { createLogger, setLogLevel } from './telemetry/logger.js';
export type { LogLevel, ScopedLogger } from './telemetry/logger.js';
export { TimeoutError, withTimeout } from './utils/async.js';
