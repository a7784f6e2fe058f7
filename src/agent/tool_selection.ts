/**
 * @fileoverview Tool choice matching and tool input construction
 *
 * Matching policy for the decision maker's free-text tool choice:
 * lower-cased and trimmed, compared against each registered name in
 * registration order, a match when either string contains the other, first
 * match wins, otherwise the default tool.
 */

import { DEFAULT_TOOL, type ToolInput } from '../tools/types.js';
import { findMention, type KnownEntity } from './prompts.js';

export const SEARCH_LIMIT = 3;
export const DEPENDENCY_DEPTH = 3;

// ============================================================================
// TOOL CHOICE
// ============================================================================

export function matchToolName(
  choice: string,
  toolNames: readonly string[],
  defaultTool: string = DEFAULT_TOOL
): string {
  const normalized = choice.trim().toLowerCase();
  // Every name contains the empty string; an empty reply is "no choice".
  if (!normalized) {
    return defaultTool;
  }
  for (const name of toolNames) {
    const candidate = name.toLowerCase();
    if (candidate.includes(normalized) || normalized.includes(candidate)) {
      return name;
    }
  }
  return defaultTool;
}

// ============================================================================
// TARGET RESOLUTION
// ============================================================================

export interface ToolTargets {
  /** Node whose upstream is examined (dependencies, validate/trace target). */
  targetId: string;
  /** Start of a validate/trace path. */
  sourceId: string;
  /** Node for metadata lookups. */
  nodeId: string;
}

export const DEFAULT_TOOL_TARGETS: ToolTargets = {
  targetId: 'dashboard_revenue',
  sourceId: 'table_orders',
  nodeId: 'table_users',
};

/**
 * Vocabulary entities mentioned in the query, ordered by first mention.
 */
export function findMentionedEntities(query: string, vocabulary: readonly KnownEntity[]): KnownEntity[] {
  return vocabulary
    .map((entity) => ({ entity, index: findMention(query, entity.name) }))
    .filter((hit) => hit.index >= 0)
    .sort((a, b) => a.index - b.index)
    .map((hit) => hit.entity);
}

/**
 * The last mentioned entity is the target ("what feeds into X"); the first
 * mentioned entity other than the target is the source ("does A feed B").
 */
export function resolveToolTargets(
  query: string,
  vocabulary: readonly KnownEntity[],
  defaults: ToolTargets = DEFAULT_TOOL_TARGETS
): ToolTargets {
  const mentioned = findMentionedEntities(query, vocabulary);
  const target = mentioned.at(-1);
  if (!target) {
    return { ...defaults };
  }
  const source = mentioned.find((entity) => entity.id !== target.id);
  return {
    targetId: target.id,
    sourceId: source?.id ?? defaults.sourceId,
    nodeId: target.id,
  };
}

// ============================================================================
// TOOL INPUT
// ============================================================================

/**
 * Build the input for a tool by keyword sniffing its name.
 */
export function buildToolInput(toolName: string, query: string, targets: ToolTargets): ToolInput {
  const name = toolName.toLowerCase();
  if (name.includes('search')) {
    return { query, limit: SEARCH_LIMIT };
  }
  if (name.includes('dependencies')) {
    return { tableId: targets.targetId, depth: DEPENDENCY_DEPTH };
  }
  if (name.includes('validate') || name.includes('trace')) {
    return { sourceId: targets.sourceId, targetId: targets.targetId };
  }
  if (name.includes('metadata')) {
    return { nodeId: targets.nodeId };
  }
  if (name.includes('freshness')) {
    return { tableId: targets.nodeId };
  }
  return { query, limit: SEARCH_LIMIT };
}
