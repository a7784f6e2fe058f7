/**
 * @fileoverview The six lineage tools
 *
 * Each tool validates its input with zod, calls one collaborator (semantic
 * search or the dependency graph) and shapes a `ToolResult`. Collaborator
 * failures are left to propagate; the dispatcher folds them into failed
 * results. A missing node is a normal `{ success: false }` answer.
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { clamp01 } from '../utils/math.js';
import type {
  DependencyGraph,
  LineageTool,
  SemanticSearch,
  ToolInput,
  ToolName,
  ToolResult,
} from './types.js';

// ============================================================================
// INPUT SCHEMAS
// ============================================================================

const SearchInputSchema = z.object({
  query: z.string().min(1),
  limit: z.number().int().min(1).max(50).default(3),
});

const DependenciesInputSchema = z.object({
  tableId: z.string().min(1),
  depth: z.number().int().min(1).max(10).default(3),
});

const PathInputSchema = z.object({
  sourceId: z.string().min(1),
  targetId: z.string().min(1),
});

const NodeInputSchema = z.object({
  nodeId: z.string().min(1),
});

const FreshnessInputSchema = z.object({
  tableId: z.string().min(1),
});

/** Depth used when a tool needs the full upstream closure of a node. */
export const FULL_TRACE_DEPTH = 10;

export const PATH_CONFIDENCE = { found: 0.95, missing: 0.2 } as const;
export const TRACE_CONFIDENCE = { found: 0.95, missing: 0.3 } as const;

const HOUR_MS = 60 * 60 * 1000;

function parseInput<S extends z.ZodTypeAny>(toolName: ToolName, schema: S, input: ToolInput): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new ValidationError(
      `${toolName}.${issue?.path.join('.') || 'input'}`,
      issue?.message ?? 'valid input',
      JSON.stringify(input),
    );
  }
  return parsed.data;
}

// ============================================================================
// TOOL FACTORY
// ============================================================================

export interface LineageToolDependencies {
  search: SemanticSearch;
  graph: DependencyGraph;
  /** Age after which a node counts as fully stale. Default: one week. */
  staleAfterHours?: number;
  now?: () => number;
}

/**
 * Build the six tools in their fixed selection order.
 */
export function createLineageTools(deps: LineageToolDependencies): LineageTool[] {
  const { search, graph } = deps;
  const staleAfterMs = (deps.staleAfterHours ?? 168) * HOUR_MS;
  const now = deps.now ?? Date.now;

  const searchVectorDb: LineageTool = {
    name: 'search_vector_db',
    description: 'Search for relevant tables and dashboards using natural language',
    async invoke(input): Promise<ToolResult> {
      const { query, limit } = parseInput('search_vector_db', SearchInputSchema, input);
      const items = await search.search(query, limit);
      return {
        success: true,
        items,
        count: items.length,
        relevanceScores: items.map((item) => item.similarity),
      };
    },
  };

  const getTableDependencies: LineageTool = {
    name: 'get_table_dependencies',
    description: 'Get upstream dependencies of a table (recursive traversal)',
    async invoke(input): Promise<ToolResult> {
      const { tableId, depth } = parseInput('get_table_dependencies', DependenciesInputSchema, input);
      const traversal = await graph.getDependencies(tableId, depth);
      return {
        success: true,
        root: traversal.root,
        dependencyCount: traversal.dependencies.length,
        dependencies: traversal.dependencies,
        dependencyNames: traversal.dependencies.map((dep) => dep.name),
        depthUsed: depth,
      };
    },
  };

  const validateLineagePath: LineageTool = {
    name: 'validate_lineage_path',
    description: 'Confirm that data flows from a source node into a target node',
    async invoke(input): Promise<ToolResult> {
      const { sourceId, targetId } = parseInput('validate_lineage_path', PathInputSchema, input);
      const upstream = await graph.getDependencies(targetId, FULL_TRACE_DEPTH);
      const upstreamNodes = upstream.dependencies.map((dep) => dep.id);
      const isValid = sourceId === targetId || upstreamNodes.includes(sourceId);
      return {
        success: true,
        isValid,
        source: sourceId,
        target: targetId,
        upstreamNodes,
        confidence: isValid ? PATH_CONFIDENCE.found : PATH_CONFIDENCE.missing,
      };
    },
  };

  const getNodeMetadata: LineageTool = {
    name: 'get_node_metadata',
    description: 'Get details about a specific table or dashboard',
    async invoke(input): Promise<ToolResult> {
      const { nodeId } = parseInput('get_node_metadata', NodeInputSchema, input);
      const node = await graph.getNode(nodeId);
      if (!node) {
        return { success: false, error: `Node not found: ${nodeId}`, id: nodeId };
      }
      return {
        success: true,
        id: node.id,
        name: node.name,
        type: node.nodeType,
        description: node.description,
        metadata: node.metadata,
      };
    },
  };

  const traceDataFlow: LineageTool = {
    name: 'trace_data_flow',
    description: 'Trace the complete flow from a source node to a destination node',
    async invoke(input): Promise<ToolResult> {
      const { sourceId, targetId } = parseInput('trace_data_flow', PathInputSchema, input);
      const upstream = await graph.getDependencies(targetId, FULL_TRACE_DEPTH);

      // Target first, then upstream nodes nearest-first.
      let path = [targetId];
      for (const dep of upstream.dependencies) {
        if (!path.includes(dep.id)) {
          path.push(dep.id);
        }
      }

      const sourceIndex = path.indexOf(sourceId);
      const found = sourceIndex >= 0;
      if (found) {
        path = path.slice(0, sourceIndex + 1).reverse();
      }

      return {
        success: true,
        start: sourceId,
        end: targetId,
        path,
        pathLength: path.length,
        confidence: found ? TRACE_CONFIDENCE.found : TRACE_CONFIDENCE.missing,
      };
    },
  };

  const checkDataFreshness: LineageTool = {
    name: 'check_data_freshness',
    description: 'Check how fresh the data behind a table is',
    async invoke(input): Promise<ToolResult> {
      const { tableId } = parseInput('check_data_freshness', FreshnessInputSchema, input);
      const node = await graph.getNode(tableId);
      if (!node) {
        return { success: false, error: `Node not found: ${tableId}`, tableId };
      }

      const updatedAt = Date.parse(node.updatedAt);
      if (Number.isNaN(updatedAt)) {
        return { success: false, error: `Unreadable update time for ${tableId}: ${node.updatedAt}`, tableId };
      }
      const ageMs = Math.max(0, now() - updatedAt);
      const freshnessScore = clamp01(1 - ageMs / staleAfterMs);
      return {
        success: true,
        tableId,
        freshnessScore,
        stale: freshnessScore === 0,
        ageHours: ageMs / HOUR_MS,
        lastUpdate: new Date(updatedAt).toISOString(),
      };
    },
  };

  return [
    searchVectorDb,
    getTableDependencies,
    validateLineagePath,
    getNodeMetadata,
    traceDataFlow,
    checkDataFreshness,
  ];
}
