/**
 * @fileoverview Tool contracts
 *
 * A tool takes a structured input and returns a `ToolResult` tagged with
 * `success`. Everything beyond `success` and `error` is tool-specific and
 * opaque to the dispatcher.
 */

// ============================================================================
// RESULTS
// ============================================================================

export interface ToolResult {
  success: boolean;
  error?: string;
  [field: string]: unknown;
}

export type ToolInput = Record<string, unknown>;

// ============================================================================
// TOOLS
// ============================================================================

export const TOOL_NAMES = [
  'search_vector_db',
  'get_table_dependencies',
  'validate_lineage_path',
  'get_node_metadata',
  'trace_data_flow',
  'check_data_freshness',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Selected whenever the decision maker's choice matches no registered tool. */
export const DEFAULT_TOOL: ToolName = 'search_vector_db';

export interface LineageTool {
  readonly name: string;
  readonly description: string;
  invoke(input: ToolInput): Promise<ToolResult> | ToolResult;
}

// ============================================================================
// COLLABORATOR RECORDS
// ============================================================================

/** One ranked hit from the semantic search collaborator. */
export interface SearchHit {
  id: string;
  entityName: string;
  similarity: number;
  text: string;
  sourceType: string;
}

export interface DependencyRecord {
  id: string;
  name: string;
  type: string;
  depth: number;
}

/** Upstream traversal rooted at `root`, bounded by a caller-supplied depth. */
export interface DependencyTraversal {
  root: string;
  dependencies: DependencyRecord[];
}

export interface LineageNode {
  id: string;
  nodeType: string;
  name: string;
  description: string;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface SemanticSearch {
  search(query: string, limit: number): Promise<SearchHit[]>;
}

export interface DependencyGraph {
  getDependencies(nodeId: string, depth: number): Promise<DependencyTraversal> | DependencyTraversal;
  getNode(nodeId: string): Promise<LineageNode | null> | LineageNode | null;
}
