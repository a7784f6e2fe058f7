/**
 * @fileoverview SQLite-backed lineage graph
 *
 * Nodes are tables, dashboards and the like; edges are typed relationships
 * between them. Only `FEEDS_INTO` edges take part in upstream traversal.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { safeSync } from '../core/result.js';
import type { DependencyGraph, DependencyRecord, DependencyTraversal, LineageNode } from '../tools/types.js';

export const FEEDS_INTO = 'FEEDS_INTO';

// ============================================================================
// TYPES
// ============================================================================

export interface NodeInput {
  id: string;
  nodeType: string;
  name: string;
  description?: string;
  metadata?: Record<string, unknown>;
  /** ISO timestamp; defaults to the time of the write. */
  updatedAt?: string;
}

export interface EdgeInput {
  sourceId: string;
  targetId: string;
  edgeType?: string;
  strength?: number;
}

interface NodeRow {
  id: string;
  node_type: string;
  name: string;
  description: string;
  metadata: string;
  created_at: string;
  updated_at: string;
}

interface DependencyRow {
  id: string;
  name: string;
  type: string;
  depth: number;
}

// ============================================================================
// GRAPH
// ============================================================================

export class SqliteLineageGraph implements DependencyGraph {
  private readonly stmtUpsertNode: Database.Statement<[NodeRow]>;
  private readonly stmtInsertEdge: Database.Statement<[string, string, string, number, string]>;
  private readonly stmtGetNode: Database.Statement<[string], NodeRow>;
  private readonly stmtListNodes: Database.Statement<[], NodeRow>;
  private readonly stmtDependencies: Database.Statement<[{ nodeId: string; depth: number }], DependencyRow>;

  constructor(private readonly db: Database.Database) {
    this.ensureTables();

    this.stmtUpsertNode = this.db.prepare<NodeRow>(`
      INSERT INTO lineage_nodes (id, node_type, name, description, metadata, created_at, updated_at)
      VALUES (@id, @node_type, @name, @description, @metadata, @created_at, @updated_at)
      ON CONFLICT(id) DO UPDATE SET
        node_type = excluded.node_type,
        name = excluded.name,
        description = excluded.description,
        metadata = excluded.metadata,
        updated_at = excluded.updated_at
    `);

    this.stmtInsertEdge = this.db.prepare<[string, string, string, number, string]>(`
      INSERT INTO lineage_edges (source_id, target_id, edge_type, strength, created_at)
      VALUES (?, ?, ?, ?, ?)
    `);

    this.stmtGetNode = this.db.prepare<[string], NodeRow>(`
      SELECT id, node_type, name, description, metadata, created_at, updated_at
      FROM lineage_nodes WHERE id = ?
    `);

    this.stmtListNodes = this.db.prepare<[], NodeRow>(`
      SELECT id, node_type, name, description, metadata, created_at, updated_at
      FROM lineage_nodes ORDER BY id
    `);

    // UNION (not UNION ALL) plus the depth bound keeps cyclic graphs finite.
    this.stmtDependencies = this.db.prepare<{ nodeId: string; depth: number }, DependencyRow>(`
      WITH RECURSIVE upstream(id, depth) AS (
        SELECT source_id, 1
        FROM lineage_edges
        WHERE target_id = @nodeId AND edge_type = '${FEEDS_INTO}'
        UNION
        SELECT e.source_id, u.depth + 1
        FROM lineage_edges e
        JOIN upstream u ON e.target_id = u.id
        WHERE e.edge_type = '${FEEDS_INTO}' AND u.depth < @depth
      )
      SELECT n.id AS id, n.name AS name, n.node_type AS type, MIN(u.depth) AS depth
      FROM upstream u
      JOIN lineage_nodes n ON n.id = u.id
      WHERE u.id != @nodeId
      GROUP BY n.id, n.name, n.node_type
      ORDER BY depth, n.id
    `);
  }

  static open(path: string): SqliteLineageGraph {
    return new SqliteLineageGraph(new Database(path));
  }

  private ensureTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS lineage_nodes (
        id TEXT PRIMARY KEY,
        node_type TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        metadata TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS lineage_edges (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source_id TEXT NOT NULL REFERENCES lineage_nodes(id),
        target_id TEXT NOT NULL REFERENCES lineage_nodes(id),
        edge_type TEXT NOT NULL,
        strength REAL NOT NULL DEFAULT 1.0,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_lineage_nodes_name ON lineage_nodes(name);
      CREATE INDEX IF NOT EXISTS idx_lineage_edges_source ON lineage_edges(source_id);
      CREATE INDEX IF NOT EXISTS idx_lineage_edges_target ON lineage_edges(target_id);
    `);
  }

  addNode(node: NodeInput): void {
    const now = new Date().toISOString();
    this.stmtUpsertNode.run({
      id: node.id,
      node_type: node.nodeType,
      name: node.name,
      description: node.description ?? '',
      metadata: JSON.stringify(node.metadata ?? {}),
      created_at: now,
      updated_at: node.updatedAt ?? now,
    });
  }

  addEdge(edge: EdgeInput): void {
    this.stmtInsertEdge.run(
      edge.sourceId,
      edge.targetId,
      edge.edgeType ?? FEEDS_INTO,
      edge.strength ?? 1.0,
      new Date().toISOString()
    );
  }

  getNode(nodeId: string): LineageNode | null {
    const row = this.stmtGetNode.get(nodeId);
    return row ? toLineageNode(row) : null;
  }

  listNodes(): LineageNode[] {
    return this.stmtListNodes.all().map(toLineageNode);
  }

  /**
   * Upstream nodes of `nodeId` within `depth` hops. Direct parents are at
   * depth 1; a node reachable along several paths is reported once, at its
   * shortest distance.
   */
  getDependencies(nodeId: string, depth: number): DependencyTraversal {
    const rows = this.stmtDependencies.all({ nodeId, depth });
    const dependencies: DependencyRecord[] = rows.map((row) => ({
      id: row.id,
      name: row.name,
      type: row.type,
      depth: row.depth,
    }));
    return { root: nodeId, dependencies };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function toLineageNode(row: NodeRow): LineageNode {
  return {
    id: row.id,
    nodeType: row.node_type,
    name: row.name,
    description: row.description,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const MetadataSchema = z.record(z.unknown());

/** Unreadable metadata is reported as empty. */
function parseMetadata(raw: string): Record<string, unknown> {
  const parsed = safeSync<unknown>(() => JSON.parse(raw));
  if (!parsed.ok) {
    return {};
  }
  const metadata = MetadataSchema.safeParse(parsed.value);
  return metadata.success ? metadata.data : {};
}
