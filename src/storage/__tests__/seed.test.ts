import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { SqliteLineageGraph } from '../lineage_graph.js';
import {
  loadSampleLineage,
  parseSampleLineage,
  resolveSamplePath,
  seedSampleLineage,
  vocabularyFromNodes,
} from '../seed.js';
import { SqliteVectorStore } from '../vector_store.js';

describe('sample lineage file', () => {
  it('is found beside the sources and parses', () => {
    expect(resolveSamplePath().endsWith('sample_lineage.json')).toBe(true);

    const sample = loadSampleLineage();
    expect(sample.nodes.map((node) => node.id)).toEqual([
      'table_users',
      'table_orders',
      'table_order_clean',
      'table_revenue_daily',
      'dashboard_revenue',
    ]);
    expect(sample.edges).toHaveLength(4);
    expect(sample.edges.every((edge) => edge.edgeType === 'FEEDS_INTO')).toBe(true);
    expect(sample.documents).toHaveLength(5);
  });
});

describe('parseSampleLineage', () => {
  it('fills defaults', () => {
    const sample = parseSampleLineage({
      nodes: [{ id: 'n', nodeType: 'Table', name: 'n' }],
      edges: [{ sourceId: 'n', targetId: 'n' }],
    });
    expect(sample.nodes[0].description).toBe('');
    expect(sample.edges[0].edgeType).toBe('FEEDS_INTO');
    expect(sample.documents).toEqual([]);
  });

  it('names the offending entry', () => {
    const error = (() => {
      try {
        parseSampleLineage({ nodes: [{ id: 'n', nodeType: 'Table', name: '' }], edges: [] });
        return undefined;
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty('field', 'sampleLineage.nodes.0.name');
  });
});

describe('seedSampleLineage', () => {
  let db: Database.Database;
  let graph: SqliteLineageGraph;

  beforeEach(() => {
    db = new Database(':memory:');
    graph = new SqliteLineageGraph(db);
  });

  afterEach(() => {
    graph.close();
  });

  it('loads the graph without an embedder', async () => {
    const report = await seedSampleLineage(graph);

    expect(report).toEqual({ nodes: 5, edges: 4, documents: 0 });
    expect(graph.getDependencies('dashboard_revenue', 3).dependencies.map((dep) => dep.id)).toEqual([
      'table_revenue_daily',
      'table_order_clean',
      'table_users',
      'table_orders',
    ]);
  });

  it('does not duplicate edges on a second seed', async () => {
    await seedSampleLineage(graph);
    const second = await seedSampleLineage(graph);

    expect(second).toEqual({ nodes: 5, edges: 0, documents: 0 });
    const { count } = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM lineage_edges').get() ?? { count: -1 };
    expect(count).toBe(4);
  });

  it('embeds documents when a store and embedder are given', async () => {
    const store = new SqliteVectorStore(db);
    const embed = vi.fn(async (text: string) => [text.length, 1]);

    const report = await seedSampleLineage(graph, store, { embed });

    expect(report.documents).toBe(5);
    expect(embed).toHaveBeenCalledTimes(5);
    expect(store.count()).toBe(5);
  });

  it('maps nodes to a vocabulary', async () => {
    await seedSampleLineage(graph);
    expect(vocabularyFromNodes(graph.listNodes())).toEqual([
      { id: 'dashboard_revenue', name: 'revenue_dashboard' },
      { id: 'table_order_clean', name: 'order_clean' },
      { id: 'table_orders', name: 'orders' },
      { id: 'table_revenue_daily', name: 'revenue_daily' },
      { id: 'table_users', name: 'users' },
    ]);
  });
});
