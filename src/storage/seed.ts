/**
 * @fileoverview Sample lineage loading
 *
 * Reads `data/sample_lineage.json` (nodes, FEEDS_INTO edges and searchable
 * documents) and writes it into the graph and, when an embedder is at hand,
 * the vector store.
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import type { KnownEntity } from '../agent/prompts.js';
import { createLogger } from '../telemetry/logger.js';
import type { LineageNode } from '../tools/types.js';
import type { SqliteLineageGraph } from './lineage_graph.js';
import type { Embedder, SqliteVectorStore } from './vector_store.js';

const log = createLogger('seed');

export const SampleLineageSchema = z.object({
  nodes: z.array(z.object({
    id: z.string().min(1),
    nodeType: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(''),
    metadata: z.record(z.unknown()).optional(),
  })),
  edges: z.array(z.object({
    sourceId: z.string().min(1),
    targetId: z.string().min(1),
    edgeType: z.string().default('FEEDS_INTO'),
    strength: z.number().optional(),
  })),
  documents: z.array(z.object({
    id: z.string().min(1),
    text: z.string(),
    entityName: z.string().min(1),
    sourceType: z.string().min(1),
  })).default([]),
});

export type SampleLineage = z.infer<typeof SampleLineageSchema>;

export interface SeedReport {
  nodes: number;
  edges: number;
  documents: number;
}

// Sources run from src/storage, the build from dist/src/storage.
const SAMPLE_CANDIDATES = [
  new URL('../../data/sample_lineage.json', import.meta.url),
  new URL('../../../data/sample_lineage.json', import.meta.url),
];

export function resolveSamplePath(): string {
  for (const candidate of SAMPLE_CANDIDATES) {
    const path = fileURLToPath(candidate);
    if (existsSync(path)) {
      return path;
    }
  }
  throw new ValidationError('sampleLineage', 'data/sample_lineage.json', 'missing file');
}

export function parseSampleLineage(raw: unknown): SampleLineage {
  const result = SampleLineageSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new ValidationError(`sampleLineage.${issue.path.join('.')}`, issue.message, 'invalid entry');
  }
  return result.data;
}

export function loadSampleLineage(path: string = resolveSamplePath()): SampleLineage {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseSampleLineage(raw);
}

/**
 * Write the sample into the graph, and into the vector store when both a
 * store and an embedder are given. Edges are only written on the first
 * seed, so re-seeding does not duplicate them.
 */
export async function seedSampleLineage(
  graph: SqliteLineageGraph,
  store?: SqliteVectorStore,
  embedder?: Embedder,
  sample: SampleLineage = loadSampleLineage()
): Promise<SeedReport> {
  const fresh = graph.listNodes().length === 0;
  for (const node of sample.nodes) {
    graph.addNode(node);
  }
  if (fresh) {
    for (const edge of sample.edges) {
      graph.addEdge(edge);
    }
  }

  let documents = 0;
  if (store && embedder) {
    for (const doc of sample.documents) {
      const embedding = await embedder.embed(doc.text);
      store.addDocument({ ...doc, embedding });
      documents += 1;
    }
  }

  const report: SeedReport = {
    nodes: sample.nodes.length,
    edges: fresh ? sample.edges.length : 0,
    documents,
  };
  log.info('sample lineage loaded', { ...report });
  return report;
}

export function vocabularyFromNodes(nodes: Array<Pick<LineageNode, 'id' | 'name'>>): KnownEntity[] {
  return nodes.map((node) => ({ id: node.id, name: node.name }));
}
