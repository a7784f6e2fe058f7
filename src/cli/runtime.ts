/**
 * @fileoverview Wiring for CLI commands: one SQLite file holding both stores,
 * the Ollama clients, the six tools and an agent over them.
 */

import Database from 'better-sqlite3';
import { LineageAgent } from '../agent/orchestrator.js';
import type { LineageConfig } from '../config/index.js';
import { OllamaDecisionMaker, OllamaEmbedder } from '../providers/ollama.js';
import { SqliteLineageGraph } from '../storage/lineage_graph.js';
import { vocabularyFromNodes } from '../storage/seed.js';
import { SqliteVectorStore, VectorSearchService } from '../storage/vector_store.js';
import { createLineageTools } from '../tools/lineage_tools.js';
import { ToolRegistry } from '../tools/registry.js';
import { createError } from './errors.js';
import { getErrorMessage } from '../utils/errors.js';

export interface LineageRuntime {
  graph: SqliteLineageGraph;
  store: SqliteVectorStore;
  embedder: OllamaEmbedder;
  registry: ToolRegistry;
  createAgent(): LineageAgent;
  close(): void;
}

export function openRuntime(config: LineageConfig): LineageRuntime {
  let db: Database.Database;
  try {
    db = new Database(config.dbPath);
  } catch (error) {
    throw createError('STORAGE_ERROR', `Cannot open ${config.dbPath}: ${getErrorMessage(error)}`);
  }

  const graph = new SqliteLineageGraph(db);
  const store = new SqliteVectorStore(db);
  const embedder = new OllamaEmbedder({
    baseUrl: config.baseUrl,
    model: config.embeddingModel,
    timeoutMs: config.llmTimeoutMs,
  });
  const registry = new ToolRegistry(createLineageTools({
    search: new VectorSearchService(embedder, store),
    graph,
    staleAfterHours: config.staleAfterHours,
  }));

  return {
    graph,
    store,
    embedder,
    registry,
    createAgent: () => new LineageAgent({
      decisionMaker: new OllamaDecisionMaker({
        baseUrl: config.baseUrl,
        model: config.model,
        temperature: config.temperature,
        topP: config.topP,
        timeoutMs: config.llmTimeoutMs,
      }),
      registry,
      vocabulary: vocabularyFromNodes(graph.listNodes()),
      llmTimeoutMs: config.llmTimeoutMs,
      toolTimeoutMs: config.toolTimeoutMs,
      transitionLimit: config.transitionLimit,
    }),
    close: () => graph.close(),
  };
}
