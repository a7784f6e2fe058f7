/**
 * @fileoverview SQLite-backed document embeddings and semantic search
 *
 * Embeddings are stored as float32 BLOBs and ranked in process by cosine
 * similarity. The store never computes embeddings itself; an `Embedder`
 * supplies them.
 */

import type Database from 'better-sqlite3';
import type { SearchHit, SemanticSearch } from '../tools/types.js';
import { cosineSimilarity } from '../utils/math.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface DocumentInput {
  id: string;
  text: string;
  entityName: string;
  sourceType: string;
  embedding: ArrayLike<number>;
}

interface DocumentRow {
  id: string;
  text: string;
  entity_name: string;
  source_type: string;
  embedding: Buffer;
}

// ============================================================================
// STORE
// ============================================================================

export class SqliteVectorStore {
  private readonly stmtUpsert: Database.Statement<[string, string, string, string, Buffer]>;
  private readonly stmtAll: Database.Statement<[], DocumentRow>;
  private readonly stmtCount: Database.Statement<[], { count: number }>;

  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS lineage_documents (
        id TEXT PRIMARY KEY,
        text TEXT NOT NULL,
        entity_name TEXT NOT NULL,
        source_type TEXT NOT NULL,
        embedding BLOB NOT NULL
      )
    `);

    this.stmtUpsert = this.db.prepare<[string, string, string, string, Buffer]>(`
      INSERT INTO lineage_documents (id, text, entity_name, source_type, embedding)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        text = excluded.text,
        entity_name = excluded.entity_name,
        source_type = excluded.source_type,
        embedding = excluded.embedding
    `);
    this.stmtAll = this.db.prepare<[], DocumentRow>(`
      SELECT id, text, entity_name, source_type, embedding FROM lineage_documents
    `);
    this.stmtCount = this.db.prepare<[], { count: number }>(`
      SELECT COUNT(*) AS count FROM lineage_documents
    `);
  }

  addDocument(doc: DocumentInput): void {
    this.stmtUpsert.run(doc.id, doc.text, doc.entityName, doc.sourceType, encodeEmbedding(doc.embedding));
  }

  count(): number {
    return this.stmtCount.get()?.count ?? 0;
  }

  /**
   * Documents ranked by cosine similarity to `queryEmbedding`, best first.
   * Documents whose dimension differs from the query are skipped.
   */
  search(queryEmbedding: ArrayLike<number>, limit: number): SearchHit[] {
    const hits: SearchHit[] = [];
    for (const row of this.stmtAll.iterate()) {
      const embedding = decodeEmbedding(row.embedding);
      if (embedding.length === 0 || embedding.length !== queryEmbedding.length) {
        continue;
      }
      hits.push({
        id: row.id,
        entityName: row.entity_name,
        similarity: cosineSimilarity(queryEmbedding, embedding),
        text: row.text,
        sourceType: row.source_type,
      });
    }
    return hits
      .sort((a, b) => b.similarity - a.similarity || a.id.localeCompare(b.id))
      .slice(0, Math.max(0, limit));
  }
}

export function encodeEmbedding(values: ArrayLike<number>): Buffer {
  const floats = Float32Array.from(values);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

export function decodeEmbedding(blob: Buffer): Float32Array {
  // Copy first: the Buffer's byteOffset need not be 4-byte aligned.
  const bytes = Uint8Array.from(blob);
  return new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / Float32Array.BYTES_PER_ELEMENT));
}

// ============================================================================
// SEARCH SERVICE
// ============================================================================

/**
 * Embeds the query text, then ranks stored documents against it.
 */
export class VectorSearchService implements SemanticSearch {
  constructor(
    private readonly embedder: Embedder,
    private readonly store: SqliteVectorStore
  ) {}

  async search(query: string, limit: number): Promise<SearchHit[]> {
    const embedding = await this.embedder.embed(query);
    return this.store.search(embedding, limit);
  }
}
