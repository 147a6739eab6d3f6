/**
 * In-memory index with SQLite persistence.
 *
 * Chunks and both vector representations are stored in SQLite and loaded
 * into memory on first access for brute-force search.
 *
 * ## Architecture
 *
 * ```
 * ┌──────────────────────────────────────────────────────────────┐
 * │                      SqliteIndexStore                        │
 * │  ┌──────────────────────────┐   ┌──────────────────────────┐ │
 * │  │  In-Memory Index         │   │  SQLite Persistence      │ │
 * │  │  chunks: id -> vectors   │◄──┤  documents, chunks       │ │
 * │  │  documents: source -> ids│   │  (per collection)        │ │
 * │  │  docFreq: term -> count  │   └──────────────────────────┘ │
 * │  └──────────────────────────┘                                │
 * └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Write path
 *
 * Writes for one source id run under a per-source mutex. The delete and the
 * inserts happen in one SQLite transaction; the in-memory index is swapped
 * synchronously after commit, so a concurrent search sees either the old
 * chunk set or the new one.
 *
 * ## Scoring
 *
 * - Dense: cosine similarity
 * - Sparse: dot product over overlapping terms, each term optionally scaled by
 *   its inverse document frequency `ln((N - n + 0.5) / (n + 0.5) + 1)`
 *
 * Equal scores are ordered by chunk id ascending.
 *
 * @module storage/sqlite-index-store
 */

import type { Db } from './db.js';
import { ensureCollection } from './collections.js';
import type { DocumentRecord, IndexStats, IndexStore, UpsertOptions } from './index-store.js';
import type { Chunk, DenseVector, SearchHit, SparseVector, StoredChunk } from '../core/types.js';
import { ConfigurationError, DuorankError, IndexStoreError } from '../utils/errors.js';
import {
  deserializeEmbedding,
  deserializeSparse,
  serializeEmbedding,
  serializeSparse,
} from '../utils/embedding-utils.js';
import { cosineSimilarity, sparseDot } from '../utils/vector-math.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { throwIfAborted } from '../utils/async-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('index-store');

export interface SqliteIndexStoreOptions {
  /** Collection to read and write; created on first use */
  collection: string;
  /** Dense dimension; must match an existing collection's */
  dimensions: number;
  /** Scale sparse term matches by inverse document frequency. Default: true */
  sparseIdf?: boolean;
}

interface IndexedChunk {
  chunk: StoredChunk;
  dense: DenseVector;
  sparse: SparseVector;
}

interface IndexedDocument {
  title?: string;
  chunkIds: string[];
}

interface ChunkRow {
  id: string;
  source_id: string;
  ordinal: number;
  start_offset: number;
  end_offset: number;
  content: string;
  dense: Buffer;
  sparse_indices: Buffer;
  sparse_values: Buffer;
}

interface DocumentRow {
  source_id: string;
  title: string | null;
}

/**
 * Order hits by score descending, then chunk id ascending.
 */
function compareHits(a: { id: string; score: number }, b: { id: string; score: number }): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function validateTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new ConfigurationError(`topK must be a positive integer, got ${topK}`, 'INVALID_TOP_K');
  }
}

function rankTop(scored: Array<{ id: string; score: number }>, topK: number): SearchHit[] {
  return scored
    .sort(compareHits)
    .slice(0, topK)
    .map((s, i) => ({ chunkId: s.id, score: s.score, rank: i + 1 }));
}

/**
 * Index store over one named collection of a SQLite database.
 */
export class SqliteIndexStore implements IndexStore {
  readonly dimensions: number;
  readonly collection: string;
  private readonly sparseIdf: boolean;

  private chunks = new Map<string, IndexedChunk>();
  private documents = new Map<string, IndexedDocument>();
  /** term index -> number of chunks containing it */
  private docFreq = new Map<number, number>();
  private loaded = false;
  private readonly writes = new KeyedMutex();

  /**
   * @throws ConfigurationError DIMENSION_MISMATCH if the collection exists with another dimension
   */
  constructor(
    private readonly db: Db,
    options: SqliteIndexStoreOptions,
  ) {
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw new ConfigurationError(
        `dimensions must be a positive integer, got ${options.dimensions}`,
        'INVALID_DIMENSIONS',
      );
    }
    this.dimensions = options.dimensions;
    this.collection = options.collection;
    this.sparseIdf = options.sparseIdf ?? true;
    ensureCollection(db, options.collection, options.dimensions);
  }

  /**
   * Load the collection into memory. Runs once.
   */
  private load(): void {
    if (this.loaded) return;

    try {
      const docRows = this.db
        .prepare('SELECT source_id, title FROM documents WHERE collection = ?')
        .all(this.collection) as DocumentRow[];
      for (const row of docRows) {
        this.documents.set(row.source_id, { title: row.title ?? undefined, chunkIds: [] });
      }

      const chunkRows = this.db
        .prepare(
          `
        SELECT id, source_id, ordinal, start_offset, end_offset, content, dense, sparse_indices, sparse_values
        FROM chunks WHERE collection = ?
        ORDER BY source_id, ordinal
      `,
        )
        .all(this.collection) as ChunkRow[];

      for (const row of chunkRows) {
        const doc = this.documents.get(row.source_id) ?? { chunkIds: [] };
        this.documents.set(row.source_id, doc);
        this.addToMemory(
          {
            chunk: {
              id: row.id,
              sourceId: row.source_id,
              title: doc.title,
              ordinal: row.ordinal,
              text: row.content,
              start: row.start_offset,
              end: row.end_offset,
            },
            dense: deserializeEmbedding(row.dense),
            sparse: deserializeSparse(row.sparse_indices, row.sparse_values),
          },
          doc,
        );
      }
    } catch (error) {
      this.chunks.clear();
      this.documents.clear();
      this.docFreq.clear();
      if (error instanceof DuorankError) throw error;
      throw new IndexStoreError(
        `Failed to load collection "${this.collection}"`,
        'LOAD_FAILED',
        error,
      );
    }

    this.loaded = true;
    log.debug('Loaded collection', {
      collection: this.collection,
      documents: this.documents.size,
      chunks: this.chunks.size,
    });
  }

  private addToMemory(entry: IndexedChunk, doc: IndexedDocument): void {
    this.chunks.set(entry.chunk.id, entry);
    doc.chunkIds.push(entry.chunk.id);
    for (const index of entry.sparse.indices) {
      this.docFreq.set(index, (this.docFreq.get(index) ?? 0) + 1);
    }
  }

  private removeSourceFromMemory(sourceId: string): number {
    const doc = this.documents.get(sourceId);
    if (!doc) return 0;

    for (const id of doc.chunkIds) {
      const entry = this.chunks.get(id);
      if (!entry) continue;
      for (const index of entry.sparse.indices) {
        const n = (this.docFreq.get(index) ?? 1) - 1;
        if (n > 0) {
          this.docFreq.set(index, n);
        } else {
          this.docFreq.delete(index);
        }
      }
      this.chunks.delete(id);
    }
    this.documents.delete(sourceId);
    return doc.chunkIds.length;
  }

  private validateChunks(document: DocumentRecord, chunks: readonly Chunk[]): void {
    const ids = new Set<string>();
    for (const chunk of chunks) {
      if (chunk.documentId !== document.sourceId) {
        throw new IndexStoreError(
          `Chunk ${chunk.id} belongs to "${chunk.documentId}", not "${document.sourceId}"`,
          'PARENT_MISMATCH',
        );
      }
      if (chunk.dense.length !== this.dimensions) {
        throw new ConfigurationError(
          `Chunk ${chunk.id} has a ${chunk.dense.length}-dimension dense vector, expected ${this.dimensions}`,
          'DIMENSION_MISMATCH',
        );
      }
      if (chunk.sparse.indices.length !== chunk.sparse.values.length) {
        throw new IndexStoreError(
          `Chunk ${chunk.id} has mismatched sparse indices and values`,
          'UPSERT_FAILED',
        );
      }
      if (ids.has(chunk.id)) {
        throw new IndexStoreError(`Duplicate chunk id ${chunk.id}`, 'UPSERT_FAILED');
      }
      ids.add(chunk.id);
    }
  }

  async upsert(
    document: DocumentRecord,
    chunks: readonly Chunk[],
    options: UpsertOptions = {},
  ): Promise<void> {
    this.validateChunks(document, chunks);
    const ingestedAt = document.ingestedAt ?? new Date();

    await this.writes.runExclusive(document.sourceId, () => {
      throwIfAborted(options.signal);
      this.load();

      const deleteChunks = this.db.prepare(
        'DELETE FROM chunks WHERE collection = ? AND source_id = ?',
      );
      const upsertDocument = this.db.prepare(`
        INSERT INTO documents (collection, source_id, title, ingested_at, chunk_count)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT (collection, source_id) DO UPDATE SET
          title = excluded.title,
          ingested_at = excluded.ingested_at,
          chunk_count = excluded.chunk_count
      `);
      const insertChunk = this.db.prepare(`
        INSERT INTO chunks
        (collection, id, source_id, ordinal, start_offset, end_offset, content, dense, sparse_indices, sparse_values)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);

      const replace = this.db.transaction(() => {
        deleteChunks.run(this.collection, document.sourceId);
        upsertDocument.run(
          this.collection,
          document.sourceId,
          document.title ?? null,
          ingestedAt.toISOString(),
          chunks.length,
        );
        for (const chunk of chunks) {
          const sparse = serializeSparse(chunk.sparse);
          insertChunk.run(
            this.collection,
            chunk.id,
            chunk.documentId,
            chunk.ordinal,
            chunk.start,
            chunk.end,
            chunk.text,
            serializeEmbedding(chunk.dense),
            sparse.indices,
            sparse.values,
          );
        }
      });

      try {
        replace();
      } catch (error) {
        throw new IndexStoreError(
          `Failed to upsert ${chunks.length} chunks for "${document.sourceId}"`,
          'UPSERT_FAILED',
          error,
        );
      }

      // Committed: swap the in-memory view in one synchronous step
      const removed = this.removeSourceFromMemory(document.sourceId);
      const doc: IndexedDocument = { title: document.title, chunkIds: [] };
      this.documents.set(document.sourceId, doc);
      for (const chunk of chunks) {
        this.addToMemory(
          {
            chunk: {
              id: chunk.id,
              sourceId: chunk.documentId,
              title: document.title,
              ordinal: chunk.ordinal,
              text: chunk.text,
              start: chunk.start,
              end: chunk.end,
            },
            // Stored at float32 precision; keep memory identical to what a reload sees
            dense: Array.from(new Float32Array(chunk.dense)),
            sparse: {
              indices: [...chunk.sparse.indices],
              values: Array.from(new Float32Array(chunk.sparse.values)),
            },
          },
          doc,
        );
      }

      log.debug('Upserted document', {
        collection: this.collection,
        sourceId: document.sourceId,
        removed,
        inserted: chunks.length,
      });
    });
  }

  async deleteBySource(sourceId: string): Promise<number> {
    return this.writes.runExclusive(sourceId, () => {
      this.load();

      const remove = this.db.transaction(() => {
        const removedChunks = this.db
          .prepare('DELETE FROM chunks WHERE collection = ? AND source_id = ?')
          .run(this.collection, sourceId).changes;
        this.db
          .prepare('DELETE FROM documents WHERE collection = ? AND source_id = ?')
          .run(this.collection, sourceId);
        return removedChunks;
      });

      let removed: number;
      try {
        removed = remove();
      } catch (error) {
        throw new IndexStoreError(`Failed to delete "${sourceId}"`, 'DELETE_FAILED', error);
      }

      this.removeSourceFromMemory(sourceId);
      if (removed > 0) {
        log.debug('Deleted document', { collection: this.collection, sourceId, removed });
      }
      return removed;
    });
  }

  async searchDense(vector: DenseVector, topK: number): Promise<SearchHit[]> {
    validateTopK(topK);
    if (vector.length !== this.dimensions) {
      throw new ConfigurationError(
        `Query vector has ${vector.length} dimensions, expected ${this.dimensions}`,
        'DIMENSION_MISMATCH',
      );
    }
    this.load();

    try {
      const scored: Array<{ id: string; score: number }> = [];
      for (const [id, entry] of this.chunks) {
        scored.push({ id, score: cosineSimilarity(vector, entry.dense) });
      }
      return rankTop(scored, topK);
    } catch (error) {
      throw new IndexStoreError('Dense search failed', 'SEARCH_FAILED', error);
    }
  }

  async searchSparse(vector: SparseVector, topK: number): Promise<SearchHit[]> {
    validateTopK(topK);
    this.load();
    if (vector.indices.length === 0) {
      return [];
    }

    try {
      const total = this.chunks.size;
      const weight = this.sparseIdf
        ? (index: number): number => {
            const n = this.docFreq.get(index) ?? 0;
            return Math.log((total - n + 0.5) / (n + 0.5) + 1);
          }
        : undefined;

      const scored: Array<{ id: string; score: number }> = [];
      for (const [id, entry] of this.chunks) {
        const score = sparseDot(vector, entry.sparse, weight);
        if (score > 0) {
          scored.push({ id, score });
        }
      }
      return rankTop(scored, topK);
    } catch (error) {
      throw new IndexStoreError('Sparse search failed', 'SEARCH_FAILED', error);
    }
  }

  async getChunks(ids: readonly string[]): Promise<Map<string, StoredChunk>> {
    this.load();
    const found = new Map<string, StoredChunk>();
    for (const id of ids) {
      const entry = this.chunks.get(id);
      if (entry) {
        found.set(id, { ...entry.chunk });
      }
    }
    return found;
  }

  async stats(): Promise<IndexStats> {
    this.load();
    return { documents: this.documents.size, chunks: this.chunks.size };
  }
}
