/**
 * Index Store contract.
 *
 * The store exclusively owns persisted chunks and vectors. Mutations are
 * scoped per source id: concurrent writes to different sources proceed
 * independently, writes to the same source are serialized, and readers see
 * either the whole previous chunk set of a source or the whole new one.
 */

import type {
  Chunk,
  DenseVector,
  SearchHit,
  SourceDocument,
  SparseVector,
  StoredChunk,
} from '../core/types.js';

/** Document metadata recorded alongside its chunks. */
export type DocumentRecord = Omit<SourceDocument, 'text'>;

export interface UpsertOptions {
  /** Checked before the replace transaction starts; a started transaction always completes. */
  signal?: AbortSignal;
}

export interface IndexStats {
  documents: number;
  chunks: number;
}

export interface IndexStore {
  /** Dense dimension every stored and queried vector must have */
  readonly dimensions: number;

  /**
   * Atomically replace every chunk of `document.sourceId` with `chunks`.
   *
   * @throws IndexStoreError PARENT_MISMATCH if a chunk belongs to another document
   * @throws ConfigurationError DIMENSION_MISMATCH for a dense vector of the wrong length
   * @throws IndexStoreError UPSERT_FAILED if the transaction fails (nothing is changed)
   */
  upsert(document: DocumentRecord, chunks: readonly Chunk[], options?: UpsertOptions): Promise<void>;

  /** Top `topK` chunks by cosine similarity, descending, ties by chunk id. */
  searchDense(vector: DenseVector, topK: number): Promise<SearchHit[]>;

  /** Top `topK` chunks by sparse dot product over overlapping terms, descending, ties by chunk id. */
  searchSparse(vector: SparseVector, topK: number): Promise<SearchHit[]>;

  /**
   * Remove a document and all its chunks.
   *
   * @returns Number of chunks removed; 0 when the source is absent
   */
  deleteBySource(sourceId: string): Promise<number>;

  /** Stored chunks for the given ids. Unknown ids are left out. */
  getChunks(ids: readonly string[]): Promise<Map<string, StoredChunk>>;

  stats(): Promise<IndexStats>;
}
