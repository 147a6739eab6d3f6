/**
 * Core data model shared by the chunker, embedders, index store and fusion.
 */

/** Dense embedding: fixed-length real-valued vector. */
export type DenseVector = number[];

/**
 * Sparse embedding as parallel arrays.
 * Indices are unique and ascending; values are finite and non-negative.
 */
export interface SparseVector {
  indices: number[];
  values: number[];
}

/** The two vector representations stored per chunk. */
export type Representation = 'dense' | 'sparse';

/**
 * A document to ingest. Re-ingesting the same sourceId replaces it.
 */
export interface SourceDocument {
  /** Stable identifier, usually the origin URL */
  sourceId: string;
  /** Raw (markdown) text */
  text: string;
  title?: string;
  /** Defaults to now */
  ingestedAt?: Date;
}

/**
 * A contiguous span of document text produced by the chunker.
 * `text === document.slice(start, end)`.
 */
export interface TextSpan {
  /** 0-based position within the document */
  ordinal: number;
  text: string;
  start: number;
  end: number;
}

/**
 * The unit of indexing and retrieval.
 */
export interface Chunk extends TextSpan {
  /** Stable, unique within a collection */
  id: string;
  /** sourceId of the parent document */
  documentId: string;
  dense: DenseVector;
  sparse: SparseVector;
}

/**
 * A stored chunk without its vectors, as returned to callers.
 */
export interface StoredChunk extends TextSpan {
  id: string;
  sourceId: string;
  title?: string;
}

/**
 * One entry of a single-representation ranking.
 */
export interface SearchHit {
  chunkId: string;
  score: number;
  /** 1-based position in its source ranking */
  rank: number;
}

/**
 * One entry of the fused ranking.
 */
export interface FusedResult {
  chunkId: string;
  score: number;
  /** Absent when the chunk was not in the dense list */
  denseRank?: number;
  /** Absent when the chunk was not in the sparse list */
  sparseRank?: number;
}
