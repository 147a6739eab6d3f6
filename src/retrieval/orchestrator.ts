/**
 * Retrieval orchestrator: the engine's public ingest and query paths.
 *
 * Ingest: chunk -> embed every chunk densely and sparsely -> atomic replace
 * in the index store. Query: embed densely and sparsely -> two independent
 * top-K searches -> RRF fusion -> hydrate stored chunks.
 *
 * The orchestrator holds no state between calls; the index store is the only
 * shared resource.
 */

import { createHash } from 'node:crypto';
import type { RetrievalConfig } from '../config/engine-config.js';
import type { Chunk, FusedResult, Representation, SourceDocument } from '../core/types.js';
import type { Chunker } from '../parser/chunker.js';
import type { DenseTextEmbedder, SparseTextEmbedder } from '../models/embedder.js';
import type { IndexStore } from '../storage/index-store.js';
import { fuse } from './rrf.js';
import {
  CancelledError,
  ConfigurationError,
  DuorankError,
  RetrievalError,
  errorMessage,
} from '../utils/errors.js';
import { mapWithConcurrency, throwIfAborted } from '../utils/async-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orchestrator');

export type IngestPhase = 'chunking' | 'embedding' | 'storing' | 'done';

export interface IngestProgress {
  phase: IngestPhase;
  current: number;
  total: number;
}

export interface IngestOptions {
  signal?: AbortSignal;
  onProgress?: (progress: IngestProgress) => void;
}

export interface RetrieveOptions {
  topKPerList?: number;
  topNFused?: number;
  rrfK?: number;
  signal?: AbortSignal;
}

/** A fused result joined with its stored chunk. */
export interface RetrievedChunk extends FusedResult {
  text: string;
  sourceId: string;
  title?: string;
  ordinal: number;
}

/** Why one representation was left out of a degraded retrieval. */
export interface RepresentationFailure {
  representation: Representation;
  code: string;
  message: string;
}

export interface RetrievalResult {
  results: RetrievedChunk[];
  /** True when one representation failed and ranking used the other alone */
  degraded: boolean;
  failures: RepresentationFailure[];
  durationMs: number;
}

export interface RetrievalOrchestratorDeps {
  chunker: Chunker;
  dense: DenseTextEmbedder;
  sparse: SparseTextEmbedder;
  store: IndexStore;
  retrieval: Readonly<RetrievalConfig>;
  /** Chunks embedded at once during ingest. Default: 4 */
  ingestConcurrency?: number;
}

/**
 * Stable chunk id: the same source, position and text always map to the same id.
 */
export function chunkIdFor(sourceId: string, ordinal: number, text: string): string {
  return createHash('sha256')
    .update(`${sourceId}\0${ordinal}\0${text}`)
    .digest('hex')
    .slice(0, 32);
}

function toFailure(representation: Representation, error: unknown): RepresentationFailure {
  return {
    representation,
    code: error instanceof DuorankError ? error.code : 'UNKNOWN',
    message: errorMessage(error),
  };
}

function validatePositiveInteger(value: number, name: string, code: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`, code);
  }
}

export class RetrievalOrchestrator {
  private readonly chunker: Chunker;
  private readonly dense: DenseTextEmbedder;
  private readonly sparse: SparseTextEmbedder;
  private readonly store: IndexStore;
  private readonly retrieval: Readonly<RetrievalConfig>;
  private readonly ingestConcurrency: number;

  constructor(deps: RetrievalOrchestratorDeps) {
    this.chunker = deps.chunker;
    this.dense = deps.dense;
    this.sparse = deps.sparse;
    this.store = deps.store;
    this.retrieval = deps.retrieval;
    this.ingestConcurrency = deps.ingestConcurrency ?? 4;
  }

  /**
   * Index a document, replacing any earlier version with the same sourceId.
   *
   * All-or-nothing per document: if any chunk fails to embed, nothing is
   * stored and the previous version stays searchable.
   *
   * @returns Number of chunks indexed
   * @throws ConfigurationError INVALID_SOURCE_ID
   * @throws EmbeddingProviderError when a chunk cannot be embedded
   * @throws IndexStoreError when the replace fails
   * @throws CancelledError if `options.signal` fires before the replace starts
   */
  async ingest(document: SourceDocument, options: IngestOptions = {}): Promise<number> {
    const { signal, onProgress } = options;
    const { sourceId } = document;
    if (sourceId.trim().length === 0) {
      throw new ConfigurationError('Document sourceId must not be empty', 'INVALID_SOURCE_ID');
    }
    throwIfAborted(signal);

    const start = performance.now();
    log.info('Ingesting document', { sourceId, chars: document.text.length });

    try {
      const spans = [...this.chunker.split(document.text)];
      onProgress?.({ phase: 'chunking', current: spans.length, total: spans.length });

      if (spans.length === 0) {
        log.warn('Document is empty; removing any indexed chunks', { sourceId });
      }

      let embedded = 0;
      const chunks = await mapWithConcurrency(
        spans,
        this.ingestConcurrency,
        async (span, _index, chunkSignal): Promise<Chunk> => {
          const [dense, sparse] = await Promise.all([
            this.dense.embed(span.text, { signal: chunkSignal }),
            this.sparse.embed(span.text, { signal: chunkSignal }),
          ]);
          embedded++;
          onProgress?.({ phase: 'embedding', current: embedded, total: spans.length });
          return {
            ...span,
            id: chunkIdFor(sourceId, span.ordinal, span.text),
            documentId: sourceId,
            dense,
            sparse,
          };
        },
        signal,
      );

      onProgress?.({ phase: 'storing', current: 0, total: chunks.length });
      await this.store.upsert(
        { sourceId, title: document.title, ingestedAt: document.ingestedAt },
        chunks,
        { signal },
      );
      onProgress?.({ phase: 'done', current: chunks.length, total: chunks.length });

      log.info('Ingested document', {
        sourceId,
        chunks: chunks.length,
        durationMs: Math.round(performance.now() - start),
      });
      return chunks.length;
    } catch (error) {
      log.error('Ingest failed; index unchanged', { sourceId, error: errorMessage(error) });
      if (error instanceof DuorankError) throw error;
      throw new RetrievalError(`Failed to ingest "${sourceId}"`, 'INGEST_FAILED', error);
    }
  }

  /**
   * Rank stored chunks for a query by fusing dense and sparse search.
   *
   * If one embedder fails, ranking continues on the other alone and the
   * result is flagged `degraded` with the failure listed. Blank queries
   * return no results.
   *
   * @throws RetrievalError ALL_REPRESENTATIONS_FAILED when both embedders fail
   * @throws ConfigurationError for invalid topK, topN or k
   * @throws IndexStoreError when a search fails
   * @throws CancelledError if `options.signal` fires
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const topK = options.topKPerList ?? this.retrieval.topKPerList;
    const topN = options.topNFused ?? this.retrieval.topNFused;
    const k = options.rrfK ?? this.retrieval.rrfK;
    const { signal } = options;

    validatePositiveInteger(topK, 'topKPerList', 'INVALID_TOP_K');
    validatePositiveInteger(topN, 'topNFused', 'INVALID_TOP_N');
    if (!Number.isFinite(k) || k <= 0) {
      throw new ConfigurationError(`rrfK must be a positive number, got ${k}`, 'INVALID_RRF_K');
    }
    throwIfAborted(signal);

    const start = performance.now();
    if (query.trim().length === 0) {
      return { results: [], degraded: false, failures: [], durationMs: 0 };
    }

    const [denseOutcome, sparseOutcome] = await Promise.allSettled([
      this.dense.embed(query, { signal }),
      this.sparse.embed(query, { signal }),
    ]);

    for (const outcome of [denseOutcome, sparseOutcome]) {
      if (outcome.status === 'rejected' && outcome.reason instanceof CancelledError) {
        throw outcome.reason;
      }
    }
    throwIfAborted(signal);

    const failures: RepresentationFailure[] = [];
    if (denseOutcome.status === 'rejected') {
      failures.push(toFailure('dense', denseOutcome.reason));
    }
    if (sparseOutcome.status === 'rejected') {
      failures.push(toFailure('sparse', sparseOutcome.reason));
    }

    if (denseOutcome.status === 'rejected' && sparseOutcome.status === 'rejected') {
      throw new RetrievalError(
        `Both query embeddings failed: ${failures.map((f) => `${f.representation}: ${f.message}`).join('; ')}`,
        'ALL_REPRESENTATIONS_FAILED',
        denseOutcome.reason,
      );
    }

    for (const failure of failures) {
      log.warn('Retrieval degraded to a single representation', {
        failed: failure.representation,
        code: failure.code,
        error: failure.message,
      });
    }

    const [denseHits, sparseHits] = await Promise.all([
      denseOutcome.status === 'fulfilled' ? this.store.searchDense(denseOutcome.value, topK) : [],
      sparseOutcome.status === 'fulfilled' ? this.store.searchSparse(sparseOutcome.value, topK) : [],
    ]);
    throwIfAborted(signal);

    const fused = fuse(denseHits, sparseHits, k, topN, {
      dense: this.retrieval.denseWeight,
      sparse: this.retrieval.sparseWeight,
    });

    // A chunk replaced between search and hydration is dropped rather than returned stale
    const stored = await this.store.getChunks(fused.map((r) => r.chunkId));
    const results: RetrievedChunk[] = [];
    const dropped: string[] = [];
    for (const result of fused) {
      const chunk = stored.get(result.chunkId);
      if (!chunk) {
        dropped.push(result.chunkId);
        continue;
      }
      results.push({
        ...result,
        text: chunk.text,
        sourceId: chunk.sourceId,
        title: chunk.title,
        ordinal: chunk.ordinal,
      });
    }

    if (dropped.length > 0) {
      log.debug('Dropped fused results whose chunks were replaced', { dropped });
    }

    const durationMs = performance.now() - start;
    log.debug('Retrieved', {
      denseHits: denseHits.length,
      sparseHits: sparseHits.length,
      results: results.length,
      degraded: failures.length > 0,
      durationMs: Math.round(durationMs),
    });

    return { results, degraded: failures.length > 0, failures, durationMs };
  }

  /**
   * Remove a document and all of its chunks. No-op for an unknown source.
   *
   * @returns Number of chunks removed
   */
  async deleteBySource(sourceId: string): Promise<number> {
    const removed = await this.store.deleteBySource(sourceId);
    log.info('Deleted document', { sourceId, removed });
    return removed;
  }
}
