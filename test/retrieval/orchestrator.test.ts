/**
 * Tests for the retrieval orchestrator: ingest, retrieve and delete end to end
 * over an in-memory index.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RetrievalOrchestrator, chunkIdFor, type IngestProgress } from '../../src/retrieval/orchestrator.js';
import { Chunker } from '../../src/parser/chunker.js';
import { DenseEmbedder, type DenseEmbeddingProvider } from '../../src/models/dense-embedder.js';
import { SparseEmbedder, type SparseEmbeddingModel } from '../../src/models/sparse-embedder.js';
import { LexicalSparseModel } from '../../src/models/lexical-model.js';
import { SqliteIndexStore } from '../../src/storage/sqlite-index-store.js';
import type { Db } from '../../src/storage/db.js';
import { DEFAULT_CONFIG } from '../../src/config/engine-config.js';
import { CancelledError, RetrievalError } from '../../src/utils/errors.js';
import { getLogLevel, setLogLevel, setLogSink, type LogLevel } from '../../src/utils/logger.js';
import { createTestDb } from '../storage/test-utils.js';
import {
  FailingSparseModel,
  FakeDenseProvider,
  HangingDenseProvider,
  authError,
} from '../models/fakes.js';

const DIMENSIONS = 16;
const INSTALL_DOC = 'https://docs.test/install';
const RETRY_DOC = 'https://docs.test/retry';

const NATO = ['alpha', 'bravo', 'charlie', 'delta', 'echo', 'foxtrot'];
/** 600 characters with no separator the chunker recognizes */
const LONG_TEXT = Array.from({ length: 200 }, (_, i) => NATO[i % NATO.length])
  .join('_')
  .slice(0, 600);
/** 1200 characters, eight spans at chunkSize 200 and overlap 50 */
const LONGER_TEXT = Array.from({ length: 400 }, (_, i) => NATO[i % NATO.length])
  .join('_')
  .slice(0, 1200);

describe('RetrievalOrchestrator', () => {
  let db: Db;
  let store: SqliteIndexStore;
  let provider: FakeDenseProvider;
  let orchestrator: RetrievalOrchestrator;
  let savedLevel: LogLevel;

  function createOrchestrator(
    denseProvider: DenseEmbeddingProvider,
    sparseModel: SparseEmbeddingModel,
    ingestConcurrency = 4,
  ): RetrievalOrchestrator {
    return new RetrievalOrchestrator({
      chunker: new Chunker({ chunkSize: 200, overlap: 50 }),
      dense: new DenseEmbedder(
        {
          ...DEFAULT_CONFIG.dense,
          model: 'test-model',
          dimensions: DIMENSIONS,
          initialDelayMs: 1,
          maxDelayMs: 1,
          cache: false,
        },
        { provider: denseProvider },
      ),
      sparse: new SparseEmbedder(sparseModel),
      store,
      retrieval: DEFAULT_CONFIG.retrieval,
      ingestConcurrency,
    });
  }

  async function ingestSamples(): Promise<void> {
    await orchestrator.ingest({
      sourceId: INSTALL_DOC,
      title: 'Installation',
      text: 'Install the package with npm and import the client.',
    });
    await orchestrator.ingest({
      sourceId: RETRY_DOC,
      text: 'Configure retry backoff and timeout settings for requests.',
    });
  }

  beforeEach(() => {
    savedLevel = getLogLevel();
    setLogLevel('silent');
    db = createTestDb();
    store = new SqliteIndexStore(db, { collection: 'default', dimensions: DIMENSIONS });
    provider = new FakeDenseProvider();
    orchestrator = createOrchestrator(provider, new LexicalSparseModel());
  });

  afterEach(() => {
    db.close();
    setLogLevel(savedLevel);
  });

  describe('chunkIdFor', () => {
    it('is stable and depends on source, position and text', () => {
      const id = chunkIdFor('doc', 0, 'text');

      expect(id).toMatch(/^[0-9a-f]{32}$/);
      expect(chunkIdFor('doc', 0, 'text')).toBe(id);
      expect(chunkIdFor('doc', 1, 'text')).not.toBe(id);
      expect(chunkIdFor('other', 0, 'text')).not.toBe(id);
      expect(chunkIdFor('doc', 0, 'texts')).not.toBe(id);
    });
  });

  describe('ingest', () => {
    it('chunks, embeds and stores every span', async () => {
      const count = await orchestrator.ingest({ sourceId: INSTALL_DOC, text: LONG_TEXT });

      expect(LONG_TEXT).toHaveLength(600);
      expect(count).toBe(4);
      expect(provider.calls).toBe(4);
      expect(await store.stats()).toEqual({ documents: 1, chunks: 4 });

      const spans = [...new Chunker({ chunkSize: 200, overlap: 50 }).split(LONG_TEXT)];
      const ids = spans.map((s) => chunkIdFor(INSTALL_DOC, s.ordinal, s.text));
      const stored = await store.getChunks(ids);
      expect(ids.map((id) => [stored.get(id)?.start, stored.get(id)?.end])).toEqual([
        [0, 200],
        [150, 350],
        [300, 500],
        [450, 600],
      ]);
    });

    it('reports progress through each phase', async () => {
      const sequential = createOrchestrator(provider, new LexicalSparseModel(), 1);
      const events: IngestProgress[] = [];

      await sequential.ingest(
        { sourceId: INSTALL_DOC, text: LONG_TEXT },
        { onProgress: (p) => events.push(p) },
      );

      expect(events).toEqual([
        { phase: 'chunking', current: 4, total: 4 },
        { phase: 'embedding', current: 1, total: 4 },
        { phase: 'embedding', current: 2, total: 4 },
        { phase: 'embedding', current: 3, total: 4 },
        { phase: 'embedding', current: 4, total: 4 },
        { phase: 'storing', current: 0, total: 4 },
        { phase: 'done', current: 4, total: 4 },
      ]);
    });

    it('replaces the previous version of a document', async () => {
      await orchestrator.ingest({ sourceId: INSTALL_DOC, text: LONG_TEXT });
      await orchestrator.ingest({ sourceId: INSTALL_DOC, text: 'A much shorter replacement.' });

      expect(await store.stats()).toEqual({ documents: 1, chunks: 1 });
      const { results } = await orchestrator.retrieve('foxtrot charlie');
      expect(results.every((r) => r.text === 'A much shorter replacement.')).toBe(true);
    });

    it('removes indexed chunks when the new version is empty', async () => {
      await orchestrator.ingest({ sourceId: INSTALL_DOC, text: LONG_TEXT });

      expect(await orchestrator.ingest({ sourceId: INSTALL_DOC, text: '' })).toBe(0);
      expect(await store.stats()).toEqual({ documents: 1, chunks: 0 });
    });

    it('keeps the previous version when embedding fails', async () => {
      await orchestrator.ingest({ sourceId: INSTALL_DOC, text: LONG_TEXT });
      provider.failAlways = authError();

      await expect(
        orchestrator.ingest({ sourceId: INSTALL_DOC, text: 'Replacement text.' }),
      ).rejects.toMatchObject({ code: 'AUTH_FAILED' });

      provider.failAlways = null;
      expect(await store.stats()).toEqual({ documents: 1, chunks: 4 });
    });

    it('wraps unexpected failures as INGEST_FAILED', async () => {
      const broken: SparseEmbeddingModel = {
        modelId: 'broken',
        embedText: async () => {
          throw new TypeError('unexpected');
        },
      };
      const failing = createOrchestrator(provider, broken);

      const error = await failing
        .ingest({ sourceId: INSTALL_DOC, text: 'Some text.' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetrievalError);
      expect(error).toMatchObject({
        code: 'INGEST_FAILED',
        message: `Failed to ingest "${INSTALL_DOC}"`,
      });
    });

    it('rejects a blank sourceId', async () => {
      await expect(orchestrator.ingest({ sourceId: '  ', text: 'text' })).rejects.toMatchObject({
        code: 'INVALID_SOURCE_ID',
      });
    });

    it('stores nothing when cancelled up front', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        orchestrator.ingest({ sourceId: INSTALL_DOC, text: LONG_TEXT }, { signal: controller.signal }),
      ).rejects.toBeInstanceOf(CancelledError);
      expect(provider.calls).toBe(0);
      expect(await store.stats()).toEqual({ documents: 0, chunks: 0 });
    });

    it('aborts in-flight embeds and keeps the stored version when cancelled midway', async () => {
      await orchestrator.ingest({ sourceId: INSTALL_DOC, text: LONG_TEXT });
      const spans = [...new Chunker({ chunkSize: 200, overlap: 50 }).split(LONG_TEXT)];
      const oldIds = spans.map((s) => chunkIdFor(INSTALL_DOC, s.ordinal, s.text));

      const hanging = new HangingDenseProvider();
      const slow = createOrchestrator(hanging, new LexicalSparseModel());
      const controller = new AbortController();
      const pending = slow.ingest(
        { sourceId: INSTALL_DOC, text: LONG_TEXT.toUpperCase() },
        { signal: controller.signal },
      );

      await vi.waitFor(() => expect(hanging.calls).toBe(4));
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(hanging.aborted).toBe(4);
      expect(await store.stats()).toEqual({ documents: 1, chunks: 4 });
      expect([...(await store.getChunks(oldIds)).keys()].sort()).toEqual([...oldIds].sort());
    });

    it('ingests distinct sources concurrently without mixing their chunks', async () => {
      const counts = await Promise.all([
        orchestrator.ingest({ sourceId: INSTALL_DOC, text: LONG_TEXT }),
        orchestrator.ingest({ sourceId: RETRY_DOC, text: LONGER_TEXT }),
      ]);

      expect(counts).toEqual([4, 8]);
      expect(provider.calls).toBe(12);
      expect(await store.stats()).toEqual({ documents: 2, chunks: 12 });
      expect(await orchestrator.deleteBySource(INSTALL_DOC)).toBe(4);
      expect(await store.stats()).toEqual({ documents: 1, chunks: 8 });
    });
  });

  describe('retrieve', () => {
    beforeEach(async () => {
      await ingestSamples();
    });

    it('ranks the chunk both representations agree on first', async () => {
      const { results, degraded, failures } = await orchestrator.retrieve('install package npm');

      expect(degraded).toBe(false);
      expect(failures).toEqual([]);
      expect(results[0]).toMatchObject({
        sourceId: INSTALL_DOC,
        title: 'Installation',
        ordinal: 0,
        text: 'Install the package with npm and import the client.',
        sparseRank: 1,
      });
      expect(results[0].denseRank).toBeDefined();
    });

    it('returns results in descending fused score', async () => {
      const { results } = await orchestrator.retrieve('retry timeout install');

      for (let i = 1; i < results.length; i++) {
        expect(results[i - 1].score).toBeGreaterThanOrEqual(results[i].score);
      }
    });

    it('keeps at most topNFused results', async () => {
      const { results } = await orchestrator.retrieve('install retry', { topNFused: 1 });

      expect(results).toHaveLength(1);
    });

    it('drops and logs results whose chunks vanish before hydration', async () => {
      const getChunks = store.getChunks.bind(store);
      vi.spyOn(store, 'getChunks').mockImplementation(async (ids) => {
        const chunks = await getChunks(ids);
        chunks.delete(ids[0]);
        return chunks;
      });
      const lines: string[] = [];
      const restoreSink = setLogSink((line) => lines.push(line));
      setLogLevel('debug');

      try {
        const { results } = await orchestrator.retrieve('install package npm');

        expect(results.map((r) => r.sourceId)).toEqual([RETRY_DOC]);
        const installId = chunkIdFor(
          INSTALL_DOC,
          0,
          'Install the package with npm and import the client.',
        );
        expect(lines.filter((l) => l.includes('Dropped')).map((l) => l.slice(11))).toEqual([
          `DEBUG [orchestrator] Dropped fused results whose chunks were replaced (dropped=["${installId}"])`,
        ]);
      } finally {
        restoreSink();
      }
    });

    it('returns nothing for a blank query', async () => {
      const result = await orchestrator.retrieve('   ');

      expect(result).toEqual({ results: [], degraded: false, failures: [], durationMs: 0 });
      expect(provider.calls).toBe(2);
    });

    it('rejects an invalid topK before embedding', async () => {
      await expect(orchestrator.retrieve('install', { topKPerList: 0 })).rejects.toMatchObject({
        code: 'INVALID_TOP_K',
      });
      expect(provider.calls).toBe(2);
    });

    it('rejects when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        orchestrator.retrieve('install', { signal: controller.signal }),
      ).rejects.toBeInstanceOf(CancelledError);
    });

    it('degrades to dense ranking when the sparse embedder fails', async () => {
      const denseOnly = createOrchestrator(provider, new FailingSparseModel());

      const { results, degraded, failures } = await denseOnly.retrieve('install package npm');

      expect(degraded).toBe(true);
      expect(failures).toEqual([
        { representation: 'sparse', code: 'PROVIDER_ERROR', message: 'Sparse model crashed' },
      ]);
      expect(results.map((r) => r.sourceId).sort()).toEqual([INSTALL_DOC, RETRY_DOC]);
      expect(results.every((r) => r.sparseRank === undefined)).toBe(true);
    });

    it('degrades to sparse ranking when the dense embedder fails', async () => {
      const failingProvider = new FakeDenseProvider();
      failingProvider.failAlways = authError();
      const sparseOnly = createOrchestrator(failingProvider, new LexicalSparseModel());

      const { results, degraded, failures } = await sparseOnly.retrieve('install package npm');

      expect(degraded).toBe(true);
      expect(failures).toEqual([
        { representation: 'dense', code: 'AUTH_FAILED', message: 'Authentication failed (401)' },
      ]);
      expect(results.map((r) => [r.sourceId, r.sparseRank, r.denseRank])).toEqual([
        [INSTALL_DOC, 1, undefined],
      ]);
    });

    it('fails when both representations fail', async () => {
      const failingProvider = new FakeDenseProvider();
      failingProvider.failAlways = authError();
      const broken = createOrchestrator(failingProvider, new FailingSparseModel());

      const error = await broken.retrieve('install').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetrievalError);
      expect(error).toMatchObject({
        code: 'ALL_REPRESENTATIONS_FAILED',
        message:
          'Both query embeddings failed: dense: Authentication failed (401); sparse: Sparse model crashed',
      });
    });
  });

  describe('deleteBySource', () => {
    it('removes the document from results', async () => {
      await ingestSamples();

      expect(await orchestrator.deleteBySource(INSTALL_DOC)).toBe(1);

      const { results } = await orchestrator.retrieve('install package npm');
      expect(results.map((r) => r.sourceId)).toEqual([RETRY_DOC]);
    });

    it('is a no-op for an unknown source', async () => {
      expect(await orchestrator.deleteBySource('https://docs.test/missing')).toBe(0);
    });
  });
});
