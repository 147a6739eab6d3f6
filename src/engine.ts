/**
 * Engine assembly: wires config, database, embedders, store and orchestrator.
 */

import type { EngineConfig } from './config/engine-config.js';
import { Chunker } from './parser/chunker.js';
import { DenseEmbedder, type DenseEmbeddingProvider } from './models/dense-embedder.js';
import { OpenAIEmbeddingProvider } from './models/openai-provider.js';
import { SparseEmbedder, type SparseEmbeddingModel } from './models/sparse-embedder.js';
import { createSparseModel } from './models/model-registry.js';
import { openDatabase, type Db } from './storage/db.js';
import { EmbeddingCache } from './storage/embedding-cache.js';
import { SqliteIndexStore } from './storage/sqlite-index-store.js';
import { RetrievalOrchestrator } from './retrieval/orchestrator.js';
import { ConfigurationError } from './utils/errors.js';

export interface EngineDependencies {
  /** Replaces the OpenAI provider */
  denseProvider?: DenseEmbeddingProvider;
  /** Replaces the model named by config.sparse.model */
  sparseModel?: SparseEmbeddingModel;
  /** Use an already-open database instead of config.storage */
  db?: Db;
}

export interface Engine {
  orchestrator: RetrievalOrchestrator;
  store: SqliteIndexStore;
  db: Db;
  /** Close the database if the engine opened it. */
  close(): void;
}

/**
 * Build a ready-to-use engine from a config.
 *
 * @throws ConfigurationError MISSING_API_KEY when no dense provider is given and no API key is configured
 * @throws ConfigurationError DIMENSION_MISMATCH when the collection exists with another dimension
 */
export function createEngine(
  config: Readonly<EngineConfig>,
  deps: EngineDependencies = {},
): Engine {
  let denseProvider = deps.denseProvider;
  if (!denseProvider) {
    if (!config.dense.apiKey) {
      throw new ConfigurationError(
        'No dense embedding API key configured (set OPENAI_API_KEY or dense.apiKey)',
        'MISSING_API_KEY',
      );
    }
    denseProvider = new OpenAIEmbeddingProvider({
      apiKey: config.dense.apiKey,
      baseURL: config.dense.baseURL,
    });
  }

  const ownsDb = deps.db === undefined;
  const db = deps.db ?? openDatabase(config.storage);

  try {
    const store = new SqliteIndexStore(db, {
      collection: config.storage.collection,
      dimensions: config.dense.dimensions,
      sparseIdf: config.sparse.idf,
    });

    const orchestrator = new RetrievalOrchestrator({
      chunker: new Chunker(config.chunking),
      dense: new DenseEmbedder(config.dense, {
        provider: denseProvider,
        cache: new EmbeddingCache(db),
      }),
      sparse: new SparseEmbedder(deps.sparseModel ?? createSparseModel(config.sparse)),
      store,
      retrieval: config.retrieval,
      ingestConcurrency: config.dense.concurrency,
    });

    return {
      orchestrator,
      store,
      db,
      close: () => {
        if (ownsDb && db.open) {
          db.close();
        }
      },
    };
  } catch (error) {
    if (ownsDb) db.close();
    throw error;
  }
}
