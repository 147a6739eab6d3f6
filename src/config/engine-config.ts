/**
 * Engine configuration: shape, defaults, and validation.
 *
 * Components receive a frozen EngineConfig (or one of its sections) at
 * construction and never read the environment themselves.
 */

import { homedir } from 'node:os';

/** Sparse model implementations shipped with the engine. */
export type SparseModelName = 'bm25';

export interface ChunkingConfig {
  /** Maximum span length in characters */
  chunkSize: number;
  /** Characters shared by consecutive spans */
  overlap: number;
}

export interface DenseConfig {
  /** Provider model name */
  model: string;
  /** Vector length the provider must return */
  dimensions: number;
  apiKey?: string;
  baseURL?: string;
  /** Time bound per provider call */
  timeoutMs: number;
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Chunks embedded at once during ingest */
  concurrency: number;
  /** Reuse vectors for unchanged chunk text */
  cache: boolean;
}

export interface SparseConfig {
  model: SparseModelName;
  /** Weight overlapping terms by inverse document frequency at query time */
  idf: boolean;
}

export interface RetrievalConfig {
  topKPerList: number;
  topNFused: number;
  /** RRF smoothing constant */
  rrfK: number;
  denseWeight: number;
  sparseWeight: number;
}

export interface EncryptionConfig {
  enabled: boolean;
  cipher: 'chacha20' | 'sqlcipher';
  /** Database key. Read from DUORANK_DB_KEY; never written to config files. */
  key?: string;
}

export interface StorageConfig {
  /** SQLite file path, `~` expanded; ':memory:' for a transient index */
  dbPath: string;
  /** Named collection to read and write */
  collection: string;
  encryption: EncryptionConfig;
}

/**
 * Complete engine configuration.
 */
export interface EngineConfig {
  chunking: ChunkingConfig;
  dense: DenseConfig;
  sparse: SparseConfig;
  retrieval: RetrievalConfig;
  storage: StorageConfig;
}

/**
 * Partial config, used for config files, environment and overrides.
 */
export interface EngineConfigPatch {
  chunking?: Partial<ChunkingConfig>;
  dense?: Partial<DenseConfig>;
  sparse?: Partial<SparseConfig>;
  retrieval?: Partial<RetrievalConfig>;
  storage?: Partial<Omit<StorageConfig, 'encryption'>> & {
    encryption?: Partial<EncryptionConfig>;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: EngineConfig = {
  chunking: {
    chunkSize: 1000,
    overlap: 200,
  },
  dense: {
    model: 'text-embedding-3-large',
    dimensions: 3072,
    timeoutMs: 30_000,
    maxRetries: 3,
    initialDelayMs: 500,
    maxDelayMs: 8000,
    concurrency: 4,
    cache: true,
  },
  sparse: {
    model: 'bm25',
    idf: true,
  },
  retrieval: {
    topKPerList: 10,
    topNFused: 5,
    rrfK: 60,
    denseWeight: 1,
    sparseWeight: 1,
  },
  storage: {
    dbPath: '~/.duorank/index.db',
    collection: 'default',
    encryption: {
      enabled: false,
      cipher: 'chacha20',
    },
  },
};

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return homedir() + path.slice(1);
  }
  return path;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate configuration values.
 *
 * @returns Human-readable problems; empty when the config is usable
 */
export function validateConfig(config: EngineConfig): string[] {
  const errors: string[] = [];
  const { chunking, dense, sparse, retrieval, storage } = config;

  // Chunking
  if (!isPositiveInteger(chunking.chunkSize)) {
    errors.push('chunking.chunkSize must be a positive integer');
  }
  if (!Number.isInteger(chunking.overlap) || chunking.overlap < 0) {
    errors.push('chunking.overlap must be a non-negative integer');
  } else if (chunking.overlap >= chunking.chunkSize) {
    errors.push('chunking.overlap must be less than chunking.chunkSize');
  }

  // Dense
  if (dense.model.trim() === '') {
    errors.push('dense.model must not be empty');
  }
  if (!isPositiveInteger(dense.dimensions)) {
    errors.push('dense.dimensions must be a positive integer');
  }
  if (!(dense.timeoutMs > 0)) {
    errors.push('dense.timeoutMs must be positive');
  }
  if (!Number.isInteger(dense.maxRetries) || dense.maxRetries < 0) {
    errors.push('dense.maxRetries must be a non-negative integer');
  }
  if (dense.initialDelayMs < 0 || dense.maxDelayMs < dense.initialDelayMs) {
    errors.push('dense.initialDelayMs must be >= 0 and <= dense.maxDelayMs');
  }
  if (!isPositiveInteger(dense.concurrency)) {
    errors.push('dense.concurrency must be a positive integer');
  }

  // Sparse
  if (sparse.model !== 'bm25') {
    errors.push(`sparse.model must be 'bm25'`);
  }

  // Retrieval
  if (!isPositiveInteger(retrieval.topKPerList)) {
    errors.push('retrieval.topKPerList must be a positive integer');
  }
  if (!isPositiveInteger(retrieval.topNFused)) {
    errors.push('retrieval.topNFused must be a positive integer');
  }
  if (!(retrieval.rrfK > 0)) {
    errors.push('retrieval.rrfK must be positive');
  }
  if (!(retrieval.denseWeight >= 0) || !(retrieval.sparseWeight >= 0)) {
    errors.push('retrieval weights must be non-negative');
  }

  // Storage
  if (storage.dbPath.trim() === '') {
    errors.push('storage.dbPath must not be empty');
  }
  if (!/^[a-z0-9][a-z0-9_-]*$/i.test(storage.collection)) {
    errors.push('storage.collection must contain only letters, digits, "-" and "_"');
  }
  if (storage.encryption.enabled && !storage.encryption.key) {
    errors.push('storage.encryption.enabled requires a key (DUORANK_DB_KEY)');
  }

  return errors;
}

/**
 * Freeze a config and every section in it.
 */
export function freezeConfig(config: EngineConfig): Readonly<EngineConfig> {
  Object.freeze(config.chunking);
  Object.freeze(config.dense);
  Object.freeze(config.sparse);
  Object.freeze(config.retrieval);
  Object.freeze(config.storage.encryption);
  Object.freeze(config.storage);
  return Object.freeze(config);
}
