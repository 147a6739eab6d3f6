/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Explicit overrides (passed directly)
 * 2. Environment variables (DUORANK_*, OPENAI_API_KEY)
 * 3. Project config file (./duorank.config.json)
 * 4. User config file (~/.duorank/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  freezeConfig,
  resolvePath,
  validateConfig,
  type EngineConfig,
  type EngineConfigPatch,
  type SparseModelName,
} from './engine-config.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSparseModelName(value: unknown): value is SparseModelName {
  return value === 'bm25';
}

function isCipher(value: unknown): value is 'chacha20' | 'sqlcipher' {
  return value === 'chacha20' || value === 'sqlcipher';
}

function pickNumber(source: UnknownRecord, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' ? value : undefined;
}

function pickString(source: UnknownRecord, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

function pickBoolean(source: UnknownRecord, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

function section(source: UnknownRecord, key: string): UnknownRecord {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/**
 * Read a config patch out of parsed JSON. Fields of the wrong type are ignored.
 * The encryption key is never taken from a file.
 */
export function patchFromObject(raw: unknown): EngineConfigPatch {
  if (!isRecord(raw)) {
    return {};
  }

  const chunking = section(raw, 'chunking');
  const dense = section(raw, 'dense');
  const sparse = section(raw, 'sparse');
  const retrieval = section(raw, 'retrieval');
  const storage = section(raw, 'storage');
  const encryption = section(storage, 'encryption');

  const sparseModel = sparse.model;
  if (sparseModel !== undefined && !isSparseModelName(sparseModel)) {
    log.warn('Ignoring unknown sparse model in config file', { model: String(sparseModel) });
  }
  const cipher = encryption.cipher;

  return {
    chunking: {
      chunkSize: pickNumber(chunking, 'chunkSize'),
      overlap: pickNumber(chunking, 'overlap'),
    },
    dense: {
      model: pickString(dense, 'model'),
      dimensions: pickNumber(dense, 'dimensions'),
      baseURL: pickString(dense, 'baseURL'),
      timeoutMs: pickNumber(dense, 'timeoutMs'),
      maxRetries: pickNumber(dense, 'maxRetries'),
      initialDelayMs: pickNumber(dense, 'initialDelayMs'),
      maxDelayMs: pickNumber(dense, 'maxDelayMs'),
      concurrency: pickNumber(dense, 'concurrency'),
      cache: pickBoolean(dense, 'cache'),
    },
    sparse: {
      model: isSparseModelName(sparseModel) ? sparseModel : undefined,
      idf: pickBoolean(sparse, 'idf'),
    },
    retrieval: {
      topKPerList: pickNumber(retrieval, 'topKPerList'),
      topNFused: pickNumber(retrieval, 'topNFused'),
      rrfK: pickNumber(retrieval, 'rrfK'),
      denseWeight: pickNumber(retrieval, 'denseWeight'),
      sparseWeight: pickNumber(retrieval, 'sparseWeight'),
    },
    storage: {
      dbPath: pickString(storage, 'dbPath'),
      collection: pickString(storage, 'collection'),
      encryption: {
        enabled: pickBoolean(encryption, 'enabled'),
        cipher: isCipher(cipher) ? cipher : undefined,
      },
    },
  };
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): EngineConfigPatch | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    return patchFromObject(JSON.parse(content));
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

/**
 * Load config from environment variables.
 * Variables are prefixed with DUORANK_ and use underscores for nesting.
 * Examples:
 *   DUORANK_CHUNKING_CHUNK_SIZE=800
 *   DUORANK_RETRIEVAL_RRF_K=40
 *   DUORANK_STORAGE_DB_PATH=~/.duorank/index.db
 */
function loadEnvConfig(): EngineConfigPatch {
  const env = process.env;
  const config: EngineConfigPatch = {};

  // Chunking
  if (env.DUORANK_CHUNKING_CHUNK_SIZE) {
    config.chunking = config.chunking ?? {};
    config.chunking.chunkSize = parseInt(env.DUORANK_CHUNKING_CHUNK_SIZE, 10);
  }
  if (env.DUORANK_CHUNKING_OVERLAP) {
    config.chunking = config.chunking ?? {};
    config.chunking.overlap = parseInt(env.DUORANK_CHUNKING_OVERLAP, 10);
  }

  // Dense
  const apiKey = env.DUORANK_DENSE_API_KEY ?? env.OPENAI_API_KEY;
  if (apiKey) {
    config.dense = config.dense ?? {};
    config.dense.apiKey = apiKey;
  }
  if (env.DUORANK_DENSE_MODEL) {
    config.dense = config.dense ?? {};
    config.dense.model = env.DUORANK_DENSE_MODEL;
  }
  if (env.DUORANK_DENSE_DIMENSIONS) {
    config.dense = config.dense ?? {};
    config.dense.dimensions = parseInt(env.DUORANK_DENSE_DIMENSIONS, 10);
  }
  if (env.DUORANK_DENSE_BASE_URL) {
    config.dense = config.dense ?? {};
    config.dense.baseURL = env.DUORANK_DENSE_BASE_URL;
  }
  if (env.DUORANK_DENSE_TIMEOUT_MS) {
    config.dense = config.dense ?? {};
    config.dense.timeoutMs = parseInt(env.DUORANK_DENSE_TIMEOUT_MS, 10);
  }
  if (env.DUORANK_DENSE_MAX_RETRIES) {
    config.dense = config.dense ?? {};
    config.dense.maxRetries = parseInt(env.DUORANK_DENSE_MAX_RETRIES, 10);
  }
  if (env.DUORANK_DENSE_CONCURRENCY) {
    config.dense = config.dense ?? {};
    config.dense.concurrency = parseInt(env.DUORANK_DENSE_CONCURRENCY, 10);
  }
  if (env.DUORANK_DENSE_CACHE) {
    config.dense = config.dense ?? {};
    config.dense.cache = env.DUORANK_DENSE_CACHE === 'true';
  }

  // Sparse
  const sparseModel = env.DUORANK_SPARSE_MODEL;
  if (sparseModel) {
    if (isSparseModelName(sparseModel)) {
      config.sparse = config.sparse ?? {};
      config.sparse.model = sparseModel;
    } else {
      log.warn('Ignoring unknown DUORANK_SPARSE_MODEL', { model: sparseModel });
    }
  }
  if (env.DUORANK_SPARSE_IDF) {
    config.sparse = config.sparse ?? {};
    config.sparse.idf = env.DUORANK_SPARSE_IDF === 'true';
  }

  // Retrieval
  if (env.DUORANK_RETRIEVAL_TOP_K) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.topKPerList = parseInt(env.DUORANK_RETRIEVAL_TOP_K, 10);
  }
  if (env.DUORANK_RETRIEVAL_TOP_N) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.topNFused = parseInt(env.DUORANK_RETRIEVAL_TOP_N, 10);
  }
  if (env.DUORANK_RETRIEVAL_RRF_K) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.rrfK = parseFloat(env.DUORANK_RETRIEVAL_RRF_K);
  }
  if (env.DUORANK_RETRIEVAL_DENSE_WEIGHT) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.denseWeight = parseFloat(env.DUORANK_RETRIEVAL_DENSE_WEIGHT);
  }
  if (env.DUORANK_RETRIEVAL_SPARSE_WEIGHT) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.sparseWeight = parseFloat(env.DUORANK_RETRIEVAL_SPARSE_WEIGHT);
  }

  // Storage
  if (env.DUORANK_STORAGE_DB_PATH) {
    config.storage = config.storage ?? {};
    config.storage.dbPath = env.DUORANK_STORAGE_DB_PATH;
  }
  if (env.DUORANK_STORAGE_COLLECTION) {
    config.storage = config.storage ?? {};
    config.storage.collection = env.DUORANK_STORAGE_COLLECTION;
  }

  // Encryption
  if (env.DUORANK_ENCRYPTION_ENABLED) {
    config.storage = config.storage ?? {};
    config.storage.encryption = config.storage.encryption ?? {};
    config.storage.encryption.enabled = env.DUORANK_ENCRYPTION_ENABLED === 'true';
  }
  const cipher = env.DUORANK_ENCRYPTION_CIPHER;
  if (cipher && isCipher(cipher)) {
    config.storage = config.storage ?? {};
    config.storage.encryption = config.storage.encryption ?? {};
    config.storage.encryption.cipher = cipher;
  }
  if (env.DUORANK_DB_KEY) {
    config.storage = config.storage ?? {};
    config.storage.encryption = config.storage.encryption ?? {};
    config.storage.encryption.key = env.DUORANK_DB_KEY;
  }

  return config;
}

/**
 * Copy `target`, replacing every field `patch` defines.
 */
function assignDefined<T extends object>(target: T, patch: Partial<T> | undefined): T {
  const result = { ...target };
  if (!patch) {
    return result;
  }
  for (const key of Object.keys(patch) as (keyof T)[]) {
    const value = patch[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Merge a patch into a complete config, section by section.
 */
export function mergeConfig(base: EngineConfig, patch: EngineConfigPatch): EngineConfig {
  const { encryption, ...storage }: NonNullable<EngineConfigPatch['storage']> =
    patch.storage ?? {};
  return {
    chunking: assignDefined(base.chunking, patch.chunking),
    dense: assignDefined(base.dense, patch.dense),
    sparse: assignDefined(base.sparse, patch.sparse),
    retrieval: assignDefined(base.retrieval, patch.retrieval),
    storage: {
      ...assignDefined(base.storage, storage),
      encryption: assignDefined(base.storage.encryption, encryption),
    },
  };
}

export interface LoadConfigOptions {
  /** Explicit overrides (highest priority) */
  overrides?: EngineConfigPatch;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 *
 * @returns A deep-frozen, validated config
 * @throws ConfigurationError CONFIG_INVALID listing every problem found
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<EngineConfig> {
  // 5. Defaults
  let config: EngineConfig = mergeConfig(DEFAULT_CONFIG, {});

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.duorank/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'duorank.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  // 1. Overrides
  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, 'CONFIG_INVALID');
  }

  return freezeConfig(config);
}
