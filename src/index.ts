/**
 * duorank
 *
 * Hybrid retrieval engine: dense and sparse embeddings per chunk, two
 * independent searches, reciprocal rank fusion.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/index.js';

// Core types
export type {
  Chunk,
  DenseVector,
  FusedResult,
  Representation,
  SearchHit,
  SourceDocument,
  SparseVector,
  StoredChunk,
  TextSpan,
} from './core/types.js';

// Chunking
export { Chunker, split, validateChunkerOptions, DEFAULT_SEPARATORS, type Separator } from './parser/chunker.js';

// Embedding
export * from './models/index.js';

// Storage
export * from './storage/index.js';

// Retrieval
export * from './retrieval/index.js';

// Engine
export { createEngine, type Engine, type EngineDependencies } from './engine.js';

// Utils
export * from './utils/errors.js';
export {
  createLogger,
  setLogLevel,
  getLogLevel,
  setJsonMode,
  setLogSink,
  type Logger,
  type LogLevel,
} from './utils/logger.js';
export { withRetry, type RetryOptions } from './utils/retry.js';
