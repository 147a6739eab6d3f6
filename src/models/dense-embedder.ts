/**
 * Dense embedder: remote provider call wrapped in timeout, retry and cache.
 *
 * Vectors are returned at float32 precision, the precision they are cached
 * and stored at, so a fresh call and a cache hit are bit-identical.
 */

import type { DenseConfig } from '../config/engine-config.js';
import type { DenseVector } from '../core/types.js';
import type { DenseTextEmbedder, EmbedOptions } from './embedder.js';
import type { EmbeddingCache } from '../storage/embedding-cache.js';
import { cacheModelKey } from '../storage/embedding-cache.js';
import { ConfigurationError, EmbeddingProviderError } from '../utils/errors.js';
import { toFloat32Precision } from '../utils/embedding-utils.js';
import { withTimeout } from '../utils/async-utils.js';
import { withRetry } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('dense-embedder');

/**
 * External dense embedding capability.
 * Must return exactly `dimensions` floats; may fail on auth, rate limit or network.
 */
export interface DenseEmbeddingProvider {
  embedText(
    text: string,
    model: string,
    dimensions: number,
    options: { signal: AbortSignal },
  ): Promise<number[]>;
}

export interface DenseEmbedderDeps {
  provider: DenseEmbeddingProvider;
  /** Omit to disable caching */
  cache?: EmbeddingCache;
}

export class DenseEmbedder implements DenseTextEmbedder {
  readonly representation = 'dense' as const;
  readonly modelId: string;
  private readonly config: Readonly<DenseConfig>;
  private readonly provider: DenseEmbeddingProvider;
  private readonly cache?: EmbeddingCache;

  /**
   * @throws ConfigurationError INVALID_DIMENSIONS
   */
  constructor(config: Readonly<DenseConfig>, deps: DenseEmbedderDeps) {
    if (!Number.isInteger(config.dimensions) || config.dimensions <= 0) {
      throw new ConfigurationError(
        `dense.dimensions must be a positive integer, got ${config.dimensions}`,
        'INVALID_DIMENSIONS',
      );
    }
    this.config = config;
    this.provider = deps.provider;
    this.cache = config.cache ? deps.cache : undefined;
    this.modelId = cacheModelKey(config.model, config.dimensions);
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  /**
   * Embed text, retrying retryable provider failures with backoff.
   *
   * @throws EmbeddingProviderError on provider failure (RETRY_EXHAUSTED once retries run out)
   * @throws CancelledError if `options.signal` fires
   */
  async embed(text: string, options: EmbedOptions = {}): Promise<DenseVector> {
    const cached = this.cache?.get(text, this.modelId);
    if (cached && cached.length === this.config.dimensions) {
      return cached;
    }

    const { model, dimensions, timeoutMs, maxRetries, initialDelayMs, maxDelayMs } = this.config;

    let raw: number[];
    try {
      raw = await withRetry(
        'dense embedding',
        () =>
          withTimeout(
            (signal) => this.provider.embedText(text, model, dimensions, { signal }),
            timeoutMs,
            {
              signal: options.signal,
              onTimeout: () =>
                new EmbeddingProviderError(
                  `Dense embedding timed out after ${timeoutMs}ms`,
                  'TIMEOUT',
                  { retryable: true },
                ),
            },
          ),
        {
          maxRetries,
          initialDelayMs,
          maxDelayMs,
          retryOn: (error) => error instanceof EmbeddingProviderError && error.retryable,
          signal: options.signal,
        },
      );
    } catch (error) {
      if (error instanceof EmbeddingProviderError && error.retryable && maxRetries > 0) {
        throw new EmbeddingProviderError(
          `Dense embedding failed after ${maxRetries + 1} attempts: ${error.message}`,
          'RETRY_EXHAUSTED',
          { cause: error },
        );
      }
      throw error;
    }

    if (raw.length !== dimensions) {
      throw new EmbeddingProviderError(
        `Provider returned ${raw.length} dimensions, expected ${dimensions}`,
        'BAD_RESPONSE',
      );
    }
    if (!raw.every(Number.isFinite)) {
      throw new EmbeddingProviderError('Provider returned a non-finite value', 'BAD_RESPONSE');
    }

    const vector = toFloat32Precision(raw);
    this.cache?.set(text, this.modelId, vector);
    log.debug('Embedded text', { model: this.modelId, chars: text.length });
    return vector;
  }
}
