/**
 * Sparse embedder: local model output normalized to a canonical sparse vector.
 */

import type { SparseVector } from '../core/types.js';
import type { EmbedOptions, SparseTextEmbedder } from './embedder.js';
import { EmbeddingProviderError } from '../utils/errors.js';
import { throwIfAborted } from '../utils/async-utils.js';

/**
 * Local sparse embedding capability: token id -> weight.
 * Deterministic for identical input and model version.
 */
export interface SparseEmbeddingModel {
  readonly modelId: string;
  embedText(text: string): Promise<Map<number, number>>;
}

/**
 * Convert a term-weight map to a sparse vector with ascending indices.
 * Zero weights are dropped.
 *
 * @throws EmbeddingProviderError BAD_RESPONSE for negative, non-finite or non-integer entries
 */
export function normalizeSparseVector(weights: ReadonlyMap<number, number>): SparseVector {
  const entries: Array<[number, number]> = [];
  for (const [index, value] of weights) {
    if (!Number.isInteger(index) || index < 0 || index > 0xffffffff) {
      throw new EmbeddingProviderError(`Invalid sparse index ${index}`, 'BAD_RESPONSE');
    }
    if (!Number.isFinite(value) || value < 0) {
      throw new EmbeddingProviderError(
        `Sparse weight for index ${index} must be finite and non-negative, got ${value}`,
        'BAD_RESPONSE',
      );
    }
    if (value > 0) {
      entries.push([index, value]);
    }
  }
  entries.sort((a, b) => a[0] - b[0]);
  return {
    indices: entries.map(([index]) => index),
    values: entries.map(([, value]) => value),
  };
}

export class SparseEmbedder implements SparseTextEmbedder {
  readonly representation = 'sparse' as const;

  constructor(private readonly model: SparseEmbeddingModel) {}

  get modelId(): string {
    return this.model.modelId;
  }

  /**
   * Embed text. Empty or whitespace-only text yields an empty vector.
   */
  async embed(text: string, options: EmbedOptions = {}): Promise<SparseVector> {
    throwIfAborted(options.signal);
    if (text.trim().length === 0) {
      return { indices: [], values: [] };
    }
    const weights = await this.model.embedText(text);
    throwIfAborted(options.signal);
    return normalizeSparseVector(weights);
  }
}
