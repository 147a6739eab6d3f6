/**
 * Sparse model registry.
 */

import type { SparseConfig, SparseModelName } from '../config/engine-config.js';
import type { SparseEmbeddingModel } from './sparse-embedder.js';
import { LexicalSparseModel } from './lexical-model.js';
import { ConfigurationError } from '../utils/errors.js';

export interface SparseModelEntry {
  /** Short identifier used in config */
  id: SparseModelName;
  notes: string;
  create(config: Readonly<SparseConfig>): SparseEmbeddingModel;
}

export const SPARSE_MODEL_REGISTRY: Record<SparseModelName, SparseModelEntry> = {
  bm25: {
    id: 'bm25',
    notes: 'Hashed lexical terms with BM25 saturation. No model files.',
    create: () => new LexicalSparseModel(),
  },
};

/**
 * Instantiate the configured sparse model.
 *
 * @throws ConfigurationError UNKNOWN_MODEL
 */
export function createSparseModel(config: Readonly<SparseConfig>): SparseEmbeddingModel {
  const name: string = config.model;
  const entry = Object.values(SPARSE_MODEL_REGISTRY).find((e) => e.id === name);
  if (!entry) {
    throw new ConfigurationError(
      `Unknown sparse model: ${name}. Available: ${Object.keys(SPARSE_MODEL_REGISTRY).join(', ')}`,
      'UNKNOWN_MODEL',
    );
  }
  return entry.create(config);
}
