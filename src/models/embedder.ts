/**
 * Text-to-vector capability shared by the dense and sparse embedders.
 *
 * The orchestrator drives both through this interface and never needs to
 * know which embedding mechanism sits behind it.
 */

import type { DenseVector, Representation, SparseVector } from '../core/types.js';

export interface EmbedOptions {
  /** Cancels the call and any in-flight work it started */
  signal?: AbortSignal;
}

export interface TextEmbedder<V> {
  readonly representation: Representation;
  /** Identifies the model configuration, e.g. for cache keys and logs */
  readonly modelId: string;
  embed(text: string, options?: EmbedOptions): Promise<V>;
}

export type DenseTextEmbedder = TextEmbedder<DenseVector>;
export type SparseTextEmbedder = TextEmbedder<SparseVector>;
