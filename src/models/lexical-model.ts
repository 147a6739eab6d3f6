/**
 * Local lexical sparse model.
 *
 * Tokens are Unicode letter/digit runs, lowercased and NFKC-normalized, hashed
 * to 32-bit ids with FNV-1a. Each term is weighted by BM25 term-frequency
 * saturation against a fixed reference length, so the vector depends on the
 * text alone and stays stable as the index grows. Corpus statistics (IDF)
 * are applied by the index store at query time.
 */

import type { SparseEmbeddingModel } from './sparse-embedder.js';

/** BM25 term-frequency saturation */
const K1 = 1.2;
/** BM25 length normalization */
const B = 0.75;
/** Reference document length in tokens */
const AVG_DOC_LENGTH = 256;

/**
 * Split text into normalized tokens.
 */
export function tokenize(text: string): string[] {
  return text.normalize('NFKC').toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * 32-bit FNV-1a hash of a token.
 */
export function tokenId(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * BM25 weight of a term occurring `tf` times in a document of `docLength` tokens.
 */
export function termWeight(tf: number, docLength: number): number {
  return (tf * (K1 + 1)) / (tf + K1 * (1 - B + (B * docLength) / AVG_DOC_LENGTH));
}

export class LexicalSparseModel implements SparseEmbeddingModel {
  readonly modelId = 'bm25';

  async embedText(text: string): Promise<Map<number, number>> {
    const tokens = tokenize(text);
    const counts = new Map<number, number>();
    for (const token of tokens) {
      const id = tokenId(token);
      counts.set(id, (counts.get(id) ?? 0) + 1);
    }

    const weights = new Map<number, number>();
    for (const [id, tf] of counts) {
      weights.set(id, termWeight(tf, tokens.length));
    }
    return weights;
  }
}
