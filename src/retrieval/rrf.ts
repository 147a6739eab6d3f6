/**
 * Reciprocal Rank Fusion (RRF) for combining ranked lists from different retrieval sources.
 *
 * Merges the dense and sparse rankings into a single list using:
 *   score(chunk) = Sum(weight_i / (k + rank_i))
 *
 * A chunk absent from a list gets no contribution from it (an omission, not a
 * penalty). With a large enough k, a chunk found by both lists at moderate
 * ranks outranks a chunk found at rank 1 by only one of them.
 */

import type { FusedResult, Representation, SearchHit } from '../core/types.js';
import { ConfigurationError } from '../utils/errors.js';

export interface RRFSource {
  name: Representation;
  /** Ranked best first; position i contributes rank i + 1 */
  items: readonly SearchHit[];
  weight: number;
}

export interface RRFOptions {
  /** RRF constant. Higher values reduce the impact of high-ranked items. */
  k: number;
  /** Keep only the best `topN` results. Default: all */
  topN?: number;
}

export interface FusionWeights {
  dense: number;
  sparse: number;
}

const DEFAULT_WEIGHTS: FusionWeights = { dense: 1, sparse: 1 };

function validateFusionParams(k: number, topN: number | undefined, sources: readonly RRFSource[]): void {
  if (!Number.isFinite(k) || k <= 0) {
    throw new ConfigurationError(`RRF k must be a positive number, got ${k}`, 'INVALID_RRF_K');
  }
  if (topN !== undefined && (!Number.isInteger(topN) || topN <= 0)) {
    throw new ConfigurationError(`topN must be a positive integer, got ${topN}`, 'INVALID_TOP_N');
  }
  for (const source of sources) {
    if (!Number.isFinite(source.weight) || source.weight < 0) {
      throw new ConfigurationError(
        `Weight for ${source.name} must be a non-negative number, got ${source.weight}`,
        'INVALID_WEIGHT',
      );
    }
  }
}

function rankSum(result: FusedResult): number {
  return (result.denseRank ?? 0) + (result.sparseRank ?? 0);
}

/**
 * Order by fused score descending, then combined rank ascending, then chunk id ascending.
 */
export function compareFused(a: FusedResult, b: FusedResult): number {
  if (b.score !== a.score) return b.score - a.score;
  const byRank = rankSum(a) - rankSum(b);
  if (byRank !== 0) return byRank;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

/**
 * Fuse ranked lists using Reciprocal Rank Fusion.
 *
 * A chunk listed twice in one source counts once, at its best rank.
 *
 * @returns Fused list sorted by {@link compareFused}, deduplicated by chunkId
 */
export function fuseRRF(sources: readonly RRFSource[], options: RRFOptions): FusedResult[] {
  validateFusionParams(options.k, options.topN, sources);

  const fused = new Map<string, FusedResult>();

  for (const source of sources) {
    const rankKey = source.name === 'dense' ? 'denseRank' : 'sparseRank';
    for (let i = 0; i < source.items.length; i++) {
      const { chunkId } = source.items[i];
      const rank = i + 1;

      let entry = fused.get(chunkId);
      if (!entry) {
        entry = { chunkId, score: 0 };
        fused.set(chunkId, entry);
      }
      if (entry[rankKey] !== undefined) continue;

      entry[rankKey] = rank;
      entry.score += source.weight / (options.k + rank);
    }
  }

  const results = [...fused.values()].sort(compareFused);
  return options.topN === undefined ? results : results.slice(0, options.topN);
}

/**
 * Fuse a dense and a sparse ranking.
 *
 * Either list may be empty, in which case the result is the other list's
 * ranking rescored; both empty gives an empty result.
 *
 * @throws ConfigurationError INVALID_RRF_K, INVALID_TOP_N or INVALID_WEIGHT
 */
export function fuse(
  denseHits: readonly SearchHit[],
  sparseHits: readonly SearchHit[],
  kConstant: number,
  topN: number,
  weights: FusionWeights = DEFAULT_WEIGHTS,
): FusedResult[] {
  return fuseRRF(
    [
      { name: 'dense', items: denseHits, weight: weights.dense },
      { name: 'sparse', items: sparseHits, weight: weights.sparse },
    ],
    { k: kConstant, topN },
  );
}
