/**
 * Markdown-aware recursive character chunking.
 *
 * Strategy:
 * 1. Each span ends at the best separator at or before `chunkSize` characters
 * 2. Separators are tried in preference order: markdown headers, code fences,
 *    paragraph breaks, line breaks, sentence ends, then word boundaries
 * 3. A separator is only taken if the span keeps at least half its budget;
 *    otherwise the next tier is tried, and finally a hard character cut
 * 4. The next span starts `overlap` characters before the previous one ended
 *
 * Spans therefore cover the input with no gaps, and each pair of neighbors
 * shares exactly `overlap` characters. Span boundaries never fall inside a
 * UTF-16 surrogate pair: a cut moves back one unit and a restart moves
 * forward one, so such neighbors share one character fewer.
 */

import type { ChunkingConfig } from '../config/engine-config.js';
import type { TextSpan } from '../core/types.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * A split point candidate. The span ends `cutOffset` characters into the match,
 * so headers and fences begin the next span and punctuation stays with this one.
 */
export interface Separator {
  patterns: readonly string[];
  cutOffset: number;
}

/** Separator tiers, most preferred first. */
export const DEFAULT_SEPARATORS: readonly Separator[] = [
  { patterns: ['\n## '], cutOffset: 1 },
  { patterns: ['\n### '], cutOffset: 1 },
  { patterns: ['\n#### '], cutOffset: 1 },
  { patterns: ['\n```'], cutOffset: 1 },
  { patterns: ['\n\n'], cutOffset: 2 },
  { patterns: ['\n'], cutOffset: 1 },
  { patterns: ['. ', '! ', '? '], cutOffset: 2 },
  { patterns: [' '], cutOffset: 1 },
];

/**
 * Check chunker parameters.
 *
 * @throws ConfigurationError INVALID_CHUNK_SIZE or INVALID_OVERLAP
 */
export function validateChunkerOptions(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(
      `chunkSize must be a positive integer, got ${chunkSize}`,
      'INVALID_CHUNK_SIZE',
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new ConfigurationError(
      `overlap must be an integer in [0, ${chunkSize}), got ${overlap}`,
      'INVALID_OVERLAP',
    );
  }
}

/**
 * Whether `index` falls between the two halves of a surrogate pair.
 */
function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/**
 * Pick the end of a span: the best separator cut in [minEnd, hardEnd], else hardEnd.
 */
function findCut(
  text: string,
  hardEnd: number,
  minEnd: number,
  separators: readonly Separator[],
): number {
  for (const { patterns, cutOffset } of separators) {
    let best = -1;
    for (const pattern of patterns) {
      const pos = text.lastIndexOf(pattern, hardEnd - cutOffset);
      if (pos >= 0 && pos + cutOffset >= minEnd && pos + cutOffset <= hardEnd) {
        best = Math.max(best, pos + cutOffset);
      }
    }
    if (best >= 0) {
      return best;
    }
  }
  return hardEnd;
}

function* generateSpans(
  text: string,
  chunkSize: number,
  overlap: number,
  separators: readonly Separator[],
): Generator<TextSpan> {
  if (text.length === 0) {
    return;
  }

  const minFill = Math.max(overlap + 1, Math.ceil(chunkSize / 2));
  let start = 0;
  let ordinal = 0;

  while (text.length - start > chunkSize) {
    let cut = findCut(text, start + chunkSize, start + minFill, separators);
    // Backing off must still leave the next span starting past this one
    if (splitsSurrogatePair(text, cut) && cut - 1 - overlap > start) {
      cut--;
    }
    yield { ordinal: ordinal++, text: text.slice(start, cut), start, end: cut };
    start = cut - overlap;
    if (start < cut && splitsSurrogatePair(text, start)) {
      start++;
    }
  }

  yield { ordinal, text: text.slice(start), start, end: text.length };
}

/**
 * Split text into ordered, overlapping spans of at most `chunkSize` characters.
 *
 * The result is lazy and restartable: each iteration re-derives the same spans.
 *
 * @throws ConfigurationError when chunkSize or overlap are out of range
 */
export function split(
  text: string,
  chunkSize: number,
  overlap: number,
  separators: readonly Separator[] = DEFAULT_SEPARATORS,
): Iterable<TextSpan> {
  validateChunkerOptions(chunkSize, overlap);
  return {
    [Symbol.iterator]: () => generateSpans(text, chunkSize, overlap, separators),
  };
}

/**
 * Chunker bound to one chunking configuration.
 */
export class Chunker {
  readonly chunkSize: number;
  readonly overlap: number;

  constructor(config: ChunkingConfig, private readonly separators = DEFAULT_SEPARATORS) {
    validateChunkerOptions(config.chunkSize, config.overlap);
    this.chunkSize = config.chunkSize;
    this.overlap = config.overlap;
  }

  split(text: string): Iterable<TextSpan> {
    return split(text, this.chunkSize, this.overlap, this.separators);
  }
}
