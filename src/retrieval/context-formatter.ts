/**
 * Render retrieved chunks as a numbered context block for an LLM prompt.
 */

import type { RetrievedChunk } from './orchestrator.js';

export interface FormatContextOptions {
  /** Characters of each chunk to include. Default: 500 */
  maxCharsPerChunk?: number;
  /** Default: 'RELEVANT DOCUMENTATION:' */
  heading?: string;
}

/**
 * Format results as:
 *
 * ```
 *
 *
 * RELEVANT DOCUMENTATION:
 *
 * 1. <chunk text>
 *    Source: <source id>
 * ```
 *
 * Returns an empty string when there are no results.
 */
export function formatContext(
  results: ReadonlyArray<Pick<RetrievedChunk, 'text' | 'sourceId'>>,
  options: FormatContextOptions = {},
): string {
  if (results.length === 0) {
    return '';
  }
  const { maxCharsPerChunk = 500, heading = 'RELEVANT DOCUMENTATION:' } = options;

  let context = `\n\n${heading}\n`;
  results.forEach((result, i) => {
    context += `\n${i + 1}. ${result.text.slice(0, maxCharsPerChunk)}\n   Source: ${result.sourceId}\n`;
  });
  return context;
}
