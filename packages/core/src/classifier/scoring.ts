/**
 * Keyword Scoring
 *
 * Case-insensitive, whole-word phrase counting and the saturating
 * confidence curve.
 */

import type { IndustryStrategy } from '../types';
import { KEYWORD_WEIGHT_PREFIX } from '../strategies/definition';

const DEFAULT_WEIGHT = 1.0;

// Keyword phrases repeat across every call; compiled patterns are shared
const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  // '-' stays unescaped: '\-' is a syntax error under the 'u' flag
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a keyword phrase to a global, case-insensitive pattern whose ends
 * may not touch another letter or digit. Inner spaces match any whitespace
 * run, including line breaks.
 */
export function compileKeyword(keyword: string): RegExp {
  let pattern = patternCache.get(keyword);
  if (!pattern) {
    const body = keyword.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
    pattern = new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'giu');
    patternCache.set(keyword, pattern);
  }
  return pattern;
}

export function countOccurrences(text: string, keyword: string): number {
  if (!keyword.trim()) return 0;
  const matches = text.match(compileKeyword(keyword));
  return matches ? matches.length : 0;
}

/**
 * Weight for a keyword: its own `keyword:<phrase>` weight, else its document
 * type's weight, else 1.0.
 */
export function keywordWeight(strategy: Readonly<IndustryStrategy>, documentType: string, keyword: string): number {
  const weights = strategy.scoring_weights ?? {};
  return weights[KEYWORD_WEIGHT_PREFIX + keyword] ?? weights[documentType] ?? DEFAULT_WEIGHT;
}

export interface DocumentTypeScore {
  documentType: string;
  raw: number;
  /** Total keyword occurrences, unweighted */
  occurrences: number;
}

export function scoreDocumentType(
  text: string,
  strategy: Readonly<IndustryStrategy>,
  documentType: string
): DocumentTypeScore {
  let raw = 0;
  let occurrences = 0;

  for (const keyword of strategy.keywords[documentType] ?? []) {
    const count = countOccurrences(text, keyword);
    if (count > 0) {
      occurrences += count;
      raw += count * keywordWeight(strategy, documentType, keyword);
    }
  }

  return { documentType, raw, occurrences };
}

/**
 * Map a non-negative raw score into [0, 1). Monotonic, never reaches 1.
 */
export function saturate(raw: number, k: number): number {
  if (raw <= 0) return 0;
  return raw / (raw + k);
}
