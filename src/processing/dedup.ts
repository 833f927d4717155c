/**
 * Deduplication Logic
 *
 * Greedy clustering of near-duplicate records by title similarity:
 * 1. Stable sort by publication date, most recent first, undated last
 * 2. Each record not yet absorbed becomes a cluster representative
 * 3. Later records are absorbed when their titles are similar enough:
 *    - same non-empty domain and score >= threshold, or
 *    - score >= 98 whatever the domains
 *
 * Clustering is not transitive: a record absorbs only records it is
 * compared with directly, so chains of drifting titles may survive.
 */

import type { NormalizedRecord } from '../schemas/index.js';
import { CROSS_DOMAIN_THRESHOLD, DEFAULT_THRESHOLD } from '../types/index.js';
import { logVerbose } from '../utils/logger.js';

// ============================================
// Types
// ============================================

/**
 * Result of deduplication process with metadata
 */
export interface DeduplicationResult {
  /** Cluster representatives, most recent first */
  records: NormalizedRecord[];
  /** Total duplicates removed */
  duplicatesRemoved: number;
  /** Absorptions under the same-domain threshold */
  sameDomainMatches: number;
  /** Absorptions under the cross-domain threshold */
  crossDomainMatches: number;
}

/**
 * A title reduced to its sorted, distinct tokens
 */
export interface TitleTokens {
  tokens: string[];
  set: Set<string>;
}

// ============================================
// Similarity Functions
// ============================================

/**
 * Lowercase, replace every non letter/digit character with a space,
 * collapse whitespace and trim.
 */
export function preprocessTitle(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * Tokenize a title once for repeated comparisons
 */
export function tokenizeTitle(text: string): TitleTokens {
  const set = new Set(preprocessTitle(text).split(' ').filter((t) => t.length > 0));
  return { tokens: [...set].sort(), set };
}

/**
 * Length of the longest common subsequence of two code point arrays
 */
function lcsLength(a: string[], b: string[]): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (const charA of a) {
    current[0] = 0;
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        charA === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Normalized indel similarity: 100 * (1 - distance / total length)
 */
function normalizedScore(distance: number, totalLength: number): number {
  return totalLength === 0 ? 100 : 100 * (1 - distance / totalLength);
}

/**
 * Token-set similarity between two tokenized titles.
 *
 * Returns 0 when the score is below `scoreCutoff`, which lets the
 * character-level comparison be skipped when lengths alone rule it out.
 *
 * @param a - First title tokens
 * @param b - Second title tokens
 * @param scoreCutoff - Minimum score of interest (0-100)
 * @returns Score between 0 and 100
 */
export function tokenSetScore(a: TitleTokens, b: TitleTokens, scoreCutoff = 0): number {
  if (a.set.size === 0 || b.set.size === 0) {
    return 0;
  }

  const intersection = a.tokens.filter((t) => b.set.has(t));
  const diffAB = a.tokens.filter((t) => !b.set.has(t));
  const diffBA = b.tokens.filter((t) => !a.set.has(t));

  // One title's words are a subset of the other's
  if (intersection.length > 0 && (diffAB.length === 0 || diffBA.length === 0)) {
    return 100;
  }

  const da = Array.from(diffAB.join(' '));
  const db = Array.from(diffBA.join(' '));
  const sectLength = Array.from(intersection.join(' ')).length;
  const separator = sectLength > 0 ? 1 : 0;

  // Lengths of "sect da" and "sect db"
  const sectAB = sectLength + separator + da.length;
  const sectBA = sectLength + separator + db.length;

  let best = 0;
  if (intersection.length > 0) {
    best = Math.max(
      normalizedScore(separator + da.length, sectLength + sectAB),
      normalizedScore(separator + db.length, sectLength + sectBA)
    );
  }

  // The shared prefix adds nothing to the distance between "sect da" and "sect db"
  const upperBound = normalizedScore(Math.abs(da.length - db.length), sectAB + sectBA);
  if (upperBound > best && upperBound >= scoreCutoff) {
    const distance = da.length + db.length - 2 * lcsLength(da, db);
    best = Math.max(best, normalizedScore(distance, sectAB + sectBA));
  }

  return best >= scoreCutoff ? best : 0;
}

/**
 * Token-set similarity between two titles (0-100), insensitive to case,
 * punctuation, word order and repeated words.
 *
 * @example
 * tokenSetRatio('City council approves new budget', 'City council approves new budget plan') // 100
 */
export function tokenSetRatio(a: string, b: string): number {
  return tokenSetScore(tokenizeTitle(a), tokenizeTitle(b));
}

// ============================================
// Deduplication Functions
// ============================================

/**
 * Stable sort by date descending; undated records keep their relative
 * order after every dated one.
 */
export function sortByRecency(records: NormalizedRecord[]): NormalizedRecord[] {
  return [...records].sort((a, b) => {
    if (a.date_pub === null && b.date_pub === null) return 0;
    if (a.date_pub === null) return 1;
    if (b.date_pub === null) return -1;
    return b.date_pub.getTime() - a.date_pub.getTime();
  });
}

function sharesDomain(a: NormalizedRecord, b: NormalizedRecord): boolean {
  return a.domain !== null && a.domain.length > 0 && a.domain === b.domain;
}

/**
 * Collapse near-duplicate records, keeping one representative per cluster.
 *
 * @param records - Normalized records with non-empty titles
 * @param threshold - Same-domain similarity threshold (0-100)
 * @returns Representatives in date-descending order, with match counts
 * @throws RangeError if threshold is outside [0, 100]
 */
export function deduplicate(
  records: NormalizedRecord[],
  threshold: number = DEFAULT_THRESHOLD
): DeduplicationResult {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
    throw new RangeError(`Similarity threshold must be between 0 and 100, got ${threshold}`);
  }

  const sorted = sortByRecency(records);
  const titles = sorted.map((record) => tokenizeTitle(record.titre));
  const absorbed = new Array<boolean>(sorted.length).fill(false);

  let sameDomainMatches = 0;
  let crossDomainMatches = 0;

  for (let i = 0; i < sorted.length; i++) {
    if (absorbed[i]) continue;
    const representative = sorted[i];

    for (let j = i + 1; j < sorted.length; j++) {
      if (absorbed[j]) continue;
      const candidate = sorted[j];

      const sameDomain = sharesDomain(representative, candidate);
      const cutoff = sameDomain ? Math.min(threshold, CROSS_DOMAIN_THRESHOLD) : CROSS_DOMAIN_THRESHOLD;
      const score = tokenSetScore(titles[i], titles[j], cutoff);

      if (sameDomain && score >= threshold) {
        absorbed[j] = true;
        sameDomainMatches++;
      } else if (score >= CROSS_DOMAIN_THRESHOLD) {
        absorbed[j] = true;
        crossDomainMatches++;
      } else {
        continue;
      }

      logVerbose(
        `Dedup: "${candidate.titre}" absorbed by "${representative.titre}" (score ${score.toFixed(1)})`
      );
    }
  }

  const kept = sorted.filter((_, index) => !absorbed[index]);

  return {
    records: kept,
    duplicatesRemoved: sorted.length - kept.length,
    sameDomainMatches,
    crossDomainMatches,
  };
}
