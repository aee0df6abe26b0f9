/**
 * Fuzzy Matching Pass
 *
 * Recovers near-duplicate titles (typos, dropped words) among records the
 * exact pass left unmatched.
 *
 * Greedy first-match pairing: A is walked in input order, and each A record
 * takes the first unconsumed B record (in input order) that clears the
 * threshold. This is not a maximum-weight assignment; the outcome depends on
 * input order and is reproducible for a fixed order.
 *
 * Cost is O(|A| × |B|) ratio computations. It only runs on the residual
 * sets, which are expected to be small after exact keying.
 */

import { normalizeTitle } from './normalize.js';
import { similarityRatio } from './sequence-matcher.js';
import { resolveTitle, truncatedYear, type BibRecord } from './fields.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export const FUZZY_DEFAULT_THRESHOLD = 0.9;

export interface FuzzyMatchOptions {
  /** Minimum similarity ratio to accept a pair (0-1) */
  threshold: number;

  /**
   * Stop after this many ratio computations. Records not matched by then
   * are returned as leftovers.
   */
  maxComparisons: number;
}

export const DEFAULT_FUZZY_OPTIONS: FuzzyMatchOptions = {
  threshold: FUZZY_DEFAULT_THRESHOLD,
  maxComparisons: Number.POSITIVE_INFINITY,
};

// ============================================================================
// TYPES
// ============================================================================

export interface FuzzyMatch<T extends BibRecord = BibRecord> {
  recordA: T;
  recordB: T;
  similarity: number;
}

export interface FuzzyMatchResult<T extends BibRecord = BibRecord> {
  matches: FuzzyMatch<T>[];
  remainingA: T[];
  remainingB: T[];

  /** Ratio computations performed */
  comparisons: number;

  /** True when maxComparisons cut the pass short */
  truncated: boolean;
}

interface Candidate<T> {
  record: T;
  title: string;
  year: string;
}

function toCandidate<T extends BibRecord>(record: T): Candidate<T> {
  return {
    record,
    title: normalizeTitle(resolveTitle(record)),
    year: truncatedYear(record),
  };
}

// ============================================================================
// FUZZY PASS
// ============================================================================

/**
 * Pair near-duplicate titles between two residual sets.
 *
 * A pair is considered only when both titles are non-empty and the
 * 4-character year prefixes are equal. Two missing years count as equal:
 * these records already failed year-based exact keying.
 */
export function fuzzyMatchPass<T extends BibRecord>(
  uniqueA: readonly T[],
  uniqueB: readonly T[],
  options: Partial<FuzzyMatchOptions> = {}
): FuzzyMatchResult<T> {
  const { threshold, maxComparisons } = { ...DEFAULT_FUZZY_OPTIONS, ...options };

  const candidatesA = uniqueA.map(toCandidate);
  const candidatesB = uniqueB.map(toCandidate);

  const matches: FuzzyMatch<T>[] = [];
  const matchedA = new Set<number>();
  const matchedB = new Set<number>();
  let comparisons = 0;
  let truncated = false;

  outer:
  for (let i = 0; i < candidatesA.length; i++) {
    const a = candidatesA[i];
    if (!a.title) continue;

    for (let j = 0; j < candidatesB.length; j++) {
      if (matchedB.has(j)) continue;

      const b = candidatesB[j];
      if (!b.title) continue;
      if (a.year !== b.year) continue;

      if (comparisons >= maxComparisons) {
        truncated = true;
        break outer;
      }
      comparisons++;

      const similarity = similarityRatio(a.title, b.title);
      if (similarity >= threshold) {
        matches.push({ recordA: a.record, recordB: b.record, similarity });
        matchedA.add(i);
        matchedB.add(j);
        break; // first qualifying B wins
      }
    }
  }

  return {
    matches,
    remainingA: uniqueA.filter((_, i) => !matchedA.has(i)),
    remainingB: uniqueB.filter((_, j) => !matchedB.has(j)),
    comparisons,
    truncated,
  };
}
