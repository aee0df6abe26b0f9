/**
 * Match Confidence Scoring
 *
 * Advisory rating of how likely two records describe the same work.
 * Rules are checked in order and the first that applies wins:
 *
 * | Rule                                   | Confidence |
 * |----------------------------------------|------------|
 * | Equal DOIs                             | 1.00       |
 * | Equal titles, equal non-empty year     | 0.95       |
 * | Title ratio >= 0.95, equal years       | 0.90       |
 * | Title ratio >= 0.90, equal years       | 0.85       |
 * | Title ratio >= 0.85, equal years       | 0.75       |
 * | Anything else                          | 0.50       |
 */

import { normalizeTitle } from './normalize.js';
import { similarityRatio } from './sequence-matcher.js';
import { normalizedDoi, resolveTitle, truncatedYear, type BibRecord } from './fields.js';

// ============================================================================
// TIERS
// ============================================================================

export const CONFIDENCE_TIERS = {
  DOI: 1.0,
  EXACT_TITLE_YEAR: 0.95,
  HIGH_SIMILARITY: 0.9,
  GOOD_SIMILARITY: 0.85,
  FAIR_SIMILARITY: 0.75,
  LOW: 0.5,
};

/** Similarity ratio needed for each fuzzy tier */
export const SIMILARITY_TIERS: ReadonlyArray<{ minRatio: number; confidence: number; label: string }> = [
  { minRatio: 0.95, confidence: CONFIDENCE_TIERS.HIGH_SIMILARITY, label: 'high similarity' },
  { minRatio: 0.9, confidence: CONFIDENCE_TIERS.GOOD_SIMILARITY, label: 'good similarity' },
  { minRatio: 0.85, confidence: CONFIDENCE_TIERS.FAIR_SIMILARITY, label: 'fair similarity' },
];

export const TITLE_MATCH_THRESHOLD = 0.9;

export interface MatchConfidence {
  /** 0-1 */
  confidence: number;
  reason: string;
}

// ============================================================================
// SCORING
// ============================================================================

/**
 * Score a candidate pair. Callable on any two records, matched or not.
 */
export function calculateMatchConfidence(recordA: BibRecord, recordB: BibRecord): MatchConfidence {
  const doiA = normalizedDoi(recordA);
  const doiB = normalizedDoi(recordB);
  if (doiA && doiB && doiA === doiB) {
    return { confidence: CONFIDENCE_TIERS.DOI, reason: 'DOI match' };
  }

  const titleA = normalizeTitle(resolveTitle(recordA));
  const titleB = normalizeTitle(resolveTitle(recordB));
  const yearA = truncatedYear(recordA);
  const yearB = truncatedYear(recordB);

  if (titleA === titleB && yearA === yearB && yearA) {
    return { confidence: CONFIDENCE_TIERS.EXACT_TITLE_YEAR, reason: 'exact title+year match' };
  }

  if (titleA && titleB && yearA === yearB) {
    const similarity = similarityRatio(titleA, titleB);
    for (const tier of SIMILARITY_TIERS) {
      if (similarity >= tier.minRatio) {
        return {
          confidence: tier.confidence,
          reason: `${tier.label} (${similarity.toFixed(2)})`,
        };
      }
    }
  }

  return { confidence: CONFIDENCE_TIERS.LOW, reason: 'low confidence match' };
}

/**
 * Standalone title comparison: equal after normalization, or
 * similarity strictly above 0.9
 */
export function isTitleMatch(title1: unknown, title2: unknown): boolean {
  if (typeof title1 !== 'string' || typeof title2 !== 'string') {
    return false;
  }

  const t1 = normalizeTitle(title1);
  const t2 = normalizeTitle(title2);

  if (t1 === t2) return true;

  return similarityRatio(t1, t2) > TITLE_MATCH_THRESHOLD;
}
