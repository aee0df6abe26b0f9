/**
 * Dataset Comparison
 *
 * Public entry point of the matching engine.
 *
 * Algorithm:
 * 1. Key every record (DOI, else normalized title + year)
 * 2. Partition both datasets by key (overlap / unique to A / unique to B)
 * 3. Optionally run the fuzzy pass over the two unique sets
 * 4. Return copies of the records with internal fields removed
 *
 * On a fuzzy match only the A record reaches `overlap` (flagged
 * `fuzzy_match: true`); the B record is dropped from the output.
 * `compareDatasetsDetailed` keeps both sides in `pairs`.
 */

import { partitionByKey } from './exact-match.js';
import { fuzzyMatchPass, FUZZY_DEFAULT_THRESHOLD } from './fuzzy-match.js';
import { calculateMatchConfidence } from './confidence.js';
import { assertRecord, type BibRecord } from './fields.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface CompareConfig {
  /** Run the fuzzy pass over unmatched records */
  useFuzzy: boolean;

  /** Title similarity threshold for the fuzzy pass (0-1) */
  fuzzyThreshold: number;

  /** Cap on fuzzy ratio computations (prevents quadratic blow-up) */
  maxFuzzyComparisons: number;
}

export const DEFAULT_COMPARE_CONFIG: CompareConfig = {
  useFuzzy: true,
  fuzzyThreshold: FUZZY_DEFAULT_THRESHOLD,
  maxFuzzyComparisons: Number.POSITIVE_INFINITY,
};

/** Key column left on records by earlier comparison runs; dropped from output */
export const INTERNAL_FIELDS: readonly string[] = ['temp_key'];

export const FUZZY_MATCH_FLAG = 'fuzzy_match';

// ============================================================================
// TYPES
// ============================================================================

export interface ComparisonResult {
  overlap: BibRecord[];
  uniqueA: BibRecord[];
  uniqueB: BibRecord[];
}

export interface MatchedPair {
  recordA: BibRecord;
  recordB: BibRecord;
  confidence: number;
  reason: string;
  isFuzzy: boolean;
}

export interface ComparisonSummary {
  totalA: number;
  totalB: number;
  overlapCount: number;
  uniqueACount: number;
  uniqueBCount: number;
  fuzzyMatchCount: number;

  /** Overlap as a percentage of each dataset (0-100, one decimal) */
  overlapPercentA: number;
  overlapPercentB: number;

  /** True when the fuzzy comparison cap stopped the pass early */
  fuzzyTruncated: boolean;
}

export interface DetailedComparisonResult extends ComparisonResult {
  pairs: MatchedPair[];
  summary: ComparisonSummary;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Copy a record without engine-internal fields
 */
export function stripInternalFields(record: BibRecord): BibRecord {
  const copy: BibRecord = { ...record };
  for (const field of INTERNAL_FIELDS) {
    delete copy[field];
  }
  return copy;
}

function validateAll(records: readonly unknown[], side: 'a' | 'b'): BibRecord[] {
  return records.map((record, index) => {
    assertRecord(record, side, index);
    return record;
  });
}

function percent(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 1000) / 10 : 0;
}

// ============================================================================
// COMPARISON
// ============================================================================

/**
 * Compare two datasets and report every exact and fuzzy match with both sides
 */
export function compareDatasetsDetailed(
  recordsA: readonly unknown[],
  recordsB: readonly unknown[],
  config: Partial<CompareConfig> = {}
): DetailedComparisonResult {
  const { useFuzzy, fuzzyThreshold, maxFuzzyComparisons } = { ...DEFAULT_COMPARE_CONFIG, ...config };

  const a = validateAll(recordsA, 'a');
  const b = validateAll(recordsB, 'b');

  const partition = partitionByKey(a, b);

  // Exact pairs: each A overlap record against the first B record with its key
  const firstBByKey = new Map<string, BibRecord>();
  for (const { record, key } of partition.overlapB) {
    if (!firstBByKey.has(key)) firstBByKey.set(key, record);
  }

  const overlap: BibRecord[] = [];
  const pairs: MatchedPair[] = [];

  for (const { record, key } of partition.overlap) {
    overlap.push(stripInternalFields(record));
    const partner = firstBByKey.get(key);
    if (partner) {
      const { confidence, reason } = calculateMatchConfidence(record, partner);
      pairs.push({
        recordA: stripInternalFields(record),
        recordB: stripInternalFields(partner),
        confidence,
        reason,
        isFuzzy: false,
      });
    }
  }

  let uniqueA = partition.uniqueA.map(k => k.record);
  let uniqueB = partition.uniqueB.map(k => k.record);
  let fuzzyMatchCount = 0;
  let fuzzyTruncated = false;

  if (useFuzzy && uniqueA.length > 0 && uniqueB.length > 0) {
    const fuzzy = fuzzyMatchPass(uniqueA, uniqueB, {
      threshold: fuzzyThreshold,
      maxComparisons: maxFuzzyComparisons,
    });

    for (const match of fuzzy.matches) {
      overlap.push({ ...stripInternalFields(match.recordA), [FUZZY_MATCH_FLAG]: true });
      const { confidence, reason } = calculateMatchConfidence(match.recordA, match.recordB);
      pairs.push({
        recordA: stripInternalFields(match.recordA),
        recordB: stripInternalFields(match.recordB),
        confidence,
        reason,
        isFuzzy: true,
      });
    }

    uniqueA = fuzzy.remainingA;
    uniqueB = fuzzy.remainingB;
    fuzzyMatchCount = fuzzy.matches.length;
    fuzzyTruncated = fuzzy.truncated;
  }

  const result: ComparisonResult = {
    overlap,
    uniqueA: uniqueA.map(stripInternalFields),
    uniqueB: uniqueB.map(stripInternalFields),
  };

  return {
    ...result,
    pairs,
    summary: {
      totalA: a.length,
      totalB: b.length,
      overlapCount: result.overlap.length,
      uniqueACount: result.uniqueA.length,
      uniqueBCount: result.uniqueB.length,
      fuzzyMatchCount,
      overlapPercentA: percent(result.overlap.length, a.length),
      overlapPercentB: percent(partition.overlapB.length + fuzzyMatchCount, b.length),
      fuzzyTruncated,
    },
  };
}

/**
 * Compare two datasets: overlap, records only in A, records only in B
 */
export function compareDatasets(
  recordsA: readonly unknown[],
  recordsB: readonly unknown[],
  config: Partial<CompareConfig> = {}
): ComparisonResult {
  const { overlap, uniqueA, uniqueB } = compareDatasetsDetailed(recordsA, recordsB, config);
  return { overlap, uniqueA, uniqueB };
}
