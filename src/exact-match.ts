/**
 * Exact Matching
 *
 * Set-based partition of two record collections by match key:
 * overlap = keys(A) ∩ keys(B), uniqueA = keys(A) − keys(B),
 * uniqueB = keys(B) − keys(A).
 *
 * Records are filtered back from their own side in input order. Several
 * records sharing a key on one side all pass through.
 */

import { generateKey } from './match-key.js';
import type { BibRecord } from './fields.js';

// ============================================================================
// TYPES
// ============================================================================

export interface KeyedRecord<T extends BibRecord = BibRecord> {
  record: T;
  key: string;
}

export interface ExactPartition<T extends BibRecord = BibRecord> {
  overlapKeys: Set<string>;
  uniqueAKeys: Set<string>;
  uniqueBKeys: Set<string>;

  /** Overlapping records, taken from side A */
  overlap: KeyedRecord<T>[];

  /** Side B records whose key is in the overlap */
  overlapB: KeyedRecord<T>[];
  uniqueA: KeyedRecord<T>[];
  uniqueB: KeyedRecord<T>[];
}

// ============================================================================
// PARTITION
// ============================================================================

/**
 * Attach a match key to each record without touching the record itself
 */
export function keyRecords<T extends BibRecord>(records: readonly T[]): KeyedRecord<T>[] {
  return records.map(record => ({ record, key: generateKey(record) }));
}

/**
 * Partition two collections by exact match key
 */
export function partitionByKey<T extends BibRecord>(
  recordsA: readonly T[],
  recordsB: readonly T[]
): ExactPartition<T> {
  const keyedA = keyRecords(recordsA);
  const keyedB = keyRecords(recordsB);

  // Empty side: nothing can overlap, skip key set work
  if (keyedA.length === 0 || keyedB.length === 0) {
    return {
      overlapKeys: new Set<string>(),
      uniqueAKeys: new Set(keyedA.map(k => k.key)),
      uniqueBKeys: new Set(keyedB.map(k => k.key)),
      overlap: [],
      overlapB: [],
      uniqueA: keyedA,
      uniqueB: keyedB,
    };
  }

  const keysA = new Set(keyedA.map(k => k.key));
  const keysB = new Set(keyedB.map(k => k.key));

  const overlapKeys = new Set([...keysA].filter(key => keysB.has(key)));
  const uniqueAKeys = new Set([...keysA].filter(key => !keysB.has(key)));
  const uniqueBKeys = new Set([...keysB].filter(key => !keysA.has(key)));

  return {
    overlapKeys,
    uniqueAKeys,
    uniqueBKeys,
    overlap: keyedA.filter(k => overlapKeys.has(k.key)),
    overlapB: keyedB.filter(k => overlapKeys.has(k.key)),
    uniqueA: keyedA.filter(k => uniqueAKeys.has(k.key)),
    uniqueB: keyedB.filter(k => uniqueBKeys.has(k.key)),
  };
}
