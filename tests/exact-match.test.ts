import { describe, it, expect } from 'vitest';
import { keyRecords, partitionByKey } from '../src/exact-match.js';
import type { BibRecord } from '../src/fields.js';

function ref(title: string, year?: string, doi?: string): BibRecord {
  const record: BibRecord = { title };
  if (year !== undefined) record.year = year;
  if (doi !== undefined) record.doi = doi;
  return record;
}

describe('keyRecords', () => {
  it('pairs each record with its key without copying it', () => {
    const record = ref('Graph Theory', '1998');
    const [keyed] = keyRecords([record]);
    expect(keyed.key).toBe('TY:graphtheory_1998');
    expect(keyed.record).toBe(record);
  });
});

describe('partitionByKey', () => {
  it('splits records into overlap and unique sets', () => {
    const a = [ref('Shared Paper', '2020'), ref('Only A', '2021')];
    const b = [ref('Only B', '2019'), ref('The Shared Paper', '2020')];

    const result = partitionByKey(a, b);

    expect([...result.overlapKeys]).toEqual(['TY:sharedpaper_2020']);
    expect([...result.uniqueAKeys]).toEqual(['TY:onlya_2021']);
    expect([...result.uniqueBKeys]).toEqual(['TY:onlyb_2019']);
    expect(result.overlap.map(k => k.record)).toEqual([a[0]]);
    expect(result.overlapB.map(k => k.record)).toEqual([b[1]]);
    expect(result.uniqueA.map(k => k.record)).toEqual([a[1]]);
    expect(result.uniqueB.map(k => k.record)).toEqual([b[0]]);
  });

  it('matches on DOI even when titles differ', () => {
    const a = [ref('T1', '2020', '10.1234/X')];
    const b = [ref('T2 (different)', '2018', '10.1234/x')];

    const result = partitionByKey(a, b);
    expect(result.overlap).toHaveLength(1);
    expect(result.uniqueA).toHaveLength(0);
    expect(result.uniqueB).toHaveLength(0);
  });

  it('passes same-side duplicates through', () => {
    const a = [ref('Shared', '2020'), ref('Shared', '2020'), ref('Solo A', '2020'), ref('Solo A', '2020')];
    const b = [ref('Shared', '2020')];

    const result = partitionByKey(a, b);
    expect(result.overlap).toHaveLength(2);
    expect(result.uniqueA).toHaveLength(2);
    expect(result.uniqueB).toHaveLength(0);
  });

  it('keeps input order within each set', () => {
    const a = [ref('C', '2001'), ref('X', '2000'), ref('A', '2003'), ref('B', '2002')];
    const b = [ref('X', '2000')];

    const result = partitionByKey(a, b);
    expect(result.uniqueA.map(k => k.record.title)).toEqual(['C', 'A', 'B']);
  });

  it('does not match undated records whose titles differ in length', () => {
    const a = [ref('AI in Medicine')];
    const b = [ref('AI in Medicines')];

    const result = partitionByKey(a, b);
    expect(result.overlap).toHaveLength(0);
  });

  it('skips set work when a side is empty', () => {
    const a = [ref('Only A', '2021')];

    const left = partitionByKey(a, []);
    expect(left.overlap).toEqual([]);
    expect(left.uniqueA.map(k => k.record)).toEqual(a);
    expect(left.uniqueB).toEqual([]);

    const right = partitionByKey([], a);
    expect(right.uniqueA).toEqual([]);
    expect(right.uniqueB.map(k => k.record)).toEqual(a);
  });
});
