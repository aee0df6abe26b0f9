import { describe, it, expect } from 'vitest';
import {
  assertRecord,
  InvalidRecordShapeError,
  isRecord,
  normalizedDoi,
  resolveAuthors,
  resolveField,
  resolveString,
  resolveTitle,
  truncatedYear,
} from '../src/fields.js';

describe('resolveField', () => {
  it('returns the first usable alias', () => {
    expect(resolveField({ title: 'A', primary_title: 'B', ti: 'C' }, 'title')).toBe('A');
    expect(resolveField({ primary_title: 'B', ti: 'C' }, 'title')).toBe('B');
    expect(resolveField({ ti: 'C' }, 'title')).toBe('C');
  });

  it('skips empty and unsupported values', () => {
    expect(resolveField({ title: '', primary_title: null, ti: 'C' }, 'title')).toBe('C');
    expect(resolveField({ year: 0, py: '1999' }, 'year')).toBe('1999');
    expect(resolveField({ year: false, py: 2001 }, 'year')).toBe(2001);
    expect(resolveField({ year: Number.NaN }, 'year')).toBeUndefined();
  });

  it('resolves journal and abstract aliases', () => {
    expect(resolveField({ t2: 'Nature' }, 'journal')).toBe('Nature');
    expect(resolveField({ jo: 'Sci', t2: 'Nature' }, 'journal')).toBe('Sci');
    expect(resolveField({ n2: 'Text' }, 'abstract')).toBe('Text');
  });

  it('accepts string arrays but not mixed arrays', () => {
    expect(resolveField({ au: ['Doe, J', 'Roe, R'] }, 'authors')).toEqual(['Doe, J', 'Roe, R']);
    expect(resolveField({ authors: ['Doe, J', 3], au: ['Roe, R'] }, 'authors')).toEqual(['Roe, R']);
  });
});

describe('scalar helpers', () => {
  it('resolveString stringifies numbers and drops arrays', () => {
    expect(resolveString({ year: 2020 }, 'year')).toBe('2020');
    expect(resolveString({ year: ['2020'] }, 'year')).toBe('');
  });

  it('resolveTitle only accepts strings', () => {
    expect(resolveTitle({ title: 99 })).toBe('');
    expect(resolveTitle({ ti: 'Graph Theory' })).toBe('Graph Theory');
  });

  it('truncatedYear keeps the first four characters', () => {
    expect(truncatedYear({ year: '2020-01-01' })).toBe('2020');
    expect(truncatedYear({ py: 1987 })).toBe('1987');
    expect(truncatedYear({})).toBe('');
  });

  it('normalizedDoi trims and lowercases', () => {
    expect(normalizedDoi({ do: ' 10.1/ABC ' })).toBe('10.1/abc');
    expect(normalizedDoi({})).toBe('');
  });

  it('resolveAuthors wraps a single author', () => {
    expect(resolveAuthors({ authors: 'Doe, J' })).toEqual(['Doe, J']);
    expect(resolveAuthors({})).toEqual([]);
  });
});

describe('record shape', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord(null)).toBe(false);
    expect(isRecord([])).toBe(false);
    expect(isRecord('title')).toBe(false);
  });

  it('assertRecord throws InvalidRecordShapeError with location', () => {
    let caught: unknown;
    try {
      assertRecord(['not', 'a', 'record'], 'b', 3);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidRecordShapeError);
    if (caught instanceof InvalidRecordShapeError) {
      expect(caught.name).toBe('InvalidRecordShapeError');
      expect(caught.side).toBe('b');
      expect(caught.index).toBe(3);
      expect(caught.message).toBe('Record must be an object, got array (dataset B, record 3)');
    }
  });

  it('assertRecord describes primitives', () => {
    expect(() => assertRecord(null)).toThrow('Record must be an object, got null');
    expect(() => assertRecord(7)).toThrow('Record must be an object, got number');
  });
});
