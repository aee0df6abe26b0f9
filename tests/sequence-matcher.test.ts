import { describe, it, expect } from 'vitest';
import { SequenceMatcher, similarityRatio } from '../src/sequence-matcher.js';

describe('similarityRatio', () => {
  it('returns 1.0 for identical strings', () => {
    expect(similarityRatio('abcd', 'abcd')).toBe(1.0);
  });

  it('treats two empty strings as identical', () => {
    expect(similarityRatio('', '')).toBe(1.0);
  });

  it('returns 0 when one side is empty', () => {
    expect(similarityRatio('abc', '')).toBe(0);
    expect(similarityRatio('', 'abc')).toBe(0);
  });

  it('returns 0 for strings with no common characters', () => {
    expect(similarityRatio('abc', 'xyz')).toBe(0);
  });

  it('computes 2M/T over matched blocks', () => {
    expect(similarityRatio('abcd', 'bcde')).toBe(0.75);
    expect(similarityRatio('abxcd', 'abcd')).toBeCloseTo(8 / 9, 10);
  });

  it('hits 0.90 exactly for one substitution in ten characters', () => {
    expect(similarityRatio('abcdefghij', 'abcdefghix')).toBe(0.9);
  });

  it('scores a typo in a title', () => {
    expect(similarityRatio('machinelearninginhealthcare', 'machinelearinginhealthcare'))
      .toBeCloseTo(52 / 53, 10);
  });

  it('compares by code point', () => {
    expect(similarityRatio('über', 'uber')).toBe(0.75);
  });
});

describe('SequenceMatcher', () => {
  it('finds the earliest longest block on ties', () => {
    const matcher = new SequenceMatcher('abxcd', 'abcd');
    expect(matcher.findLongestMatch(0, 5, 0, 4)).toEqual([0, 0, 2]);
  });

  it('returns matching blocks in order', () => {
    const matcher = new SequenceMatcher('abxcd', 'abcd');
    expect(matcher.getMatchingBlocks()).toEqual([
      [0, 0, 2],
      [3, 2, 2],
    ]);
  });

  it('ignores popular characters as match seeds in long sequences', () => {
    const a = 'x' + 'a'.repeat(5) + 'y';
    const b = 'a'.repeat(250) + 'xy';

    expect(new SequenceMatcher(a, b).ratio()).toBeCloseTo(4 / 257, 10);
    expect(new SequenceMatcher(a, b, false).ratio()).toBeCloseTo(12 / 259, 10);
  });

  it('extends a match across popular characters', () => {
    const matcher = new SequenceMatcher('qxay', 'a'.repeat(200) + 'xay');
    expect(matcher.getMatchingBlocks()).toEqual([[1, 200, 3]]);
    expect(matcher.ratio()).toBeCloseTo(6 / 207, 10);
  });
});
