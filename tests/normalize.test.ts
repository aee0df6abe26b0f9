import { describe, it, expect } from 'vitest';
import { normalizeTitle } from '../src/normalize.js';

describe('normalizeTitle', () => {
  it('removes a leading English article', () => {
    expect(normalizeTitle('The Impact of AI')).toBe('impactofai');
    expect(normalizeTitle('Impact of AI')).toBe('impactofai');
    expect(normalizeTitle('A Study on Machine Learning')).toBe('studyonmachinelearning');
    expect(normalizeTitle('An Overview of Deep Learning')).toBe('overviewofdeeplearning');
  });

  it('is case insensitive', () => {
    expect(normalizeTitle('THE IMPACT OF AI')).toBe(normalizeTitle('Impact of AI'));
  });

  it('removes only one article', () => {
    expect(normalizeTitle('The The Band')).toBe('theband');
    expect(normalizeTitle('A An Example')).toBe('anexample');
  });

  it('requires the article to be a whole word', () => {
    expect(normalizeTitle('Theory of Everything')).toBe('theoryofeverything');
    expect(normalizeTitle('Another Look')).toBe('anotherlook');
    expect(normalizeTitle('A/B Testing')).toBe('abtesting');
  });

  it('trims before looking for an article', () => {
    expect(normalizeTitle('   The  Impact  ')).toBe('impact');
  });

  it('keeps only letters and digits', () => {
    expect(normalizeTitle('COVID-19: A Review!')).toBe('covid19areview');
    expect(normalizeTitle('Über die Quantenmechanik')).toBe('überdiequantenmechanik');
  });

  it('returns empty string for non-string input', () => {
    expect(normalizeTitle(null)).toBe('');
    expect(normalizeTitle(undefined)).toBe('');
    expect(normalizeTitle(42)).toBe('');
    expect(normalizeTitle(['The Title'])).toBe('');
  });

  it('is idempotent', () => {
    const titles = [
      'The Impact of AI',
      'The The Band',
      'A An Example',
      '  An   Overview, Part 2 ',
      'Über die Quantenmechanik',
      '',
      '!!!',
    ];
    for (const title of titles) {
      const once = normalizeTitle(title);
      expect(normalizeTitle(once)).toBe(once);
    }
  });
});
