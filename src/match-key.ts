/**
 * Match Key Generation
 *
 * Derives the exact-match key of a record.
 *
 * Priority:
 * 1. DOI — globally unique, authoritative regardless of title
 * 2. Normalized title + 4-character year
 *
 * Records without a year get "NOYEAR_<title length>" in place of the year,
 * so two undated records only collide when their normalized titles are equal
 * (and therefore of equal length).
 */

import { normalizeTitle } from './normalize.js';
import { resolveString, resolveTitle, type BibRecord } from './fields.js';

export const DOI_KEY_PREFIX = 'DOI:';
export const TITLE_KEY_PREFIX = 'TY:';
export const NO_YEAR_MARKER = 'NOYEAR_';

/**
 * Generate the exact-match key for a record. Never empty.
 */
export function generateKey(record: BibRecord): string {
  const doi = resolveString(record, 'doi').trim();
  if (doi) {
    return `${DOI_KEY_PREFIX}${doi.toLowerCase()}`;
  }

  const titleNorm = normalizeTitle(resolveTitle(record));
  const year = resolveString(record, 'year');

  const yearPart = year.trim()
    ? year.slice(0, 4)
    : `${NO_YEAR_MARKER}${titleNorm.length}`;

  return `${TITLE_KEY_PREFIX}${titleNorm}_${yearPart}`;
}
