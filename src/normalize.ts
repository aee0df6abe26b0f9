/**
 * Title Normalization
 *
 * Canonical form of a title for key generation and similarity scoring:
 * lowercase, one leading English article removed, letters and digits only.
 *
 * Examples:
 * - "The Impact of AI" -> "impactofai"
 * - "Impact of AI"     -> "impactofai"
 * - "A/B Testing, 2nd ed." -> "abtesting2nded" (no space after "a")
 */

// =============================================================================
// ARTICLE PREFIXES
// =============================================================================

/**
 * Checked in order; only the first matching prefix is removed
 */
export const ARTICLE_PREFIXES = ['the ', 'a ', 'an '] as const;

const NON_ALPHANUMERIC = /[^\p{L}\p{N}]/gu;

// =============================================================================
// NORMALIZATION
// =============================================================================

/**
 * Normalize a title for matching. Non-string input yields ''.
 */
export function normalizeTitle(title: unknown): string {
  if (typeof title !== 'string') return '';

  let lower = title.toLowerCase().trim();

  for (const prefix of ARTICLE_PREFIXES) {
    if (lower.startsWith(prefix)) {
      lower = lower.slice(prefix.length);
      break;
    }
  }

  return lower.replace(NON_ALPHANUMERIC, '');
}
