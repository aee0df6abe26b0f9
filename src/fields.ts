/**
 * Record Fields Module
 *
 * Record shape validation and ordered alias resolution for bibliographic
 * fields. Parsers name the same field differently (`title`, `primary_title`,
 * `ti`), so every lookup walks an explicit alias list.
 */

// ============================================================================
// TYPES
// ============================================================================

/**
 * A bibliographic record as produced by a parser: field name to value.
 * Values are expected to be strings, numbers or string arrays; anything
 * else is tolerated and treated as absent.
 */
export type BibRecord = Record<string, unknown>;

export type CanonicalField =
  | 'doi'
  | 'title'
  | 'year'
  | 'journal'
  | 'abstract'
  | 'authors'
  | 'type';

// ============================================================================
// ALIASES
// ============================================================================

/**
 * Ordered alias chains; the first usable value wins
 */
export const FIELD_ALIASES: Record<CanonicalField, readonly string[]> = {
  doi: ['doi', 'do'],
  title: ['title', 'primary_title', 'ti'],
  year: ['year', 'py'],
  journal: ['journal_name', 'jo', 't2'],
  abstract: ['abstract', 'ab', 'n2'],
  authors: ['authors', 'au'],
  type: ['type_of_reference'],
};

// ============================================================================
// SHAPE VALIDATION
// ============================================================================

export class InvalidRecordShapeError extends Error {
  readonly side: 'a' | 'b' | null;
  readonly index: number | null;

  constructor(message: string, side: 'a' | 'b' | null = null, index: number | null = null) {
    super(message);
    this.name = 'InvalidRecordShapeError';
    this.side = side;
    this.index = index;
  }
}

export function isRecord(value: unknown): value is BibRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Throw InvalidRecordShapeError unless the value is a field mapping
 */
export function assertRecord(
  value: unknown,
  side: 'a' | 'b' | null = null,
  index: number | null = null
): asserts value is BibRecord {
  if (!isRecord(value)) {
    const got = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
    const where = side !== null && index !== null ? ` (dataset ${side.toUpperCase()}, record ${index})` : '';
    throw new InvalidRecordShapeError(`Record must be an object, got ${got}${where}`, side, index);
  }
}

// ============================================================================
// RESOLUTION
// ============================================================================

function isUsable(value: unknown): value is string | number | string[] {
  if (typeof value === 'string') return value.length > 0;
  if (typeof value === 'number') return Number.isFinite(value) && value !== 0;
  if (Array.isArray(value)) {
    return value.length > 0 && value.every(item => typeof item === 'string');
  }
  return false;
}

/**
 * Resolve a canonical field through its alias chain.
 * Returns undefined when no alias carries a usable value.
 */
export function resolveField(
  record: BibRecord,
  field: CanonicalField
): string | number | string[] | undefined {
  for (const alias of FIELD_ALIASES[field]) {
    const value = record[alias];
    if (isUsable(value)) return value;
  }
  return undefined;
}

/**
 * Resolve a field as a string; arrays are not scalar and count as absent
 */
export function resolveString(record: BibRecord, field: CanonicalField): string {
  const value = resolveField(record, field);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Resolved title. Only strings are titles; anything else is empty.
 */
export function resolveTitle(record: BibRecord): string {
  const value = resolveField(record, 'title');
  return typeof value === 'string' ? value : '';
}

/**
 * First four characters of the stringified year, or '' when absent
 */
export function truncatedYear(record: BibRecord): string {
  return resolveString(record, 'year').slice(0, 4);
}

/**
 * DOI trimmed and lowercased, or '' when absent
 */
export function normalizedDoi(record: BibRecord): string {
  return resolveString(record, 'doi').trim().toLowerCase();
}

/**
 * Authors as a list; a single string is one author
 */
export function resolveAuthors(record: BibRecord): string[] {
  const value = resolveField(record, 'authors');
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') return [value];
  return [];
}
