/**
 * refmatch - bibliographic reference matching and deduplication
 *
 * @packageDocumentation
 */

// ============================================================================
// RECORD FIELDS
// ============================================================================

export {
  FIELD_ALIASES,
  InvalidRecordShapeError,
  isRecord,
  assertRecord,
  resolveField,
  resolveString,
  resolveTitle,
  resolveAuthors,
  truncatedYear,
  normalizedDoi,
  type BibRecord,
  type CanonicalField,
} from './fields.js';

// ============================================================================
// NORMALIZATION & SIMILARITY
// ============================================================================

export { ARTICLE_PREFIXES, normalizeTitle } from './normalize.js';

export {
  SequenceMatcher,
  similarityRatio,
  type MatchingBlock,
} from './sequence-matcher.js';

// ============================================================================
// MATCHING
// ============================================================================

export {
  DOI_KEY_PREFIX,
  TITLE_KEY_PREFIX,
  NO_YEAR_MARKER,
  generateKey,
} from './match-key.js';

export {
  keyRecords,
  partitionByKey,
  type KeyedRecord,
  type ExactPartition,
} from './exact-match.js';

export {
  FUZZY_DEFAULT_THRESHOLD,
  DEFAULT_FUZZY_OPTIONS,
  fuzzyMatchPass,
  type FuzzyMatchOptions,
  type FuzzyMatch,
  type FuzzyMatchResult,
} from './fuzzy-match.js';

export {
  CONFIDENCE_TIERS,
  SIMILARITY_TIERS,
  TITLE_MATCH_THRESHOLD,
  calculateMatchConfidence,
  isTitleMatch,
  type MatchConfidence,
} from './confidence.js';

export {
  DEFAULT_COMPARE_CONFIG,
  INTERNAL_FIELDS,
  FUZZY_MATCH_FLAG,
  stripInternalFields,
  compareDatasets,
  compareDatasetsDetailed,
  type CompareConfig,
  type ComparisonResult,
  type ComparisonSummary,
  type DetailedComparisonResult,
  type MatchedPair,
} from './compare.js';

// ============================================================================
// FILES & OUTPUT
// ============================================================================

export {
  getFileType,
  getSupportedExtensions,
  parseJSONRecords,
  parseCSVRecords,
  splitCSVLine,
  splitCSVRows,
  loadRecordFile,
  loadRecordFiles,
  mergeLoadResults,
  type LoadResult,
  type SupportedFormat,
} from './loader.js';

export {
  OUTPUT_FORMATS,
  isOutputFormat,
  escapeCSV,
  formatRecords,
  formatSummary,
  type OutputFormat,
} from './format.js';
