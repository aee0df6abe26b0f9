/**
 * Record Loader Module
 *
 * Reads bibliographic records from JSON and CSV/TSV files.
 * Parsing of tagged bibliographic text formats happens upstream; this
 * module only handles tabular and JSON exports of already-parsed records.
 */

import * as fsPromises from 'fs/promises';
import * as path from 'path';
import type { BibRecord } from './fields.js';

// ============================================================================
// TYPES
// ============================================================================

export interface LoadResult {
  success: boolean;

  /** Entries as found; non-object entries are kept for the engine to reject */
  records: unknown[];
  fileType: string;
  fileName: string;
  error?: string;
}

export type SupportedFormat = 'json' | 'csv' | 'unknown';

const AUTHOR_COLUMNS = ['authors', 'au'];
const AUTHOR_SEPARATOR = ';';

// ============================================================================
// FILE TYPE DETECTION
// ============================================================================

/**
 * Detect file type from extension
 */
export function getFileType(filePath: string): SupportedFormat {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.json': return 'json';
    case '.csv':
    case '.tsv': return 'csv';
    default: return 'unknown';
  }
}

export function getSupportedExtensions(): string[] {
  return ['.json', '.csv', '.tsv'];
}

// ============================================================================
// JSON PARSING
// ============================================================================

/**
 * Parse a JSON array of records, or an object with a `records` array
 */
export function parseJSONRecords(content: string): unknown[] {
  const data: unknown = JSON.parse(content);

  if (Array.isArray(data)) return data;

  if (typeof data === 'object' && data !== null && 'records' in data && Array.isArray(data.records)) {
    return data.records;
  }

  throw new Error('Expected a JSON array of records or an object with a "records" array');
}

// ============================================================================
// CSV PARSING
// ============================================================================

/**
 * Detect CSV delimiter from the header line
 */
function detectDelimiter(firstLine: string): string {
  const delimiters = [',', '\t', ';', '|'];
  let maxCount = 0;
  let detected = ',';

  for (const delim of delimiters) {
    const count = firstLine.split(delim).length - 1;
    if (count > maxCount) {
      maxCount = count;
      detected = delim;
    }
  }

  return detected;
}

/**
 * Split CSV content into rows of fields, honouring double-quoted fields
 * ("" is a literal quote). A newline inside quotes stays in the field.
 */
export function splitCSVRows(content: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];

    if (inQuotes) {
      if (ch === '"' && content[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.trim() === '') {
      current = '';
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(current.trim());
      current = '';
    } else if (ch === '\r' && content[i + 1] === '\n') {
      continue;
    } else if (ch === '\n') {
      row.push(current.trim());
      rows.push(row);
      row = [];
      current = '';
    } else {
      current += ch;
    }
  }

  if (row.length > 0 || current !== '') {
    row.push(current.trim());
    rows.push(row);
  }

  return rows;
}

/**
 * Split one CSV line
 */
export function splitCSVLine(line: string, delimiter: string): string[] {
  return splitCSVRows(line, delimiter)[0] ?? [''];
}

/**
 * Parse CSV content into records keyed by header name
 */
export function parseCSVRecords(content: string): BibRecord[] {
  const records: BibRecord[] = [];
  const headerEnd = content.search(/\r?\n/);
  const delimiter = detectDelimiter(headerEnd === -1 ? content : content.slice(0, headerEnd));
  const rows = splitCSVRows(content, delimiter).filter(row => row.some(value => value !== ''));

  if (rows.length < 2) return records;

  const headers = rows[0];

  for (let i = 1; i < rows.length; i++) {
    const values = rows[i];
    const record: BibRecord = {};

    for (let j = 0; j < headers.length; j++) {
      const header = headers[j];
      const value = values[j];
      if (!header || !value) continue;

      if (AUTHOR_COLUMNS.includes(header.toLowerCase()) && delimiter !== AUTHOR_SEPARATOR) {
        record[header] = value.split(AUTHOR_SEPARATOR).map(a => a.trim()).filter(Boolean);
      } else {
        record[header] = value;
      }
    }

    records.push(record);
  }

  return records;
}

// ============================================================================
// MAIN LOAD FUNCTION
// ============================================================================

/**
 * Load a record file. Failures are reported in the result, never thrown.
 */
export async function loadRecordFile(filePath: string): Promise<LoadResult> {
  const fileType = getFileType(filePath);
  const fileName = path.basename(filePath);

  if (fileType === 'unknown') {
    return {
      success: false,
      records: [],
      fileType,
      fileName,
      error: `Unsupported file type: ${path.extname(filePath) || '(none)'}`,
    };
  }

  try {
    const content = await fsPromises.readFile(filePath, 'utf-8');
    const records = fileType === 'json' ? parseJSONRecords(content) : parseCSVRecords(content);

    return { success: true, records, fileType, fileName };
  } catch (error) {
    return {
      success: false,
      records: [],
      fileType,
      fileName,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Load several record files concurrently
 */
export async function loadRecordFiles(filePaths: string[]): Promise<LoadResult[]> {
  return Promise.all(filePaths.map(loadRecordFile));
}

/**
 * Concatenate the records of all successful loads
 */
export function mergeLoadResults(results: LoadResult[]): {
  records: unknown[];
  successCount: number;
  errorCount: number;
  errors: Array<{ file: string; error: string }>;
} {
  const records: unknown[] = [];
  let successCount = 0;
  let errorCount = 0;
  const errors: Array<{ file: string; error: string }> = [];

  for (const result of results) {
    if (result.success) {
      records.push(...result.records);
      successCount++;
    } else {
      errorCount++;
      errors.push({ file: result.fileName, error: result.error || 'Unknown error' });
    }
  }

  return { records, successCount, errorCount, errors };
}
