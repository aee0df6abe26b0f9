/**
 * Output Formatters
 *
 * Renders comparison output as JSON, CSV or a plain-text table.
 */

import { resolveAuthors, resolveString, resolveTitle, type BibRecord } from './fields.js';
import { FUZZY_MATCH_FLAG, type ComparisonSummary } from './compare.js';

export type OutputFormat = 'json' | 'csv' | 'table';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv', 'table'];

const CSV_HEADERS = ['title', 'authors', 'year', 'journal', 'doi', 'fuzzy_match'];
const TABLE_TITLE_WIDTH = 50;

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function escapeCSV(str: string): string {
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function csvRow(record: BibRecord): string {
  return [
    resolveTitle(record),
    resolveAuthors(record).join('; '),
    resolveString(record, 'year'),
    resolveString(record, 'journal'),
    resolveString(record, 'doi'),
    record[FUZZY_MATCH_FLAG] === true ? 'true' : '',
  ].map(escapeCSV).join(',');
}

function tableRows(records: BibRecord[]): string[] {
  const header = `${'Title'.padEnd(TABLE_TITLE_WIDTH)} | ${'Year'.padEnd(4)} | DOI`;
  const separator = '-'.repeat(header.length);
  const rows = records.map(record => {
    const title = resolveTitle(record).slice(0, TABLE_TITLE_WIDTH).padEnd(TABLE_TITLE_WIDTH);
    const year = resolveString(record, 'year').slice(0, 4).padEnd(4);
    const doi = resolveString(record, 'doi');
    const marker = record[FUZZY_MATCH_FLAG] === true ? ' (fuzzy)' : '';
    return `${title} | ${year} | ${doi}${marker}`;
  });
  return [header, separator, ...rows];
}

/**
 * Render a list of records
 */
export function formatRecords(records: BibRecord[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(records, null, 2);

    case 'csv':
      return [CSV_HEADERS.join(','), ...records.map(csvRow)].join('\n');

    case 'table':
      return tableRows(records).join('\n');
  }
}

/**
 * Human-readable comparison summary
 */
export function formatSummary(summary: ComparisonSummary): string {
  const lines = [
    `Dataset A:     ${summary.totalA} records`,
    `Dataset B:     ${summary.totalB} records`,
    `Overlap:       ${summary.overlapCount} (${summary.overlapPercentA}% of A, ${summary.overlapPercentB}% of B)`,
    `Fuzzy matches: ${summary.fuzzyMatchCount}`,
    `Only in A:     ${summary.uniqueACount}`,
    `Only in B:     ${summary.uniqueBCount}`,
  ];
  if (summary.fuzzyTruncated) {
    lines.push('Fuzzy pass stopped early (comparison limit reached)');
  }
  return lines.join('\n');
}
