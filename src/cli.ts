/**
 * refmatch CLI
 *
 * Bibliographic reference comparison tool.
 *
 * Commands:
 *   compare - Compare two reference lists: overlap and records unique to each
 *   explain - Show how two titles are keyed, scored and matched
 *   stats   - Show field coverage and duplicate keys of reference files
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import ora from 'ora';

import {
  loadRecordFile,
  loadRecordFiles,
  mergeLoadResults,
  type LoadResult,
} from './loader.js';

import {
  compareDatasetsDetailed,
  DEFAULT_COMPARE_CONFIG,
  type CompareConfig,
  type DetailedComparisonResult,
} from './compare.js';

import { formatRecords, formatSummary, isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from './format.js';
import { calculateMatchConfidence } from './confidence.js';
import { generateKey } from './match-key.js';
import { normalizeTitle } from './normalize.js';
import { similarityRatio } from './sequence-matcher.js';
import { fuzzyMatchPass } from './fuzzy-match.js';
import { isRecord, normalizedDoi, resolveTitle, truncatedYear, type BibRecord } from './fields.js';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '0.1.0';

const SUBSETS = ['overlap', 'unique-a', 'unique-b'] as const;
type Subset = typeof SUBSETS[number];

function isSubset(value: string): value is Subset {
  return SUBSETS.some(subset => subset === value);
}

// ============================================================================
// HELPERS
// ============================================================================

function fail(message: string): void {
  console.error(message);
  process.exitCode = 1;
}

function parseNumberOption(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

function writeOutput(output: string, outputFile: string | undefined, quiet: boolean): void {
  if (outputFile) {
    fs.writeFileSync(outputFile, output);
    if (!quiet) {
      console.log(`Output written to ${outputFile}`);
    }
  } else {
    console.log(output);
  }
}

function subsetRecords(result: DetailedComparisonResult, subset: Subset): BibRecord[] {
  switch (subset) {
    case 'overlap': return result.overlap;
    case 'unique-a': return result.uniqueA;
    case 'unique-b': return result.uniqueB;
  }
}

function renderComparison(
  result: DetailedComparisonResult,
  format: OutputFormat,
  includePairs: boolean
): string {
  if (format === 'json') {
    return JSON.stringify({
      summary: result.summary,
      overlap: result.overlap,
      uniqueA: result.uniqueA,
      uniqueB: result.uniqueB,
      ...(includePairs ? { pairs: result.pairs } : {}),
    }, null, 2);
  }

  const sections = [
    formatSummary(result.summary),
    `\n=== Overlap (${result.overlap.length}) ===\n`,
    formatRecords(result.overlap, format),
    `\n=== Only in A (${result.uniqueA.length}) ===\n`,
    formatRecords(result.uniqueA, format),
    `\n=== Only in B (${result.uniqueB.length}) ===\n`,
    formatRecords(result.uniqueB, format),
  ];

  if (includePairs) {
    sections.push(`\n=== Matched Pairs (${result.pairs.length}) ===\n`);
    for (const pair of result.pairs) {
      const kind = pair.isFuzzy ? 'fuzzy' : 'exact';
      sections.push(
        `[${kind}, ${pair.confidence.toFixed(2)}] ${pair.reason}: "${resolveTitle(pair.recordA)}" ~ "${resolveTitle(pair.recordB)}"`
      );
    }
  }

  return sections.join('\n');
}

// ============================================================================
// COMPARE COMMAND
// ============================================================================

function createCompareCommand(): Command {
  return new Command('compare')
    .description('Compare two reference lists and report overlap and unique records')
    .argument('<fileA>', 'Reference file A (JSON or CSV)')
    .argument('<fileB>', 'Reference file B (JSON or CSV)')
    .option('--no-fuzzy', 'Disable fuzzy title matching of unmatched records')
    .option('-t, --threshold <score>', 'Fuzzy title similarity threshold (0-1)', String(DEFAULT_COMPARE_CONFIG.fuzzyThreshold))
    .option('--max-comparisons <count>', 'Limit fuzzy title comparisons')
    .option('-s, --subset <subset>', `Output only one subset: ${SUBSETS.join(', ')}`)
    .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'json')
    .option('-o, --output <file>', 'Output file (defaults to stdout)')
    .option('--pairs', 'Include matched pairs with confidence scores')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (fileA: string, fileB: string, options) => {
      const spinner = options.quiet ? null : ora('Loading reference files...').start();

      try {
        const format: string = options.format;
        if (!isOutputFormat(format)) {
          throw new Error(`Unknown format: ${format} (expected ${OUTPUT_FORMATS.join(', ')})`);
        }
        const subset: string | undefined = options.subset;
        if (subset !== undefined && !isSubset(subset)) {
          throw new Error(`Unknown subset: ${subset} (expected ${SUBSETS.join(', ')})`);
        }

        const [resultA, resultB] = await Promise.all([
          loadRecordFile(path.resolve(fileA)),
          loadRecordFile(path.resolve(fileB)),
        ]);

        if (!resultA.success) {
          throw new Error(`Failed to load ${resultA.fileName}: ${resultA.error}`);
        }
        if (!resultB.success) {
          throw new Error(`Failed to load ${resultB.fileName}: ${resultB.error}`);
        }

        if (spinner) {
          spinner.text = `Comparing ${resultA.records.length} against ${resultB.records.length} records...`;
        }

        const config: CompareConfig = {
          useFuzzy: options.fuzzy !== false,
          fuzzyThreshold: parseNumberOption(options.threshold, 'threshold'),
          maxFuzzyComparisons: options.maxComparisons !== undefined
            ? parseNumberOption(options.maxComparisons, 'max-comparisons')
            : DEFAULT_COMPARE_CONFIG.maxFuzzyComparisons,
        };

        const result = compareDatasetsDetailed(resultA.records, resultB.records, config);

        if (spinner) {
          spinner.succeed(
            `Compared: ${result.summary.overlapCount} shared, ${result.summary.uniqueACount} only in A, ${result.summary.uniqueBCount} only in B`
          );
        }

        const output = subset !== undefined
          ? formatRecords(subsetRecords(result, subset), format)
          : renderComparison(result, format, options.pairs === true);

        writeOutput(output, options.output, options.quiet === true);
      } catch (error) {
        if (spinner) spinner.fail('Compare failed');
        fail(error instanceof Error ? error.message : String(error));
      }
    });
}

// ============================================================================
// EXPLAIN COMMAND
// ============================================================================

function createExplainCommand(): Command {
  return new Command('explain')
    .description('Show how two titles are keyed, scored and matched')
    .argument('<title1>', 'First title')
    .argument('<title2>', 'Second title')
    .option('--year1 <year>', 'Year of the first record')
    .option('--year2 <year>', 'Year of the second record')
    .option('--doi1 <doi>', 'DOI of the first record')
    .option('--doi2 <doi>', 'DOI of the second record')
    .option('-t, --threshold <score>', 'Fuzzy title similarity threshold', String(DEFAULT_COMPARE_CONFIG.fuzzyThreshold))
    .action((title1: string, title2: string, options) => {
      const threshold = parseFloat(options.threshold);
      const recordA: BibRecord = { title: title1, year: options.year1, doi: options.doi1 };
      const recordB: BibRecord = { title: title2, year: options.year2, doi: options.doi2 };

      const norm1 = normalizeTitle(title1);
      const norm2 = normalizeTitle(title2);
      const key1 = generateKey(recordA);
      const key2 = generateKey(recordB);
      const ratio = similarityRatio(norm1, norm2);
      const { confidence, reason } = calculateMatchConfidence(recordA, recordB);
      const fuzzy = fuzzyMatchPass([recordA], [recordB], { threshold });

      console.log('\n=== Titles ===\n');
      console.log(`Original 1:   "${title1}"`);
      console.log(`Original 2:   "${title2}"`);
      console.log(`Normalized 1: "${norm1}"`);
      console.log(`Normalized 2: "${norm2}"`);

      console.log('\n=== Match Keys ===\n');
      console.log(`Key 1: ${key1}`);
      console.log(`Key 2: ${key2}`);
      console.log(`Exact match: ${key1 === key2 ? 'YES' : 'No'}`);

      console.log('\n=== Similarity ===\n');
      console.log(`Title ratio:  ${(ratio * 100).toFixed(1)}%`);
      console.log(`Threshold:    ${(threshold * 100).toFixed(0)}%`);
      console.log(`Years:        "${truncatedYear(recordA)}" vs "${truncatedYear(recordB)}"`);
      console.log(`DOIs:         "${normalizedDoi(recordA)}" vs "${normalizedDoi(recordB)}"`);

      console.log('\n=== Result ===\n');
      console.log(`Fuzzy match: ${fuzzy.matches.length > 0 ? 'YES' : 'No'}`);
      console.log(`Confidence:  ${confidence.toFixed(2)} (${reason})`);
      console.log('');
    });
}

// ============================================================================
// STATS COMMAND
// ============================================================================

function printFileStats(result: LoadResult): void {
  const records = result.records.filter(isRecord);
  const total = records.length;
  const pct = (n: number): string => total > 0 ? ((n / total) * 100).toFixed(1) : '0.0';

  const withDoi = records.filter(r => normalizedDoi(r)).length;
  const withTitle = records.filter(r => normalizeTitle(resolveTitle(r))).length;
  const withYear = records.filter(r => truncatedYear(r).trim()).length;

  const keyCounts = new Map<string, number>();
  for (const record of records) {
    const key = generateKey(record);
    keyCounts.set(key, (keyCounts.get(key) || 0) + 1);
  }
  const duplicateKeys = [...keyCounts.values()].filter(count => count > 1).length;

  console.log(`\n=== ${result.fileName} ===\n`);
  console.log(`Records:        ${total}`);
  if (result.records.length > total) {
    console.log(`Invalid rows:   ${result.records.length - total}`);
  }
  console.log(`With DOI:       ${withDoi} (${pct(withDoi)}%)`);
  console.log(`With title:     ${withTitle} (${pct(withTitle)}%)`);
  console.log(`With year:      ${withYear} (${pct(withYear)}%)`);
  console.log(`Duplicate keys: ${duplicateKeys}`);
}

function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show field coverage and duplicate keys of reference files')
    .argument('<files...>', 'Reference files to analyze')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (files: string[], options) => {
      const spinner = options.quiet ? null : ora('Analyzing files...').start();

      try {
        const results = await loadRecordFiles(files.map(f => path.resolve(f)));
        const merged = mergeLoadResults(results);

        if (spinner) spinner.succeed('Analysis complete');

        console.log('\n=== File Statistics ===\n');
        console.log(`Files processed: ${results.length}`);
        console.log(`Files succeeded: ${merged.successCount}`);
        console.log(`Files failed:    ${merged.errorCount}`);

        if (merged.errors.length > 0) {
          console.log('\nErrors:');
          for (const err of merged.errors) {
            console.log(`  ${err.file}: ${err.error}`);
          }
        }

        for (const result of results) {
          if (result.success) printFileStats(result);
        }

        console.log('');
      } catch (error) {
        if (spinner) spinner.fail('Analysis failed');
        fail(error instanceof Error ? error.message : String(error));
      }
    });
}

// ============================================================================
// MAIN PROGRAM
// ============================================================================

export function createProgram(): Command {
  const program = new Command()
    .name('refmatch')
    .description('Bibliographic reference matching and deduplication')
    .version(VERSION);

  program.addCommand(createCompareCommand());
  program.addCommand(createExplainCommand());
  program.addCommand(createStatsCommand());

  return program;
}
