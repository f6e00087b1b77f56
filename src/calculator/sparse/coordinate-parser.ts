/**
 * Coordinate text parser.
 *
 *   rows=<int>
 *   cols=<int>
 *   (<row>, <col>, <value>)
 *   ...
 *
 * Syntax errors throw FormatError. Entries outside the declared bounds are
 * skipped and reported, never thrown.
 */

import { log, logDebug, logOnce, logWarning } from '../calculator-logger';
import { FormatError } from './errors';
import { SparseMatrix } from './SparseMatrix';

export interface ParseReport {
  /** Entry lines read (after the header) */
  totalEntries: number;
  /** Entries dropped because their indices were out of bounds */
  skippedEntries: number;
  /** Entries whose value was zero */
  zeroEntries: number;
  /** Entries that overwrote an earlier entry at the same position */
  duplicateEntries: number;
  /** "(row, col)" -> occurrences, for out-of-bounds entries */
  outOfBounds: Map<string, number>;
  suggestions: string[];
}

export interface ParseResult {
  matrix: SparseMatrix;
  report: ParseReport;
}

const INTEGER = '[+-]?\\d+';
const NUMBER = '[+-]?(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][+-]?\\d+)?';

const ENTRY_PATTERN = new RegExp(
  `^\\(\\s*(${INTEGER})\\s*,\\s*(${INTEGER})\\s*,\\s*(${NUMBER})\\s*\\)$`
);

const TOP_PATTERNS = 5;

interface SourceLine {
  text: string;
  lineNumber: number;
}

function nonBlankLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  text.split(/\r?\n/).forEach((raw, index) => {
    const trimmed = raw.trim();
    if (trimmed.length > 0) {
      lines.push({ text: trimmed, lineNumber: index + 1 });
    }
  });
  return lines;
}

function parseDimension(line: SourceLine | undefined, name: 'rows' | 'cols'): number {
  if (!line) {
    throw new FormatError('Invalid file format: missing rows/cols declaration');
  }

  const match = new RegExp(`^${name}\\s*=\\s*(${INTEGER})$`).exec(line.text);
  if (!match) {
    throw new FormatError(`Expected "${name}=<integer>", got "${line.text}"`, line.lineNumber);
  }

  const value = Number(match[1]);
  if (value < 0) {
    throw new FormatError(`Negative ${name} dimension: ${match[1]}`, line.lineNumber);
  }
  if (!Number.isSafeInteger(value)) {
    throw new FormatError(`${name} dimension too large: ${match[1]}`, line.lineNumber);
  }
  return value;
}

function buildSuggestions(report: ParseReport, rows: number, cols: number): string[] {
  const suggestions: string[] = [];
  let oneBasedCols = false;
  let oneBasedRows = false;

  for (let row = 0; row < rows && !oneBasedCols; row++) {
    oneBasedCols = report.outOfBounds.has(`(${row}, ${cols})`);
  }
  for (let col = 0; col < cols && !oneBasedRows; col++) {
    oneBasedRows = report.outOfBounds.has(`(${rows}, ${col})`);
  }

  if (oneBasedCols) {
    suggestions.push(
      'Some indices appear to use 1-based indexing for columns. ' +
        'Consider subtracting 1 from each column value.'
    );
  }
  if (oneBasedRows) {
    suggestions.push(
      'Some indices appear to use 1-based indexing for rows. ' +
        'Consider subtracting 1 from each row value.'
    );
  }
  return suggestions;
}

function logSkippedSummary(report: ParseReport): void {
  const percent = ((report.skippedEntries / report.totalEntries) * 100).toFixed(2);

  logWarning(
    `Skipped ${report.skippedEntries} of ${report.totalEntries} entries ` +
      `due to out-of-bounds indices (${percent}%)`
  );

  const patterns = Array.from(report.outOfBounds.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, TOP_PATTERNS);

  log('Most common out-of-bounds patterns:');
  for (const [pattern, count] of patterns) {
    log(`  ${pattern}: ${count} occurrences`);
  }

  // Both operands of one run may produce the same hint
  for (const suggestion of report.suggestions) {
    logOnce(`Suggestion: ${suggestion}`);
  }
}

/**
 * Parses coordinate text and reports what was skipped along the way.
 * Duplicate positions follow last-write-wins.
 */
export function parseMatrixWithReport(text: string): ParseResult {
  const lines = nonBlankLines(text);
  const rows = parseDimension(lines[0], 'rows');
  const cols = parseDimension(lines[1], 'cols');
  const matrix = SparseMatrix.create(rows, cols);

  const report: ParseReport = {
    totalEntries: 0,
    skippedEntries: 0,
    zeroEntries: 0,
    duplicateEntries: 0,
    outOfBounds: new Map<string, number>(),
    suggestions: [],
  };
  const seen = new Set<string>();

  for (const { text: line, lineNumber } of lines.slice(2)) {
    const match = ENTRY_PATTERN.exec(line);
    if (!match) {
      throw new FormatError(`Expected "(row, col, value)", got "${line}"`, lineNumber);
    }

    const row = Number(match[1]);
    const col = Number(match[2]);
    const value = Number(match[3]);
    if (!Number.isFinite(value)) {
      throw new FormatError(`Value out of range: ${match[3]}`, lineNumber);
    }
    report.totalEntries++;

    if (row < 0 || row >= rows || col < 0 || col >= cols) {
      const key = `(${row}, ${col})`;
      report.skippedEntries++;
      report.outOfBounds.set(key, (report.outOfBounds.get(key) ?? 0) + 1);
      logDebug(
        `Skipping out-of-bounds index at line ${lineNumber}: ${key} - ` +
          `valid range is (0-${rows - 1}, 0-${cols - 1})`
      );
      continue;
    }

    const position = `${row},${col}`;
    if (seen.has(position)) {
      report.duplicateEntries++;
    }
    seen.add(position);

    if (value === 0) {
      report.zeroEntries++;
    }
    // set() drops zeros, so a later zero also clears an earlier value
    matrix.set(row, col, value);
  }

  if (report.skippedEntries > 0) {
    report.suggestions = buildSuggestions(report, rows, cols);
    logSkippedSummary(report);
  }

  return { matrix, report };
}

export function parseMatrix(text: string): SparseMatrix {
  return parseMatrixWithReport(text).matrix;
}
