/**
 * Error taxonomy for sparse matrix parsing, construction and arithmetic.
 *
 * Parsing is tolerant of out-of-range entries (they are skipped), but direct
 * construction through `set` is strict and throws `IndexError`.
 */

export type MatrixShape = readonly [rows: number, cols: number];

export class MatrixError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MatrixError';
  }
}

/** Malformed header or entry syntax in coordinate text. */
export class FormatError extends MatrixError {
  /** 1-based line number in the source text, when known */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line !== undefined ? `Line ${line}: ${message}` : message);
    this.name = 'FormatError';
    this.line = line;
  }
}

/** Position or dimension outside what a matrix declares. */
export class IndexError extends MatrixError {
  readonly row: number;
  readonly col: number;
  readonly rows: number;
  readonly cols: number;

  constructor(row: number, col: number, rows: number, cols: number, message?: string) {
    super(
      message ??
        `Index (${row}, ${col}) out of bounds for ${rows}x${cols} matrix`
    );
    this.name = 'IndexError';
    this.row = row;
    this.col = col;
    this.rows = rows;
    this.cols = cols;
  }
}

export class DimensionMismatchError extends MatrixError {
  readonly operation: string;
  readonly left: MatrixShape;
  readonly right: MatrixShape;

  constructor(operation: string, left: MatrixShape, right: MatrixShape) {
    const detail =
      operation === 'multiply'
        ? `columns of A (${left[1]}) must equal rows of B (${right[0]})`
        : 'dimensions must match';
    super(
      `Cannot ${operation} ${left[0]}x${left[1]} and ${right[0]}x${right[1]}: ${detail}`
    );
    this.name = 'DimensionMismatchError';
    this.operation = operation;
    this.left = left;
    this.right = right;
  }
}
