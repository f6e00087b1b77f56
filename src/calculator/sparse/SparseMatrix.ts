/**
 * Sparse Matrix in DOK (dictionary of keys) format, grouped by row.
 *
 * Only non-zero values are stored. Rows map to a column -> value map, which
 * keeps row lookups O(1) and lets multiplication reuse the row grouping.
 */

import { IndexError, type MatrixShape } from './errors';

export interface Triplet {
  row: number;
  col: number;
  value: number;
}

function isIndex(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

function ascending(a: number, b: number): number {
  return a - b;
}

export class SparseMatrix {
  /** Number of rows */
  readonly rows: number;

  /** Number of columns */
  readonly cols: number;

  /** row -> (col -> value). Empty rows are never kept. */
  private readonly _rowMaps = new Map<number, Map<number, number>>();

  private _nonZeroCount = 0;

  private constructor(rows: number, cols: number) {
    this.rows = rows;
    this.cols = cols;
  }

  /**
   * Creates an empty rows x cols matrix.
   * Negative or fractional dimensions throw IndexError.
   */
  static create(rows: number, cols: number): SparseMatrix {
    if (!isIndex(rows) || !isIndex(cols)) {
      throw new IndexError(rows, cols, rows, cols, `Invalid matrix dimensions ${rows}x${cols}`);
    }
    return new SparseMatrix(rows, cols);
  }

  /**
   * Creates a sparse matrix from COO (coordinate) format triplets.
   * Later duplicates overwrite earlier ones; out-of-range triplets throw.
   */
  static fromTriplets(rows: number, cols: number, triplets: Iterable<Triplet>): SparseMatrix {
    const matrix = SparseMatrix.create(rows, cols);
    for (const t of triplets) {
      matrix.set(t.row, t.col, t.value);
    }
    return matrix;
  }

  /**
   * Creates a sparse matrix from a dense 2D array.
   * Every row must have the length of the first; ragged input throws IndexError.
   */
  static fromDense(dense: number[][]): SparseMatrix {
    const rows = dense.length;
    const cols = rows > 0 ? dense[0].length : 0;
    const matrix = SparseMatrix.create(rows, cols);

    for (let i = 0; i < rows; i++) {
      if (dense[i].length !== cols) {
        throw new IndexError(
          i,
          dense[i].length,
          rows,
          cols,
          `Row ${i} has ${dense[i].length} columns, expected ${cols}`
        );
      }
      for (let j = 0; j < cols; j++) {
        matrix.set(i, j, dense[i][j]);
      }
    }

    return matrix;
  }

  static identity(n: number): SparseMatrix {
    const matrix = SparseMatrix.create(n, n);
    for (let i = 0; i < n; i++) {
      matrix.set(i, i, 1);
    }
    return matrix;
  }

  /** Number of non-zero entries */
  get nonZeroCount(): number {
    return this._nonZeroCount;
  }

  /** Sparsity ratio (fraction of zero entries). 0 for a matrix with no cells. */
  get sparsity(): number {
    const cells = this.rows * this.cols;
    return cells === 0 ? 0 : 1.0 - this._nonZeroCount / cells;
  }

  dimensions(): MatrixShape {
    return [this.rows, this.cols];
  }

  /**
   * Sets a value at (row, col). Zero removes the entry.
   */
  set(row: number, col: number, value: number): void {
    if (!isIndex(row) || !isIndex(col) || row >= this.rows || col >= this.cols) {
      throw new IndexError(row, col, this.rows, this.cols);
    }

    let rowMap = this._rowMaps.get(row);

    if (value === 0) {
      if (rowMap && rowMap.delete(col)) {
        this._nonZeroCount--;
        if (rowMap.size === 0) {
          this._rowMaps.delete(row);
        }
      }
      return;
    }

    if (!rowMap) {
      rowMap = new Map<number, number>();
      this._rowMaps.set(row, rowMap);
    }
    if (!rowMap.has(col)) {
      this._nonZeroCount++;
    }
    rowMap.set(col, value);
  }

  /**
   * Gets a value at (row, col). Returns 0 if not present.
   */
  get(row: number, col: number): number {
    return this._rowMaps.get(row)?.get(col) ?? 0;
  }

  has(row: number, col: number): boolean {
    return this._rowMaps.get(row)?.has(col) ?? false;
  }

  /**
   * Non-zero entries of one row as col -> value, in insertion order.
   * Returns undefined for rows with no entries.
   */
  row(row: number): ReadonlyMap<number, number> | undefined {
    return this._rowMaps.get(row);
  }

  /** Indices of rows holding at least one entry, ascending. */
  occupiedRows(): number[] {
    return Array.from(this._rowMaps.keys()).sort(ascending);
  }

  /**
   * Lazily yields non-zero entries in row-major order, columns ascending.
   */
  *nonZeroEntries(): Generator<Triplet, void, undefined> {
    for (const row of this.occupiedRows()) {
      const rowMap = this._rowMaps.get(row);
      if (!rowMap) continue;
      const cols = Array.from(rowMap.keys()).sort(ascending);
      for (const col of cols) {
        const value = rowMap.get(col);
        if (value !== undefined) {
          yield { row, col, value };
        }
      }
    }
  }

  /**
   * Yields non-zero entries in insertion order, without sorting.
   * For callers whose result does not depend on order.
   */
  *unorderedEntries(): Generator<Triplet, void, undefined> {
    for (const [row, rowMap] of this._rowMaps) {
      for (const [col, value] of rowMap) {
        yield { row, col, value };
      }
    }
  }

  /**
   * Shape and value equality. Iteration order is not compared.
   */
  equals(other: SparseMatrix): boolean {
    if (this.rows !== other.rows || this.cols !== other.cols) return false;
    if (this._nonZeroCount !== other._nonZeroCount) return false;

    for (const [row, rowMap] of this._rowMaps) {
      for (const [col, value] of rowMap) {
        if (other.get(row, col) !== value) return false;
      }
    }
    return true;
  }

  clone(): SparseMatrix {
    const copy = new SparseMatrix(this.rows, this.cols);
    for (const [row, rowMap] of this._rowMaps) {
      copy._rowMaps.set(row, new Map(rowMap));
    }
    copy._nonZeroCount = this._nonZeroCount;
    return copy;
  }

  /**
   * Converts to dense 2D array (for debugging/small matrices).
   */
  toDense(): number[][] {
    const dense: number[][] = Array.from({ length: this.rows }, () =>
      new Array<number>(this.cols).fill(0)
    );

    for (const { row, col, value } of this.unorderedEntries()) {
      dense[row][col] = value;
    }

    return dense;
  }
}
