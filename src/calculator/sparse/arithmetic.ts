/**
 * Sparse matrix arithmetic.
 *
 * Every operation reads only the non-zero entries of its operands and returns
 * a new matrix; operands are never mutated. Shapes are checked before any
 * arithmetic work starts.
 */

import { DimensionMismatchError } from './errors';
import { SparseMatrix } from './SparseMatrix';

function checkSameShape(a: SparseMatrix, b: SparseMatrix, operation: string): void {
  if (a.rows !== b.rows || a.cols !== b.cols) {
    throw new DimensionMismatchError(operation, a.dimensions(), b.dimensions());
  }
}

/**
 * Merges b into a copy of a, combining overlapping positions with `sign`.
 * O(nnz(a) + nnz(b)); entries are visited unsorted.
 */
function mergeEntries(a: SparseMatrix, b: SparseMatrix, sign: 1 | -1): SparseMatrix {
  const result = a.clone();
  for (const { row, col, value } of b.unorderedEntries()) {
    // set() drops the entry when the two values cancel
    result.set(row, col, result.get(row, col) + sign * value);
  }
  return result;
}

export function add(a: SparseMatrix, b: SparseMatrix): SparseMatrix {
  checkSameShape(a, b, 'add');
  return mergeEntries(a, b, 1);
}

export function subtract(a: SparseMatrix, b: SparseMatrix): SparseMatrix {
  checkSameShape(a, b, 'subtract');
  return mergeEntries(a, b, -1);
}

/**
 * Sparse matrix product C = A * B.
 *
 * A's entries are grouped by column and B's by row, so only pairs that share
 * the middle index k are multiplied. Partial sums are accumulated per output
 * cell and cells that end at exactly zero are not stored.
 * The product can be denser than either operand (fill-in).
 */
export function multiply(a: SparseMatrix, b: SparseMatrix): SparseMatrix {
  if (a.cols !== b.rows) {
    throw new DimensionMismatchError('multiply', a.dimensions(), b.dimensions());
  }

  // k -> [(i, A[i][k])]
  const aByCol = new Map<number, Array<[number, number]>>();
  for (const { row, col, value } of a.unorderedEntries()) {
    let column = aByCol.get(col);
    if (!column) {
      column = [];
      aByCol.set(col, column);
    }
    column.push([row, value]);
  }

  // i -> (j -> sum)
  const sums = new Map<number, Map<number, number>>();
  for (const [k, column] of aByCol) {
    const bRow = b.row(k);
    if (!bRow) continue;

    for (const [i, aValue] of column) {
      let sumRow = sums.get(i);
      if (!sumRow) {
        sumRow = new Map<number, number>();
        sums.set(i, sumRow);
      }
      for (const [j, bValue] of bRow) {
        sumRow.set(j, (sumRow.get(j) ?? 0) + aValue * bValue);
      }
    }
  }

  const result = SparseMatrix.create(a.rows, b.cols);
  for (const [i, sumRow] of sums) {
    for (const [j, sum] of sumRow) {
      result.set(i, j, sum);
    }
  }
  return result;
}

/**
 * Entrywise product with a scalar. A zero factor yields an empty matrix.
 */
export function scale(m: SparseMatrix, factor: number): SparseMatrix {
  const result = SparseMatrix.create(m.rows, m.cols);
  for (const { row, col, value } of m.unorderedEntries()) {
    result.set(row, col, value * factor);
  }
  return result;
}

export function negate(m: SparseMatrix): SparseMatrix {
  return scale(m, -1);
}

export function transpose(m: SparseMatrix): SparseMatrix {
  const result = SparseMatrix.create(m.cols, m.rows);
  for (const { row, col, value } of m.unorderedEntries()) {
    result.set(col, row, value);
  }
  return result;
}
