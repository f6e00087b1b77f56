/**
 * Renders a SparseMatrix in the coordinate text format the parser reads,
 * and as a plain JSON object.
 */

import { SparseMatrix, type Triplet } from './SparseMatrix';

export interface MatrixJson {
  rows: number;
  cols: number;
  entries: Triplet[];
}

export function formatEntry({ row, col, value }: Triplet): string {
  return `(${row}, ${col}, ${value})`;
}

/**
 * Header lines, then one line per non-zero entry in row-major order.
 * parseMatrix(formatMatrix(m)) equals m.
 */
export function formatMatrix(matrix: SparseMatrix): string {
  const lines = [`rows=${matrix.rows}`, `cols=${matrix.cols}`];
  for (const entry of matrix.nonZeroEntries()) {
    lines.push(formatEntry(entry));
  }
  return lines.join('\n') + '\n';
}

export function matrixToJson(matrix: SparseMatrix): MatrixJson {
  return {
    rows: matrix.rows,
    cols: matrix.cols,
    entries: Array.from(matrix.nonZeroEntries()),
  };
}
