/**
 * Sparse Matrix Module
 *
 * Coordinate-format sparse matrices: parsing, arithmetic and formatting.
 */

export { SparseMatrix, type Triplet } from './SparseMatrix';
export {
  MatrixError,
  FormatError,
  IndexError,
  DimensionMismatchError,
  type MatrixShape,
} from './errors';
export {
  parseMatrix,
  parseMatrixWithReport,
  type ParseReport,
  type ParseResult,
} from './coordinate-parser';
export { add, subtract, multiply, scale, negate, transpose } from './arithmetic';
export { formatMatrix, formatEntry, matrixToJson, type MatrixJson } from './result-formatter';
