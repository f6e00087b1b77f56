import * as fs from 'fs'
import * as path from 'path'
import glob from 'glob'
import { log } from '../calculator/calculator-logger'
import { parseMatrixWithReport, type ParseResult } from '../calculator/sparse/coordinate-parser'
import { FormatError } from '../calculator/sparse/errors'
import { formatMatrix, matrixToJson } from '../calculator/sparse/result-formatter'
import type { SparseMatrix } from '../calculator/sparse/SparseMatrix'
import { errorToMessage } from '../types/utils'

const MATRIX_FILE_PATTERN = '*.txt'

function readText(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new FormatError(`File not found: ${filePath}`)
  }
  try {
    return fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    throw new FormatError(`Error reading file ${filePath}: ${errorToMessage(error)}`)
  }
}

export function readMatrixFileWithReport(filePath: string): ParseResult {
  const parsed = parseMatrixWithReport(readText(filePath))
  const { matrix } = parsed
  log(`Loaded ${path.basename(filePath)}: ${matrix.rows}x${matrix.cols} with ${matrix.nonZeroCount} non-zero elements`)
  return parsed
}

export function readMatrixFile(filePath: string): SparseMatrix {
  return readMatrixFileWithReport(filePath).matrix
}

export function writeMatrixFile(matrix: SparseMatrix, filePath: string): void {
  fs.writeFileSync(filePath, formatMatrix(matrix), 'utf-8')
}

export function writeMatrixJson(matrix: SparseMatrix, filePath: string): void {
  fs.writeFileSync(filePath, JSON.stringify(matrixToJson(matrix), null, 2), 'utf-8')
}

/**
 * .txt files directly inside the folder, sorted by name.
 * A missing folder yields an empty list.
 */
export function listMatrixFiles(folder: string): string[] {
  if (!fs.existsSync(folder)) return []
  return glob
    .sync(MATRIX_FILE_PATTERN, { cwd: folder, nodir: true })
    .sort()
    .map(name => path.join(folder, name))
}
