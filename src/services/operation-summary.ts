import * as fs from 'fs'
import * as path from 'path'
import { getCalculatorConfig } from '../calculator/calculator-config'
import { OPERATIONS, type OperationResult } from '../calculator/operations'
import type { SparseMatrix, Triplet } from '../calculator/sparse/SparseMatrix'

export interface MatrixOverview {
  dimensions: string
  non_zero_elements: number
}

export interface OperationSummary {
  operation_info: {
    run_id: string
    timestamp: string
    operation_type: string
    input_files: {
      matrix1: string
      matrix2: string
    }
  }
  input_matrices: {
    matrix1: MatrixOverview
    matrix2: MatrixOverview
  }
  result: MatrixOverview & {
    sample_entries: Triplet[]
  }
}

export interface SummaryOptions {
  sampleSize?: number
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

// YYYYMMDD_HHMMSS in local time
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

function overview(matrix: SparseMatrix): MatrixOverview {
  return {
    dimensions: `${matrix.rows}x${matrix.cols}`,
    non_zero_elements: matrix.nonZeroCount
  }
}

function firstEntries(matrix: SparseMatrix, count: number): Triplet[] {
  const entries: Triplet[] = []
  if (count <= 0) return entries
  for (const entry of matrix.nonZeroEntries()) {
    entries.push(entry)
    if (entries.length >= count) break
  }
  return entries
}

export function buildOperationSummary(
  run: OperationResult,
  a: SparseMatrix,
  b: SparseMatrix,
  options: SummaryOptions = {}
): OperationSummary {
  const sampleSize = options.sampleSize ?? getCalculatorConfig().summarySampleSize

  return {
    operation_info: {
      run_id: run.runId,
      timestamp: formatTimestamp(run.startedAt),
      operation_type: OPERATIONS[run.operation].name,
      input_files: {
        matrix1: path.basename(run.operandA),
        matrix2: path.basename(run.operandB)
      }
    },
    input_matrices: {
      matrix1: overview(a),
      matrix2: overview(b)
    },
    result: {
      ...overview(run.result),
      sample_entries: firstEntries(run.result, sampleSize)
    }
  }
}

export function writeOperationSummary(summary: OperationSummary, filePath: string): void {
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2), 'utf-8')
}
