/**
 * Operation selection and timed execution.
 */

import { nanoid } from 'nanoid';
import { log } from './calculator-logger';
import { add, multiply, subtract } from './sparse/arithmetic';
import { MatrixError } from './sparse/errors';
import type { SparseMatrix } from './sparse/SparseMatrix';

export type Operation = 'add' | 'subtract' | 'multiply';

export interface OperationInfo {
  name: string;
  /** Menu number in the original calculator */
  key: string;
  apply: (a: SparseMatrix, b: SparseMatrix) => SparseMatrix;
}

export const OPERATIONS: Record<Operation, OperationInfo> = {
  add: { name: 'Add', key: '1', apply: add },
  subtract: { name: 'Subtract', key: '2', apply: subtract },
  multiply: { name: 'Multiply', key: '3', apply: multiply },
};

export interface OperationResult {
  runId: string;
  operation: Operation;
  /** Identifier of the left operand (file name or label) */
  operandA: string;
  operandB: string;
  result: SparseMatrix;
  startedAt: Date;
  durationMs: number;
}

export interface OperandLabels {
  operandA: string;
  operandB: string;
}

function isOperation(value: string): value is Operation {
  return value === 'add' || value === 'subtract' || value === 'multiply';
}

/**
 * Accepts "add", "Add", "ADD" or the menu number "1".
 */
export function parseOperation(input: string): Operation {
  const normalized = input.trim().toLowerCase();
  if (isOperation(normalized)) {
    return normalized;
  }

  for (const [operation, info] of Object.entries(OPERATIONS)) {
    if (info.key === normalized && isOperation(operation)) {
      return operation;
    }
  }

  throw new MatrixError(`Unknown operation: "${input}" (expected add, subtract or multiply)`);
}

export function applyOperation(operation: Operation, a: SparseMatrix, b: SparseMatrix): SparseMatrix {
  return OPERATIONS[operation].apply(a, b);
}

/**
 * Runs one operation and records what ran, on what, and how long it took.
 */
export function runOperation(
  operation: Operation,
  a: SparseMatrix,
  b: SparseMatrix,
  labels: OperandLabels = { operandA: 'A', operandB: 'B' }
): OperationResult {
  const { name } = OPERATIONS[operation];
  const startedAt = new Date();

  log(`Performing ${name}...`);
  const start = performance.now();
  const result = applyOperation(operation, a, b);
  const durationMs = performance.now() - start;

  log(`Operation completed in ${(durationMs / 1000).toFixed(4)} seconds`);
  log(`Result: ${result.rows}x${result.cols} with ${result.nonZeroCount} non-zero elements`);

  return {
    runId: nanoid(),
    operation,
    operandA: labels.operandA,
    operandB: labels.operandB,
    result,
    startedAt,
    durationMs,
  };
}
