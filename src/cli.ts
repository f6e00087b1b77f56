#!/usr/bin/env node

/**
 * sparse-calc CLI -- arithmetic on coordinate-format sparse matrix files
 *
 * Usage:
 *   sparse-calc list [folder]
 *   sparse-calc calculate <add|subtract|multiply> <fileA> <fileB>
 *                         [--out <file>] [--format json|text] [--verbose]
 */

import * as path from 'path';
import { getCalculatorConfig, isOutputFormat, type OutputFormat } from './calculator/calculator-config';
import { clearCalculatorLogs, setVerbosity } from './calculator/calculator-logger';
import { parseOperation, runOperation, type Operation } from './calculator/operations';
import { formatMatrix } from './calculator/sparse/result-formatter';
import { listMatrixFiles, readMatrixFile, writeMatrixFile } from './services/matrix-files';
import { buildOperationSummary, writeOperationSummary } from './services/operation-summary';
import { errorToMessage } from './types/utils';

export interface CliIO {
  print: (line: string) => void;
  error: (line: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE =
  'Usage: sparse-calc list [folder]\n' +
  '       sparse-calc calculate <add|subtract|multiply> <fileA> <fileB> ' +
  '[--out <file>] [--format json|text] [--verbose]';

interface CalculateOptions {
  operation: Operation;
  fileA: string;
  fileB: string;
  out?: string;
  format: OutputFormat;
  verbose: boolean;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseCalculateArgs(args: string[]): CalculateOptions {
  const positional: string[] = [];
  let out: string | undefined;
  let format = getCalculatorConfig().outputFormat;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--out' || arg === '-o') {
      out = args[++i];
      if (out === undefined) throw new UsageError('--out needs a file path');
    } else if (arg === '--format' || arg === '-f') {
      const value = args[++i];
      if (value === undefined || !isOutputFormat(value)) {
        throw new UsageError(`--format must be json or text, got ${value ?? 'nothing'}`);
      }
      format = value;
    } else if (arg === '--verbose' || arg === '-v') {
      verbose = true;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 3) {
    throw new UsageError('calculate needs an operation and two matrix files');
  }
  const [operationName, fileA, fileB] = positional;

  let operation: Operation;
  try {
    operation = parseOperation(operationName);
  } catch (error) {
    throw new UsageError(errorToMessage(error));
  }

  return { operation, fileA, fileB, out, format, verbose };
}

function listCommand(args: string[], io: CliIO): number {
  const folder = args[0] ?? getCalculatorConfig().inputFolder;
  const files = listMatrixFiles(folder);

  if (files.length === 0) {
    io.print(`No matrix files found in ${folder}`);
    return EXIT_OK;
  }

  io.print('Available matrices:');
  files.forEach((file, i) => io.print(`${i + 1}: ${path.basename(file)}`));
  return EXIT_OK;
}

function calculateCommand(options: CalculateOptions, io: CliIO): number {
  clearCalculatorLogs();
  setVerbosity(options.verbose ? 'verbose' : 'normal');

  const loadStart = performance.now();
  const m1 = readMatrixFile(options.fileA);
  const m2 = readMatrixFile(options.fileB);
  const loadSeconds = (performance.now() - loadStart) / 1000;

  io.print(`Matrices loaded in ${loadSeconds.toFixed(4)} seconds`);
  io.print(`Matrix 1: ${m1.rows}x${m1.cols} with ${m1.nonZeroCount} non-zero elements`);
  io.print(`Matrix 2: ${m2.rows}x${m2.cols} with ${m2.nonZeroCount} non-zero elements`);

  const run = runOperation(options.operation, m1, m2, {
    operandA: options.fileA,
    operandB: options.fileB,
  });

  if (options.format === 'json') {
    const summary = buildOperationSummary(run, m1, m2);
    if (options.out) {
      writeOperationSummary(summary, options.out);
    } else {
      io.print(JSON.stringify(summary, null, 2));
    }
  } else if (options.out) {
    writeMatrixFile(run.result, options.out);
  } else {
    io.print(formatMatrix(run.result).trimEnd());
  }

  if (options.out) {
    io.print(`✅ Result saved to ${path.resolve(options.out)}`);
  }
  return EXIT_OK;
}

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export function runCli(argv: string[], io: CliIO = { print: console.log, error: console.error }): number {
  const [command, ...rest] = argv;

  if (command === undefined || command === '--help' || command === '-h') {
    io.print(USAGE);
    return command === undefined ? EXIT_USAGE : EXIT_OK;
  }

  try {
    switch (command) {
      case 'list':
        return listCommand(rest, io);
      case 'calculate':
        return calculateCommand(parseCalculateArgs(rest), io);
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.error(`${error.message}\n${USAGE}`);
      return EXIT_USAGE;
    }
    io.error(`❌ Error: ${errorToMessage(error)}`);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
