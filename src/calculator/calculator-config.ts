/**
 * Calculator Configuration
 *
 * Settings shared by the file service, the summary writer and the CLI.
 */

/**
 * Output format options:
 * - 'json': operation summary document (dimensions, counts, sample entries)
 * - 'text': the result matrix in coordinate text format
 */
export type OutputFormat = 'json' | 'text';

export interface CalculatorConfig {
  outputFormat: OutputFormat;
  /** Number of result entries copied into the summary */
  summarySampleSize: number;
  /** Folder scanned for .txt matrix files when none is given */
  inputFolder: string;
}

const DEFAULT_CONFIG: CalculatorConfig = {
  outputFormat: 'json',
  summarySampleSize: 5,
  inputFolder: 'sample_inputs',
};

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'text';
}

function configFromEnv(): CalculatorConfig {
  const config = { ...DEFAULT_CONFIG };
  if (typeof process === 'undefined') return config;

  const format = process.env.SPARSE_CALC_OUTPUT_FORMAT;
  if (format !== undefined && isOutputFormat(format)) {
    config.outputFormat = format;
  }
  const folder = process.env.SPARSE_CALC_INPUT_DIR;
  if (folder) {
    config.inputFolder = folder;
  }
  return config;
}

let CONFIG: CalculatorConfig = configFromEnv();

export function getCalculatorConfig(): Readonly<CalculatorConfig> {
  return CONFIG;
}

/**
 * Override some settings. A negative or fractional sample size is rejected.
 */
export function setCalculatorConfig(partial: Partial<CalculatorConfig>): void {
  if (
    partial.summarySampleSize !== undefined &&
    (!Number.isInteger(partial.summarySampleSize) || partial.summarySampleSize < 0)
  ) {
    throw new RangeError(`Invalid summary sample size: ${partial.summarySampleSize}`);
  }
  CONFIG = { ...CONFIG, ...partial };
}

/**
 * Restore defaults (environment overrides included).
 */
export function resetCalculatorConfig(): void {
  CONFIG = configFromEnv();
}
