// Calculator logging module - isolated so every layer can import it without cycles

export type Verbosity = 'normal' | 'verbose';

export const calculatorLogs: string[] = [];

// Messages that should only be logged once per calculator run
const loggedOnceMessages = new Set<string>();

// Last logged message, to collapse consecutive duplicates
let lastLoggedMessage: string | null = null;

let verbosity: Verbosity = 'normal';

const isTest = typeof process !== 'undefined' && process.env.NODE_ENV === 'test';

// Allow console output during tests via environment variable
const FORCE_CONSOLE_LOGS =
  typeof process !== 'undefined' && process.env.SPARSE_CALC_VERBOSE_TESTS === 'true';

/**
 * Set verbosity level.
 * - 'normal': summaries, warnings and errors
 * - 'verbose': also per-step details such as each skipped entry
 */
export function setVerbosity(level: Verbosity) {
  verbosity = level;
}

export function getVerbosity(): Verbosity {
  return verbosity;
}

/**
 * Main log function - always records to the buffer, echoes to console outside tests.
 * Use logDebug() for messages that should be hidden in normal mode.
 */
export function log(message: string) {
  if (message === lastLoggedMessage) {
    return;
  }
  lastLoggedMessage = message;

  if (!isTest || FORCE_CONSOLE_LOGS) {
    console.log(message);
  }

  calculatorLogs.push(message);
}

export function logWarning(message: string) {
  log(`⚠️ ${message}`);
}

/**
 * Debug log function - only logs when verbosity is 'verbose'.
 */
export function logDebug(message: string) {
  if (verbosity !== 'verbose') {
    return;
  }
  log(message);
}

export function clearCalculatorLogs() {
  calculatorLogs.length = 0;
  loggedOnceMessages.clear();
  lastLoggedMessage = null;
}

/**
 * Log a message only once per run. Useful for hints that would otherwise
 * repeat for every matrix loaded.
 */
export function logOnce(message: string) {
  if (loggedOnceMessages.has(message)) {
    return;
  }
  loggedOnceMessages.add(message);
  log(message);
}
