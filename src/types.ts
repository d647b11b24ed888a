/**
 * Shared configuration types for the harness CLI
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Output format for the results printed to stdout
 */
export type ResultsFormat = 'pretty' | 'markdown' | 'json';

export const RESULTS_FORMATS: readonly ResultsFormat[] = ['pretty', 'markdown', 'json'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some(level => level === value);
}

export function isResultsFormat(value: string): value is ResultsFormat {
  return RESULTS_FORMATS.some(format => format === value);
}
