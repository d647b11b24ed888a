/**
 * Parser for the single CSV record a kernel prints on success
 *
 * Format:
 *   variant_id,thread_count,elapsed_seconds[,result_value]
 *
 * Example lines:
 *   1,4,0.02341000,1.99998000
 *   3,1,1.20450000
 */

import { ResultLine } from './benchmark-types';

export interface ParseError {
  message: string;
  /** Unmodified stdout of the trial */
  raw: string;
}

export type ParseResult =
  | { success: true; record: ResultLine }
  | { success: false; error: ParseError };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseInteger(field: string): number | null {
  return INTEGER_PATTERN.test(field) ? parseInt(field, 10) : null;
}

function parseDecimal(field: string): number | null {
  if (!DECIMAL_PATTERN.test(field)) {
    return null;
  }
  const value = parseFloat(field);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parses kernel stdout into a typed record.
 *
 * Blank lines are ignored; exactly one non-blank line with exactly
 * `expectedFieldCount` fields must remain. No partial results are returned.
 *
 * @param rawStdout - Captured standard output of the kernel
 * @param expectedFieldCount - 3 for time-only kernels, 4 when a result value follows the time
 */
export function parseResultLine(rawStdout: string, expectedFieldCount: number): ParseResult {
  const fail = (message: string): ParseResult => ({
    success: false,
    error: { message, raw: rawStdout },
  });

  const lines = rawStdout
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  if (lines.length === 0) {
    return fail('No output');
  }
  if (lines.length > 1) {
    return fail(`Expected one output line, got ${lines.length}`);
  }

  const fields = lines[0].split(',').map(field => field.trim());
  if (fields.length !== expectedFieldCount) {
    return fail(`Expected ${expectedFieldCount} fields, got ${fields.length}`);
  }

  const [variantField, threadsField, timeField, resultField] = fields;

  const variantId = parseInteger(variantField);
  if (variantId === null) {
    return fail(`Variant id is not an integer: "${variantField}"`);
  }

  const threadCount = parseInteger(threadsField);
  if (threadCount === null || threadCount < 1) {
    return fail(`Thread count is not a positive integer: "${threadsField}"`);
  }

  const elapsedSeconds = parseDecimal(timeField);
  // a zero time cannot be a baseline or a divisor
  if (elapsedSeconds === null || elapsedSeconds <= 0) {
    return fail(`Elapsed time is not a positive number: "${timeField}"`);
  }

  const record: ResultLine = { variantId, threadCount, elapsedSeconds };

  if (resultField !== undefined) {
    const resultValue = parseDecimal(resultField);
    if (resultValue === null) {
      return fail(`Result value is not a number: "${resultField}"`);
    }
    record.resultValue = resultValue;
  }

  return { success: true, record };
}
