/**
 * Default values for CLI options. The benchmark core takes every value
 * explicitly; these apply only when neither a flag nor the config file sets one.
 */

export const DEFAULT_THREAD_COUNTS = [1, 2, 4, 8, 16];
export const DEFAULT_RUNS = 3;
export const DEFAULT_WARMUP_RUNS = 0;
export const DEFAULT_MIN_SUCCESSES = 1;

export const INTEGRATION_DEFAULTS = {
  executable: './numerical-integration',
  x1: 0,
  x2: 3.14159,
  dx: 0.0001,
  // integral of sin(x) over [0, pi]
  expectedValue: 2.0,
  relativeTolerance: 0.01,
  timeoutSeconds: 30,
  output: 'integration_results.csv',
} as const;

export const MATRIX_DEFAULTS = {
  executable: './blocked-matrix-multiplication',
  matrixSize: 1024,
  blockSize: 128,
  timeoutSeconds: 60,
  output: 'performance_results.csv',
} as const;
