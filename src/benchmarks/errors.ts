/**
 * Error classes for conditions that stop a benchmark run
 */

/**
 * The benchmarked executable could not be started. Fatal to the whole run.
 */
export class LaunchError extends Error {
  public readonly executable: string;

  constructor(executable: string, reason: string) {
    super(`Failed to launch ${executable}: ${reason}`);
    this.name = 'LaunchError';
    this.executable = executable;
  }
}

/**
 * A benchmark specification or kernel parameter set is inconsistent
 */
export class BenchmarkSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BenchmarkSpecError';
  }
}

/**
 * Accuracy validation was called with an expected value it cannot divide by
 */
export class AccuracyPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AccuracyPreconditionError';
  }
}

/**
 * A parallel configuration reached the metrics engine without its family's baseline
 */
export class MissingBaselineError extends Error {
  public readonly family: string;

  constructor(method: string, family: string, threadCount: number) {
    super(
      `No sequential baseline for family "${family}" while computing ${method} with ${threadCount} threads`
    );
    this.name = 'MissingBaselineError';
    this.family = family;
  }
}
