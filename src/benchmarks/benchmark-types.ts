/**
 * Type definitions for benchmark specifications, trials and derived metrics
 */

/**
 * Whether a variant is the single-threaded reference or a threaded sweep
 */
export type VariantKind = 'sequential' | 'parallel';

/**
 * One algorithmic approach implemented by the benchmarked executable
 */
export interface VariantSpec {
  /** Method number passed to the executable */
  id: number;
  /** Human readable method label, e.g. 'Rectangle (OpenMP)' */
  label: string;
  kind: VariantKind;
  /** Algorithm family; parallel variants are compared to the sequential variant of the same family */
  family: string;
}

/**
 * Known analytic answer used to check numeric results
 */
export interface AccuracyCheck {
  expectedValue: number;
  /** Maximum relative error, e.g. 0.01 for 1% */
  relativeTolerance: number;
}

/**
 * Immutable description of one kernel family and its configuration matrix
 */
export interface BenchmarkSpec {
  id: string;
  title: string;
  /** Path to the benchmarked executable */
  executable: string;
  /** Positional arguments placed before the variant id and thread count */
  fixedArgs: readonly string[];
  /** Named fixed parameters, used for report headers */
  parameters: Readonly<Record<string, number>>;
  variants: readonly VariantSpec[];
  /** Thread-count sweep in execution order */
  threadCounts: readonly number[];
  /** Number of comma-separated fields the executable prints (3 or 4) */
  outputFieldCount: 3 | 4;
  /** Column name of the reported result value, present when outputFieldCount is 4 */
  resultLabel?: string;
  accuracy?: AccuracyCheck;
}

/**
 * Caller-supplied options for one experiment run
 */
export interface ExperimentOptions {
  /** Measured trials per configuration */
  trialsPerConfiguration: number;
  /** Discarded trials run before the measured ones */
  warmupRuns: number;
  /** Wall-clock budget for one trial in milliseconds */
  timeoutMs: number;
  /** Configurations with fewer successful trials are treated as failed */
  minSuccessfulTrials: number;
}

/**
 * Record printed by the executable on success
 */
export interface ResultLine {
  variantId: number;
  threadCount: number;
  elapsedSeconds: number;
  resultValue?: number;
}

/**
 * Outcome of comparing a measured value against the expected one
 */
export interface ValidationOutcome {
  ok: boolean;
  relativeError: number;
}

export type TrialFailure =
  | { kind: 'timed-out'; timeoutMs: number }
  | { kind: 'non-zero-exit'; exitCode: number | null; signal?: string; stderr: string }
  | { kind: 'parse-error'; message: string; raw: string };

export interface SuccessfulTrial {
  success: true;
  variantId: number;
  threadCount: number;
  elapsedSeconds: number;
  resultValue?: number;
  /** Present when the benchmark defines an accuracy check */
  accuracy?: ValidationOutcome;
}

export interface FailedTrial {
  success: false;
  variantId: number;
  threadCount: number;
  failure: TrialFailure;
}

/**
 * One raw execution of the kernel
 */
export type Trial = SuccessfulTrial | FailedTrial;

/**
 * Runs a single trial for a variant at a thread count
 */
export type TrialInvoker = (variant: VariantSpec, threadCount: number) => Promise<Trial>;

/**
 * Reduction of the successful trials of one (variant, thread count) configuration
 */
export interface AggregateSample {
  variant: VariantSpec;
  threadCount: number;
  meanElapsedSeconds: number;
  meanResultValue?: number;
  successfulTrials: number;
  attemptedTrials: number;
  /** Successful trials whose result exceeded the accuracy tolerance */
  flaggedTrials: number;
  /** Largest relative error seen among the successful trials */
  maxRelativeError?: number;
}

export interface AggregationError {
  variant: VariantSpec;
  threadCount: number;
  attemptedTrials: number;
  successfulTrials: number;
  failures: TrialFailure[];
}

export type AggregationResult =
  | { success: true; sample: AggregateSample }
  | { success: false; error: AggregationError };

/**
 * Final per-configuration metrics
 */
export interface MetricsRecord {
  method: string;
  variantId: number;
  family: string;
  kind: VariantKind;
  threadCount: number;
  meanElapsedSeconds: number;
  meanResultValue?: number;
  /** Relative error of the mean result against the expected value */
  relativeError?: number;
  speedup: number;
  efficiency: number;
  successfulTrials: number;
  attemptedTrials: number;
}

export interface MissingBaselineMetricsError {
  kind: 'missing-baseline';
  method: string;
  family: string;
  threadCount: number;
}

export type MetricsResult =
  | { success: true; record: MetricsRecord }
  | { success: false; error: MissingBaselineMetricsError };

/**
 * A configuration that produced no metrics record
 */
export interface ConfigurationFailure {
  method: string;
  variantId: number;
  threadCount: number;
  reason: 'aggregation' | 'baseline-unavailable';
  attemptedTrials: number;
  successfulTrials: number;
  /** Human readable description of the trial failures */
  details: string[];
}

/**
 * Configuration whose results exceeded the accuracy tolerance
 */
export interface AccuracyWarning {
  method: string;
  threadCount: number;
  flaggedTrials: number;
  successfulTrials: number;
  maxRelativeError: number;
}

/**
 * Output of a full sweep
 */
export interface ExperimentResult {
  /** Sequential baselines first, then each parallel variant over the thread sweep */
  records: MetricsRecord[];
  failures: ConfigurationFailure[];
  warnings: AccuracyWarning[];
}
