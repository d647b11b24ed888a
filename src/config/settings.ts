/**
 * Resolves CLI flags, config file values and defaults into run settings.
 * Precedence: CLI flag, then config file, then default.
 */

import { ExperimentOptions } from '../benchmarks/benchmark-types';
import { IntegrationParameters } from '../kernels/numerical-integration';
import { MatrixParameters } from '../kernels/matrix-multiplication';
import { LogLevel, ResultsFormat } from '../types';
import { ConfigFile } from './config-file';
import {
  DEFAULT_MIN_SUCCESSES,
  DEFAULT_RUNS,
  DEFAULT_THREAD_COUNTS,
  DEFAULT_WARMUP_RUNS,
  INTEGRATION_DEFAULTS,
  MATRIX_DEFAULTS,
} from './defaults';

/**
 * Options shared by every benchmark subcommand, as parsed by commander
 */
export interface CommonCliOptions {
  executable?: string;
  threads?: number[];
  runs?: number;
  warmup?: number;
  /** Seconds */
  timeout?: number;
  minSuccesses?: number;
  format?: ResultsFormat;
  /** false when --no-output was given */
  output?: string | false;
  config?: string;
  logLevel?: LogLevel;
}

export interface IntegrationCliOptions extends CommonCliOptions {
  x1?: number;
  x2?: number;
  dx?: number;
  expected?: number;
  tolerance?: number;
}

export interface MatrixCliOptions extends CommonCliOptions {
  size?: number;
  block?: number;
}

/**
 * Everything a subcommand needs after option resolution
 */
export interface ResolvedSettings<P> {
  parameters: P;
  experiment: ExperimentOptions;
  format: ResultsFormat;
  output?: string;
  logLevel: LogLevel;
}

interface CommonDefaults {
  timeoutSeconds: number;
  output: string;
}

function resolveCommon(
  cli: CommonCliOptions,
  file: ConfigFile,
  defaults: CommonDefaults
): Omit<ResolvedSettings<never>, 'parameters'> & { threadCounts: number[] } {
  const trialsPerConfiguration = cli.runs ?? file.runs ?? DEFAULT_RUNS;
  const minSuccessfulTrials = cli.minSuccesses ?? file.minSuccesses ?? DEFAULT_MIN_SUCCESSES;
  if (minSuccessfulTrials > trialsPerConfiguration) {
    throw new Error(
      `Minimum successful trials (${minSuccessfulTrials}) cannot exceed runs per configuration (${trialsPerConfiguration})`
    );
  }

  const timeoutSeconds = cli.timeout ?? file.timeoutSeconds ?? defaults.timeoutSeconds;

  let output: string | undefined;
  if (cli.output === false) {
    output = undefined;
  } else {
    output = cli.output ?? file.output ?? defaults.output;
  }

  return {
    threadCounts: [...(cli.threads ?? file.threads ?? DEFAULT_THREAD_COUNTS)],
    experiment: {
      trialsPerConfiguration,
      warmupRuns: cli.warmup ?? file.warmup ?? DEFAULT_WARMUP_RUNS,
      timeoutMs: Math.round(timeoutSeconds * 1000),
      minSuccessfulTrials,
    },
    format: cli.format ?? file.format ?? 'pretty',
    output,
    logLevel: cli.logLevel ?? file.logLevel ?? 'info',
  };
}

export function resolveIntegrationSettings(
  cli: IntegrationCliOptions,
  file: ConfigFile = {}
): ResolvedSettings<IntegrationParameters> {
  const section = file.integration ?? {};
  const { threadCounts, ...common } = resolveCommon(cli, file, INTEGRATION_DEFAULTS);

  return {
    ...common,
    parameters: {
      executable: cli.executable ?? section.executable ?? INTEGRATION_DEFAULTS.executable,
      x1: cli.x1 ?? section.x1 ?? INTEGRATION_DEFAULTS.x1,
      x2: cli.x2 ?? section.x2 ?? INTEGRATION_DEFAULTS.x2,
      dx: cli.dx ?? section.dx ?? INTEGRATION_DEFAULTS.dx,
      threadCounts,
      expectedValue: cli.expected ?? section.expectedValue ?? INTEGRATION_DEFAULTS.expectedValue,
      relativeTolerance:
        cli.tolerance ?? section.relativeTolerance ?? INTEGRATION_DEFAULTS.relativeTolerance,
    },
  };
}

export function resolveMatrixSettings(
  cli: MatrixCliOptions,
  file: ConfigFile = {}
): ResolvedSettings<MatrixParameters> {
  const section = file.matmul ?? {};
  const { threadCounts, ...common } = resolveCommon(cli, file, MATRIX_DEFAULTS);

  return {
    ...common,
    parameters: {
      executable: cli.executable ?? section.executable ?? MATRIX_DEFAULTS.executable,
      matrixSize: cli.size ?? section.matrixSize ?? MATRIX_DEFAULTS.matrixSize,
      blockSize: cli.block ?? section.blockSize ?? MATRIX_DEFAULTS.blockSize,
      threadCounts,
    },
  };
}
