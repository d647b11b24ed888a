#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { logger } from './logger';
import { LOG_LEVEL_NAMES, LogLevel, RESULTS_FORMATS, ResultsFormat, isLogLevel, isResultsFormat } from './types';
import { ConfigFile, loadConfigFile } from './config/config-file';
import {
  CommonCliOptions,
  IntegrationCliOptions,
  MatrixCliOptions,
  ResolvedSettings,
  resolveIntegrationSettings,
  resolveMatrixSettings,
} from './config/settings';
import {
  DEFAULT_MIN_SUCCESSES,
  DEFAULT_RUNS,
  DEFAULT_THREAD_COUNTS,
  DEFAULT_WARMUP_RUNS,
  INTEGRATION_DEFAULTS,
  MATRIX_DEFAULTS,
} from './config/defaults';
import { createIntegrationBenchmark, createMatrixBenchmark } from './kernels';
import { BenchmarkSpec } from './benchmarks/benchmark-types';
import { runBenchmarkCommand } from './commands/run-benchmark';

/**
 * Parses a comma-separated list of thread counts (e.g. "1,2,4,8")
 * @throws InvalidArgumentError on empty lists, non-integers, values below 1 or duplicates
 */
export function parseThreadCounts(input: string): number[] {
  const parts = input
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);

  if (parts.length === 0) {
    throw new InvalidArgumentError('Expected at least one thread count.');
  }

  const counts = parts.map(part => {
    if (!/^\d+$/.test(part) || parseInt(part, 10) < 1) {
      throw new InvalidArgumentError(`"${part}" is not a positive integer.`);
    }
    return parseInt(part, 10);
  });

  if (new Set(counts).size !== counts.length) {
    throw new InvalidArgumentError('Thread counts must not repeat.');
  }
  return counts;
}

export function parsePositiveInteger(input: string): number {
  if (!/^\d+$/.test(input.trim()) || parseInt(input, 10) < 1) {
    throw new InvalidArgumentError(`"${input}" is not a positive integer.`);
  }
  return parseInt(input, 10);
}

export function parseNonNegativeInteger(input: string): number {
  if (!/^\d+$/.test(input.trim())) {
    throw new InvalidArgumentError(`"${input}" is not a non-negative integer.`);
  }
  return parseInt(input, 10);
}

export function parseFiniteNumber(input: string): number {
  const value = Number(input);
  if (input.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidArgumentError(`"${input}" is not a number.`);
  }
  return value;
}

export function parsePositiveNumber(input: string): number {
  const value = parseFiniteNumber(input);
  if (value <= 0) {
    throw new InvalidArgumentError(`"${input}" must be greater than zero.`);
  }
  return value;
}

export function parseResultsFormat(input: string): ResultsFormat {
  if (!isResultsFormat(input)) {
    throw new InvalidArgumentError(`Expected one of: ${RESULTS_FORMATS.join(', ')}.`);
  }
  return input;
}

export function parseLogLevel(input: string): LogLevel {
  if (!isLogLevel(input)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVEL_NAMES.join(', ')}.`);
  }
  return input;
}

export function addCommonOptions(
  command: Command,
  defaults: { executable: string; timeoutSeconds: number; output: string }
): Command {
  return command
    .option('--executable <path>', `Path to the benchmarked executable (default: ${defaults.executable})`)
    .option(
      '-t, --threads <list>',
      `Comma-separated thread counts to sweep (default: ${DEFAULT_THREAD_COUNTS.join(',')})`,
      parseThreadCounts
    )
    .option('-r, --runs <n>', `Measured runs per configuration (default: ${DEFAULT_RUNS})`, parsePositiveInteger)
    .option('--warmup <n>', `Discarded warmup runs per configuration (default: ${DEFAULT_WARMUP_RUNS})`, parseNonNegativeInteger)
    .option(
      '--timeout <seconds>',
      `Wall-clock limit for one run (default: ${defaults.timeoutSeconds})`,
      parsePositiveNumber
    )
    .option(
      '--min-successes <n>',
      `Successful runs required for a configuration to count (default: ${DEFAULT_MIN_SUCCESSES})`,
      parsePositiveInteger
    )
    .option('-f, --format <format>', `Output format: ${RESULTS_FORMATS.join(', ')} (default: pretty)`, parseResultsFormat)
    .option('-o, --output <path>', `CSV file for the results (default: ${defaults.output})`)
    .option('--no-output', 'Do not write a CSV file')
    .option('-c, --config <path>', 'YAML file with default option values')
    .option('--log-level <level>', `Log level: ${LOG_LEVEL_NAMES.join(', ')} (default: info)`, parseLogLevel);
}

function readConfig(options: CommonCliOptions): ConfigFile {
  if (!options.config) {
    return {};
  }
  return loadConfigFile(options.config);
}

/**
 * Resolves settings, builds the benchmark and runs it. Returns the exit code.
 */
async function execute<P>(
  options: CommonCliOptions,
  resolve: (file: ConfigFile) => ResolvedSettings<P>,
  build: (parameters: P) => BenchmarkSpec
): Promise<number> {
  let settings: ResolvedSettings<P>;
  let spec: BenchmarkSpec;
  try {
    settings = resolve(readConfig(options));
    logger.setLevel(settings.logLevel);
    spec = build(settings.parameters);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  logger.debug('Configuration:', JSON.stringify({ spec, experiment: settings.experiment }, null, 2));
  return runBenchmarkCommand(spec, {
    experiment: settings.experiment,
    format: settings.format,
    output: settings.output,
  });
}

const program = new Command();

program
  .name('speedup-harness')
  .description('Measure speedup and parallel efficiency of external compute kernels')
  .version('0.1.0');

addCommonOptions(
  program
    .command('integration')
    .description('Benchmark the numerical-integration kernel (rectangle and trapezoidal rules)'),
  INTEGRATION_DEFAULTS
)
  .option('--x1 <number>', `Lower integration bound (default: ${INTEGRATION_DEFAULTS.x1})`, parseFiniteNumber)
  .option('--x2 <number>', `Upper integration bound (default: ${INTEGRATION_DEFAULTS.x2})`, parseFiniteNumber)
  .option('--dx <number>', `Integration step size (default: ${INTEGRATION_DEFAULTS.dx})`, parsePositiveNumber)
  .option(
    '--expected <number>',
    `Analytic value of the integral (default: ${INTEGRATION_DEFAULTS.expectedValue})`,
    parseFiniteNumber
  )
  .option(
    '--tolerance <fraction>',
    `Relative tolerance before an accuracy warning (default: ${INTEGRATION_DEFAULTS.relativeTolerance})`,
    parseFiniteNumber
  )
  .action(async (_options: unknown, command: Command) => {
    const options = command.opts<IntegrationCliOptions>();
    const exitCode = await execute(
      options,
      file => resolveIntegrationSettings(options, file),
      createIntegrationBenchmark
    );
    process.exit(exitCode);
  });

addCommonOptions(
  program
    .command('matmul')
    .description('Benchmark the matrix-multiplication kernel (blocked, standard and sequential)'),
  MATRIX_DEFAULTS
)
  .option('-n, --size <n>', `Matrix size N for N x N matrices (default: ${MATRIX_DEFAULTS.matrixSize})`, parsePositiveInteger)
  .option('-b, --block <n>', `Block size; must divide the matrix size (default: ${MATRIX_DEFAULTS.blockSize})`, parsePositiveInteger)
  .action(async (_options: unknown, command: Command) => {
    const options = command.opts<MatrixCliOptions>();
    const exitCode = await execute(
      options,
      file => resolveMatrixSettings(options, file),
      createMatrixBenchmark
    );
    process.exit(exitCode);
  });

// Only parse arguments if this file is run directly (not imported as a module)
if (require.main === module) {
  program.parseAsync().catch(error => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
}
