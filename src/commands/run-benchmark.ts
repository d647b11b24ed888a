/**
 * Command handler shared by the `integration` and `matmul` subcommands
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger';
import { ResultsFormat } from '../types';
import {
  BenchmarkSpec,
  ExperimentOptions,
  ExperimentResult,
  LaunchError,
  runExperiment,
} from '../benchmarks';
import { buildReport } from '../report/report-builder';
import { formatFailureSummary, formatReport } from '../report/results-formatter';
import { writeResultsCsv } from '../report/csv-writer';

export interface RunBenchmarkOptions {
  experiment: ExperimentOptions;
  format: ResultsFormat;
  /** CSV output path; no CSV is written when undefined */
  output?: string;
}

export interface RunBenchmarkDependencies {
  runExperiment: (spec: BenchmarkSpec, options: ExperimentOptions) => Promise<ExperimentResult>;
}

/**
 * Checks that the kernel exists and may be executed
 *
 * @returns An error message, or null when the executable is usable
 */
export function checkExecutable(executable: string): string | null {
  if (!fs.existsSync(executable)) {
    return `${executable} not found`;
  }
  try {
    fs.accessSync(executable, fs.constants.X_OK);
  } catch {
    return `${executable} is not executable`;
  }
  return null;
}

function logBanner(spec: BenchmarkSpec, options: ExperimentOptions): void {
  logger.info(`Testing ${spec.title.toLowerCase()} performance`);
  for (const [name, value] of Object.entries(spec.parameters)) {
    logger.info(`  ${name}: ${value}`);
  }
  if (spec.accuracy) {
    logger.info(`  Expected result: ${spec.accuracy.expectedValue}`);
  }
  logger.info(`  Thread counts: ${spec.threadCounts.join(', ')}`);
  logger.info(`  Runs per test: ${options.trialsPerConfiguration}`);
  logger.info(`  Timeout per run: ${options.timeoutMs / 1000}s`);
}

/**
 * Runs a benchmark end to end: checks the executable, sweeps the
 * configuration matrix, prints failures and results, and writes the CSV.
 *
 * @returns Process exit code: 0 when at least one configuration produced metrics
 */
export async function runBenchmarkCommand(
  spec: BenchmarkSpec,
  options: RunBenchmarkOptions,
  dependencies: RunBenchmarkDependencies = { runExperiment }
): Promise<number> {
  const problem = checkExecutable(spec.executable);
  if (problem) {
    logger.error(`Error: ${problem}`);
    logger.error(`Please compile the program first with: make ${path.basename(spec.executable)}`);
    return 1;
  }

  logBanner(spec, options.experiment);

  let result: ExperimentResult;
  try {
    result = await dependencies.runExperiment(spec, options.experiment);
  } catch (error) {
    if (error instanceof LaunchError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const colorize = !!(process.stdout.isTTY && options.format === 'pretty');
  // markdown and json carry the failures inside the report itself
  const failureSummary = options.format === 'pretty' ? formatFailureSummary(result.failures, colorize) : '';
  if (failureSummary) {
    console.log(failureSummary);
    console.log('');
  }

  const report = buildReport(spec, options.experiment, result);
  console.log(formatReport(report, options.format, colorize));

  if (result.records.length === 0) {
    logger.error('No configuration produced results');
    return 1;
  }

  if (options.output) {
    const written = await writeResultsCsv(options.output, result.records, spec.resultLabel);
    logger.info(`Results saved to ${written}`);
  }

  logger.success('Testing completed successfully!');
  return 0;
}
