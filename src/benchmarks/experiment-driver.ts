/**
 * Experiment driver: sweeps the (variant x thread count) matrix of a benchmark
 */

import {
  AccuracyWarning,
  AggregateSample,
  AggregationError,
  BenchmarkSpec,
  ConfigurationFailure,
  ExperimentOptions,
  ExperimentResult,
  MetricsRecord,
  TrialInvoker,
  VariantSpec,
} from './benchmark-types';
import { orderVariants } from './benchmark-spec';
import { aggregateTrials, AggregationPolicy } from './trial-aggregator';
import { computeMetrics, findBaseline } from './metrics-engine';
import { createTrialInvoker, describeTrialFailure } from './trial-invoker';
import { validateAccuracy } from './accuracy-validator';
import { MissingBaselineError } from './errors';
import { logger } from '../logger';

export interface ExperimentDependencies {
  invokeTrial: TrialInvoker;
}

function toPolicy(options: ExperimentOptions): AggregationPolicy {
  return {
    repeats: options.trialsPerConfiguration,
    warmupRuns: options.warmupRuns,
    minSuccessfulTrials: options.minSuccessfulTrials,
  };
}

function aggregationFailure(error: AggregationError): ConfigurationFailure {
  return {
    method: error.variant.label,
    variantId: error.variant.id,
    threadCount: error.threadCount,
    reason: 'aggregation',
    attemptedTrials: error.attemptedTrials,
    successfulTrials: error.successfulTrials,
    details: error.failures.map(describeTrialFailure),
  };
}

function formatProgress(record: MetricsRecord): string {
  return (
    `${String(record.threadCount).padStart(2)} threads: ${record.meanElapsedSeconds.toFixed(6)}s, ` +
    `speedup: ${record.speedup.toFixed(2)}x, efficiency: ${record.efficiency.toFixed(2)}`
  );
}

/**
 * Runs every configuration of a benchmark and returns the metrics records.
 *
 * Sequential variants run first and become the baselines of their family.
 * A configuration whose trials all fail is recorded in `failures` and the
 * sweep continues; parallel variants whose family has no baseline are
 * recorded as `baseline-unavailable` without being run. A LaunchError from
 * the invoker aborts the run.
 */
export async function runExperiment(
  spec: BenchmarkSpec,
  options: ExperimentOptions,
  dependencies: ExperimentDependencies = {
    invokeTrial: createTrialInvoker(spec, { timeoutMs: options.timeoutMs }),
  }
): Promise<ExperimentResult> {
  const policy = toPolicy(options);
  const { sequential, parallel } = orderVariants(spec);

  const records: MetricsRecord[] = [];
  const failures: ConfigurationFailure[] = [];
  const warnings: AccuracyWarning[] = [];
  const baselines = new Map<string, AggregateSample>();

  const recordSample = (sample: AggregateSample, baseline: AggregateSample | null): MetricsRecord => {
    const metrics = computeMetrics(sample, baseline);
    if (!metrics.success) {
      throw new MissingBaselineError(metrics.error.method, metrics.error.family, metrics.error.threadCount);
    }

    const record: MetricsRecord = { ...metrics.record };
    if (spec.accuracy && record.meanResultValue !== undefined) {
      record.relativeError = validateAccuracy(
        record.meanResultValue,
        spec.accuracy.expectedValue,
        spec.accuracy.relativeTolerance
      ).relativeError;
    }
    if (sample.flaggedTrials > 0 && sample.maxRelativeError !== undefined) {
      warnings.push({
        method: record.method,
        threadCount: record.threadCount,
        flaggedTrials: sample.flaggedTrials,
        successfulTrials: sample.successfulTrials,
        maxRelativeError: sample.maxRelativeError,
      });
    }

    records.push(record);
    return record;
  };

  for (const variant of sequential) {
    logger.info(`Testing ${variant.label}...`);
    const result = await aggregateTrials(dependencies.invokeTrial, variant, 1, policy);

    if (!result.success) {
      logger.error(`  ${variant.label}: FAILED (${result.error.successfulTrials}/${result.error.attemptedTrials} trials succeeded)`);
      failures.push(aggregationFailure(result.error));
      continue;
    }

    baselines.set(variant.family, result.sample);
    const record = recordSample(result.sample, result.sample);
    const area = record.meanResultValue !== undefined ? `, result: ${record.meanResultValue.toFixed(8)}` : '';
    logger.info(`  ${variant.label}: ${record.meanElapsedSeconds.toFixed(6)} seconds (baseline)${area}`);
  }

  for (const variant of parallel) {
    logger.info(`Testing ${variant.label}...`);
    const baseline = findBaseline(baselines, variant);

    if (!baseline) {
      logger.error(`  No sequential baseline for ${variant.label}, skipping ${spec.threadCounts.length} configurations`);
      failures.push(...spec.threadCounts.map(threads => baselineUnavailable(variant, threads)));
      continue;
    }

    for (const threads of spec.threadCounts) {
      const result = await aggregateTrials(dependencies.invokeTrial, variant, threads, policy);
      if (!result.success) {
        logger.error(`  ${String(threads).padStart(2)} threads: FAILED`);
        failures.push(aggregationFailure(result.error));
        continue;
      }

      logger.info(`  ${formatProgress(recordSample(result.sample, baseline))}`);
    }
  }

  return { records, failures, warnings };
}

function baselineUnavailable(variant: VariantSpec, threadCount: number): ConfigurationFailure {
  return {
    method: variant.label,
    variantId: variant.id,
    threadCount,
    reason: 'baseline-unavailable',
    attemptedTrials: 0,
    successfulTrials: 0,
    details: [`sequential baseline for family "${variant.family}" failed`],
  };
}
