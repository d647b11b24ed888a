/**
 * Speedup and parallel efficiency against a sequential baseline
 */

import { AggregateSample, MetricsRecord, MetricsResult, VariantSpec } from './benchmark-types';

/**
 * Per-family sequential samples, keyed by VariantSpec.family
 */
export type BaselineMap = ReadonlyMap<string, AggregateSample>;

/**
 * Looks up the sequential sample a variant is compared to
 */
export function findBaseline(baselines: BaselineMap, variant: VariantSpec): AggregateSample | null {
  return baselines.get(variant.family) ?? null;
}

/**
 * Derives the metrics record of an aggregate sample.
 *
 * Sequential samples are their own baseline: speedup and efficiency are 1.0
 * by definition. Parallel samples need the sequential sample of the same
 * family; pairing it correctly is the caller's job.
 */
export function computeMetrics(sample: AggregateSample, baseline: AggregateSample | null): MetricsResult {
  const { variant } = sample;
  const base: Omit<MetricsRecord, 'speedup' | 'efficiency'> = {
    method: variant.label,
    variantId: variant.id,
    family: variant.family,
    kind: variant.kind,
    threadCount: sample.threadCount,
    meanElapsedSeconds: sample.meanElapsedSeconds,
    meanResultValue: sample.meanResultValue,
    successfulTrials: sample.successfulTrials,
    attemptedTrials: sample.attemptedTrials,
  };

  if (variant.kind === 'sequential') {
    return { success: true, record: { ...base, threadCount: 1, speedup: 1.0, efficiency: 1.0 } };
  }

  if (!baseline) {
    return {
      success: false,
      error: {
        kind: 'missing-baseline',
        method: variant.label,
        family: variant.family,
        threadCount: sample.threadCount,
      },
    };
  }

  const speedup = baseline.meanElapsedSeconds / sample.meanElapsedSeconds;
  const efficiency = speedup / sample.threadCount;

  return { success: true, record: { ...base, speedup, efficiency } };
}
