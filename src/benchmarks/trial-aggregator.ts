/**
 * Runs repeated trials of one configuration and reduces them to a sample
 */

import {
  AggregateSample,
  AggregationResult,
  SuccessfulTrial,
  TrialFailure,
  TrialInvoker,
  VariantSpec,
} from './benchmark-types';
import { mean } from './sample-stats';
import { describeTrialFailure } from './trial-invoker';
import { logger } from '../logger';

/**
 * How many trials to run and how many must succeed
 */
export interface AggregationPolicy {
  /** Measured trials */
  repeats: number;
  /** Discarded trials run first */
  warmupRuns: number;
  /** Minimum successful trials for the configuration to count; values below 1 are raised to 1 */
  minSuccessfulTrials: number;
}

/**
 * Runs `policy.repeats` trials strictly one after another and averages the
 * successful ones.
 *
 * Failed trials are logged and dropped. If fewer than
 * `policy.minSuccessfulTrials` succeed the configuration fails as a whole.
 * Errors thrown by the invoker (a launch failure) propagate.
 */
export async function aggregateTrials(
  invoke: TrialInvoker,
  variant: VariantSpec,
  threadCount: number,
  policy: AggregationPolicy
): Promise<AggregationResult> {
  const threads = variant.kind === 'sequential' ? 1 : threadCount;
  const context = `${variant.label} with ${threads} threads`;
  const required = Math.max(1, policy.minSuccessfulTrials);

  for (let i = 0; i < policy.warmupRuns; i++) {
    logger.debug(`${context}: warmup run ${i + 1}/${policy.warmupRuns}`);
    const warmup = await invoke(variant, threads);
    if (!warmup.success) {
      logger.debug(`${context}: warmup run ${i + 1} failed: ${describeTrialFailure(warmup.failure)}`);
    }
  }

  const successes: SuccessfulTrial[] = [];
  const failures: TrialFailure[] = [];

  for (let i = 0; i < policy.repeats; i++) {
    logger.debug(`${context}: trial ${i + 1}/${policy.repeats}`);
    const trial = await invoke(variant, threads);

    if (trial.success) {
      logger.debug(`${context}: trial ${i + 1} took ${trial.elapsedSeconds}s`);
      successes.push(trial);
    } else {
      logger.warn(`${context}: trial ${i + 1} dropped, ${describeTrialFailure(trial.failure)}`);
      failures.push(trial.failure);
    }
  }

  if (successes.length < required) {
    return {
      success: false,
      error: {
        variant,
        threadCount: threads,
        attemptedTrials: policy.repeats,
        successfulTrials: successes.length,
        failures,
      },
    };
  }

  const resultValues = successes
    .map(trial => trial.resultValue)
    .filter((value): value is number => value !== undefined);
  const relativeErrors = successes
    .map(trial => trial.accuracy?.relativeError)
    .filter((value): value is number => value !== undefined);

  const sample: AggregateSample = {
    variant,
    threadCount: threads,
    meanElapsedSeconds: mean(successes.map(trial => trial.elapsedSeconds)),
    meanResultValue: resultValues.length > 0 ? mean(resultValues) : undefined,
    successfulTrials: successes.length,
    attemptedTrials: policy.repeats,
    flaggedTrials: successes.filter(trial => trial.accuracy !== undefined && !trial.accuracy.ok).length,
    maxRelativeError: relativeErrors.length > 0 ? Math.max(...relativeErrors) : undefined,
  };

  return { success: true, sample };
}
