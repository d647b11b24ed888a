import { ValidationOutcome } from './benchmark-types';
import { AccuracyPreconditionError } from './errors';

/**
 * Compares a measured value against a known answer.
 *
 * `relativeError = |measured - expected| / |expected|`; the outcome is ok when
 * the error is less than or equal to the tolerance.
 *
 * @throws AccuracyPreconditionError when expected is zero or an input is not finite
 */
export function validateAccuracy(
  measuredValue: number,
  expectedValue: number,
  relativeTolerance: number
): ValidationOutcome {
  if (expectedValue === 0) {
    throw new AccuracyPreconditionError('Expected value must be non-zero for a relative error');
  }
  if (![measuredValue, expectedValue, relativeTolerance].every(Number.isFinite)) {
    throw new AccuracyPreconditionError(
      `Accuracy inputs must be finite (measured=${measuredValue}, expected=${expectedValue}, tolerance=${relativeTolerance})`
    );
  }

  const relativeError = Math.abs(measuredValue - expectedValue) / Math.abs(expectedValue);
  return { ok: relativeError <= relativeTolerance, relativeError };
}
