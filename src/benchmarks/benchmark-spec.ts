/**
 * Validation of benchmark specifications
 */

import { BenchmarkSpec, VariantSpec } from './benchmark-types';
import { BenchmarkSpecError } from './errors';

/**
 * Checks a benchmark specification and returns a frozen copy of it.
 *
 * @throws BenchmarkSpecError when the variants, thread sweep or accuracy settings are inconsistent
 */
export function defineBenchmark(spec: BenchmarkSpec): BenchmarkSpec {
  if (!spec.id.trim()) {
    throw new BenchmarkSpecError('Benchmark id must not be empty');
  }
  if (!spec.executable.trim()) {
    throw new BenchmarkSpecError(`Benchmark "${spec.id}" has no executable`);
  }

  validateVariants(spec);
  validateThreadCounts(spec.id, spec.threadCounts);
  validateOutputShape(spec);

  return Object.freeze({
    ...spec,
    fixedArgs: Object.freeze([...spec.fixedArgs]),
    parameters: Object.freeze({ ...spec.parameters }),
    variants: Object.freeze(spec.variants.map(variant => Object.freeze({ ...variant }))),
    threadCounts: Object.freeze([...spec.threadCounts]),
    accuracy: spec.accuracy ? Object.freeze({ ...spec.accuracy }) : undefined,
  });
}

function validateVariants(spec: BenchmarkSpec): void {
  if (spec.variants.length === 0) {
    throw new BenchmarkSpecError(`Benchmark "${spec.id}" declares no variants`);
  }

  const seenIds = new Set<number>();
  const sequentialByFamily = new Map<string, VariantSpec>();

  for (const variant of spec.variants) {
    if (!Number.isInteger(variant.id)) {
      throw new BenchmarkSpecError(`Variant "${variant.label}" has a non-integer id: ${variant.id}`);
    }
    if (seenIds.has(variant.id)) {
      throw new BenchmarkSpecError(`Duplicate variant id ${variant.id} in benchmark "${spec.id}"`);
    }
    seenIds.add(variant.id);

    if (variant.kind === 'sequential') {
      const existing = sequentialByFamily.get(variant.family);
      if (existing) {
        throw new BenchmarkSpecError(
          `Family "${variant.family}" has two sequential variants: ${existing.label} and ${variant.label}`
        );
      }
      sequentialByFamily.set(variant.family, variant);
    }
  }

  for (const variant of spec.variants) {
    if (variant.kind === 'parallel' && !sequentialByFamily.has(variant.family)) {
      throw new BenchmarkSpecError(
        `Parallel variant "${variant.label}" has no sequential baseline in family "${variant.family}"`
      );
    }
  }
}

function validateThreadCounts(id: string, threadCounts: readonly number[]): void {
  if (threadCounts.length === 0) {
    throw new BenchmarkSpecError(`Benchmark "${id}" has an empty thread sweep`);
  }
  const seen = new Set<number>();
  for (const threads of threadCounts) {
    if (!Number.isInteger(threads) || threads < 1) {
      throw new BenchmarkSpecError(`Thread counts must be positive integers, got ${threads}`);
    }
    if (seen.has(threads)) {
      throw new BenchmarkSpecError(`Duplicate thread count ${threads} in benchmark "${id}"`);
    }
    seen.add(threads);
  }
}

function validateOutputShape(spec: BenchmarkSpec): void {
  const reportsResult = spec.outputFieldCount === 4;
  if (reportsResult !== (spec.resultLabel !== undefined)) {
    throw new BenchmarkSpecError(
      `Benchmark "${spec.id}" must set resultLabel exactly when the executable prints a result value`
    );
  }

  if (!spec.accuracy) {
    return;
  }
  if (!reportsResult) {
    throw new BenchmarkSpecError(
      `Benchmark "${spec.id}" defines an accuracy check but its executable prints no result value`
    );
  }
  const { expectedValue, relativeTolerance } = spec.accuracy;
  if (!Number.isFinite(expectedValue) || expectedValue === 0) {
    throw new BenchmarkSpecError(`Expected value must be a non-zero finite number, got ${expectedValue}`);
  }
  if (!Number.isFinite(relativeTolerance) || relativeTolerance < 0) {
    throw new BenchmarkSpecError(`Relative tolerance must be a non-negative number, got ${relativeTolerance}`);
  }
}

/**
 * Returns the variants of a benchmark in execution order: sequential baselines
 * first, then the parallel variants, each group in declaration order.
 */
export function orderVariants(spec: BenchmarkSpec): { sequential: VariantSpec[]; parallel: VariantSpec[] } {
  return {
    sequential: spec.variants.filter(variant => variant.kind === 'sequential'),
    parallel: spec.variants.filter(variant => variant.kind === 'parallel'),
  };
}
