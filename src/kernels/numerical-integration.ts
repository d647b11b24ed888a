/**
 * Benchmark definition for the numerical-integration kernel
 *
 * Invocation: numerical-integration <x1> <x2> <dx> <method> <threads>
 * Output:     method,threads,elapsed_seconds,area
 */

import { BenchmarkSpec } from '../benchmarks/benchmark-types';
import { defineBenchmark } from '../benchmarks/benchmark-spec';
import { BenchmarkSpecError } from '../benchmarks/errors';

export interface IntegrationParameters {
  executable: string;
  /** Lower integration bound */
  x1: number;
  /** Upper integration bound */
  x2: number;
  /** Step size */
  dx: number;
  threadCounts: number[];
  /** Analytic value of the integral over [x1, x2] */
  expectedValue: number;
  relativeTolerance: number;
}

export function createIntegrationBenchmark(params: IntegrationParameters): BenchmarkSpec {
  const { x1, x2, dx } = params;
  if (![x1, x2, dx].every(Number.isFinite)) {
    throw new BenchmarkSpecError(`Integration bounds and step must be finite (x1=${x1}, x2=${x2}, dx=${dx})`);
  }
  if (dx <= 0) {
    throw new BenchmarkSpecError(`Step size must be positive, got ${dx}`);
  }
  if (x2 <= x1) {
    throw new BenchmarkSpecError(`Upper bound (${x2}) must be greater than lower bound (${x1})`);
  }

  return defineBenchmark({
    id: 'integration',
    title: 'Numerical Integration',
    executable: params.executable,
    fixedArgs: [String(x1), String(x2), String(dx)],
    parameters: { x1, x2, dx },
    variants: [
      { id: 1, label: 'Rectangle (OpenMP)', kind: 'parallel', family: 'rectangle' },
      { id: 2, label: 'Trapezoidal (OpenMP)', kind: 'parallel', family: 'trapezoidal' },
      { id: 3, label: 'Rectangle (Sequential)', kind: 'sequential', family: 'rectangle' },
      { id: 4, label: 'Trapezoidal (Sequential)', kind: 'sequential', family: 'trapezoidal' },
    ],
    threadCounts: params.threadCounts,
    outputFieldCount: 4,
    resultLabel: 'Area',
    accuracy: {
      expectedValue: params.expectedValue,
      relativeTolerance: params.relativeTolerance,
    },
  });
}
