/**
 * Benchmark definition for the blocked matrix-multiplication kernel
 *
 * Invocation: blocked-matrix-multiplication <N> <block> <method> <threads>
 * Output:     method,threads,elapsed_seconds
 */

import { BenchmarkSpec } from '../benchmarks/benchmark-types';
import { defineBenchmark } from '../benchmarks/benchmark-spec';
import { BenchmarkSpecError } from '../benchmarks/errors';

export interface MatrixParameters {
  executable: string;
  /** Size of the square matrices (N x N) */
  matrixSize: number;
  /** Edge length of the square blocks used by the blocked method */
  blockSize: number;
  threadCounts: number[];
}

export function createMatrixBenchmark(params: MatrixParameters): BenchmarkSpec {
  const { matrixSize, blockSize } = params;
  if (!Number.isInteger(matrixSize) || matrixSize < 1) {
    throw new BenchmarkSpecError(`Matrix size must be a positive integer, got ${matrixSize}`);
  }
  if (!Number.isInteger(blockSize) || blockSize < 1) {
    throw new BenchmarkSpecError(`Block size must be a positive integer, got ${blockSize}`);
  }
  if (matrixSize % blockSize !== 0) {
    throw new BenchmarkSpecError(
      `Matrix size (${matrixSize}) must be divisible by block size (${blockSize})`
    );
  }

  return defineBenchmark({
    id: 'matmul',
    title: 'Matrix Multiplication',
    executable: params.executable,
    fixedArgs: [String(matrixSize), String(blockSize)],
    parameters: { matrixSize, blockSize },
    variants: [
      { id: 1, label: 'Blocked', kind: 'parallel', family: 'matmul' },
      { id: 2, label: 'Standard', kind: 'parallel', family: 'matmul' },
      { id: 3, label: 'Sequential', kind: 'sequential', family: 'matmul' },
    ],
    threadCounts: params.threadCounts,
    outputFieldCount: 3,
  });
}
