import { runExperiment } from './experiment-driver';
import { ExperimentOptions, Trial, TrialInvoker, VariantSpec } from './benchmark-types';
import { LaunchError } from './errors';
import { createTrialInvoker } from './trial-invoker';
import { ProcessOutcome } from './process-runner';
import { createIntegrationBenchmark, createMatrixBenchmark } from '../kernels';

jest.mock('../logger', () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const options: ExperimentOptions = {
  trialsPerConfiguration: 3,
  warmupRuns: 0,
  timeoutMs: 1000,
  minSuccessfulTrials: 1,
};

const matmul = createMatrixBenchmark({
  executable: './blocked-matrix-multiplication',
  matrixSize: 256,
  blockSize: 64,
  threadCounts: [1, 2, 4],
});

const integration = createIntegrationBenchmark({
  executable: './numerical-integration',
  x1: 0,
  x2: 3.14159,
  dx: 0.0001,
  threadCounts: [2],
  expectedValue: 2.0,
  relativeTolerance: 0.01,
});

type Timing = (variant: VariantSpec, threadCount: number) => number | 'timeout';

/** Fake invoker whose elapsed time depends only on the configuration */
function fakeInvoker(timing: Timing, resultValue?: number): jest.Mock<Promise<Trial>, Parameters<TrialInvoker>> {
  return jest.fn(async (variant: VariantSpec, threadCount: number): Promise<Trial> => {
    const elapsed = timing(variant, threadCount);
    if (elapsed === 'timeout') {
      return { success: false, variantId: variant.id, threadCount, failure: { kind: 'timed-out', timeoutMs: 1000 } };
    }
    return { success: true, variantId: variant.id, threadCount, elapsedSeconds: elapsed, resultValue };
  });
}

describe('runExperiment', () => {
  it('should derive speedup and efficiency from the sequential baseline', async () => {
    const blockedTimes: Record<number, number> = { 1: 1.0, 2: 0.52, 4: 0.3 };
    const invokeTrial = fakeInvoker((variant, threads) => {
      if (variant.kind === 'sequential') return 1.0;
      return variant.label === 'Blocked' ? blockedTimes[threads] : 2.0;
    });

    const result = await runExperiment(matmul, options, { invokeTrial });

    expect(result.failures).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.records.map(r => [r.method, r.threadCount])).toEqual([
      ['Sequential', 1],
      ['Blocked', 1],
      ['Blocked', 2],
      ['Blocked', 4],
      ['Standard', 1],
      ['Standard', 2],
      ['Standard', 4],
    ]);

    const [baseline, blocked1, blocked2, blocked4, standard1] = result.records;
    expect(baseline.speedup).toBe(1.0);
    expect(baseline.efficiency).toBe(1.0);
    expect(blocked1.speedup).toBeCloseTo(1.0, 2);
    expect(blocked2.speedup).toBeCloseTo(1.92, 2);
    expect(blocked4.speedup).toBeCloseTo(3.33, 2);
    expect(blocked1.efficiency).toBeCloseTo(1.0, 2);
    expect(blocked2.efficiency).toBeCloseTo(0.96, 2);
    expect(blocked4.efficiency).toBeCloseTo(0.83, 2);
    expect(standard1.speedup).toBe(0.5);
    expect(baseline.relativeError).toBeUndefined();
  });

  it('should run the sequential variant once and every parallel configuration in order', async () => {
    const invokeTrial = fakeInvoker(() => 1.0);

    await runExperiment(matmul, { ...options, trialsPerConfiguration: 1 }, { invokeTrial });

    expect(invokeTrial.mock.calls.map(([variant, threads]) => `${variant.id}:${threads}`)).toEqual([
      '3:1',
      '1:1',
      '1:2',
      '1:4',
      '2:1',
      '2:2',
      '2:4',
    ]);
  });

  it('should compare each parallel variant with the baseline of its own family', async () => {
    const invokeTrial = fakeInvoker(variant => {
      if (variant.family === 'rectangle') return variant.kind === 'sequential' ? 2.0 : 1.0;
      return variant.kind === 'sequential' ? 4.0 : 1.0;
    }, 2.0);

    const result = await runExperiment(integration, options, { invokeTrial });

    const byMethod = new Map(result.records.map(record => [record.method, record]));
    expect(byMethod.get('Rectangle (OpenMP)')?.speedup).toBe(2);
    expect(byMethod.get('Trapezoidal (OpenMP)')?.speedup).toBe(4);
    expect(byMethod.get('Trapezoidal (OpenMP)')?.efficiency).toBe(2);
    expect(byMethod.get('Rectangle (Sequential)')?.meanResultValue).toBe(2.0);
    expect(byMethod.get('Rectangle (Sequential)')?.relativeError).toBe(0);
  });

  it('should record a failed configuration and continue the sweep', async () => {
    const invokeTrial = fakeInvoker((variant, threads) =>
      variant.label === 'Blocked' && threads === 2 ? 'timeout' : 1.0
    );

    const result = await runExperiment(matmul, options, { invokeTrial });

    expect(result.records).toHaveLength(6);
    expect(result.failures).toEqual([
      {
        method: 'Blocked',
        variantId: 1,
        threadCount: 2,
        reason: 'aggregation',
        attemptedTrials: 3,
        successfulTrials: 0,
        details: ['timed out after 1000ms', 'timed out after 1000ms', 'timed out after 1000ms'],
      },
    ]);
    expect(result.records.some(record => record.method === 'Blocked' && record.threadCount === 4)).toBe(true);
  });

  it('should skip parallel variants whose baseline failed', async () => {
    const invokeTrial = fakeInvoker(variant => (variant.kind === 'sequential' ? 'timeout' : 1.0));

    const result = await runExperiment(matmul, options, { invokeTrial });

    expect(result.records).toEqual([]);
    expect(invokeTrial).toHaveBeenCalledTimes(3);
    expect(result.failures.map(f => [f.method, f.threadCount, f.reason])).toEqual([
      ['Sequential', 1, 'aggregation'],
      ['Blocked', 1, 'baseline-unavailable'],
      ['Blocked', 2, 'baseline-unavailable'],
      ['Blocked', 4, 'baseline-unavailable'],
      ['Standard', 1, 'baseline-unavailable'],
      ['Standard', 2, 'baseline-unavailable'],
      ['Standard', 4, 'baseline-unavailable'],
    ]);
    expect(result.failures[1].details).toEqual(['sequential baseline for family "matmul" failed']);
  });

  it('should collect a warning for configurations with results outside the tolerance', async () => {
    const invokeTrial = jest.fn(async (variant: VariantSpec, threadCount: number): Promise<Trial> => ({
      success: true,
      variantId: variant.id,
      threadCount,
      elapsedSeconds: 1.0,
      resultValue: 2.5,
      accuracy: { ok: false, relativeError: 0.25 },
    }));

    const result = await runExperiment(integration, { ...options, trialsPerConfiguration: 2 }, { invokeTrial });

    expect(result.records).toHaveLength(4);
    expect(result.warnings).toHaveLength(4);
    expect(result.warnings[0]).toEqual({
      method: 'Rectangle (Sequential)',
      threadCount: 1,
      flaggedTrials: 2,
      successfulTrials: 2,
      maxRelativeError: 0.25,
    });
    expect(result.records[0].relativeError).toBe(0.25);
  });

  it('should fail configurations whose kernel reports a zero time instead of dividing by it', async () => {
    const zeroTime = createMatrixBenchmark({
      executable: './blocked-matrix-multiplication',
      matrixSize: 8,
      blockSize: 4,
      threadCounts: [1, 2],
    });
    const runProcess = jest.fn(async (_executable: string, args: readonly string[]): Promise<ProcessOutcome> => {
      const [variantId, threads] = args.slice(-2);
      return { kind: 'completed', stdout: `\n${variantId},${threads},0.00000000\n`, stderr: '', exitCode: 0 };
    });
    const invokeTrial = createTrialInvoker(zeroTime, { timeoutMs: 1000, runProcess });

    const result = await runExperiment(zeroTime, options, { invokeTrial });

    expect(result.records).toEqual([]);
    expect(result.failures.map(f => [f.method, f.threadCount, f.reason])).toEqual([
      ['Sequential', 1, 'aggregation'],
      ['Blocked', 1, 'baseline-unavailable'],
      ['Blocked', 2, 'baseline-unavailable'],
      ['Standard', 1, 'baseline-unavailable'],
      ['Standard', 2, 'baseline-unavailable'],
    ]);
    expect(result.failures[0].details[0]).toBe(
      'Elapsed time is not a positive number: "0.00000000" (output: "\\n3,1,0.00000000\\n")'
    );
  });

  it('should drop zero-time trials of a parallel variant and keep its other trials', async () => {
    const runProcess = jest.fn(async (_executable: string, args: readonly string[]): Promise<ProcessOutcome> => {
      const [variantId, threads] = args.slice(-2);
      const time = variantId === '3' ? '1.00000000' : threads === '2' ? '0.00000000' : '0.50000000';
      return { kind: 'completed', stdout: `${variantId},${threads},${time}`, stderr: '', exitCode: 0 };
    });
    const invokeTrial = createTrialInvoker(matmul, { timeoutMs: 1000, runProcess });

    const result = await runExperiment(matmul, options, { invokeTrial });

    expect(result.records.every(record => Number.isFinite(record.speedup))).toBe(true);
    expect(result.records.map(r => [r.method, r.threadCount, r.speedup])).toEqual([
      ['Sequential', 1, 1],
      ['Blocked', 1, 2],
      ['Blocked', 4, 2],
      ['Standard', 1, 2],
      ['Standard', 4, 2],
    ]);
    expect(result.failures.map(f => [f.method, f.threadCount])).toEqual([
      ['Blocked', 2],
      ['Standard', 2],
    ]);
  });

  it('should abort the run when the executable cannot be launched', async () => {
    const invokeTrial = jest.fn(async (): Promise<Trial> => {
      throw new LaunchError('./blocked-matrix-multiplication', 'spawn EACCES');
    });

    await expect(runExperiment(matmul, options, { invokeTrial })).rejects.toThrow(LaunchError);
    expect(invokeTrial).toHaveBeenCalledTimes(1);
  });
});
