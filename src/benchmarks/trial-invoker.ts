/**
 * Turns one process invocation into a Trial: run, parse, validate
 */

import {
  BenchmarkSpec,
  FailedTrial,
  SuccessfulTrial,
  Trial,
  TrialFailure,
  TrialInvoker,
  VariantSpec,
} from './benchmark-types';
import { ProcessRunner, runProcess } from './process-runner';
import { parseResultLine } from './result-parser';
import { validateAccuracy } from './accuracy-validator';
import { LaunchError } from './errors';
import { logger } from '../logger';

export interface TrialInvokerOptions {
  timeoutMs: number;
  /** Defaults to the execa-backed runner */
  runProcess?: ProcessRunner;
}

/**
 * Builds the positional argument vector for a kernel:
 * `<fixed-params...> <variant_id> <thread_count>`.
 * Sequential variants always receive a thread count of 1.
 */
export function buildKernelArgs(
  spec: BenchmarkSpec,
  variant: VariantSpec,
  threadCount: number
): string[] {
  const threads = variant.kind === 'sequential' ? 1 : threadCount;
  return [...spec.fixedArgs, String(variant.id), String(threads)];
}

/**
 * Describes a trial failure in one line for logs and summaries
 */
export function describeTrialFailure(failure: TrialFailure): string {
  switch (failure.kind) {
    case 'timed-out':
      return `timed out after ${failure.timeoutMs}ms`;
    case 'non-zero-exit': {
      const status = failure.exitCode === null
        ? `terminated by ${failure.signal ?? 'signal'}`
        : `exited with code ${failure.exitCode}`;
      const stderr = failure.stderr.trim();
      return stderr ? `${status}: ${stderr}` : status;
    }
    case 'parse-error':
      return `${failure.message} (output: ${JSON.stringify(failure.raw)})`;
  }
}

/**
 * Creates the invoker the aggregator calls once per trial.
 *
 * A launch failure throws LaunchError since no later trial can succeed either.
 */
export function createTrialInvoker(spec: BenchmarkSpec, options: TrialInvokerOptions): TrialInvoker {
  const run = options.runProcess ?? runProcess;

  return async (variant: VariantSpec, threadCount: number): Promise<Trial> => {
    const threads = variant.kind === 'sequential' ? 1 : threadCount;
    const failed = (failure: TrialFailure): FailedTrial => ({
      success: false,
      variantId: variant.id,
      threadCount: threads,
      failure,
    });

    const outcome = await run(spec.executable, buildKernelArgs(spec, variant, threads), {
      timeoutMs: options.timeoutMs,
    });

    switch (outcome.kind) {
      case 'launch-failed':
        throw new LaunchError(spec.executable, outcome.reason);
      case 'timed-out':
        return failed({ kind: 'timed-out', timeoutMs: outcome.timeoutMs });
      case 'completed':
        break;
    }

    if (outcome.exitCode !== 0) {
      return failed({
        kind: 'non-zero-exit',
        exitCode: outcome.exitCode,
        signal: outcome.signal,
        stderr: outcome.stderr,
      });
    }

    const parsed = parseResultLine(outcome.stdout, spec.outputFieldCount);
    if (!parsed.success) {
      return failed({ kind: 'parse-error', message: parsed.error.message, raw: parsed.error.raw });
    }

    const { record } = parsed;
    if (record.variantId !== variant.id || record.threadCount !== threads) {
      return failed({
        kind: 'parse-error',
        message: `Output is for method ${record.variantId} with ${record.threadCount} threads, expected method ${variant.id} with ${threads}`,
        raw: outcome.stdout,
      });
    }

    const trial: SuccessfulTrial = {
      success: true,
      variantId: record.variantId,
      threadCount: record.threadCount,
      elapsedSeconds: record.elapsedSeconds,
      resultValue: record.resultValue,
    };

    if (spec.accuracy && record.resultValue !== undefined) {
      const accuracy = validateAccuracy(
        record.resultValue,
        spec.accuracy.expectedValue,
        spec.accuracy.relativeTolerance
      );
      trial.accuracy = accuracy;
      if (!accuracy.ok) {
        logger.warn(
          `Large numerical error (${accuracy.relativeError.toFixed(3)}) for ${variant.label} with ${threads} threads: ` +
            `got ${record.resultValue}, expected ${spec.accuracy.expectedValue}`
        );
      }
    }

    return trial;
  };
}
