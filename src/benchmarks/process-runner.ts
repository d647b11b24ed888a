/**
 * Runs the benchmarked executable with a hard wall-clock budget
 */

import { once } from 'events';
import { ChildProcess } from 'child_process';
import execa from 'execa';
import { logger } from '../logger';

export interface RunProcessOptions {
  /** Wall-clock budget in milliseconds; the child is killed when it expires */
  timeoutMs: number;
}

export type ProcessOutcome =
  | {
      kind: 'completed';
      stdout: string;
      stderr: string;
      /** null when the process was terminated by a signal */
      exitCode: number | null;
      signal?: string;
    }
  | { kind: 'timed-out'; timeoutMs: number; stdout: string; stderr: string }
  | { kind: 'launch-failed'; reason: string };

export type ProcessRunner = (
  executable: string,
  args: readonly string[],
  options: RunProcessOptions
) => Promise<ProcessOutcome>;

/**
 * Resolves once the child has exited. Returns immediately if it already has.
 */
async function waitForExit(child: ChildProcess): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return;
  }
  await once(child, 'exit');
}

/**
 * Invokes an executable and classifies how it ended.
 *
 * Never rejects for failures of the child itself: a non-zero exit code is
 * reported as `completed`, an expired budget as `timed-out` (after the child
 * is confirmed dead), and a spawn error as `launch-failed`.
 */
export async function runProcess(
  executable: string,
  args: readonly string[],
  options: RunProcessOptions
): Promise<ProcessOutcome> {
  logger.trace(`Running ${executable} ${args.join(' ')} (timeout ${options.timeoutMs}ms)`);

  let subprocess: execa.ExecaChildProcess;
  let result: execa.ExecaReturnValue;
  try {
    subprocess = execa(executable, [...args], {
      timeout: options.timeoutMs,
      killSignal: 'SIGKILL',
      reject: false,
    });
    result = await subprocess;
  } catch (error) {
    // execa rejects even with reject: false when spawn() throws synchronously
    return {
      kind: 'launch-failed',
      reason: error instanceof Error ? error.message : String(error),
    };
  }

  if (result.timedOut) {
    await waitForExit(subprocess);
    return {
      kind: 'timed-out',
      timeoutMs: options.timeoutMs,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }

  if (typeof result.exitCode === 'number') {
    return {
      kind: 'completed',
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
    };
  }

  if (result.signal) {
    return {
      kind: 'completed',
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: null,
      signal: result.signal,
    };
  }

  // No exit code and no signal: the process never started (ENOENT, EACCES, ...)
  return { kind: 'launch-failed', reason: launchFailureReason(result) };
}

/**
 * Reads the OS cause off execa's error result. The spawn error is created in
 * Node's own realm, so it is inspected by shape rather than with instanceof.
 */
function launchFailureReason(result: execa.ExecaReturnValue): string {
  if ('originalMessage' in result && typeof result.originalMessage === 'string' && result.originalMessage) {
    return result.originalMessage;
  }
  if ('shortMessage' in result && typeof result.shortMessage === 'string' && result.shortMessage) {
    return result.shortMessage;
  }
  return `Unable to start ${result.command}`;
}
