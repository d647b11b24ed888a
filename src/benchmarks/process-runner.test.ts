import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runProcess } from './process-runner';

jest.mock('../logger', () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Child processes are plain Node scripts so the tests run wherever Jest does
const node = process.execPath;

describe('runProcess', () => {
  it('should capture stdout of a successful run', async () => {
    const outcome = await runProcess(node, ['-e', 'console.log(""); console.log("3,1,0.5")'], {
      timeoutMs: 10000,
    });

    expect(outcome.kind).toBe('completed');
    if (outcome.kind === 'completed') {
      expect(outcome.exitCode).toBe(0);
      expect(outcome.stdout).toBe('\n3,1,0.5');
    }
  });

  it('should pass arguments through unchanged', async () => {
    const outcome = await runProcess(
      node,
      ['-e', 'process.stdout.write(process.argv.slice(1).join("|"))', '0', '3.14159', '1'],
      { timeoutMs: 10000 }
    );

    expect(outcome.kind).toBe('completed');
    if (outcome.kind === 'completed') {
      expect(outcome.stdout).toBe('0|3.14159|1');
    }
  });

  it('should report a non-zero exit code as completed', async () => {
    const outcome = await runProcess(
      node,
      ['-e', 'process.stdout.write("oops"); process.stderr.write("bad input"); process.exit(3)'],
      { timeoutMs: 10000 }
    );

    expect(outcome).toEqual({ kind: 'completed', stdout: 'oops', stderr: 'bad input', exitCode: 3 });
  });

  it('should report the signal of a process killed by one', async () => {
    const outcome = await runProcess(node, ['-e', 'process.kill(process.pid, "SIGTERM")'], {
      timeoutMs: 10000,
    });

    expect(outcome.kind).toBe('completed');
    if (outcome.kind === 'completed') {
      expect(outcome.exitCode).toBeNull();
      expect(outcome.signal).toBe('SIGTERM');
    }
  });

  it('should report a missing executable as a launch failure', async () => {
    // short budget: execa keeps its timer armed after a failed spawn
    const outcome = await runProcess('/nonexistent/speedup-kernel', ['1', '1'], { timeoutMs: 100 });

    expect(outcome).toEqual({ kind: 'launch-failed', reason: 'spawn /nonexistent/speedup-kernel ENOENT' });
  });

  describe('with a file that is not executable', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'speedup-runner-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should carry the permission error in the launch failure', async () => {
      const kernel = path.join(tempDir, 'numerical-integration');
      fs.writeFileSync(kernel, '#!/bin/sh\necho 3,1,0.5\n');
      fs.chmodSync(kernel, 0o644);

      const outcome = await runProcess(kernel, ['3', '1'], { timeoutMs: 100 });

      expect(outcome.kind).toBe('launch-failed');
      if (outcome.kind === 'launch-failed') {
        expect(outcome.reason).toContain('EACCES');
      }
    });
  });


  it('should kill a process that exceeds its budget before returning', async () => {
    const started = Date.now();
    const outcome = await runProcess(
      node,
      ['-e', 'process.stdout.write(String(process.pid)); setInterval(() => {}, 1000)'],
      { timeoutMs: 2000 }
    );

    expect(Date.now() - started).toBeLessThan(4500);
    expect(outcome.kind).toBe('timed-out');
    if (outcome.kind === 'timed-out') {
      expect(outcome.timeoutMs).toBe(2000);
      const pid = Number(outcome.stdout);
      expect(Number.isInteger(pid)).toBe(true);
      expect(pid).toBeGreaterThan(0);
      // Signal 0 only checks for existence; it throws ESRCH once the child is gone
      expect(() => process.kill(pid, 0)).toThrow();
    }
  });
});
