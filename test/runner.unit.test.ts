import { describe, expect, it, vi } from 'vitest';

import {
  activeCommandCount,
  describeFailure,
  runCommand,
  splitCommandLine,
  terminateActiveCommands,
} from '../src/commands/runner.js';
import { UsageError } from '../src/errors.js';
import { isProcessAlive, nodeCommand } from './helpers.js';

describe('splitCommandLine', () => {
  it('splits on whitespace', () => {
    expect(splitCommandLine('make  -j 4')).toEqual({ executable: 'make', args: ['-j', '4'] });
  });

  it('keeps quoted tokens together and strips the quotes', () => {
    expect(splitCommandLine(`"/opt/my tools/bench" 'a b' --fast ""`)).toEqual({
      executable: '/opt/my tools/bench',
      args: ['a b', '--fast', ''],
    });
  });

  it('rejects an empty command line', () => {
    expect(() => splitCommandLine('   ')).toThrow(UsageError);
  });
});

describe('runCommand', () => {
  it('captures stdout and stderr of a successful command', async () => {
    const result = await runCommand(nodeCommand('print.mjs', '1.5', 'note', '0'), {
      timeoutMs: 10_000,
    });

    expect(result.ok).toBe(true);
    expect(result.stdout).toBe('1.5');
    expect(result.stderr).toBe('note');
  });

  it('reports a non-zero exit without throwing', async () => {
    const result = await runCommand(nodeCommand('print.mjs', '', 'broken', '3'), {
      timeoutMs: 10_000,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure).toEqual({ kind: 'exit', exitCode: 3, signal: null });
      expect(result.stderr).toBe('broken');
      expect(describeFailure(result.failure)).toBe('exited with status 3');
    }
  });

  it('kills a command that overruns its timeout', async () => {
    const result = await runCommand(nodeCommand('hang.mjs'), { timeoutMs: 300 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure).toEqual({ kind: 'timeout', timeoutMs: 300 });
    }
    expect(result.pid).toBeDefined();
    expect(isProcessAlive(result.pid ?? -1)).toBe(false);
    expect(activeCommandCount()).toBe(0);
  });

  it('reports a missing executable as a launch failure', async () => {
    const result = await runCommand('/nonexistent/fasten-missing-binary --flag', {
      timeoutMs: 10_000,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('launch');
    }
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = runCommand(nodeCommand('hang.mjs'), {
      timeoutMs: 60_000,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 200);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure).toEqual({ kind: 'aborted' });
    }
    expect(isProcessAlive(result.pid ?? -1)).toBe(false);
  });

  it('does not start a command when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await runCommand(nodeCommand('hang.mjs'), {
      timeoutMs: 60_000,
      signal: controller.signal,
    });

    expect(result.ok).toBe(false);
    expect(result.pid).toBeUndefined();
  });

  it('terminates in-flight commands on request', async () => {
    const pending = runCommand(nodeCommand('hang.mjs'), { timeoutMs: 60_000 });
    expect(activeCommandCount()).toBe(1);

    expect(terminateActiveCommands()).toBe(1);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure).toEqual({ kind: 'exit', exitCode: null, signal: 'SIGKILL' });
    }
    expect(activeCommandCount()).toBe(0);
  });

  it('kills a background descendant that outlives its parent on timeout', async () => {
    const result = await runCommand(nodeCommand('orphan.mjs'), { timeoutMs: 2_000 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure).toEqual({ kind: 'timeout', timeoutMs: 2_000 });
    }
    // Resolves on 'close' once the descendant releases the pipes, not after the grace period
    expect(result.durationMs).toBeLessThan(5_000);
    expect(result.stdout).toMatch(/^\d+$/);
    const descendant = Number(result.stdout);
    await vi.waitFor(() => expect(isProcessAlive(descendant)).toBe(false), { timeout: 2_000 });
    expect(activeCommandCount()).toBe(0);
  });

  it('terminates background descendants of in-flight commands', async () => {
    const pending = runCommand(nodeCommand('orphan.mjs'), { timeoutMs: 60_000 });
    await new Promise((resolve) => setTimeout(resolve, 1_500));

    expect(terminateActiveCommands()).toBe(1);
    const result = await pending;

    expect(result.stdout).toMatch(/^\d+$/);
    const descendant = Number(result.stdout);
    await vi.waitFor(() => expect(isProcessAlive(descendant)).toBe(false), { timeout: 2_000 });
    expect(activeCommandCount()).toBe(0);
  });
});
