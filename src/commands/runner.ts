/**
 * Command Runner
 *
 * Runs the operator's external commands (reset, build, fitness):
 * - Output is collected from the streams while the child runs
 * - A timer kills the child (and its process group) when it overruns
 * - Every outcome is returned as a value; the promise never rejects
 */

import { ChildProcess, spawn } from 'node:child_process';
import { UsageError, errorCode } from '../errors.js';

export type CommandFailure =
  | { kind: 'launch'; error: Error }
  | { kind: 'exit'; exitCode: number | null; signal: NodeJS.Signals | null }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'aborted' };

export type CommandResult =
  | { ok: true; stdout: string; stderr: string; durationMs: number; pid: number | undefined }
  | {
      ok: false;
      failure: CommandFailure;
      stdout: string;
      stderr: string;
      durationMs: number;
      pid: number | undefined;
    };

export interface RunOptions {
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

/**
 * Anything that can run a command line; the evaluator depends on this
 * rather than on child processes directly.
 */
export type CommandRunner = (commandLine: string, options: RunOptions) => Promise<CommandResult>;

// How long to wait for 'close' after SIGKILL before giving up on the child
const KILL_GRACE_MS = 5_000;

const useProcessGroups = process.platform !== 'win32';

const activeChildren = new Set<ChildProcess>();

/**
 * Split a command line into an executable and its arguments.
 * Single- or double-quoted tokens keep their whitespace.
 */
export function splitCommandLine(commandLine: string): { executable: string; args: string[] } {
  const tokens = commandLine.match(/"([^"]*)"|'([^']*)'|[^\s]+/g);
  if (!tokens || tokens.length === 0) {
    throw new UsageError('Empty command line');
  }
  const [executable, ...args] = tokens.map((token) => token.replace(/^(['"])(.*)\1$/s, '$2'));
  return { executable, args };
}

/**
 * Kill a child and, on POSIX, its whole process group. The group is
 * signalled even after the leader has exited, since a descendant may still
 * hold the output pipes. Safe to call more than once.
 */
export function killChild(child: ChildProcess): void {
  if (useProcessGroups && child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (error) {
      if (errorCode(error) === 'ESRCH') {
        return;
      }
      // Fall through to a direct kill
    }
  }
  if (child.exitCode !== null || child.signalCode !== null) {
    return;
  }
  child.kill('SIGKILL');
}

/**
 * Kill every command still running (used on interrupt)
 */
export function terminateActiveCommands(): number {
  const count = activeChildren.size;
  for (const child of activeChildren) {
    killChild(child);
  }
  return count;
}

export function activeCommandCount(): number {
  return activeChildren.size;
}

export const runCommand: CommandRunner = (commandLine, options) => {
  const { executable, args } = splitCommandLine(commandLine);
  const startTime = Date.now();

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let failure: CommandFailure | null = null;
    let settled = false;
    let graceTimer: NodeJS.Timeout | undefined;

    if (options.signal?.aborted) {
      resolve({
        ok: false,
        failure: { kind: 'aborted' },
        stdout,
        stderr,
        durationMs: 0,
        pid: undefined,
      });
      return;
    }

    let child: ChildProcess;
    try {
      child = spawn(executable, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: useProcessGroups,
      });
    } catch (error) {
      resolve({
        ok: false,
        failure: {
          kind: 'launch',
          error: error instanceof Error ? error : new Error(String(error)),
        },
        stdout,
        stderr,
        durationMs: Date.now() - startTime,
        pid: undefined,
      });
      return;
    }
    activeChildren.add(child);

    const settle = (): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      clearTimeout(graceTimer);
      options.signal?.removeEventListener('abort', onAbort);
      activeChildren.delete(child);
      const durationMs = Date.now() - startTime;
      if (failure) {
        resolve({ ok: false, failure, stdout, stderr, durationMs, pid: child.pid });
      } else {
        resolve({ ok: true, stdout, stderr, durationMs, pid: child.pid });
      }
    };

    const stop = (reason: CommandFailure): void => {
      if (failure) {
        return;
      }
      failure = reason;
      killChild(child);
      graceTimer = setTimeout(settle, KILL_GRACE_MS);
    };

    const onAbort = (): void => stop({ kind: 'aborted' });

    const timer = setTimeout(
      () => stop({ kind: 'timeout', timeoutMs: options.timeoutMs }),
      options.timeoutMs
    );
    options.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error) => {
      if (child.pid === undefined) {
        failure = failure ?? { kind: 'launch', error };
        settle();
      }
    });

    child.on('close', (exitCode, signal) => {
      if (!failure && exitCode !== 0) {
        failure = { kind: 'exit', exitCode, signal };
      }
      settle();
    });
  });
};

/**
 * One-line description of a failed command, for logs
 */
export function describeFailure(failure: CommandFailure): string {
  switch (failure.kind) {
    case 'launch':
      return `could not launch (${failure.error.message})`;
    case 'exit':
      return failure.signal
        ? `killed by ${failure.signal}`
        : `exited with status ${failure.exitCode ?? 'unknown'}`;
    case 'timeout':
      return `timed out after ${failure.timeoutMs}ms`;
    case 'aborted':
      return 'aborted';
  }
}
