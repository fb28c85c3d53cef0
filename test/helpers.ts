import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { CommandResult } from '../src/commands/runner.js';
import { ExerciseResult, Fastener, Individual, SourceFile, Value } from '../src/types.js';
import { errorCode } from '../src/errors.js';

export function randomSequence(values: readonly number[], fallback = 0.5): () => number {
  let index = 0;
  return () => {
    const value = values[index];
    index += 1;
    return value ?? fallback;
  };
}

export function int(value: bigint): Value {
  return { kind: 'integer', value };
}

export function pow(value: bigint): Value {
  return { kind: 'powerOfTwo', value };
}

export function bool(value: boolean): Value {
  return { kind: 'boolean', value };
}

export function fastener(path: string, line: number, value: Value): Fastener {
  return { path, line, original: value, current: value };
}

export function sourceFile(path: string, values: readonly Value[]): SourceFile {
  return {
    path,
    lines: values.map((_, i) => `#define F${i} 0 /* INT FASTENABLE */`),
    fasteners: values.map((value, i) => fastener(path, i + 1, value)),
  };
}

export function individual(id: string, files: readonly SourceFile[]): Individual {
  return { id, generation: 0, parentIds: [], origin: 'seed', files };
}

export function measured(id: string, fitness: number): ExerciseResult {
  return { individual: individual(id, []), fitness, measurement: 1 / fitness };
}

export function ok(stdout = ''): CommandResult {
  return { ok: true, stdout, stderr: '', durationMs: 1, pid: 1 };
}

export function failed(failure: Extract<CommandResult, { ok: false }>['failure'], stderr = ''): CommandResult {
  return { ok: false, failure, stdout: '', stderr, durationMs: 1, pid: 1 };
}

/**
 * Command line running a fixture script with the current node binary
 */
export function nodeCommand(script: string, ...args: string[]): string {
  const scriptPath = fileURLToPath(new URL(`./fixtures/${script}`, import.meta.url));
  return [process.execPath, scriptPath, ...args].map((part) => `"${part}"`).join(' ');
}

/**
 * Whether a pid names a running process. A killed orphan may linger as a
 * zombie until init reaps it; that counts as dead.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
  return !isZombie(pid);
}

function isZombie(pid: number): boolean {
  try {
    // Field 3 of /proc/<pid>/stat, after the parenthesised command name
    return /\)\s+Z\s/.test(readFileSync(`/proc/${pid}/stat`, 'utf8'));
  } catch {
    return false;
  }
}
