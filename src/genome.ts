/**
 * Genome rendering
 *
 * Text forms of values and the "path:line: change X to Y" diff lines
 * used in reports.
 */

import { nanoid } from 'nanoid';
import { Fastener, Individual, SourceFile, Value } from './types.js';

export function renderValue(value: Value): string {
  switch (value.kind) {
    case 'integer':
    case 'powerOfTwo':
      return value.value.toString();
    case 'boolean':
      return value.value ? '1' : '0';
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  return a.kind === b.kind && a.value === b.value;
}

export function isPowerOfTwo(x: bigint): boolean {
  return x > 0n && (x & (x - 1n)) === 0n;
}

/**
 * Diff line for a fastener, or '' when its value is unchanged.
 */
export function describeFastener(fastener: Fastener): string {
  if (valuesEqual(fastener.current, fastener.original)) {
    return '';
  }
  return (
    `${fastener.path}:${fastener.line}: change ` +
    `${renderValue(fastener.original)} to ${renderValue(fastener.current)}`
  );
}

export function describeIndividual(individual: Individual): string[] {
  return individual.files
    .flatMap((file) => file.fasteners.map(describeFastener))
    .filter((line) => line.length > 0);
}

export function countFasteners(files: readonly SourceFile[]): number {
  return files.reduce((sum, file) => sum + file.fasteners.length, 0);
}

/**
 * Wrap loaded files as the seed individual of a run
 */
export function createSeedIndividual(files: readonly SourceFile[]): Individual {
  return {
    id: nanoid(10),
    generation: 0,
    parentIds: [],
    origin: 'seed',
    files,
  };
}
