/**
 * Mutation Operators
 *
 * Each operator perturbs a genome by at most one step and returns new
 * objects; inputs are never modified. Untouched files are shared between
 * parent and child.
 */

import { nanoid } from 'nanoid';
import { Fastener, Individual, SourceFile, Value } from '../types.js';
import { RandomSource, RandomStep, randomIndex, randomStep } from '../random.js';

// Largest power of two representable as a signed 64-bit integer
const MAX_POWER_OF_TWO = 1n << 62n;

/**
 * Apply a drawn step to a value, preserving its kind's invariant
 */
export function applyStep(value: Value, step: RandomStep): Value {
  if (step === 'stay') {
    return value;
  }

  switch (value.kind) {
    case 'integer':
      return {
        kind: 'integer',
        value: BigInt.asIntN(64, step === 'down' ? value.value - 1n : value.value + 1n),
      };

    case 'powerOfTwo': {
      const shifted = step === 'down' ? value.value >> 1n : value.value << 1n;
      // Never zero, never outside int64
      if (shifted === 0n || shifted > MAX_POWER_OF_TWO) {
        return value;
      }
      return { kind: 'powerOfTwo', value: shifted };
    }

    case 'boolean':
      return { kind: 'boolean', value: !value.value };
  }
}

export function mutateValue(rng: RandomSource, value: Value): Value {
  return applyStep(value, randomStep(rng));
}

export function mutateFastener(rng: RandomSource, fastener: Fastener): Fastener {
  return { ...fastener, current: mutateValue(rng, fastener.current) };
}

/**
 * Mutate exactly one randomly chosen fastener of the file
 */
export function mutateFile(rng: RandomSource, file: SourceFile): SourceFile {
  if (file.fasteners.length === 0) {
    return file;
  }
  const index = randomIndex(rng, file.fasteners.length);
  const fasteners = file.fasteners.map((fastener, i) =>
    i === index ? mutateFastener(rng, fastener) : fastener
  );
  return { ...file, fasteners };
}

/**
 * Mutate one fastener in every file of the individual
 */
export function mutateIndividual(
  rng: RandomSource,
  parent: Individual,
  generation: number
): Individual {
  return {
    id: nanoid(10),
    generation,
    parentIds: [parent.id],
    origin: 'mutation',
    files: parent.files.map((file) => mutateFile(rng, file)),
  };
}
