/**
 * Crossover
 *
 * Roulette-wheel parent selection and single-point breeding of aligned
 * individuals.
 */

import { nanoid } from 'nanoid';
import { GenomeMismatchError } from '../errors.js';
import { ExerciseResult, Individual, SourceFile } from '../types.js';
import { RandomSource, randomIndex } from '../random.js';

function selectionWeight(fitness: number): number {
  return Number.isFinite(fitness) && fitness > 0 ? fitness : 0;
}

/**
 * Fitness-proportionate selection. Individuals with a non-positive weight
 * are only picked when no weight in the pool is positive, in which case
 * the pick is uniform.
 */
export function selectByFitness(
  rng: RandomSource,
  pool: readonly ExerciseResult[]
): ExerciseResult {
  if (pool.length === 0) {
    throw new RangeError('Cannot select from an empty pool');
  }

  const sums: number[] = [];
  let total = 0;
  for (const result of pool) {
    total += selectionWeight(result.fitness);
    sums.push(total);
  }

  if (total <= 0) {
    return pool[randomIndex(rng, pool.length)];
  }

  const position = rng() * total;
  const index = sums.findIndex((sum) => sum > position);
  if (index >= 0) {
    return pool[index];
  }

  // Rounding at the top of the wheel: fall back to the last positive weight
  for (let i = pool.length - 1; i >= 0; i--) {
    if (selectionWeight(pool[i].fitness) > 0) {
      return pool[i];
    }
  }
  return pool[pool.length - 1];
}

/**
 * Splice two aligned files at a random point in the shorter fastener array
 */
export function crossFiles(rng: RandomSource, a: SourceFile, b: SourceFile): SourceFile {
  if (a.path !== b.path) {
    throw new GenomeMismatchError(`Cannot cross ${a.path} with ${b.path}`);
  }
  const split = randomIndex(rng, Math.min(a.fasteners.length, b.fasteners.length));
  return {
    ...a,
    fasteners: [...a.fasteners.slice(0, split), ...b.fasteners.slice(split)],
  };
}

export function breed(
  rng: RandomSource,
  a: Individual,
  b: Individual,
  generation: number
): Individual {
  if (a.files.length !== b.files.length) {
    throw new GenomeMismatchError(
      `Parents ${a.id} and ${b.id} have ${a.files.length} and ${b.files.length} files`
    );
  }
  return {
    id: nanoid(10),
    generation,
    parentIds: [a.id, b.id],
    origin: 'crossover',
    files: a.files.map((file, i) => crossFiles(rng, file, b.files[i])),
  };
}
