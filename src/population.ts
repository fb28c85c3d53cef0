/**
 * Population Manager
 *
 * Works on the measured individuals of a generation:
 * - Ranking and truncation to the fittest half
 * - Initial population generation from the seed
 * - Text report and persistence to disk
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ExerciseResult, Individual, Population } from './types.js';
import { describeIndividual } from './genome.js';
import { mutateIndividual } from './mutations/operators.js';
import { RandomSource } from './random.js';

/**
 * Since the seed is the only example individual, the first population is
 * made of independent single-step mutants of it.
 */
export function createInitialPopulation(
  rng: RandomSource,
  seed: Individual,
  size: number
): Population {
  return Array.from({ length: size }, () => mutateIndividual(rng, seed, 1));
}

/**
 * Best first. Ties keep their evaluation order.
 */
export function rankResults(results: readonly ExerciseResult[]): ExerciseResult[] {
  return [...results].sort((a, b) => b.fitness - a.fitness);
}

/**
 * The best half of a ranked result set (at least one when any exist)
 */
export function selectFittest(ranked: readonly ExerciseResult[]): ExerciseResult[] {
  if (ranked.length === 0) {
    return [];
  }
  return ranked.slice(0, Math.max(1, Math.floor(ranked.length / 2)));
}

export function formatReport(ranked: readonly ExerciseResult[]): string {
  const sections = ranked.map((result, i) => {
    const diff = describeIndividual(result.individual);
    const header =
      `#${i + 1} fitness=${result.fitness.toFixed(6)} ` + `measurement=${result.measurement}`;
    return [header, ...(diff.length > 0 ? diff : ['(no changes)'])].join('\n');
  });
  return sections.join('\n\n') + '\n';
}

/**
 * Save the ranked results of a run to disk
 */
export async function saveResults(
  outputDir: string,
  ranked: readonly ExerciseResult[]
): Promise<void> {
  await mkdir(outputDir, { recursive: true });

  await writeFile(path.join(outputDir, 'report.txt'), formatReport(ranked));

  const summary = ranked.map((result, i) => ({
    rank: i + 1,
    id: result.individual.id,
    generation: result.individual.generation,
    origin: result.individual.origin,
    parentIds: result.individual.parentIds,
    fitness: result.fitness,
    measurement: result.measurement,
    changes: describeIndividual(result.individual),
  }));
  await writeFile(path.join(outputDir, 'results.json'), JSON.stringify(summary, null, 2));

  console.log(`Results saved to ${outputDir}`);
}
