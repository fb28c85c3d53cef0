/**
 * Random source helpers. A RandomSource yields uniform floats in [0, 1),
 * the same contract as Math.random, so runs can be replayed in tests.
 */

export type RandomSource = () => number;

export type RandomStep = 'down' | 'stay' | 'up';

export const defaultRandom: RandomSource = Math.random;

export function randomStep(rng: RandomSource): RandomStep {
  const value = rng();
  if (value < 0.33) {
    return 'down';
  }
  if (value < 0.66) {
    return 'stay';
  }
  return 'up';
}

/**
 * Uniform index into a range of the given length; 0 for an empty range.
 */
export function randomIndex(rng: RandomSource, length: number): number {
  if (length <= 0) {
    return 0;
  }
  return Math.min(Math.floor(rng() * length), length - 1);
}
