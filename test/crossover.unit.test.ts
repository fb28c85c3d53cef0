import { describe, expect, it } from 'vitest';

import { breed, crossFiles, selectByFitness } from '../src/mutations/crossover.js';
import { GenomeMismatchError } from '../src/errors.js';
import { individual, int, measured, randomSequence, sourceFile } from './helpers.js';

describe('selectByFitness', () => {
  it('always returns the only member of a single-element pool', () => {
    const only = measured('only', 3);
    for (const draw of [0, 0.5, 0.999]) {
      expect(selectByFitness(randomSequence([draw]), [only])).toBe(only);
    }
  });

  it('picks proportionally to fitness', () => {
    const pool = [measured('light', 1), measured('heavy', 3)];
    // total 4: draws below 1 land on light, the rest on heavy
    expect(selectByFitness(randomSequence([0.2]), pool).individual.id).toBe('light');
    expect(selectByFitness(randomSequence([0.25]), pool).individual.id).toBe('heavy');
    expect(selectByFitness(randomSequence([0.9]), pool).individual.id).toBe('heavy');
  });

  it('never picks a non-positive weight while a positive one exists', () => {
    const pool = [measured('zero', 0), measured('good', 2), measured('negative', -1)];
    for (const draw of [0, 0.1, 0.5, 0.999999]) {
      expect(selectByFitness(randomSequence([draw]), pool).individual.id).toBe('good');
    }
  });

  it('treats non-finite fitness as zero weight', () => {
    const pool = [measured('nan', Number.NaN), measured('good', 0.5)];
    expect(selectByFitness(randomSequence([0]), pool).individual.id).toBe('good');
  });

  it('picks uniformly when every weight is zero', () => {
    const pool = [measured('a', 0), measured('b', 0)];
    expect(selectByFitness(randomSequence([0.7]), pool).individual.id).toBe('b');
    expect(selectByFitness(randomSequence([0.2]), pool).individual.id).toBe('a');
  });

  it('rejects an empty pool', () => {
    expect(() => selectByFitness(randomSequence([0.5]), [])).toThrow(RangeError);
  });
});

describe('crossFiles', () => {
  it('takes the head of the first parent and the tail of the second', () => {
    const a = sourceFile('a.h', [int(1n), int(2n), int(3n)]);
    const b = sourceFile('a.h', [int(10n), int(20n), int(30n)]);
    // split floor(0.5 * 3) = 1
    const child = crossFiles(randomSequence([0.5]), a, b);

    expect(child.fasteners.map((f) => f.current)).toEqual([int(1n), int(20n), int(30n)]);
    expect(child.lines).toBe(a.lines);
  });

  it('splits within the shorter parent', () => {
    const a = sourceFile('a.h', [int(1n), int(2n), int(3n), int(4n)]);
    const b = sourceFile('a.h', [int(10n), int(20n)]);
    // split floor(0.99 * 2) = 1
    const child = crossFiles(randomSequence([0.99]), a, b);

    expect(child.fasteners.map((f) => f.current)).toEqual([int(1n), int(20n)]);
  });

  it('refuses files at different paths', () => {
    const a = sourceFile('a.h', [int(1n)]);
    const b = sourceFile('b.h', [int(1n)]);
    expect(() => crossFiles(randomSequence([0]), a, b)).toThrow(GenomeMismatchError);
  });
});

describe('breed', () => {
  it('preserves file count and fastener counts of aligned parents', () => {
    const a = individual('a', [
      sourceFile('a.h', [int(1n), int(2n)]),
      sourceFile('b.h', [int(3n), int(4n), int(5n)]),
    ]);
    const b = individual('b', [
      sourceFile('a.h', [int(6n), int(7n)]),
      sourceFile('b.h', [int(8n), int(9n), int(10n)]),
    ]);

    const child = breed(randomSequence([0, 0.7]), a, b, 4);

    expect(child.files).toHaveLength(2);
    expect(child.files[0].fasteners.map((f) => f.current)).toEqual([int(6n), int(7n)]);
    expect(child.files[1].fasteners.map((f) => f.current)).toEqual([int(3n), int(4n), int(10n)]);
    expect(child.parentIds).toEqual(['a', 'b']);
    expect(child.origin).toBe('crossover');
    expect(child.generation).toBe(4);
  });

  it('can breed an individual with itself', () => {
    const a = individual('a', [sourceFile('a.h', [int(1n), int(2n)])]);
    const child = breed(randomSequence([0.5]), a, a, 1);
    expect(child.files[0].fasteners).toEqual(a.files[0].fasteners);
    expect(child.parentIds).toEqual(['a', 'a']);
  });

  it('refuses parents with different file counts', () => {
    const a = individual('a', [sourceFile('a.h', [int(1n)])]);
    const b = individual('b', []);
    expect(() => breed(randomSequence([0]), a, b, 1)).toThrow(GenomeMismatchError);
  });
});
