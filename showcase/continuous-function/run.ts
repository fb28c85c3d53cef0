#!/usr/bin/env npx tsx
/**
 * Continuous Function Showcase
 *
 * Tunes three annotated constants of a toy benchmark.
 * Run with: npx tsx showcase/continuous-function/run.ts
 */

import { cp, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createFromDirectories } from '../../src/orchestrator.js';
import { formatReport } from '../../src/population.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

async function main() {
  console.log('╔════════════════════════════════════════════════════════════╗');
  console.log('║            Fasten Continuous Function Showcase             ║');
  console.log('╚════════════════════════════════════════════════════════════╝\n');

  const root = await mkdtemp(join(tmpdir(), 'fasten-showcase-'));
  const pristine = join(root, 'pristine');
  const work = join(root, 'work');
  await cp(join(__dirname, 'target'), pristine, { recursive: true });
  await cp(pristine, work, { recursive: true });

  const node = `"${process.execPath}"`;
  const target = `"${join(work, 'target.mjs')}"`;

  try {
    const orchestrator = await createFromDirectories(
      {
        directories: [work],
        filePattern: '\\.mjs$',
        populationSize: 8,
        generations: 5,
        timeoutMs: 10_000,
        commands: {
          reset: `${node} "${join(__dirname, 'reset.mjs')}" "${pristine}" "${work}"`,
          build: `${node} --check ${target}`,
          fitness: `${node} ${target}`,
        },
      },
      { quiet: true }
    );

    orchestrator.setProgressCallback((result) => {
      console.log(
        `Generation ${result.generation}: ` +
          `${result.measured}/${result.evaluated} measured | ` +
          `Best measurement: ${result.bestMeasurement}`
      );
    });

    const result = await orchestrator.evolve();

    console.log(`\nTime elapsed: ${(result.totalTimeMs / 1000).toFixed(1)}s\n`);
    console.log(formatReport(result.results.slice(0, 3)));
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
