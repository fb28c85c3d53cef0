/**
 * Writes an individual's fastener values back into its files.
 */

import { writeFile } from 'node:fs/promises';
import { renderValue } from '../genome.js';
import { Fastener, Individual, SourceFile } from '../types.js';
import { FASTENABLE_PATTERN } from './annotations.js';

export function patchLine(line: string, fastener: Fastener): string {
  return line.replace(FASTENABLE_PATTERN, renderValue(fastener.current));
}

/**
 * Full text of a file with every fastener's current value spliced in
 */
export function renderSourceFile(file: SourceFile): string {
  const byLine = new Map<number, Fastener>();
  for (const fastener of file.fasteners) {
    byLine.set(fastener.line, fastener);
  }
  return file.lines
    .map((line, index) => {
      const fastener = byLine.get(index + 1);
      return fastener ? patchLine(line, fastener) : line;
    })
    .join('\n');
}

export async function writeIndividual(individual: Individual): Promise<void> {
  for (const file of individual.files) {
    await writeFile(file.path, renderSourceFile(file), 'utf-8');
  }
}
