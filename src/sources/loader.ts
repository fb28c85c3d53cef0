/**
 * Source Loader
 *
 * Walks the search roots and turns every matching file that carries
 * FASTENABLE annotations into a SourceFile. Traversal order is sorted so
 * repeated loads of an unchanged tree line up fastener for fastener.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { DirectoryNotFoundError, InvalidFastenerError, errorCode } from '../errors.js';
import { Fastener, SourceFile, Value } from '../types.js';
import { findAnnotation } from './annotations.js';

export interface LoadOptions {
  filePattern: RegExp;
  quiet?: boolean;
}

function readAnnotation(filePath: string, line: string, lineNumber: number): Value | null {
  try {
    return findAnnotation(line);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidFastenerError(filePath, lineNumber, error.message);
    }
    throw error;
  }
}

export function parseSourceFile(filePath: string, text: string): SourceFile | null {
  const lines = text.split('\n');
  const fasteners: Fastener[] = [];

  lines.forEach((line, index) => {
    const value = readAnnotation(filePath, line, index + 1);
    if (value) {
      fasteners.push({ path: filePath, line: index + 1, original: value, current: value });
    }
  });

  if (fasteners.length === 0) {
    return null;
  }
  return { path: filePath, lines, fasteners };
}

async function listFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

async function assertDirectory(directory: string): Promise<void> {
  try {
    const info = await stat(directory);
    if (!info.isDirectory()) {
      throw new DirectoryNotFoundError(directory);
    }
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new DirectoryNotFoundError(directory);
    }
    throw error;
  }
}

/**
 * Load every annotated file under the given directories
 */
export async function loadSources(
  directories: readonly string[],
  options: LoadOptions
): Promise<SourceFile[]> {
  const sources: SourceFile[] = [];

  for (const directory of directories) {
    await assertDirectory(directory);
    const files = (await listFiles(directory)).filter((file) => options.filePattern.test(file));

    for (const file of files) {
      const source = parseSourceFile(file, await readFile(file, 'utf-8'));
      if (source) {
        if (!options.quiet) {
          console.log(`File ${file} contains ${source.fasteners.length} fasteners.`);
        }
        sources.push(source);
      }
    }
  }

  return sources;
}
