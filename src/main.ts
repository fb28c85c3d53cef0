/**
 * Command-line front end: parse flags, load sources, evolve, report.
 */

import { parseArgs } from 'node:util';
import { parseConfig } from './config.js';
import { FastenError, UsageError } from './errors.js';
import { countFasteners, createSeedIndividual } from './genome.js';
import { Orchestrator } from './orchestrator.js';
import { formatReport, saveResults } from './population.js';
import { loadSources } from './sources/loader.js';
import { terminateActiveCommands } from './commands/runner.js';

export const USAGE = `Usage:

\tfasten [<options>] <directories>

Required Parameters:

\t--build <command>
\t\tThe command that builds the source tree (e.g., 'make').

\t--fitness <command>
\t\tThe command that computes fitness (e.g. 'bin/run-benchmark').
\t\tIt must print a single number; lower is better.

\t--reset <command>
\t\tThe command that resets the source tree (e.g. 'git checkout .').

Optional Parameters:

\t--files <regex>
\t\tRegular expression matching file names to search (default '\\.(c|h)$').

\t--generations <count>
\t\tNumber of generations to run (default 20).

\t--help
\t\tPrint this help message.

\t--output <directory>
\t\tWrite report.txt and results.json to this directory.

\t--population <size>
\t\tSize of a population (default 20).

\t--timeout <milliseconds>
\t\tThe amount of time to wait for external processes before killing them (default 60000).
`;

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        build: { type: 'string' },
        files: { type: 'string' },
        fitness: { type: 'string' },
        generations: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
        output: { type: 'string' },
        population: { type: 'string' },
        reset: { type: 'string' },
        timeout: { type: 'string' },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Run the CLI and return its exit code
 */
export async function main(argv: string[]): Promise<number> {
  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals): void => {
    console.error(`\nReceived ${signal}, stopping.`);
    controller.abort();
    terminateActiveCommands();
  };
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  try {
    const { values, positionals } = parseCommandLine(argv);
    if (values.help) {
      console.log(USAGE);
      return 0;
    }

    const config = parseConfig({
      populationSize: toNumber(values.population),
      generations: toNumber(values.generations),
      timeoutMs: toNumber(values.timeout),
      filePattern: values.files,
      outputDir: values.output ?? null,
      directories: positionals,
      commands: { reset: values.reset, build: values.build, fitness: values.fitness },
    });

    console.log('Loading files.');
    const files = await loadSources(config.directories, {
      filePattern: new RegExp(config.filePattern),
    });
    if (countFasteners(files) === 0) {
      throw new UsageError(`No FASTENABLE annotations found in ${config.directories.join(', ')}`);
    }

    const orchestrator = new Orchestrator(createSeedIndividual(files), config, {
      signal: controller.signal,
    });
    orchestrator.setProgressCallback((result) => {
      console.log(
        `Generation ${result.generation}: ${result.measured}/${result.evaluated} measured | ` +
          `Best: ${result.bestFitness.toFixed(6)} (measurement ${result.bestMeasurement})`
      );
    });

    const result = await orchestrator.evolve();

    console.log(`\nFinished ${result.generations.length} generations in ${(result.totalTimeMs / 1000).toFixed(1)}s.\n`);
    console.log(formatReport(result.results));

    if (config.outputDir) {
      await saveResults(config.outputDir, result.results);
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      return 1;
    }
    if (error instanceof FastenError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', interrupt);
    process.removeListener('SIGTERM', interrupt);
  }
}
