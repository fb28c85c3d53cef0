/**
 * Fitness Evaluator
 *
 * Drives each individual through the operator's commands:
 * - Resets the working tree
 * - Writes the individual's fastener values into its files
 * - Builds the tree
 * - Runs the fitness command and parses the number it prints
 *
 * Individuals share one working tree, so they are exercised one at a time.
 */

import { z } from 'zod';
import {
  CommandSet,
  ExerciseOutcome,
  Individual,
  Population,
  PopulationExercise,
} from './types.js';
import { CommandFailedError, CommandLaunchError, RunAbortedError } from './errors.js';
import { CommandResult, CommandRunner, describeFailure, runCommand } from './commands/runner.js';
import { writeIndividual } from './sources/patcher.js';

export interface EvaluatorOptions {
  commands: CommandSet;
  timeoutMs: number;
  cwd?: string;
  signal?: AbortSignal;
  runner?: CommandRunner;
  writer?: (individual: Individual) => Promise<void>;
  quiet?: boolean;
}

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Fitness command output: exactly one positive, finite number
 */
export const MeasurementSchema = z
  .string()
  .trim()
  .regex(FLOAT_PATTERN, 'not a number')
  .transform(Number)
  .pipe(z.number().finite().positive());

/**
 * Parse a measurement, or null when the output is unusable
 */
export function parseMeasurement(output: string): number | null {
  const parsed = MeasurementSchema.safeParse(output);
  return parsed.success ? parsed.data : null;
}

export class Evaluator {
  private options: EvaluatorOptions;
  private runner: CommandRunner;
  private writer: (individual: Individual) => Promise<void>;

  constructor(options: EvaluatorOptions) {
    this.options = options;
    this.runner = options.runner ?? runCommand;
    this.writer = options.writer ?? writeIndividual;
  }

  /**
   * Exercise a whole population, keeping only the measured individuals
   */
  async exercisePopulation(population: Population): Promise<PopulationExercise> {
    this.log('Exercising population.');
    const outcomes: ExerciseOutcome[] = [];

    for (const individual of population) {
      outcomes.push(await this.exercise(individual));
    }

    const results = outcomes.flatMap((outcome) =>
      outcome.status === 'measured' ? [outcome.result] : []
    );
    return { results, outcomes };
  }

  /**
   * Reset, patch, build and measure one individual
   */
  async exercise(individual: Individual): Promise<ExerciseOutcome> {
    const { commands } = this.options;

    this.log('Resetting tree.');
    const reset = await this.run(commands.reset);
    if (!reset.ok) {
      // The tree is in an unknown state; nothing after this can be trusted
      throw new CommandFailedError(commands.reset, this.failureDetail(reset));
    }

    this.log(`Writing individual ${individual.id}.`);
    await this.writer(individual);

    this.log('Building.');
    const build = await this.run(commands.build);
    if (!build.ok) {
      console.warn(`Build failed for ${individual.id}: ${describeFailure(build.failure)}`);
      if (build.failure.kind === 'timeout') {
        return { status: 'build-timeout', individual };
      }
      return {
        status: 'build-failed',
        individual,
        exitCode: build.failure.kind === 'exit' ? build.failure.exitCode : null,
        stderr: build.stderr,
      };
    }

    this.log('Testing fitness.');
    const fitness = await this.run(commands.fitness);
    if (!fitness.ok) {
      console.warn(`Individual ${individual.id} died during exercise: ${describeFailure(fitness.failure)}`);
      if (fitness.failure.kind === 'timeout') {
        return { status: 'fitness-timeout', individual };
      }
      return {
        status: 'fitness-failed',
        individual,
        exitCode: fitness.failure.kind === 'exit' ? fitness.failure.exitCode : null,
        stderr: fitness.stderr,
      };
    }

    const measurement = parseMeasurement(fitness.stdout);
    if (measurement === null) {
      console.warn(`Individual ${individual.id} produced an invalid fitness result: '${fitness.stdout.trim()}'`);
      return { status: 'invalid-fitness', individual, output: fitness.stdout };
    }

    const score = 1 / measurement;
    this.log(`Calculated fitness: ${score.toFixed(6)}.`);
    return { status: 'measured', result: { individual, fitness: score, measurement } };
  }

  /**
   * Run one command, turning launch failures and aborts into errors.
   * Non-zero exits and timeouts are returned for the caller to judge.
   */
  private async run(command: string): Promise<CommandResult> {
    const result = await this.runner(command, {
      timeoutMs: this.options.timeoutMs,
      cwd: this.options.cwd,
      signal: this.options.signal,
    });
    if (!result.ok) {
      if (result.failure.kind === 'launch') {
        throw new CommandLaunchError(command, result.failure.error);
      }
      if (result.failure.kind === 'aborted') {
        throw new RunAbortedError(command);
      }
    }
    return result;
  }

  private failureDetail(result: CommandResult): string {
    if (result.ok) {
      return '';
    }
    const stderr = result.stderr.trim();
    return stderr ? `${describeFailure(result.failure)}\n${stderr}` : describeFailure(result.failure);
  }

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(message);
    }
  }
}
