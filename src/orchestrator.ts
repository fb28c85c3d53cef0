/**
 * Evolution Orchestrator
 *
 * Controls the evolutionary loop:
 * 1. Build the initial population from single-step mutants of the seed
 * 2. For each generation:
 *    a. Evaluate every individual (evaluating)
 *    b. Rank the measured individuals (selecting)
 *    c. Keep the fittest half, mutate it and refill the rest by crossover (breeding)
 * 3. After the last evaluation, return the ranked results (terminal)
 */

import {
  EvolutionConfig,
  EvolutionPhase,
  EvolutionResult,
  EvolutionState,
  ExerciseOutcome,
  ExerciseResult,
  GenerationResult,
  Individual,
  Population,
  DEFAULT_CONFIG,
} from './types.js';
import { EmptyGenerationError } from './errors.js';
import { Evaluator } from './evaluator.js';
import { CommandRunner } from './commands/runner.js';
import { createInitialPopulation, rankResults, selectFittest } from './population.js';
import { mutateIndividual } from './mutations/operators.js';
import { breed, selectByFitness } from './mutations/crossover.js';
import { createSeedIndividual } from './genome.js';
import { loadSources } from './sources/loader.js';
import { RandomSource, defaultRandom } from './random.js';

export interface OrchestratorOptions {
  rng?: RandomSource;
  runner?: CommandRunner;
  writer?: (individual: Individual) => Promise<void>;
  signal?: AbortSignal;
  cwd?: string;
  quiet?: boolean;
}

const TRANSITIONS: Record<EvolutionPhase, EvolutionPhase[]> = {
  initialized: ['evaluating', 'failed'],
  evaluating: ['selecting', 'failed'],
  selecting: ['breeding', 'terminal', 'failed'],
  breeding: ['evaluating', 'failed'],
  terminal: [],
  failed: [],
};

/**
 * Next population: one mutant per fittest individual, then crossover
 * children of roulette-selected parents until the population is full.
 */
export function nextPopulation(
  rng: RandomSource,
  fittest: readonly ExerciseResult[],
  size: number,
  generation: number
): Population {
  const mutants = fittest
    .slice(0, size)
    .map((result) => mutateIndividual(rng, result.individual, generation));

  const children: Individual[] = [];
  while (mutants.length + children.length < size) {
    const a = selectByFitness(rng, fittest).individual;
    const b = selectByFitness(rng, fittest).individual;
    children.push(breed(rng, a, b, generation));
  }

  return [...mutants, ...children];
}

export function summarizeGeneration(
  generation: number,
  outcomes: readonly ExerciseOutcome[],
  ranked: readonly ExerciseResult[]
): GenerationResult {
  const failures: GenerationResult['failures'] = {};
  for (const outcome of outcomes) {
    if (outcome.status !== 'measured') {
      failures[outcome.status] = (failures[outcome.status] ?? 0) + 1;
    }
  }

  const best = ranked[0];
  const meanFitness =
    ranked.length > 0 ? ranked.reduce((sum, r) => sum + r.fitness, 0) / ranked.length : 0;

  return {
    generation,
    evaluated: outcomes.length,
    measured: ranked.length,
    failures,
    bestFitness: best?.fitness ?? 0,
    meanFitness,
    bestMeasurement: best?.measurement ?? 0,
    bestIndividualId: best?.individual.id ?? '',
  };
}

export class Orchestrator {
  private config: EvolutionConfig;
  private seed: Individual;
  private rng: RandomSource;
  private evaluator: Evaluator;
  private state: EvolutionState;
  private quiet: boolean;
  private onProgress: ((result: GenerationResult) => void) | null = null;

  constructor(seed: Individual, config: Partial<EvolutionConfig> = {}, options: OrchestratorOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.seed = seed;
    this.rng = options.rng ?? defaultRandom;
    this.quiet = options.quiet ?? false;
    this.evaluator = new Evaluator({
      commands: this.config.commands,
      timeoutMs: this.config.timeoutMs,
      cwd: options.cwd,
      signal: options.signal,
      runner: options.runner,
      writer: options.writer,
      quiet: options.quiet,
    });

    this.state = {
      phase: 'initialized',
      generation: 0,
      generationsRemaining: this.config.generations,
      population: [],
      results: [],
      startedAt: new Date().toISOString(),
    };
  }

  /**
   * Set progress callback for per-generation updates
   */
  setProgressCallback(callback: (result: GenerationResult) => void): void {
    this.onProgress = callback;
  }

  /**
   * Run the full evolution loop
   */
  async evolve(): Promise<EvolutionResult> {
    if (this.state.phase !== 'initialized') {
      throw new Error(`Cannot evolve from phase '${this.state.phase}'`);
    }

    const startTime = Date.now();
    const generationResults: GenerationResult[] = [];

    try {
      this.log('Computing initial population.');
      this.state.generation = 1;
      this.state.population = createInitialPopulation(
        this.rng,
        this.seed,
        this.config.populationSize
      );

      for (;;) {
        this.transition('evaluating');
        this.log(`\n--- Generation ${this.state.generation} ---`);
        this.log(`${this.state.generationsRemaining} generations remain.`);
        const { results, outcomes } = await this.evaluator.exercisePopulation(
          this.state.population
        );
        if (results.length === 0) {
          throw new EmptyGenerationError(this.state.generation, outcomes.length);
        }
        this.state.generationsRemaining--;

        this.transition('selecting');
        const ranked = rankResults(results);
        this.state.results = ranked;

        const summary = summarizeGeneration(this.state.generation, outcomes, ranked);
        generationResults.push(summary);
        this.onProgress?.(summary);

        if (this.state.generationsRemaining <= 0) {
          this.transition('terminal');
          break;
        }

        this.transition('breeding');
        const fittest = selectFittest(ranked);
        this.state.generation++;
        this.state.population = nextPopulation(
          this.rng,
          fittest,
          this.config.populationSize,
          this.state.generation
        );
      }

      return {
        generations: generationResults,
        results: this.state.results,
        champion: this.state.results[0] ?? null,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      this.state.phase = 'failed';
      throw error;
    }
  }

  /**
   * Get current state for inspection
   */
  getState(): EvolutionState {
    return { ...this.state };
  }

  private transition(next: EvolutionPhase): void {
    if (!TRANSITIONS[this.state.phase].includes(next)) {
      throw new Error(`Invalid phase transition: ${this.state.phase} -> ${next}`);
    }
    this.state.phase = next;
  }

  private log(message: string): void {
    if (!this.quiet) {
      console.log(message);
    }
  }
}

/**
 * Factory function to create an orchestrator from source directories
 */
export async function createFromDirectories(
  config: Partial<EvolutionConfig> & Pick<EvolutionConfig, 'directories' | 'commands'>,
  options: OrchestratorOptions = {}
): Promise<Orchestrator> {
  const filePattern = new RegExp(config.filePattern ?? DEFAULT_CONFIG.filePattern);
  const files = await loadSources(config.directories, { filePattern, quiet: options.quiet });
  return new Orchestrator(createSeedIndividual(files), config, options);
}
