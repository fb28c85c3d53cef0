/**
 * Core types for Fasten
 */

// Genome

export type Value =
  | { kind: 'integer'; value: bigint }
  | { kind: 'powerOfTwo'; value: bigint } // power of two whenever produced by mutation
  | { kind: 'boolean'; value: boolean };

export type ValueKind = Value['kind'];

export interface Fastener {
  path: string;
  line: number; // 1-based
  original: Value;
  current: Value;
}

export interface SourceFile {
  path: string;
  lines: readonly string[]; // file text split on '\n'
  fasteners: readonly Fastener[];
}

export type IndividualOrigin = 'seed' | 'mutation' | 'crossover';

export interface Individual {
  id: string;
  generation: number;
  parentIds: string[];
  origin: IndividualOrigin;
  files: readonly SourceFile[];
}

export type Population = Individual[];

/**
 * A measured individual. Fitness is higher-is-better: the reciprocal of
 * the number printed by the fitness command.
 */
export interface ExerciseResult {
  individual: Individual;
  fitness: number;
  measurement: number;
}

// Evaluation

export type ExerciseOutcome =
  | { status: 'measured'; result: ExerciseResult }
  | { status: 'build-failed'; individual: Individual; exitCode: number | null; stderr: string }
  | { status: 'build-timeout'; individual: Individual }
  | { status: 'fitness-failed'; individual: Individual; exitCode: number | null; stderr: string }
  | { status: 'fitness-timeout'; individual: Individual }
  | { status: 'invalid-fitness'; individual: Individual; output: string };

export type ExerciseStatus = ExerciseOutcome['status'];

export interface PopulationExercise {
  results: ExerciseResult[];
  outcomes: ExerciseOutcome[];
}

export interface CommandSet {
  reset: string;
  build: string;
  fitness: string;
}

export interface EvolutionConfig {
  // Population
  populationSize: number;
  generations: number;

  // External processes
  commands: CommandSet;
  timeoutMs: number;

  // Sources
  directories: string[];
  filePattern: string;

  // Output
  outputDir: string | null;
}

export type EvolutionPhase =
  | 'initialized'
  | 'evaluating'
  | 'selecting'
  | 'breeding'
  | 'terminal'
  | 'failed';

export interface EvolutionState {
  phase: EvolutionPhase;
  generation: number;
  generationsRemaining: number;
  population: Population;
  results: ExerciseResult[];
  startedAt: string;
}

export interface GenerationResult {
  generation: number;
  evaluated: number;
  measured: number;
  failures: Partial<Record<Exclude<ExerciseStatus, 'measured'>, number>>;
  bestFitness: number;
  meanFitness: number;
  bestMeasurement: number;
  bestIndividualId: string;
}

export interface EvolutionResult {
  generations: GenerationResult[];
  results: ExerciseResult[]; // final generation, best first
  champion: ExerciseResult | null;
  totalTimeMs: number;
}

// Default configuration
export const DEFAULT_CONFIG: EvolutionConfig = {
  populationSize: 20,
  generations: 20,
  commands: {
    reset: '',
    build: '',
    fitness: '',
  },
  timeoutMs: 60_000,
  directories: [],
  filePattern: '\\.(c|h)$',
  outputDir: null,
};
