/**
 * Fasten
 *
 * Evolutionary tuning of the numeric constants a source tree marks as
 * FASTENABLE: mutate, build, measure, keep the fittest, repeat.
 */

export { Orchestrator, createFromDirectories, nextPopulation, summarizeGeneration } from './orchestrator.js';
export type { OrchestratorOptions } from './orchestrator.js';
export { Evaluator, parseMeasurement, MeasurementSchema } from './evaluator.js';
export type { EvaluatorOptions } from './evaluator.js';
export {
  createInitialPopulation,
  rankResults,
  selectFittest,
  formatReport,
  saveResults,
} from './population.js';
export {
  applyStep,
  mutateValue,
  mutateFastener,
  mutateFile,
  mutateIndividual,
} from './mutations/operators.js';
export { breed, crossFiles, selectByFitness } from './mutations/crossover.js';
export {
  runCommand,
  splitCommandLine,
  killChild,
  terminateActiveCommands,
  activeCommandCount,
  describeFailure,
} from './commands/runner.js';
export type { CommandFailure, CommandResult, CommandRunner, RunOptions } from './commands/runner.js';
export { loadSources, parseSourceFile } from './sources/loader.js';
export type { LoadOptions } from './sources/loader.js';
export { renderSourceFile, writeIndividual, patchLine } from './sources/patcher.js';
export { FASTENABLE_PATTERN, findAnnotation, makeValue } from './sources/annotations.js';
export {
  renderValue,
  valuesEqual,
  isPowerOfTwo,
  describeFastener,
  describeIndividual,
  countFasteners,
  createSeedIndividual,
} from './genome.js';
export { parseConfig, EvolutionConfigSchema } from './config.js';
export type { EvolutionConfigInput } from './config.js';
export { defaultRandom, randomIndex, randomStep } from './random.js';
export type { RandomSource, RandomStep } from './random.js';
export * from './errors.js';
export * from './types.js';

// Default export for convenience
import { Orchestrator } from './orchestrator.js';
export default Orchestrator;
