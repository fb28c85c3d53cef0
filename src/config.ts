/**
 * Run configuration, validated with zod.
 */

import { z } from 'zod';
import { UsageError } from './errors.js';
import { DEFAULT_CONFIG, EvolutionConfig } from './types.js';

const commandLine = (name: string) =>
  z
    .string({ required_error: `--${name} <command> is required` })
    .trim()
    .min(1, `--${name} <command> is required`);

export const EvolutionConfigSchema = z.object({
  populationSize: z
    .number()
    .int()
    .min(2, 'population must be at least 2')
    .default(DEFAULT_CONFIG.populationSize),
  generations: z
    .number()
    .int()
    .positive('generations must be positive')
    .default(DEFAULT_CONFIG.generations),
  timeoutMs: z.number().int().positive('timeout must be positive').default(DEFAULT_CONFIG.timeoutMs),
  commands: z.object({
    reset: commandLine('reset'),
    build: commandLine('build'),
    fitness: commandLine('fitness'),
  }),
  directories: z
    .array(z.string().min(1), { required_error: 'at least one directory is required' })
    .min(1, 'at least one directory is required'),
  filePattern: z
    .string()
    .refine(isValidPattern, 'file pattern is not a valid regular expression')
    .default(DEFAULT_CONFIG.filePattern),
  outputDir: z.string().min(1).nullable().default(DEFAULT_CONFIG.outputDir),
});

export type EvolutionConfigInput = Partial<Omit<EvolutionConfig, 'commands'>> & {
  commands?: Partial<EvolutionConfig['commands']>;
};

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate input, filling unset fields from the defaults. Throws
 * UsageError listing every problem found.
 */
export function parseConfig(input: EvolutionConfigInput): EvolutionConfig {
  const parsed = EvolutionConfigSchema.safeParse({ ...input, commands: { ...input.commands } });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message);
    throw new UsageError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  return parsed.data;
}
