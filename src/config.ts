/**
 * Controller configuration
 *
 * Partial overrides are merged over DEFAULT_CONFIG and validated as a whole,
 * so a bad value fails at construction rather than mid-run.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { ControllerConfig, DEFAULT_CONFIG } from './types.js';

const positiveInt = z.number().int().positive();
const fraction = z.number().min(0).max(1);
const percent = z.number().gt(0).max(100);

const controllerConfigSchema = z
  .object({
    populationSize: positiveInt,
    selectionTopK: positiveInt,
    mutationRate: fraction,
    diversityRate: fraction,
    crossoverBias: fraction,
    driftCheckFreq: positiveInt,
    driftSignificance: z.number().gt(0).lt(1),
    degradationThreshold: z.number().nonnegative(),
    retrainingFreq: positiveInt,
    baselineResetPolicy: z.enum(['never', 'on-reinitialize']),
    trainCandidates: z.boolean(),
    batchSize: positiveInt,
    cpuThreshold: percent,
    memoryThreshold: percent,
    samplingWindowMs: z.number().int().nonnegative(),
  })
  .strict()
  .refine((config) => config.selectionTopK <= config.populationSize, {
    message: 'selectionTopK must not exceed populationSize',
    path: ['selectionTopK'],
  });

/**
 * Merge overrides over the defaults and validate the result
 */
export function resolveConfig(overrides: Partial<ControllerConfig> = {}): ControllerConfig {
  return parseConfig({ ...DEFAULT_CONFIG, ...overrides });
}

/**
 * Validate an already complete config object
 */
export function parseConfig(input: unknown): ControllerConfig {
  const result = controllerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const field = issue.path.join('.');
        return field ? `${field}: ${issue.message}` : issue.message;
      })
    );
  }
  return result.data;
}

/**
 * Load overrides from a JSON file
 */
export async function loadConfigFile(filePath: string): Promise<ControllerConfig> {
  const content = await readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError([`${filePath}: ${errorMessage(error)}`]);
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError([`${filePath}: expected a JSON object`]);
  }
  return parseConfig({ ...DEFAULT_CONFIG, ...raw });
}
