/**
 * QKD Telemetry - CLI Options
 *
 * zod schemas for the raw commander option bags and their mapping onto
 * run configuration. Numeric options accept plain or exponent notation
 * ("1e12").
 */

import { z } from 'zod';
import { HarnessErrorCode } from '../types/errors';
import { DEFAULT_SIMULATION_CONFIG, SimulationConfig } from '../types/scenario';
import { FaultTypeSchema } from '../dataset/schema';
import { ConfigurationError } from '../utils/errors';

const positivePs = z.coerce.number().int().positive();

const SimulationOptionsSchema = z.object({
  duration: positivePs.optional(),
  faultStart: z.coerce.number().int().nonnegative().optional(),
  sampleInterval: positivePs.optional(),
  seed: z.coerce.number().int().optional(),
  degradeMode: z.enum(['step', 'build']).optional(),
});

export const SimulateOptionsSchema = SimulationOptionsSchema.extend({
  fault: FaultTypeSchema,
  output: z.string().min(1).optional(),
});

export const RunAllOptionsSchema = SimulationOptionsSchema.extend({
  dataDir: z.string().min(1),
});

export const ConsolidateOptionsSchema = z.object({
  dataDir: z.string().min(1),
  output: z.string().min(1).optional(),
});

export type SimulateOptions = z.infer<typeof SimulateOptionsSchema>;
export type RunAllOptions = z.infer<typeof RunAllOptionsSchema>;
export type ConsolidateOptions = z.infer<typeof ConsolidateOptionsSchema>;

/**
 * Validate an option bag, raising INVALID_PARAMETER with every issue
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `--${toFlag(issue.path.join('.'))}: ${issue.message}`);
    throw new ConfigurationError({
      code: HarnessErrorCode.INVALID_PARAMETER,
      message: `Invalid options: ${issues.join('; ')}`,
      details: { issues },
    });
  }
  return parsed.data;
}

/** camelCase option key -> kebab-case flag */
function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, c => `-${c.toLowerCase()}`);
}

/**
 * Overrides of the default run configuration. The fault starts halfway
 * through the run unless given.
 */
export function toSimulationConfig(
  options: z.infer<typeof SimulationOptionsSchema>
): Partial<SimulationConfig> {
  const duration = options.duration ?? DEFAULT_SIMULATION_CONFIG.duration;
  const config: Partial<SimulationConfig> = {
    duration,
    faultStart: options.faultStart ?? Math.floor(duration / 2),
  };
  if (options.sampleInterval !== undefined) config.sampleInterval = options.sampleInterval;
  if (options.seed !== undefined) config.seed = options.seed;
  if (options.degradeMode !== undefined) config.degradeMode = options.degradeMode;
  return config;
}
