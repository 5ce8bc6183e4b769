import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import {
  AnalysisSettings,
  STRICTNESS_MODES,
} from '../analysis/analysis.types';

/**
 * Environment schema, validated once at start-up by ConfigModule.
 * Numeric values arrive as strings and are coerced.
 */
export const EnvironmentSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  // SQLite file; PostgreSQL is used when unset
  DB_FILE: z.string().min(1).optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_DATABASE: z.string().default('inverters'),
  DB_SYNCHRONIZE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  ANALYSIS_CEILING_WATTS: z.coerce.number().int().positive().default(349),
  ANALYSIS_CADENCE_SECONDS: z.coerce.number().int().positive().default(331),
  ANALYSIS_LOW_CUTOFF_WATTS: z.coerce.number().int().min(0).default(75),
  ANALYSIS_CLOUD_THRESHOLD_WATTS: z.coerce.number().min(0).default(5),
  ANALYSIS_MIN_SAMPLES: z.coerce.number().int().min(0).default(50),
  ANALYSIS_MIN_FIT_SAMPLES: z.coerce.number().int().min(0).default(50),
  ANALYSIS_MAX_STARTUP_WATTS: z.coerce.number().int().min(0).default(20),
  ANALYSIS_MAX_SHUTDOWN_WATTS: z.coerce.number().int().min(0).default(0),
  ANALYSIS_STRICTNESS: z.enum(STRICTNESS_MODES).default('gated'),

  TELEMETRY_PAGE_SIZE: z.coerce.number().int().positive().default(1000),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * ConfigModule `validate` hook.
 *
 * @throws Error listing every invalid key
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Environment {
  const parsed = EnvironmentSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Analysis tunables from validated configuration.
 */
export function analysisSettingsFromConfig(
  config: ConfigService<Environment, true>,
): AnalysisSettings {
  return {
    ceilingWatts: config.get('ANALYSIS_CEILING_WATTS', { infer: true }),
    cadenceSeconds: config.get('ANALYSIS_CADENCE_SECONDS', { infer: true }),
    lowCutoffWatts: config.get('ANALYSIS_LOW_CUTOFF_WATTS', { infer: true }),
    cloudThresholdWatts: config.get('ANALYSIS_CLOUD_THRESHOLD_WATTS', {
      infer: true,
    }),
    minSamples: config.get('ANALYSIS_MIN_SAMPLES', { infer: true }),
    minFitSamples: config.get('ANALYSIS_MIN_FIT_SAMPLES', { infer: true }),
    maxStartupWatts: config.get('ANALYSIS_MAX_STARTUP_WATTS', { infer: true }),
    maxShutdownWatts: config.get('ANALYSIS_MAX_SHUTDOWN_WATTS', {
      infer: true,
    }),
    strictness: config.get('ANALYSIS_STRICTNESS', { infer: true }),
  };
}
