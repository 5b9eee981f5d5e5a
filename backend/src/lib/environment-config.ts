/**
 * Analyzer Configuration
 *
 * Environment variables provide defaults, command-line flags override them,
 * and the merged result is validated once with zod before anything runs.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/gateway.js';
import { DEFAULT_CONCURRENCY } from './gateway-analysis/gateway-analyzer.js';
import { MAX_CHUNK_DAYS, PERIOD_SECONDS } from './gateway-analysis/metric-catalog.js';

export const awsRegionSchema = z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d$/, 'Invalid AWS region format');

export const analyzerConfigSchema = z.object({
  region: awsRegionSchema,
  profile: z.string().min(1).optional(),
  lookbackDays: z.coerce.number().int().min(1).max(455).default(90),
  concurrency: z.coerce.number().int().min(1).max(32).default(DEFAULT_CONCURRENCY),
  output: z.string().min(1).optional(),
  logLevel: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'CRITICAL']).default('INFO'),
});

export type AnalyzerConfig = z.infer<typeof analyzerConfigSchema> & {
  periodSeconds: number;
  maxChunkDays: number;
};

export type ConfigOverrides = Partial<Record<keyof z.input<typeof analyzerConfigSchema>, string | number | undefined>>;

function fromEnvironment(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    region: env.AWS_REGION ?? env.AWS_DEFAULT_REGION,
    profile: env.AWS_PROFILE,
    lookbackDays: env.IDLE_GW_LOOKBACK_DAYS,
    concurrency: env.IDLE_GW_CONCURRENCY,
    logLevel: env.LOG_LEVEL?.toUpperCase(),
  };
}

function dropUndefined(values: ConfigOverrides): ConfigOverrides {
  return Object.fromEntries(Object.entries(values).filter(([_, v]) => v !== undefined && v !== ''));
}

/**
 * Merge environment and overrides, then validate.
 * Period length and chunk size are fixed by CloudWatch and not configurable.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  const merged = { ...dropUndefined(fromEnvironment(env)), ...dropUndefined(overrides) };
  const result = analyzerConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return {
    ...result.data,
    periodSeconds: PERIOD_SECONDS,
    maxChunkDays: MAX_CHUNK_DAYS,
  };
}
