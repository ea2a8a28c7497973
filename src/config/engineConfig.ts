/**
 * Engine policy settings.
 *
 * Every value can be overridden from the environment:
 *   BENCHMARK_INVESTMENT_DATE    start date all entities are valued against (YYYY-MM-DD)
 *   BENCHMARK_FUZZY_THRESHOLD    minimum similarity (0..1] for a fuzzy name match
 *   BENCHMARK_MONTH_BUCKET       'latest' | 'earliest' valuation wins a month
 *   BENCHMARK_VOLATILITY_WINDOW  months in the rolling volatility window
 *   BENCHMARK_NOTIONAL           amount each benchmark is assumed to invest
 */

import { z } from 'zod';
import type { MonthBucketPolicy } from '../types';
import { ConfigurationError } from '../utils/errors';

export interface EngineConfig {
  investmentDate: string;
  fuzzyMatchThreshold: number;
  monthBucketPolicy: MonthBucketPolicy;
  volatilityWindow: number;
  benchmarkNotional: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  investmentDate: '2024-04-01',
  fuzzyMatchThreshold: 0.8,
  monthBucketPolicy: 'latest',
  volatilityWindow: 3,
  benchmarkNotional: 100_000,
};

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine(value => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)), 'Date must be a real calendar date');

const EngineConfigSchema = z.object({
  investmentDate: IsoDateSchema,
  fuzzyMatchThreshold: z.coerce.number().gt(0).max(1),
  monthBucketPolicy: z.enum(['latest', 'earliest']),
  volatilityWindow: z.coerce.number().int().min(2),
  benchmarkNotional: z.coerce.number().positive(),
});

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = EngineConfigSchema.safeParse({
    investmentDate: env.BENCHMARK_INVESTMENT_DATE ?? DEFAULT_ENGINE_CONFIG.investmentDate,
    fuzzyMatchThreshold: env.BENCHMARK_FUZZY_THRESHOLD ?? DEFAULT_ENGINE_CONFIG.fuzzyMatchThreshold,
    monthBucketPolicy: env.BENCHMARK_MONTH_BUCKET ?? DEFAULT_ENGINE_CONFIG.monthBucketPolicy,
    volatilityWindow: env.BENCHMARK_VOLATILITY_WINDOW ?? DEFAULT_ENGINE_CONFIG.volatilityWindow,
    benchmarkNotional: env.BENCHMARK_NOTIONAL ?? DEFAULT_ENGINE_CONFIG.benchmarkNotional,
  });

  if (!result.success) {
    throw ConfigurationError.fromZod('config', 'Invalid engine configuration', result.error);
  }
  return result.data;
}
