/**
 * Benchmarks every investor is compared against.
 *
 * The index is a single constituent at full weight, so it is valued through
 * the same holdings pipeline as the managed funds. Fund constituents come from
 * the weightage file and are attached at run time.
 */

import type { BenchmarkDefinition, WeightEntry } from '../types';

export const MARKET_INDEX_ID = 'NIFTY 50';
export const MULTI_CAP_FUND_ID = 'Multi Cap Fund';
export const MID_SMALL_CAP_FUND_ID = 'Mid & Small Cap Fund';

export const marketIndexBenchmark: BenchmarkDefinition = {
  id: MARKET_INDEX_ID,
  kind: 'index',
  weights: [{ securityName: 'NIFTY 50', weight: 1 }],
};

/**
 * Build the default benchmark set from parsed fund weights.
 * Funds missing from `fundWeights` get an empty weight list and fail
 * construction on their own without affecting the others.
 */
export function buildDefaultBenchmarks(fundWeights: Record<string, WeightEntry[]>): BenchmarkDefinition[] {
  return [
    marketIndexBenchmark,
    { id: MULTI_CAP_FUND_ID, kind: 'fund', weights: fundWeights[MULTI_CAP_FUND_ID] ?? [] },
    { id: MID_SMALL_CAP_FUND_ID, kind: 'fund', weights: fundWeights[MID_SMALL_CAP_FUND_ID] ?? [] },
  ];
}
