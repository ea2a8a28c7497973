import type { BenchmarkDefinition } from '../types';
import { buildDefaultBenchmarks } from '../config/benchmarks';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engineConfig';
import { getDefaultRegistry } from '../config/instrumentRegistry';
import { runComparison, type ComparisonResult } from './analysis';
import { parseHoldingsCSV, parseWeightsCSV, type SkippedRow, type WeightsParseResult } from './csvParser';
import { addDays, todayIsoDate } from './dates';
import { fetchPriceHistory } from './marketData';
import { perf } from './logger';
import { createPriceProvider } from './priceSeries';
import { TickerResolver } from './tickerResolver';

// Calendar days fetched before the start date so a holiday start still finds a close
const PRICE_LOOKBACK_DAYS = 10;

export interface LoadComparisonOptions {
  holdingsCsv: string;
  weightsCsv?: string;
  benchmarks?: BenchmarkDefinition[];
  endDate?: string;
  config?: EngineConfig;
}

export interface LoadedComparison extends ComparisonResult {
  skippedRows: { holdings: SkippedRow[]; weights: SkippedRow[] };
  resolverGaps: ReturnType<TickerResolver['getGapLog']>;
}

/**
 * Parse the input files, fetch prices for every instrument they resolve to and
 * run the comparison.
 */
export async function loadComparison(options: LoadComparisonOptions): Promise<LoadedComparison> {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const endDate = options.endDate ?? todayIsoDate();

  return perf.measure('loadComparison:total', async () => {
    const { holdings, skippedRows: skippedHoldings } = parseHoldingsCSV(options.holdingsCsv);
    const weights: WeightsParseResult = options.weightsCsv ? parseWeightsCSV(options.weightsCsv) : { portfolios: {}, skippedRows: [] };
    const benchmarks = options.benchmarks ?? buildDefaultBenchmarks(weights.portfolios);

    const resolver = new TickerResolver(getDefaultRegistry(), { fuzzyMatchThreshold: config.fuzzyMatchThreshold });

    const securityNames = new Set<string>();
    for (const holding of holdings) securityNames.add(holding.securityName);
    for (const benchmark of benchmarks) {
      for (const entry of benchmark.weights) securityNames.add(entry.securityName);
    }

    const instrumentIds = new Set<string>();
    for (const name of securityNames) {
      const resolved = resolver.resolve(name);
      if (resolved.resolutionConfidence !== 'unresolved') {
        instrumentIds.add(resolved.instrumentId);
      }
    }

    const histories = await perf.measure('loadComparison:fetchPrices', () =>
      fetchPriceHistory([...instrumentIds], addDays(config.investmentDate, -PRICE_LOOKBACK_DAYS), endDate)
    );

    const result = runComparison({
      investors: holdings,
      benchmarks,
      endDate,
      resolver,
      prices: createPriceProvider(histories),
      config,
    });

    return {
      ...result,
      skippedRows: { holdings: skippedHoldings, weights: weights.skippedRows },
      resolverGaps: resolver.getGapLog(),
    };
  });
}
