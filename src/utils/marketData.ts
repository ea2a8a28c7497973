import YahooFinance from 'yahoo-finance2';
import type { PricePoint } from '../types';
import { addDays } from './dates';
import { getErrorMessage } from './errors';
import { logger, perf } from './logger';

const yahooFinance = new YahooFinance();
const historyCache: Record<string, PricePoint[]> = {};

/**
 * Daily closes for one instrument between two dates, inclusive.
 * Closes are split-adjusted but not dividend-adjusted.
 */
export async function fetchInstrumentHistory(
  instrumentId: string,
  startDate: string,
  endDate: string
): Promise<PricePoint[]> {
  const cacheKey = `${instrumentId}-${startDate}-${endDate}`;
  const cached = historyCache[cacheKey];
  if (cached) {
    return cached;
  }

  const result = await perf.measure(`fetch:${instrumentId}`, () =>
    yahooFinance.chart(instrumentId, {
      period1: startDate,
      // period2 is exclusive
      period2: addDays(endDate, 1),
      interval: '1d',
    })
  );

  const prices = result.quotes
    .map((quote) => ({
      instrumentId,
      date: quote.date.toISOString().split('T')[0],
      price: Math.round((quote.close ?? 0) * 100) / 100,
    }))
    .filter((p) => p.price > 0);

  logger.debug(`Loaded ${prices.length} closes for ${instrumentId}`);
  historyCache[cacheKey] = prices;
  return prices;
}

/**
 * Fetch several instruments in parallel. A failed instrument is logged and
 * comes back as an empty history, which the engine later reports as a price gap.
 */
export async function fetchPriceHistory(
  instrumentIds: string[],
  startDate: string,
  endDate: string
): Promise<Record<string, PricePoint[]>> {
  const uniqueIds = [...new Set(instrumentIds)].sort();
  const histories: Record<string, PricePoint[]> = {};

  const results = await Promise.allSettled(
    uniqueIds.map((instrumentId) => fetchInstrumentHistory(instrumentId, startDate, endDate))
  );

  for (let i = 0; i < uniqueIds.length; i++) {
    const result = results[i];
    if (result.status === 'fulfilled') {
      histories[uniqueIds[i]] = result.value;
    } else {
      logger.error(`Failed to fetch ${uniqueIds[i]}: ${getErrorMessage(result.reason)}`);
      histories[uniqueIds[i]] = [];
    }
  }

  return histories;
}
