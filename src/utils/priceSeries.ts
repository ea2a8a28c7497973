import { z } from 'zod';
import type { PricePoint } from '../types';
import { IsoDateSchema } from '../config/engineConfig';
import { ConfigurationError } from './errors';

/**
 * Source of historical closing prices.
 * Must answer with the last close at or before `date`, never a later one, and
 * `null` when there is none. Retrying a missing price is the provider's job.
 */
export interface PriceSeriesProvider {
  priceOnOrBefore(instrumentId: string, date: string): number | null;
}

interface DatedPrice {
  date: string;
  price: number;
}

const PricePointSchema = z.object({
  instrumentId: z.string().min(1),
  date: IsoDateSchema,
  price: z.number().positive().finite(),
});

// Binary search for the largest date <= targetDate
export function findPriceOnOrBefore(prices: DatedPrice[], targetDate: string): number | null {
  let left = 0;
  let right = prices.length - 1;
  let result: number | null = null;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    if (prices[mid].date <= targetDate) {
      result = prices[mid].price;
      left = mid + 1;
    } else {
      right = mid - 1;
    }
  }

  return result;
}

export class InMemoryPriceSeriesProvider implements PriceSeriesProvider {
  private readonly series = new Map<string, DatedPrice[]>();

  constructor(points: PricePoint[] = []) {
    this.addPoints(points);
  }

  addPoints(points: PricePoint[]): void {
    const touched = new Set<string>();
    for (const point of points) {
      const parsed = PricePointSchema.safeParse(point);
      if (!parsed.success) {
        throw ConfigurationError.fromZod(point.instrumentId || 'prices', 'Invalid price point', parsed.error);
      }
      const existing = this.series.get(parsed.data.instrumentId) ?? [];
      existing.push({ date: parsed.data.date, price: parsed.data.price });
      this.series.set(parsed.data.instrumentId, existing);
      touched.add(parsed.data.instrumentId);
    }

    // Stable sort: for duplicate dates the later point wins the lookup
    for (const instrumentId of touched) {
      this.series.get(instrumentId)?.sort((a, b) => a.date.localeCompare(b.date));
    }
  }

  priceOnOrBefore(instrumentId: string, date: string): number | null {
    const prices = this.series.get(instrumentId);
    if (!prices) return null;
    return findPriceOnOrBefore(prices, date);
  }

  instrumentIds(): string[] {
    return [...this.series.keys()].sort();
  }
}

export function createPriceProvider(histories: Record<string, PricePoint[]>): InMemoryPriceSeriesProvider {
  return new InMemoryPriceSeriesProvider(Object.values(histories).flat());
}
