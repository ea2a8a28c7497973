import { z } from 'zod';
import type { ExcludedConstituent, Holding, Valuation, ValuationGap, WeightEntry } from '../types';
import { IsoDateSchema } from '../config/engineConfig';
import { ConfigurationError } from './errors';
import type { PriceSeriesProvider } from './priceSeries';
import type { TickerResolver } from './tickerResolver';

export interface ValuationContext {
  resolver: TickerResolver;
  prices: PriceSeriesProvider;
}

const HoldingSchema = z.object({
  investorId: z.string().trim().min(1, 'Investor id is required'),
  securityName: z.string().trim().min(1, 'Security name is required'),
  quantity: z.number().finite('Quantity must be a finite number').nonnegative('Quantity must be non-negative'),
});

const WeightEntrySchema = z.object({
  securityName: z.string().trim().min(1, 'Security name is required'),
  weight: z.number().finite('Weight must be a finite number').nonnegative('Weight must be non-negative'),
});

function validateHoldings(holdings: Holding[]): string {
  const entityId = holdings[0]?.investorId || 'unknown';
  if (holdings.length === 0) {
    throw new ConfigurationError(entityId, 'No holdings provided');
  }

  const result = z.array(HoldingSchema).safeParse(holdings);
  if (!result.success) {
    throw ConfigurationError.fromZod(entityId, 'Invalid holdings', result.error);
  }

  const otherInvestor = holdings.find(h => h.investorId !== entityId);
  if (otherInvestor) {
    throw new ConfigurationError(entityId, `Holdings mix investors ${entityId} and ${otherInvestor.investorId}`);
  }

  return entityId;
}

function validateDate(entityId: string, date: string): void {
  const result = IsoDateSchema.safeParse(date);
  if (!result.success) {
    throw ConfigurationError.fromZod(entityId, `Invalid valuation date "${date}"`, result.error);
  }
}

/**
 * Value one entity's holdings on a date.
 *
 * Each holding is priced at its last close on or before `date`. Holdings that
 * cannot be resolved or priced add nothing to the value, drop out of the
 * covered quantity and are listed in `gaps`. Zero-quantity holdings are
 * skipped, so coverage is 1 exactly when every held position is priced.
 */
export function valuate(holdings: Holding[], date: string, context: ValuationContext): Valuation {
  const entityId = validateHoldings(holdings);
  validateDate(entityId, date);

  let totalValue = 0;
  let totalQuantity = 0;
  let coveredQuantity = 0;
  const gaps: ValuationGap[] = [];

  for (const holding of holdings) {
    // A zero position holds nothing to price
    if (holding.quantity === 0) continue;
    totalQuantity += holding.quantity;

    const resolved = context.resolver.resolve(holding.securityName);
    if (resolved.resolutionConfidence === 'unresolved') {
      gaps.push({ kind: 'resolution', securityName: holding.securityName, quantity: holding.quantity });
      continue;
    }

    const price = context.prices.priceOnOrBefore(resolved.instrumentId, date);
    if (price === null) {
      gaps.push({
        kind: 'price',
        securityName: holding.securityName,
        instrumentId: resolved.instrumentId,
        quantity: holding.quantity,
        date,
      });
      continue;
    }

    totalValue += price * holding.quantity;
    coveredQuantity += holding.quantity;
  }

  return {
    entityId,
    date,
    totalValue,
    coveredQuantityFraction: totalQuantity > 0 ? coveredQuantity / totalQuantity : 0,
    gaps,
  };
}

export function valuateSchedule(holdings: Holding[], dates: string[], context: ValuationContext): Valuation[] {
  return [...dates].sort().map(date => valuate(holdings, date, context));
}

export interface WeightedHoldings {
  holdings: Holding[];
  excludedConstituents: ExcludedConstituent[];
  excludedWeight: number; // share of the normalized weight that could not be invested
}

/**
 * Turn benchmark weights into holdings by investing `notional` at the start
 * date: quantity = normalized weight × notional / start price.
 * Constituents without an instrument or a start price cannot be bought and are
 * returned as excluded weight instead.
 */
export function holdingsFromWeights(
  entityId: string,
  weights: WeightEntry[],
  notional: number,
  startDate: string,
  context: ValuationContext
): WeightedHoldings {
  if (weights.length === 0) {
    throw new ConfigurationError(entityId, 'No constituent weights provided');
  }
  const result = z.array(WeightEntrySchema).safeParse(weights);
  if (!result.success) {
    throw ConfigurationError.fromZod(entityId, 'Invalid constituent weights', result.error);
  }
  if (!(Number.isFinite(notional) && notional > 0)) {
    throw new ConfigurationError(entityId, `Notional investment must be positive, got ${notional}`);
  }
  validateDate(entityId, startDate);

  const totalWeight = weights.reduce((sum, w) => sum + w.weight, 0);
  if (totalWeight <= 0) {
    throw new ConfigurationError(entityId, 'Constituent weights sum to zero');
  }

  const holdings: Holding[] = [];
  const excludedConstituents: ExcludedConstituent[] = [];
  let excludedWeight = 0;

  for (const entry of weights) {
    const weight = entry.weight / totalWeight;
    const resolved = context.resolver.resolve(entry.securityName);
    if (resolved.resolutionConfidence === 'unresolved') {
      excludedConstituents.push({ securityName: entry.securityName, weight, reason: 'unresolved' });
      excludedWeight += weight;
      continue;
    }

    const startPrice = context.prices.priceOnOrBefore(resolved.instrumentId, startDate);
    if (startPrice === null) {
      excludedConstituents.push({ securityName: entry.securityName, weight, reason: 'no-start-price' });
      excludedWeight += weight;
      continue;
    }

    holdings.push({
      investorId: entityId,
      securityName: entry.securityName,
      quantity: (weight * notional) / startPrice,
    });
  }

  return { holdings, excludedConstituents, excludedWeight };
}
