import { describe, it, expect } from 'vitest';
import { holdingsFromWeights, valuate, valuateSchedule, type ValuationContext } from '../utils/valuation';
import { InMemoryPriceSeriesProvider } from '../utils/priceSeries';
import { TickerResolver } from '../utils/tickerResolver';
import { ConfigurationError } from '../utils/errors';
import { getDefaultRegistry } from '../config/instrumentRegistry';
import type { Holding, PricePoint } from '../types';

// --- Test data factories ---

function makeHolding(securityName: string, quantity: number, investorId = 'Investor A'): Holding {
  return { investorId, securityName, quantity };
}

function makeContext(points: PricePoint[]): ValuationContext {
  return {
    resolver: new TickerResolver(getDefaultRegistry()),
    prices: new InMemoryPriceSeriesProvider(points),
  };
}

const prices: PricePoint[] = [
  { instrumentId: 'INFY.NS', date: '2024-04-01', price: 100 },
  { instrumentId: 'INFY.NS', date: '2024-04-30', price: 110 },
  { instrumentId: 'HDFCBANK.NS', date: '2024-04-01', price: 50 },
];

describe('valuate', () => {
  it('values fully priced holdings at their last close', () => {
    const context = makeContext(prices);
    const valuation = valuate(
      [makeHolding('Infosys Limited', 10), makeHolding('HDFC Bank Limited', 4)],
      '2024-04-01',
      context
    );

    expect(valuation).toEqual({
      entityId: 'Investor A',
      date: '2024-04-01',
      totalValue: 1200,
      coveredQuantityFraction: 1,
      gaps: [],
    });
  });

  it('leaves unpriced holdings out of the value and the covered quantity', () => {
    const context = makeContext(prices);
    const valuation = valuate(
      [makeHolding('Infosys Limited', 10), makeHolding('Tata Steel Limited', 5)],
      '2024-04-01',
      context
    );

    expect(valuation.totalValue).toBe(1000);
    expect(valuation.coveredQuantityFraction).toBeCloseTo(10 / 15);
    expect(valuation.gaps).toEqual([
      {
        kind: 'price',
        securityName: 'Tata Steel Limited',
        instrumentId: 'TATASTEEL.NS',
        quantity: 5,
        date: '2024-04-01',
      },
    ]);
  });

  it('records unresolved names as resolution gaps', () => {
    const context = makeContext(prices);
    const valuation = valuate(
      [makeHolding('Infosys Limited', 10), makeHolding('Zzyzx Holdings Private Limited', 10)],
      '2024-04-01',
      context
    );

    expect(valuation.totalValue).toBe(1000);
    expect(valuation.coveredQuantityFraction).toBe(0.5);
    expect(valuation.gaps).toEqual([
      { kind: 'resolution', securityName: 'Zzyzx Holdings Private Limited', quantity: 10 },
    ]);
  });

  it('uses the last close on or before the valuation date', () => {
    const context = makeContext(prices);
    const valuation = valuate([makeHolding('Infosys Limited', 10)], '2024-05-15', context);
    expect(valuation.totalValue).toBe(1100);
  });

  it('reports zero coverage when every holding has zero quantity', () => {
    const context = makeContext(prices);
    const valuation = valuate([makeHolding('Infosys Limited', 0)], '2024-04-01', context);

    expect(valuation.totalValue).toBe(0);
    expect(valuation.coveredQuantityFraction).toBe(0);
  });

  it('ignores zero-quantity holdings when measuring coverage', () => {
    const context = makeContext(prices);
    const valuation = valuate(
      [
        makeHolding('Infosys Limited', 10),
        makeHolding('Zzyzx Holdings Private Limited', 0),
        makeHolding('Tata Steel Limited', 0),
      ],
      '2024-04-01',
      context
    );

    expect(valuation.totalValue).toBe(1000);
    expect(valuation.coveredQuantityFraction).toBe(1);
    expect(valuation.gaps).toEqual([]);
  });

  it('throws ConfigurationError for empty holdings', () => {
    const context = makeContext(prices);
    expect(() => valuate([], '2024-04-01', context)).toThrow(ConfigurationError);
  });

  it('throws ConfigurationError for negative quantities', () => {
    const context = makeContext(prices);
    expect(() => valuate([makeHolding('Infosys Limited', -1)], '2024-04-01', context)).toThrow(
      /Quantity must be non-negative/
    );
  });

  it('throws ConfigurationError for holdings of more than one investor', () => {
    const context = makeContext(prices);
    const holdings = [makeHolding('Infosys Limited', 1), makeHolding('Infosys Limited', 1, 'Investor B')];
    expect(() => valuate(holdings, '2024-04-01', context)).toThrow(
      '[Investor A] Holdings mix investors Investor A and Investor B'
    );
  });

  it('throws ConfigurationError for an invalid date', () => {
    const context = makeContext(prices);
    expect(() => valuate([makeHolding('Infosys Limited', 1)], '2024-13-45', context)).toThrow(ConfigurationError);
  });
});

describe('valuateSchedule', () => {
  it('values every date in chronological order', () => {
    const context = makeContext(prices);
    const valuations = valuateSchedule([makeHolding('Infosys Limited', 10)], ['2024-04-30', '2024-04-01'], context);

    expect(valuations.map(v => [v.date, v.totalValue])).toEqual([
      ['2024-04-01', 1000],
      ['2024-04-30', 1100],
    ]);
  });
});

describe('holdingsFromWeights', () => {
  it('invests the notional by normalized weight at start prices', () => {
    const context = makeContext(prices);
    const result = holdingsFromWeights(
      'Multi Cap Fund',
      [
        { securityName: 'Infosys Limited', weight: 60 },
        { securityName: 'HDFC Bank Limited', weight: 40 },
      ],
      1000,
      '2024-04-01',
      context
    );

    expect(result.holdings).toEqual([
      { investorId: 'Multi Cap Fund', securityName: 'Infosys Limited', quantity: 6 },
      { investorId: 'Multi Cap Fund', securityName: 'HDFC Bank Limited', quantity: 8 },
    ]);
    expect(result.excludedConstituents).toEqual([]);
    expect(result.excludedWeight).toBe(0);
  });

  it('excludes constituents that cannot be resolved or priced', () => {
    const context = makeContext(prices);
    const result = holdingsFromWeights(
      'Multi Cap Fund',
      [
        { securityName: 'Infosys Limited', weight: 0.5 },
        { securityName: 'Tata Steel Limited', weight: 0.25 },
        { securityName: 'Zzyzx Holdings Private Limited', weight: 0.25 },
      ],
      1000,
      '2024-04-01',
      context
    );

    expect(result.holdings).toEqual([
      { investorId: 'Multi Cap Fund', securityName: 'Infosys Limited', quantity: 5 },
    ]);
    expect(result.excludedConstituents).toEqual([
      { securityName: 'Tata Steel Limited', weight: 0.25, reason: 'no-start-price' },
      { securityName: 'Zzyzx Holdings Private Limited', weight: 0.25, reason: 'unresolved' },
    ]);
    expect(result.excludedWeight).toBe(0.5);
  });

  it('throws ConfigurationError for empty or zero weights', () => {
    const context = makeContext(prices);
    expect(() => holdingsFromWeights('Fund', [], 1000, '2024-04-01', context)).toThrow(
      '[Fund] No constituent weights provided'
    );
    expect(() =>
      holdingsFromWeights('Fund', [{ securityName: 'Infosys Limited', weight: 0 }], 1000, '2024-04-01', context)
    ).toThrow('[Fund] Constituent weights sum to zero');
  });

  it('throws ConfigurationError for a non-positive notional', () => {
    const context = makeContext(prices);
    expect(() =>
      holdingsFromWeights('Fund', [{ securityName: 'Infosys Limited', weight: 1 }], 0, '2024-04-01', context)
    ).toThrow(ConfigurationError);
  });
});
