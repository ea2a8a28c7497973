import type {
  EntityGapReport,
  ExcludedConstituent,
  FuzzyMatchRecord,
  Holding,
  PerformancePoint,
  PriceGapRecord,
  Valuation,
} from '../types';
import { findMissingMonths } from './performance';
import type { TickerResolver } from './tickerResolver';

export interface GapReportInput {
  entityId: string;
  holdings: Holding[];
  valuations: Valuation[];
  points: PerformancePoint[];
  schedule: string[];
  resolver: TickerResolver;
  excludedConstituents?: ExcludedConstituent[];
  excludedWeight?: number;
}

export function buildGapReport(input: GapReportInput): EntityGapReport {
  const { entityId, holdings, valuations, points, schedule, resolver } = input;

  const unresolved = new Set<string>();
  const priceGaps = new Map<string, PriceGapRecord>();

  for (const valuation of valuations) {
    for (const gap of valuation.gaps) {
      if (gap.kind === 'resolution') {
        unresolved.add(gap.securityName);
        continue;
      }
      const key = `${gap.securityName}\u0000${gap.instrumentId}`;
      const record = priceGaps.get(key) ?? { securityName: gap.securityName, instrumentId: gap.instrumentId, dates: [] };
      if (!record.dates.includes(gap.date)) record.dates.push(gap.date);
      priceGaps.set(key, record);
    }
  }

  // Constituents dropped while building benchmark holdings never reach a valuation
  for (const excluded of input.excludedConstituents ?? []) {
    if (excluded.reason === 'unresolved') unresolved.add(excluded.securityName);
  }

  const fuzzyMatches: FuzzyMatchRecord[] = [];
  const seen = new Set<string>();
  for (const holding of holdings) {
    if (seen.has(holding.securityName)) continue;
    seen.add(holding.securityName);
    const resolved = resolver.resolve(holding.securityName);
    if (resolved.resolutionConfidence === 'fuzzy') {
      fuzzyMatches.push({
        securityName: resolved.securityName,
        instrumentId: resolved.instrumentId,
        matchedName: resolved.matchedName,
        matchScore: resolved.matchScore,
      });
    }
  }
  fuzzyMatches.sort((a, b) => a.securityName.localeCompare(b.securityName));

  return {
    entityId,
    unresolvedSecurities: [...unresolved].sort(),
    fuzzyMatches,
    priceGaps: [...priceGaps.values()]
      .map(record => ({ ...record, dates: [...record.dates].sort() }))
      .sort((a, b) => a.securityName.localeCompare(b.securityName)),
    missingMonths: findMissingMonths(points, schedule),
    coverageTrail: [...valuations]
      .sort((a, b) => a.date.localeCompare(b.date))
      .map(v => ({ date: v.date, coveredQuantityFraction: v.coveredQuantityFraction })),
    insufficientHistory: points.length < 2,
    excludedConstituents: [...(input.excludedConstituents ?? [])],
    excludedWeight: input.excludedWeight ?? 0,
  };
}
