import type { MonthKey } from './PerformancePoint';

export interface FuzzyMatchRecord {
  securityName: string;
  instrumentId: string;
  matchedName: string;
  matchScore: number;
}

export interface PriceGapRecord {
  securityName: string;
  instrumentId: string;
  dates: string[];
}

export interface CoverageTrailEntry {
  date: string;
  coveredQuantityFraction: number;
}

export interface ExcludedConstituent {
  securityName: string;
  weight: number;
  reason: 'unresolved' | 'no-start-price';
}

export interface EntityGapReport {
  entityId: string;
  unresolvedSecurities: string[];
  fuzzyMatches: FuzzyMatchRecord[];
  priceGaps: PriceGapRecord[];
  missingMonths: MonthKey[];
  coverageTrail: CoverageTrailEntry[];
  insufficientHistory: boolean;
  excludedConstituents: ExcludedConstituent[];
  excludedWeight: number;
}
