export interface ResolutionGap {
  kind: 'resolution';
  securityName: string;
  quantity: number;
}

export interface PriceGap {
  kind: 'price';
  securityName: string;
  instrumentId: string;
  quantity: number;
  date: string;
}

export type ValuationGap = ResolutionGap | PriceGap;

export interface Valuation {
  entityId: string;
  date: string;
  totalValue: number;
  coveredQuantityFraction: number; // 0..1, below 1 means some holdings went unpriced
  gaps: ValuationGap[];
}
