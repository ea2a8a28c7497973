export interface Holding {
  investorId: string;
  securityName: string; // raw text as it appears in the holdings file
  quantity: number;
}

export interface WeightEntry {
  securityName: string;
  weight: number;
}
