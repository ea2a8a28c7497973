export type ResolutionConfidence = 'exact' | 'fuzzy' | 'unresolved';

interface ResolutionBase {
  securityName: string;
  normalizedName: string;
}

export interface ExactResolution extends ResolutionBase {
  resolutionConfidence: 'exact';
  instrumentId: string;
  matchedName: string;
}

export interface FuzzyResolution extends ResolutionBase {
  resolutionConfidence: 'fuzzy';
  instrumentId: string;
  matchedName: string;
  matchScore: number;
}

export interface UnresolvedInstrument extends ResolutionBase {
  resolutionConfidence: 'unresolved';
}

export type ResolvedInstrument = ExactResolution | FuzzyResolution | UnresolvedInstrument;

export interface RegistryEntry {
  name: string;
  instrumentId: string;
  aliases?: string[];
}
