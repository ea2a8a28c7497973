import type { RegistryEntry, ResolvedInstrument, UnresolvedInstrument, FuzzyResolution } from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { logger } from './logger';

// Holdings exports append equity markers and face values to company names,
// e.g. "HDFC BANK LIMITED EQ NEW RS. 1/-"
const EQUITY_MARKER_PATTERNS: RegExp[] = [
  /\bEQ\b.*$/,
  /\bNEW\s+(?:F\.?\s*V\.?|RS\.?).*$/,
  /\bF\.?\s*V\.?\s*RS\.?.*$/,
  /\bR[SE]\.?\s*\d+.*$/,
  /\b\d+\/-?/g,
];

const CORPORATE_SUFFIX_PATTERN = /\b(?:LIMITED|LTD|PVT|PRIVATE|COMPANY|CO|CORPORATION|CORP|INC)\b/g;

export function normalizeSecurityName(name: string): string {
  let clean = name.toUpperCase();
  for (const pattern of EQUITY_MARKER_PATTERNS) {
    clean = clean.replace(pattern, ' ');
  }
  clean = clean.replace(/[^\w\s&]/g, ' ');
  clean = clean.replace(/\bAND\b/g, '&');
  clean = clean.replace(CORPORATE_SUFFIX_PATTERN, ' ');
  return clean.replace(/\s+/g, ' ').trim();
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
}

// 1 for identical strings, 0 for nothing in common
export function editSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshteinDistance(a, b) / longest;
}

// Jaccard overlap of whitespace-separated tokens
export function tokenOverlap(a: string, b: string): number {
  const tokensA = new Set(a.split(' ').filter(Boolean));
  const tokensB = new Set(b.split(' ').filter(Boolean));
  if (tokensA.size === 0 && tokensB.size === 0) return 1;

  let shared = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) shared++;
  }
  return shared / (tokensA.size + tokensB.size - shared);
}

export function similarityScore(a: string, b: string): number {
  return Math.max(editSimilarity(a, b), tokenOverlap(a, b));
}

interface Candidate {
  key: string;
  entry: RegistryEntry;
}

export interface TickerResolverOptions {
  fuzzyMatchThreshold?: number;
}

/**
 * Maps free-text security names onto registry instruments.
 *
 * Lookups are exact on the normalized name (or an alias, or the bare symbol),
 * then fuzzy above `fuzzyMatchThreshold`. Results are cached per raw name, so
 * a given registry snapshot always answers the same way. Unresolved and fuzzy
 * outcomes are kept in a gap log for reporting.
 */
export class TickerResolver {
  private readonly exactIndex = new Map<string, RegistryEntry>();
  private readonly symbolIndex = new Map<string, RegistryEntry>();
  private readonly candidates: Candidate[] = [];
  private readonly cache = new Map<string, ResolvedInstrument>();
  private readonly gapLog = new Map<string, UnresolvedInstrument | FuzzyResolution>();
  readonly fuzzyMatchThreshold: number;

  constructor(registry: RegistryEntry[], options: TickerResolverOptions = {}) {
    this.fuzzyMatchThreshold = options.fuzzyMatchThreshold ?? DEFAULT_ENGINE_CONFIG.fuzzyMatchThreshold;

    // Sorted so a normalized-name collision always keeps the same entry
    const sorted = [...registry].sort((a, b) => a.name.localeCompare(b.name) || a.instrumentId.localeCompare(b.instrumentId));

    for (const entry of sorted) {
      for (const name of [entry.name, ...(entry.aliases ?? [])]) {
        const key = normalizeSecurityName(name);
        if (!key) continue;
        if (!this.exactIndex.has(key)) {
          this.exactIndex.set(key, entry);
          this.candidates.push({ key, entry });
        }
      }

      const symbol = entry.instrumentId.toUpperCase();
      const bareSymbol = symbol.replace(/\.[A-Z]+$/, '');
      for (const key of [symbol, bareSymbol]) {
        if (!this.symbolIndex.has(key)) {
          this.symbolIndex.set(key, entry);
        }
      }
    }

    this.candidates.sort((a, b) => a.key.localeCompare(b.key));
  }

  resolve(securityName: string): ResolvedInstrument {
    const cached = this.cache.get(securityName);
    if (cached) return cached;

    const resolved = this.lookup(securityName);
    this.cache.set(securityName, resolved);

    if (resolved.resolutionConfidence === 'unresolved') {
      logger.debug(`Unresolved security: ${securityName}`);
      this.gapLog.set(securityName, resolved);
    } else if (resolved.resolutionConfidence === 'fuzzy') {
      logger.debug(`Fuzzy match: ${securityName} -> ${resolved.matchedName} (${resolved.matchScore.toFixed(3)})`);
      this.gapLog.set(securityName, resolved);
    }

    return resolved;
  }

  // Unresolved and fuzzy outcomes, ordered by security name
  getGapLog(): Array<UnresolvedInstrument | FuzzyResolution> {
    return [...this.gapLog.values()].sort((a, b) => a.securityName.localeCompare(b.securityName));
  }

  private lookup(securityName: string): ResolvedInstrument {
    const normalizedName = normalizeSecurityName(securityName);

    const byName = normalizedName ? this.exactIndex.get(normalizedName) : undefined;
    const bySymbol = this.symbolIndex.get(securityName.trim().toUpperCase());
    const exact = byName ?? bySymbol;
    if (exact) {
      return {
        securityName,
        normalizedName,
        resolutionConfidence: 'exact',
        instrumentId: exact.instrumentId,
        matchedName: exact.name,
      };
    }

    if (normalizedName) {
      let best: Candidate | null = null;
      let bestScore = 0;
      for (const candidate of this.candidates) {
        const score = similarityScore(normalizedName, candidate.key);
        // Strictly greater keeps the alphabetically first candidate on ties
        if (score > bestScore) {
          best = candidate;
          bestScore = score;
        }
      }

      if (best && bestScore >= this.fuzzyMatchThreshold) {
        return {
          securityName,
          normalizedName,
          resolutionConfidence: 'fuzzy',
          instrumentId: best.entry.instrumentId,
          matchedName: best.entry.name,
          matchScore: bestScore,
        };
      }
    }

    return { securityName, normalizedName, resolutionConfidence: 'unresolved' };
  }
}
