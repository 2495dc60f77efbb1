import * as fuzz from 'fuzzball';
import { normalizeCompanyName } from './companyNames';

export type FuzzyMatch = [candidate: string, score: number];

const MAX_RANKED = 10;

/**
 * Weighted blend of plain, partial and token ratios on a 0-100 scale. Case and
 * punctuation are ignored; containment scores high without beating an exact match.
 */
export function weightedRatio(a: string, b: string) {
  return fuzz.WRatio(a, b);
}

/**
 * Ranks `candidates` against a company-name query. Returns at most ten
 * `[candidate, score]` pairs, best first, keeping only scores at or above `threshold`.
 */
export function fuzzyMatchCompany(
  query: string,
  candidates: readonly string[],
  threshold = 60,
): FuzzyMatch[] {
  if (candidates.length === 0) return [];
  const normalizedQuery = normalizeCompanyName(query);
  if (!normalizedQuery) return [];
  return candidates
    .map((candidate, index) => ({ candidate, index, score: weightedRatio(normalizedQuery, candidate) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, MAX_RANKED)
    .filter((entry) => entry.score >= threshold)
    .map((entry): FuzzyMatch => [entry.candidate, entry.score]);
}

export function findBestCompanyMatch(
  query: string,
  candidates: readonly string[],
  threshold = 60,
) {
  const [best] = fuzzyMatchCompany(query, candidates, threshold);
  return best ? best[0] : null;
}
