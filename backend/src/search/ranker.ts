import { FilterSet, SearchResult } from '../types';

export const MIN_TOP_K = 1;
export const MAX_TOP_K = 20;

export function clampTopK(topK: number): number {
  if (!Number.isFinite(topK)) return MIN_TOP_K;
  return Math.min(MAX_TOP_K, Math.max(MIN_TOP_K, Math.floor(topK)));
}

// Scan results carry no score and rank as maximally relevant.
function scoreOf(result: SearchResult): number {
  return result.score ?? Number.POSITIVE_INFINITY;
}

function compareScores(a: SearchResult, b: SearchResult): number {
  const left = scoreOf(a);
  const right = scoreOf(b);
  if (left === right) return 0;
  return left > right ? -1 : 1;
}

function compareIds(a: SearchResult, b: SearchResult): number {
  if (a.vehicle.id === b.vehicle.id) return 0;
  return a.vehicle.id < b.vehicle.id ? -1 : 1;
}

function compareYears(a: SearchResult, b: SearchResult, direction: 'newest' | 'oldest'): number {
  const left = a.vehicle.modelYear;
  const right = b.vehicle.modelYear;
  if (left === right) return 0;
  // Unknown years sort last either way
  if (left === null) return 1;
  if (right === null) return -1;
  return direction === 'newest' ? right - left : left - right;
}

/**
 * Orders results and keeps the first `topK`. With a newest/oldest preference
 * the model year leads; otherwise similarity does. Identifier breaks every
 * remaining tie, so identical input always yields identical order.
 */
export function rankAndTrim(results: readonly SearchResult[], filters: FilterSet, topK: number): SearchResult[] {
  const preference = filters.year?.kind === 'preference' ? filters.year.value : undefined;

  const ordered = [...results].sort((a, b) => {
    if (preference) {
      const byYear = compareYears(a, b, preference);
      if (byYear !== 0) return byYear;
    }
    return compareScores(a, b) || compareIds(a, b);
  });

  return ordered.slice(0, clampTopK(topK));
}
