import { FilterSet, NumericRange } from '../types';

export interface ThresholdConfig {
  /** Cutoff for a question with no structured filters. Must be below 1. */
  base: number;
  /** Amount subtracted per unit of filter weight. */
  step: number;
  /** Lowest cutoff ever returned. Must be above 0. */
  floor: number;
}

export const DEFAULT_THRESHOLD_CONFIG: ThresholdConfig = {
  base: 0.4,
  step: 0.05,
  floor: 0.2,
};

function rangeWeight(range: NumericRange | undefined): number {
  return range && (range.min !== undefined || range.max !== undefined) ? 1 : 0;
}

// A year preference only orders results, so it does not narrow the candidate set.
export function filterWeight(filters: FilterSet): number {
  return (
    (filters.model ? 1 : 0) +
    (filters.color ? 1 : 0) +
    (filters.city ? 1 : 0) +
    (filters.engine ? 1 : 0) +
    (filters.year?.kind === 'exact' ? 1 : 0) +
    rangeWeight(filters.price) +
    rangeWeight(filters.mileage)
  );
}

/**
 * Similarity cutoff for vector-search candidates. The more structured
 * constraints the question carries, the lower the semantic bar: filters
 * already do the narrowing.
 */
export function computeThreshold(filters: FilterSet, config: ThresholdConfig = DEFAULT_THRESHOLD_CONFIG): number {
  const ceiling = Math.min(config.base, 0.99);
  const floor = Math.max(Math.min(config.floor, ceiling), 0.01);
  const raw = config.base - config.step * filterWeight(filters);
  // 0.4 - 0.05 * 3 must come out as exactly 0.25
  const threshold = Math.round(raw * 1e6) / 1e6;
  return Math.min(ceiling, Math.max(floor, threshold));
}
