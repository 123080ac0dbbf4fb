import { FilterSet, NumericRange, VehicleListing } from '../types';

function inRange(value: number, range: NumericRange | undefined): boolean {
  if (!range) return true;
  if (range.min !== undefined && value < range.min) return false;
  if (range.max !== undefined && value > range.max) return false;
  return true;
}

function hasBounds(range: NumericRange | undefined): boolean {
  return range !== undefined && (range.min !== undefined || range.max !== undefined);
}

/** Engine as compared by filters and stored in the Qdrant payload. */
export function engineKey(engine: string): string {
  return engine.toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Lower-case words without diacritics: "Camry XV50 (2011 — 2014)" -> camry, xv50, 2011, 2014. */
export function modelTokens(value: string): string[] {
  return value
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 0);
}

/** Model and generation words, space separated. Stored in the Qdrant payload for full-text match. */
export function modelKey(vehicle: Pick<VehicleListing, 'model' | 'generation'>): string {
  return modelTokens(`${vehicle.model} ${vehicle.generation}`).join(' ');
}

/**
 * Loose model match: every word of the requested model appears among the
 * words of model + generation, so "toyota camry xv50" matches model
 * "Toyota Camry" with generation "XV50 (2011 — 2014)". Same rule as a Qdrant
 * full-text match on the stored model key.
 */
export function matchesModel(vehicle: VehicleListing, model: string): boolean {
  const needle = modelTokens(model);
  if (needle.length === 0) return true;
  const words = new Set(modelTokens(`${vehicle.model} ${vehicle.generation}`));
  return needle.every(token => words.has(token));
}

export function hasExactFilter(filters: FilterSet): boolean {
  return (
    hasBounds(filters.price) ||
    hasBounds(filters.mileage) ||
    filters.color !== undefined ||
    filters.city !== undefined ||
    filters.engine !== undefined ||
    filters.year?.kind === 'exact'
  );
}

/**
 * True when the vehicle satisfies every active filter. Shared by the
 * post-filter of vector search, the in-memory scan and the check applied to
 * store scan results.
 */
export function matchesFilters(vehicle: VehicleListing, filters: FilterSet): boolean {
  if (!inRange(vehicle.price, filters.price)) return false;
  if (!inRange(vehicle.mileage, filters.mileage)) return false;
  if (filters.color && vehicle.color !== filters.color.value) return false;
  if (filters.city && vehicle.city !== filters.city.value) return false;
  if (filters.engine && engineKey(vehicle.engine) !== engineKey(filters.engine)) return false;
  if (filters.year?.kind === 'exact' && vehicle.modelYear !== filters.year.value) return false;
  if (filters.model && !matchesModel(vehicle, filters.model)) return false;
  return true;
}

export function describeFilters(filters: FilterSet): string {
  const parts: string[] = [];
  if (filters.model) parts.push(`model~"${filters.model}"`);
  if (hasBounds(filters.price)) parts.push(`price[${filters.price?.min ?? ''}..${filters.price?.max ?? ''}]`);
  if (hasBounds(filters.mileage)) parts.push(`mileage[${filters.mileage?.min ?? ''}..${filters.mileage?.max ?? ''}]`);
  if (filters.color) parts.push(`color=${filters.color.value}${filters.color.normalized ? '' : ' (unnormalized)'}`);
  if (filters.city) parts.push(`city=${filters.city.value}${filters.city.normalized ? '' : ' (unnormalized)'}`);
  if (filters.engine) parts.push(`engine="${filters.engine}"`);
  if (filters.year) parts.push(`year=${filters.year.value}`);
  return parts.length > 0 ? parts.join(', ') : 'none';
}
