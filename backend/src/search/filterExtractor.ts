import { z } from 'zod';
import { errorMessage, throwIfAborted } from '../errors';
import { FilterSet, NumericRange, SearchModels, YearFilter } from '../types';
import { NormalizationTable } from '../utils/normalization';
import { describeFilters } from './filters';

const numericField = z.union([z.number(), z.string()]).nullish();
const textField = z.string().nullish();

const rawFiltersSchema = z.object({
  model: textField,
  min_price: numericField,
  max_price: numericField,
  min_mileage: numericField,
  max_mileage: numericField,
  color: textField,
  city: textField,
  year_preference: z.union([z.number(), z.string()]).nullish(),
  engine: textField,
});

export type RawFilters = z.infer<typeof rawFiltersSchema>;

export interface ExtractFiltersResult {
  filters: FilterSet;
  source: 'llm' | 'fallback';
  error?: string;
}

export interface ExtractFiltersDeps {
  models: SearchModels;
  normalization: NormalizationTable;
}

export interface ExtractFiltersOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

const MULTIPLIERS: Record<string, number> = {
  million: 1_000_000,
  mln: 1_000_000,
  млн: 1_000_000,
  m: 1_000_000,
  thousand: 1_000,
  тыс: 1_000,
  k: 1_000,
};

const NEWEST_WORDS = new Set(['newest', 'latest', 'newer', 'новый', 'новейший', 'самый новый']);
const OLDEST_WORDS = new Set(['oldest', 'older', 'старый', 'самый старый']);

const MIN_MODEL_YEAR = 1900;
const MAX_MODEL_YEAR = 2100;

/**
 * Reads an amount the model may have written as a number or as text
 * ("15 000 000", "1,500,000", "5 million"). Negative, fractional-only or
 * unreadable values yield undefined.
 */
export function parseAmount(value: number | string | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;

  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.round(value) : undefined;
  }

  let text = value.toLowerCase().replace(/[\s ]/g, '');
  if (/^\d{1,3}(,\d{3})+$/.test(text)) {
    text = text.replace(/,/g, '');
  }
  const match = text.match(/^(\d+(?:[.,]\d+)?)([a-zа-я]+)?$/);
  if (!match) return undefined;

  const amount = Number(match[1].replace(',', '.'));
  const unit = match[2];
  const multiplier = unit === undefined ? 1 : MULTIPLIERS[unit];
  if (multiplier === undefined || !Number.isFinite(amount)) return undefined;
  return Math.round(amount * multiplier);
}

/** Builds a range, dropping both bounds when they are inverted. */
export function buildRange(
  min: number | string | null | undefined,
  max: number | string | null | undefined,
  label: string
): NumericRange | undefined {
  const lower = parseAmount(min);
  const upper = parseAmount(max);

  if (lower !== undefined && upper !== undefined && lower > upper) {
    console.warn(`Dropping inverted ${label} range: min ${lower} > max ${upper}`);
    return undefined;
  }
  if (lower === undefined && upper === undefined) return undefined;

  const range: NumericRange = {};
  if (lower !== undefined) range.min = lower;
  if (upper !== undefined) range.max = upper;
  return range;
}

export function parseYear(value: number | string | null | undefined): YearFilter | undefined {
  if (value === null || value === undefined) return undefined;

  const asYear = (year: number): YearFilter | undefined =>
    Number.isInteger(year) && year >= MIN_MODEL_YEAR && year <= MAX_MODEL_YEAR
      ? { kind: 'exact', value: year }
      : undefined;

  if (typeof value === 'number') return asYear(value);

  const text = value.trim().toLowerCase();
  if (NEWEST_WORDS.has(text)) return { kind: 'preference', value: 'newest' };
  if (OLDEST_WORDS.has(text)) return { kind: 'preference', value: 'oldest' };
  return /^\d{4}$/.test(text) ? asYear(Number(text)) : undefined;
}

function cleanText(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed || /^(null|none|n\/a|any)$/i.test(trimmed)) return undefined;
  return trimmed;
}

/**
 * Turns validated model output into a FilterSet: numbers sanitised, ranges
 * checked, colors and cities canonicalized.
 */
export function toFilterSet(raw: RawFilters, normalization: NormalizationTable): FilterSet {
  const filters: FilterSet = {};

  const price = buildRange(raw.min_price, raw.max_price, 'price');
  if (price) filters.price = price;

  const mileage = buildRange(raw.min_mileage, raw.max_mileage, 'mileage');
  if (mileage) filters.mileage = mileage;

  const model = cleanText(raw.model);
  if (model) filters.model = model;

  const engine = cleanText(raw.engine);
  if (engine) filters.engine = engine;

  const color = cleanText(raw.color);
  if (color) filters.color = normalization.canonicalize(color, 'color');

  const city = cleanText(raw.city);
  if (city) filters.city = normalization.canonicalize(city, 'city');

  const year = parseYear(raw.year_preference);
  if (year) filters.year = year;

  return filters;
}

export function parseExtractionOutput(text: string, normalization: NormalizationTable): FilterSet {
  const cleaned = text.replace(/```(?:json)?\s*/g, '').replace(/```/g, '').trim();
  const parsed = rawFiltersSchema.parse(JSON.parse(cleaned));
  return toFilterSet(parsed, normalization);
}

/**
 * Structured filters for a question. Any failure of the model call or of its
 * output degrades to an empty FilterSet: an unconstrained search beats none.
 * A caller abort is not absorbed.
 */
export async function extractFilters(
  question: string,
  deps: ExtractFiltersDeps,
  options: ExtractFiltersOptions = {}
): Promise<ExtractFiltersResult> {
  try {
    const output = await deps.models.extract(question, {
      signal: options.signal,
      timeoutMs: options.timeoutMs,
    });
    const filters = parseExtractionOutput(output, deps.normalization);
    console.log(`Extracted filters: ${describeFilters(filters)}`);
    return { filters, source: 'llm' };
  } catch (err) {
    throwIfAborted(options.signal, 'extraction');
    const message = errorMessage(err);
    console.warn(`Filter extraction failed, searching without filters: ${message}`);
    return { filters: {}, source: 'fallback', error: message };
  }
}
