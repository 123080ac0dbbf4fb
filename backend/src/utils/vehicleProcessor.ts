import fs from 'fs/promises';
import { z } from 'zod';
import { parseAmount } from '../search/filterExtractor';
import { VehicleListing, VehicleRecord, VehicleStore } from '../types';
import { NormalizationTable } from './normalization';

const rawVehicleSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  model: z.string().min(1),
  generation: z.string().nullish(),
  modelYear: z.union([z.number(), z.string()]).nullish(),
  color: z.string().nullish(),
  city: z.string().nullish(),
  engine: z.string().nullish(),
  price: z.union([z.number(), z.string()]),
  mileage: z.union([z.number(), z.string()]),
  url: z.string().nullish(),
});

export type RawVehicle = z.infer<typeof rawVehicleSchema>;

export type Embedder = (texts: string[]) => Promise<number[][]>;

export interface IngestDeps {
  store: VehicleStore;
  normalization: NormalizationTable;
  embedMany: Embedder;
}

export interface IngestSummary {
  ingested: number;
  skipped: number;
}

const UPSERT_BATCH_SIZE = 100;

const DISPLAY_UNIT = /\s*(₸|тг|kzt|км|km)\.?$/iu;

/**
 * Reads a display value: "15 000 000 ₸" -> 15000000, "120 000 км" -> 120000,
 * "14,5 млн" -> 14500000. Anything else yields undefined.
 */
export function parseDisplayNumber(value: number | string): number | undefined {
  return parseAmount(typeof value === 'string' ? value.trim().replace(DISPLAY_UNIT, '') : value);
}

function parseModelYear(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const year = typeof value === 'number' ? value : Number(value.match(/\d{4}/)?.[0]);
  return Number.isInteger(year) && year >= 1900 && year <= 2100 ? year : null;
}

function describeMileage(mileage: number): string {
  if (mileage === 0) return 'brand new with no mileage';
  if (mileage < 50_000) return 'low mileage';
  if (mileage <= 150_000) return 'moderate mileage';
  return 'high mileage';
}

/**
 * Text embedded for a vehicle. Numbers are described rather than spelled out,
 * so conceptual questions ("low mileage family sedan") land near it.
 */
export function buildVehicleDescription(vehicle: VehicleListing): string {
  const parts = [
    `${vehicle.model}${vehicle.generation ? ` ${vehicle.generation}` : ''}`,
    vehicle.modelYear !== null ? `model year ${vehicle.modelYear}` : undefined,
    vehicle.color ? `${vehicle.color} color` : undefined,
    vehicle.engine ? `${vehicle.engine} engine` : undefined,
    describeMileage(vehicle.mileage),
    vehicle.city ? `located in ${vehicle.city}` : undefined,
  ];
  return parts.filter((part): part is string => part !== undefined).join(', ') + '.';
}

/**
 * Validates one raw inventory item and normalizes its color and city to the
 * canonical tokens the search filters compare against. Returns undefined for
 * items without a usable price or mileage.
 */
export function parseInventoryItem(
  raw: unknown,
  index: number,
  normalization: NormalizationTable
): VehicleListing | undefined {
  const parsed = rawVehicleSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`Skipping inventory item ${index}: ${parsed.error.issues[0]?.message ?? 'invalid item'}`);
    return undefined;
  }
  const item = parsed.data;

  const price = parseDisplayNumber(item.price);
  const mileage = parseDisplayNumber(item.mileage);
  if (price === undefined || mileage === undefined) {
    console.warn(`Skipping inventory item ${index} (${item.model}): unreadable price or mileage`);
    return undefined;
  }

  const color = item.color?.trim() ?? '';
  const city = item.city?.trim() ?? '';

  return {
    id: item.id !== undefined ? String(item.id) : String(index),
    model: item.model.trim(),
    generation: item.generation?.trim() ?? '',
    price,
    mileage,
    color: color ? normalization.canonicalize(color, 'color').value : '',
    city: city ? normalization.canonicalize(city, 'city').value : '',
    engine: item.engine?.trim() ?? '',
    modelYear: parseModelYear(item.modelYear),
    url: item.url?.trim() ?? '',
  };
}

export async function readInventoryFile(filePath: string): Promise<unknown[]> {
  console.log(`Loading inventory from '${filePath}'`);
  const content = await fs.readFile(filePath, 'utf8');
  const data: unknown = JSON.parse(content);
  if (!Array.isArray(data)) {
    throw new Error(`Inventory file ${filePath} must contain a JSON array`);
  }
  return data;
}

export async function ingestVehicles(items: unknown[], deps: IngestDeps): Promise<IngestSummary> {
  const listings = items
    .map((item, index) => parseInventoryItem(item, index, deps.normalization))
    .filter((listing): listing is VehicleListing => listing !== undefined);
  const skipped = items.length - listings.length;

  console.log(`Embedding ${listings.length} vehicle descriptions (${skipped} skipped)`);
  const startTime = Date.now();
  const embeddings = await deps.embedMany(listings.map(buildVehicleDescription));
  if (embeddings.length !== listings.length) {
    throw new Error(`Expected ${listings.length} embeddings, got ${embeddings.length}`);
  }

  const records: VehicleRecord[] = listings.map((listing, i) => ({ ...listing, embedding: embeddings[i] }));
  for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
    await deps.store.upsert(records.slice(i, i + UPSERT_BATCH_SIZE));
  }

  console.log(`✓ Ingested ${records.length} vehicles in ${Date.now() - startTime}ms`);
  return { ingested: records.length, skipped };
}
