import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import { engineKey, modelKey, modelTokens } from '../search/filters';
import { FilterSet, NumericRange, ScoredVehicle, VehicleListing, VehicleRecord, VehicleStore } from '../types';

// Typed subset of the Qdrant filter DSL used by the scan
export interface QdrantMatchValue {
  value: string | number;
}

export interface QdrantMatchText {
  text: string;
}

export interface QdrantRange {
  gte?: number;
  lte?: number;
}

export interface QdrantCondition {
  key: string;
  match?: QdrantMatchValue | QdrantMatchText;
  range?: QdrantRange;
}

export interface QdrantFilter {
  must: QdrantCondition[];
}

export interface QdrantStoreSettings {
  url: string;
  apiKey?: string;
  collection: string;
}

const payloadSchema = z.object({
  model: z.string(),
  generation: z.string().default(''),
  price: z.number(),
  mileage: z.number(),
  color: z.string().default(''),
  city: z.string().default(''),
  engine: z.string().default(''),
  modelYear: z.number().int().nullable().default(null),
  url: z.string().default(''),
});

// Filters compare against the *_key fields, which hold the same folded forms
// matchesFilters compares.
const PAYLOAD_INDEXES: Array<{ field: string; schema: 'keyword' | 'integer' | 'text' }> = [
  { field: 'color', schema: 'keyword' },
  { field: 'city', schema: 'keyword' },
  { field: 'engine_key', schema: 'keyword' },
  { field: 'model_key', schema: 'text' },
  { field: 'price', schema: 'integer' },
  { field: 'mileage', schema: 'integer' },
  { field: 'modelYear', schema: 'integer' },
];

function rangeCondition(key: string, range: NumericRange | undefined): QdrantCondition | undefined {
  if (!range || (range.min === undefined && range.max === undefined)) return undefined;
  const qdrantRange: QdrantRange = {};
  if (range.min !== undefined) qdrantRange.gte = range.min;
  if (range.max !== undefined) qdrantRange.lte = range.max;
  return { key, range: qdrantRange };
}

/**
 * Qdrant filter for a FilterSet: inclusive ranges for price and mileage,
 * keyword equality for color, city, folded engine and exact year, full-text
 * match of the model words against model + generation. Returns undefined when
 * nothing is filtered.
 */
export function buildQdrantFilter(filters: FilterSet): QdrantFilter | undefined {
  const must: QdrantCondition[] = [];

  const price = rangeCondition('price', filters.price);
  if (price) must.push(price);

  const mileage = rangeCondition('mileage', filters.mileage);
  if (mileage) must.push(mileage);

  if (filters.color) must.push({ key: 'color', match: { value: filters.color.value } });
  if (filters.city) must.push({ key: 'city', match: { value: filters.city.value } });
  if (filters.engine) must.push({ key: 'engine_key', match: { value: engineKey(filters.engine) } });
  if (filters.year?.kind === 'exact') must.push({ key: 'modelYear', match: { value: filters.year.value } });

  const words = filters.model ? modelTokens(filters.model) : [];
  if (words.length > 0) must.push({ key: 'model_key', match: { text: words.join(' ') } });

  return must.length > 0 ? { must } : undefined;
}

// Qdrant point ids are unsigned integers or UUIDs
function toPointId(id: string): string | number {
  return /^\d+$/.test(id) ? Number(id) : id;
}

export function toQdrantPayload(listing: VehicleListing): Record<string, unknown> {
  return {
    model: listing.model,
    generation: listing.generation,
    price: listing.price,
    mileage: listing.mileage,
    color: listing.color,
    city: listing.city,
    engine: listing.engine,
    modelYear: listing.modelYear,
    url: listing.url,
    model_key: modelKey(listing),
    engine_key: engineKey(listing.engine),
  };
}

export function pointToVehicleListing(id: string | number, payload: unknown): VehicleListing {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Point ${id} has an invalid vehicle payload: ${parsed.error.message}`);
  }
  return { id: String(id), ...parsed.data };
}

export class QdrantVehicleStore implements VehicleStore {
  private readonly client: QdrantClient;
  private readonly collection: string;

  constructor(settings: QdrantStoreSettings, client?: QdrantClient) {
    this.client = client ?? new QdrantClient({ url: settings.url, apiKey: settings.apiKey });
    this.collection = settings.collection;
  }

  async search(vector: number[], limit: number): Promise<ScoredVehicle[]> {
    const points = await this.client.search(this.collection, {
      vector,
      limit,
      with_payload: true,
      with_vector: false,
    });

    return points.map(point => ({
      vehicle: pointToVehicleListing(point.id, point.payload),
      score: point.score,
    }));
  }

  async scan(filters: FilterSet, limit: number): Promise<VehicleListing[]> {
    const result = await this.client.scroll(this.collection, {
      filter: buildQdrantFilter(filters),
      limit,
      with_payload: true,
      with_vector: false,
    });

    return result.points.map(point => pointToVehicleListing(point.id, point.payload));
  }

  async upsert(records: VehicleRecord[]): Promise<void> {
    if (records.length === 0) return;

    await this.client.upsert(this.collection, {
      wait: true,
      points: records.map(({ embedding, ...listing }) => ({
        id: toPointId(listing.id),
        vector: embedding,
        payload: toQdrantPayload(listing),
      })),
    });
  }

  async count(): Promise<number> {
    const result = await this.client.count(this.collection, { exact: true });
    return result.count;
  }

  /** Creates the collection (cosine distance) and its payload indexes when missing. */
  async ensureCollection(vectorSize: number): Promise<boolean> {
    const { collections } = await this.client.getCollections();
    if (collections.some(collection => collection.name === this.collection)) {
      console.log(`Collection '${this.collection}' already exists`);
      return false;
    }

    console.log(`Creating collection '${this.collection}' (size ${vectorSize}, cosine)`);
    await this.client.createCollection(this.collection, {
      vectors: { size: vectorSize, distance: 'Cosine' },
    });

    for (const index of PAYLOAD_INDEXES) {
      await this.client.createPayloadIndex(this.collection, {
        field_name: index.field,
        field_schema: index.schema,
        wait: true,
      });
    }
    return true;
  }
}
