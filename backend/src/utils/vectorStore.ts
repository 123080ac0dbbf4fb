import { matchesFilters } from '../search/filters';
import { FilterSet, ScoredVehicle, VehicleListing, VehicleRecord, VehicleStore } from '../types';

function toListing(record: VehicleRecord): VehicleListing {
  const { embedding: _embedding, ...listing } = record;
  return listing;
}

/**
 * In-process vehicle store with brute-force cosine similarity. Used for local
 * development (VECTOR_STORE=memory) and as the store in tests.
 */
export class InMemoryVehicleStore implements VehicleStore {
  private vectors = new Map<string, VehicleRecord>();

  constructor(records: VehicleRecord[] = []) {
    for (const record of records) {
      this.vectors.set(record.id, record);
    }
  }

  async upsert(records: VehicleRecord[]): Promise<void> {
    for (const record of records) {
      this.vectors.set(record.id, record);
    }
  }

  async count(): Promise<number> {
    return this.vectors.size;
  }

  cosineSimilarity(vecA: number[], vecB: number[]): number {
    if (vecA.length !== vecB.length) {
      throw new Error(`Vectors must have the same length (${vecA.length} vs ${vecB.length})`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < vecA.length; i++) {
      dotProduct += vecA[i] * vecB[i];
      normA += vecA[i] * vecA[i];
      normB += vecB[i] * vecB[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    return denominator === 0 ? 0 : dotProduct / denominator;
  }

  async search(vector: number[], limit: number): Promise<ScoredVehicle[]> {
    const scored = Array.from(this.vectors.values()).map(record => ({
      vehicle: toListing(record),
      score: this.cosineSimilarity(vector, record.embedding),
    }));

    return scored
      .sort((a, b) => b.score - a.score || (a.vehicle.id < b.vehicle.id ? -1 : a.vehicle.id > b.vehicle.id ? 1 : 0))
      .slice(0, limit);
  }

  async scan(filters: FilterSet, limit: number): Promise<VehicleListing[]> {
    const matches: VehicleListing[] = [];
    for (const record of this.vectors.values()) {
      if (matches.length >= limit) break;
      if (matchesFilters(record, filters)) {
        matches.push(toListing(record));
      }
    }
    return matches;
  }
}
