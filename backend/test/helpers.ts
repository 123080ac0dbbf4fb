import { Mock, vi } from 'vitest';
import { SearchModels, VehicleListing, VehicleRecord } from '../src/types';
import { DEFAULT_NORMALIZATION_TABLE_PATH, NormalizationTable } from '../src/utils/normalization';

let table: NormalizationTable | undefined;

export function loadNormalization(): NormalizationTable {
  table ??= NormalizationTable.fromFile(DEFAULT_NORMALIZATION_TABLE_PATH);
  return table;
}

export function makeVehicle(overrides: Partial<VehicleListing> & { id: string }): VehicleListing {
  return {
    model: 'Toyota Camry',
    generation: '',
    price: 10_000_000,
    mileage: 100_000,
    color: 'white',
    city: 'Алматы',
    engine: '2.5 (бензин)',
    modelYear: 2015,
    url: `https://example.com/cars/${overrides.id}`,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<VehicleListing> & { id: string }, embedding: number[]): VehicleRecord {
  return { ...makeVehicle(overrides), embedding };
}

type ExtractFn = SearchModels['extract'];
type EmbedFn = SearchModels['embed'];
type ComposeFn = SearchModels['compose'];

export interface FakeModels extends SearchModels {
  extract: Mock<ExtractFn>;
  embed: Mock<EmbedFn>;
  compose: Mock<ComposeFn>;
}

/** Models returning fixed extraction output and a fixed query vector. */
export function fakeModels(extraction: Record<string, unknown> = {}, vector: number[] = [1, 0]): FakeModels {
  return {
    extract: vi.fn<ExtractFn>(async () => JSON.stringify(extraction)),
    embed: vi.fn<EmbedFn>(async () => vector),
    compose: vi.fn<ComposeFn>(async () => 'Here is what I found.'),
  };
}
