export type TokenCategory = 'color' | 'city';

export interface CanonicalToken {
  value: string;
  category: TokenCategory;
  // false when the table did not recognise the input; value is then the raw input
  normalized: boolean;
}

export interface NumericRange {
  min?: number;
  max?: number;
}

export type YearPreference = 'newest' | 'oldest';

export type YearFilter =
  | { kind: 'exact'; value: number }
  | { kind: 'preference'; value: YearPreference };

export interface FilterSet {
  price?: NumericRange;
  mileage?: NumericRange;
  model?: string;
  color?: CanonicalToken;
  city?: CanonicalToken;
  year?: YearFilter;
  engine?: string;
}

export interface VehicleListing {
  id: string;
  model: string;
  generation: string;
  price: number;
  mileage: number;
  color: string;
  city: string;
  engine: string;
  modelYear: number | null;
  url: string;
}

export interface VehicleRecord extends VehicleListing {
  embedding: number[];
}

export interface SearchResult {
  vehicle: VehicleListing;
  // Absent for filtered-scan results, which satisfy every filter exactly
  score?: number;
}

export type RetrievalStrategy =
  | { kind: 'vector-search' }
  | { kind: 'filtered-scan'; reason: 'exact-filters' | 'embedding-fallback' };

export interface ResolvedQuery {
  question: string;
  filters: FilterSet;
  filterSource: 'llm' | 'fallback';
  threshold: number;
  strategy: RetrievalStrategy;
  results: SearchResult[];
  answer: string;
}

export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * The three outbound model calls the pipeline makes. Implemented over OpenAI
 * in production and by deterministic fakes in tests.
 */
export interface SearchModels {
  /** Returns the model's raw text; parsing belongs to the filter extractor. */
  extract(question: string, options?: CallOptions): Promise<string>;
  embed(text: string, options?: CallOptions): Promise<number[]>;
  compose(question: string, resultsText: string, options?: CallOptions): Promise<string>;
}

export interface ScoredVehicle {
  vehicle: VehicleListing;
  score: number;
}

export interface VehicleStore {
  /** Nearest neighbours of the vector, best first. No filtering. */
  search(vector: number[], limit: number): Promise<ScoredVehicle[]>;
  /** Exact-match/range scan. Unordered, no scores. */
  scan(filters: FilterSet, limit: number): Promise<VehicleListing[]>;
  upsert(records: VehicleRecord[]): Promise<void>;
  count(): Promise<number>;
}
