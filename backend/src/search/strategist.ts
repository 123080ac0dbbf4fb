import {
  EmbeddingFailureError,
  SearchUnavailableError,
  StoreUnavailableError,
  throwIfAborted,
} from '../errors';
import {
  FilterSet,
  RetrievalStrategy,
  ScoredVehicle,
  SearchModels,
  SearchResult,
  VehicleListing,
  VehicleStore,
} from '../types';
import { hasExactFilter, matchesFilters } from './filters';

export interface RetrievalConfig {
  /** Neighbours requested from the store before post-filtering. */
  candidateLimit: number;
  /** Most records a filtered scan may return. */
  scanCap: number;
  embeddingTimeoutMs: number;
}

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  candidateLimit: 100,
  scanCap: 200,
  embeddingTimeoutMs: 10_000,
};

export interface RetrievalDeps {
  models: SearchModels;
  store: VehicleStore;
}

export interface RetrievalOutcome {
  strategy: RetrievalStrategy;
  results: SearchResult[];
}

/**
 * Exact filters without a model make the question an attribute lookup, where
 * the embedding carries little signal: scan instead of searching.
 */
export function selectStrategy(filters: FilterSet): RetrievalStrategy {
  if (!filters.model && hasExactFilter(filters)) {
    return { kind: 'filtered-scan', reason: 'exact-filters' };
  }
  return { kind: 'vector-search' };
}

async function filteredScan(filters: FilterSet, deps: RetrievalDeps, config: RetrievalConfig): Promise<SearchResult[]> {
  let vehicles: VehicleListing[];
  try {
    vehicles = await deps.store.scan(filters, config.scanCap);
  } catch (err) {
    throw new StoreUnavailableError(err);
  }

  const results = vehicles.filter(vehicle => matchesFilters(vehicle, filters)).map(vehicle => ({ vehicle }));
  if (results.length < vehicles.length) {
    console.warn(`Store scan returned ${vehicles.length - results.length} record(s) that do not satisfy the filters`);
  }
  console.log(`Filtered scan: ${results.length} match(es) (cap ${config.scanCap})`);
  return results;
}

async function embedQuestion(
  question: string,
  deps: RetrievalDeps,
  config: RetrievalConfig,
  signal?: AbortSignal
): Promise<number[]> {
  try {
    return await deps.models.embed(question, { signal, timeoutMs: config.embeddingTimeoutMs });
  } catch (err) {
    throwIfAborted(signal, 'embedding');
    throw new EmbeddingFailureError(err);
  }
}

async function vectorSearch(
  question: string,
  filters: FilterSet,
  threshold: number,
  deps: RetrievalDeps,
  config: RetrievalConfig,
  signal?: AbortSignal
): Promise<SearchResult[]> {
  const vector = await embedQuestion(question, deps, config, signal);
  throwIfAborted(signal, 'retrieval');

  let candidates: ScoredVehicle[];
  try {
    candidates = await deps.store.search(vector, config.candidateLimit);
  } catch (err) {
    throw new StoreUnavailableError(err);
  }

  const filtered = candidates.filter(candidate => matchesFilters(candidate.vehicle, filters));
  const results = filtered.filter(candidate => candidate.score >= threshold);

  console.log(
    `Vector search: ${candidates.length} candidate(s), ${filtered.length} after filters, ${results.length} at or above threshold ${threshold}`
  );
  return results.map(({ vehicle, score }) => ({ vehicle, score }));
}

/**
 * Retrieves candidates for a question. An embedding failure falls back to a
 * filtered scan when the question carries any filter; with no filters at all
 * there is nothing left to search by and the search is reported unavailable.
 */
export async function retrieve(
  question: string,
  filters: FilterSet,
  threshold: number,
  deps: RetrievalDeps,
  config: RetrievalConfig = DEFAULT_RETRIEVAL_CONFIG,
  signal?: AbortSignal
): Promise<RetrievalOutcome> {
  const strategy = selectStrategy(filters);
  console.log(`Retrieval strategy: ${strategy.kind}`);

  if (strategy.kind === 'filtered-scan') {
    return { strategy, results: await filteredScan(filters, deps, config) };
  }

  try {
    const results = await vectorSearch(question, filters, threshold, deps, config, signal);
    return { strategy, results };
  } catch (err) {
    if (!(err instanceof EmbeddingFailureError)) {
      throw err;
    }
    if (!hasExactFilter(filters) && !filters.model) {
      console.error(`Embedding failed and the question has no filters: ${err.message}`);
      throw new SearchUnavailableError(err);
    }
    console.warn(`${err.message}; falling back to filtered scan`);
    const fallback: RetrievalStrategy = { kind: 'filtered-scan', reason: 'embedding-fallback' };
    return { strategy: fallback, results: await filteredScan(filters, deps, config) };
  }
}
