import { z } from 'zod';
import { InvalidQueryError, throwIfAborted } from '../errors';
import { ResolvedQuery, SearchModels, VehicleStore } from '../types';
import { NormalizationTable } from '../utils/normalization';
import { composeAnswer } from './answerComposer';
import { extractFilters } from './filterExtractor';
import { describeFilters } from './filters';
import { MAX_TOP_K, MIN_TOP_K, rankAndTrim } from './ranker';
import { DEFAULT_RETRIEVAL_CONFIG, RetrievalConfig, retrieve } from './strategist';
import { computeThreshold, DEFAULT_THRESHOLD_CONFIG, ThresholdConfig } from './threshold';

export const DEFAULT_TOP_K = 5;
const MAX_QUESTION_LENGTH = 1000;

export interface PipelineConfig {
  threshold: ThresholdConfig;
  retrieval: RetrievalConfig;
  extractionTimeoutMs: number;
  answerTimeoutMs: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  threshold: DEFAULT_THRESHOLD_CONFIG,
  retrieval: DEFAULT_RETRIEVAL_CONFIG,
  extractionTimeoutMs: 10_000,
  answerTimeoutMs: 30_000,
};

export interface PipelineDeps {
  models: SearchModels;
  store: VehicleStore;
  normalization: NormalizationTable;
}

export const searchRequestSchema = z.object({
  question: z
    .string({ required_error: 'question is required', invalid_type_error: 'question must be a string' })
    .trim()
    .min(1, 'question must be a non-empty string')
    .max(MAX_QUESTION_LENGTH, `question must be at most ${MAX_QUESTION_LENGTH} characters`),
  topK: z
    .number({ invalid_type_error: 'top_k must be a number' })
    .int('top_k must be an integer')
    .min(MIN_TOP_K, `top_k must be between ${MIN_TOP_K} and ${MAX_TOP_K}`)
    .max(MAX_TOP_K, `top_k must be between ${MIN_TOP_K} and ${MAX_TOP_K}`)
    .default(DEFAULT_TOP_K),
});

export type SearchRequest = z.input<typeof searchRequestSchema>;
export type ValidSearchRequest = z.output<typeof searchRequestSchema>;

export function parseSearchRequest(input: unknown): ValidSearchRequest {
  const parsed = searchRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidQueryError(parsed.error.issues.map(issue => issue.message).join('; '));
  }
  return parsed.data;
}

/**
 * Resolves one question end to end: filters, threshold, strategy, ranked
 * results and the composed answer. Holds no state between calls.
 */
export async function resolveQuery(
  request: SearchRequest,
  deps: PipelineDeps,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  signal?: AbortSignal
): Promise<ResolvedQuery> {
  const { question, topK } = parseSearchRequest(request);
  const startTime = Date.now();

  const extraction = await extractFilters(
    question,
    { models: deps.models, normalization: deps.normalization },
    { signal, timeoutMs: config.extractionTimeoutMs }
  );
  const filters = extraction.filters;
  const threshold = computeThreshold(filters, config.threshold);
  console.log(`Filters (${extraction.source}): ${describeFilters(filters)}; similarity threshold ${threshold}`);

  throwIfAborted(signal, 'retrieval');
  const { strategy, results: candidates } = await retrieve(
    question,
    filters,
    threshold,
    { models: deps.models, store: deps.store },
    config.retrieval,
    signal
  );

  const results = rankAndTrim(candidates, filters, topK);

  throwIfAborted(signal, 'composition');
  const answer = await composeAnswer(question, results, deps.models, {
    signal,
    timeoutMs: config.answerTimeoutMs,
  });

  console.log(`Resolved query via ${strategy.kind}: ${results.length} result(s) in ${Date.now() - startTime}ms`);

  return {
    question,
    filters,
    filterSource: extraction.source,
    threshold,
    strategy,
    results,
    answer,
  };
}
