import express, { Response } from 'express';
import { InvalidQueryError, RequestAbortedError, SearchPipelineError } from '../errors';
import { parseSearchRequest, PipelineConfig, PipelineDeps, resolveQuery } from '../search/pipeline';
import { ResolvedQuery } from '../types';

function toResponseBody(resolved: ResolvedQuery) {
  return {
    query: resolved.question,
    filters: resolved.filters,
    filter_source: resolved.filterSource,
    strategy: resolved.strategy.kind,
    threshold: resolved.threshold,
    results: resolved.results.map(({ vehicle, score }) => ({
      ...vehicle,
      similarity_score: score ?? null,
    })),
    count: resolved.results.length,
    answer: resolved.answer,
  };
}

function sendSearchError(res: Response, error: unknown): void {
  if (error instanceof RequestAbortedError) {
    console.log(`Search aborted by client (${error.stage})`);
    if (!res.headersSent) {
      res.status(499).end();
    }
    return;
  }

  if (error instanceof InvalidQueryError) {
    res.status(400).json({ error: error.message });
    return;
  }

  if (error instanceof SearchPipelineError) {
    console.error(`Search failed at ${error.stage}:`, error.message);
    res.status(error.retryable ? 503 : 500).json({
      error: error.message,
      stage: error.stage,
      retryable: error.retryable,
    });
    return;
  }

  console.error('Search error:', error);
  res.status(500).json({ error: error instanceof Error ? error.message : 'Error performing search' });
}

export function createSearchRouter(deps: PipelineDeps, config: PipelineConfig): express.Router {
  const router = express.Router();

  router.post('/', async (req, res) => {
    const question = req.body?.question;
    const topK = req.body?.top_k;

    console.log(`\n=== SEARCH REQUEST ===`);
    console.log(`Question: ${JSON.stringify(question)}, top_k: ${topK ?? 'default'}`);

    // Client disconnects cancel the in-flight model calls
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const request = parseSearchRequest({ question, topK });
      const resolved = await resolveQuery(request, deps, config, controller.signal);
      res.json(toResponseBody(resolved));
    } catch (error) {
      sendSearchError(res, error);
    }
  });

  return router;
}
