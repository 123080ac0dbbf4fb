export type PipelineStage = 'request' | 'extraction' | 'embedding' | 'retrieval' | 'composition';

/**
 * Base class for failures the search pipeline surfaces to its caller.
 * `stage` tells the HTTP layer which collaborator failed; `retryable` whether
 * the same request may succeed later.
 */
export class SearchPipelineError extends Error {
  readonly stage: PipelineStage;
  readonly retryable: boolean;

  constructor(message: string, stage: PipelineStage, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
    this.retryable = retryable;
  }
}

export class InvalidQueryError extends SearchPipelineError {
  constructor(message: string) {
    super(message, 'request', false);
  }
}

export class RequestAbortedError extends SearchPipelineError {
  constructor(stage: PipelineStage) {
    super(`Request aborted during ${stage}`, stage, false);
  }
}

export class EmbeddingFailureError extends SearchPipelineError {
  constructor(cause: unknown) {
    super(`Embedding call failed: ${errorMessage(cause)}`, 'embedding', true, { cause });
  }
}

export class SearchUnavailableError extends SearchPipelineError {
  constructor(cause: unknown) {
    super('Search is temporarily unavailable. Please try again shortly.', 'embedding', true, { cause });
  }
}

export class StoreUnavailableError extends SearchPipelineError {
  constructor(cause: unknown) {
    super(`Vehicle store is unavailable: ${errorMessage(cause)}`, 'retrieval', true, { cause });
  }
}

export class CompositionFailureError extends SearchPipelineError {
  constructor(cause: unknown) {
    super(`Answer composition failed: ${errorMessage(cause)}`, 'composition', true, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: PipelineStage): void {
  if (signal?.aborted) {
    throw new RequestAbortedError(stage);
  }
}
