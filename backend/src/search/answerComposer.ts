import { CompositionFailureError, throwIfAborted } from '../errors';
import { SearchModels, SearchResult } from '../types';

export const NO_MATCHES_TEXT = 'No vehicles in the inventory match this request.';

function formatNumber(value: number): string {
  return String(Math.round(value)).replace(/\B(?=(\d{3})+(?!\d))/g, ' ');
}

export function formatResultsForPrompt(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return NO_MATCHES_TEXT;
  }

  return results
    .map(({ vehicle, score }, index) => {
      const lines = [
        `${index + 1}. ${vehicle.model}${vehicle.generation ? ` ${vehicle.generation}` : ''}`,
        `   Year: ${vehicle.modelYear ?? 'unknown'}`,
        `   Price: ${formatNumber(vehicle.price)} ₸`,
        `   Mileage: ${formatNumber(vehicle.mileage)} km`,
        `   Color: ${vehicle.color || 'unknown'}`,
        `   City: ${vehicle.city || 'unknown'}`,
        `   Engine: ${vehicle.engine || 'unknown'}`,
        `   URL: ${vehicle.url}`,
      ];
      if (score !== undefined) {
        lines.push(`   Relevance: ${score.toFixed(3)}`);
      }
      return lines.join('\n');
    })
    .join('\n\n');
}

export interface ComposeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export async function composeAnswer(
  question: string,
  results: readonly SearchResult[],
  models: SearchModels,
  options: ComposeOptions = {}
): Promise<string> {
  try {
    return await models.compose(question, formatResultsForPrompt(results), {
      signal: options.signal,
      timeoutMs: options.timeoutMs,
    });
  } catch (err) {
    throwIfAborted(options.signal, 'composition');
    throw new CompositionFailureError(err);
  }
}
