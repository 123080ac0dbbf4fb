import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InvalidQueryError, RequestAbortedError } from '../src/errors';
import { NO_MATCHES_TEXT } from '../src/search/answerComposer';
import { parseSearchRequest, resolveQuery } from '../src/search/pipeline';
import { InMemoryVehicleStore } from '../src/utils/vectorStore';
import { fakeModels, loadNormalization, makeRecord } from './helpers';

const normalization = loadNormalization();

function buildStore(): InMemoryVehicleStore {
  return new InMemoryVehicleStore([
    makeRecord({ id: '1', color: 'silver', price: 4_500_000, modelYear: 2012 }, [1, 0]),
    makeRecord({ id: '2', color: 'silver', price: 4_200_000, city: 'Астана' }, [1, 0]),
    makeRecord({ id: '3', color: 'silver', price: 3_000_000, modelYear: 2016 }, [3, 4]),
    makeRecord({ id: '4', color: 'silver', price: 2_000_000 }, [1, 7]),
    makeRecord({ id: '5', color: 'white', price: 4_000_000 }, [1, 0]),
    makeRecord({ id: '6', color: 'silver', price: 6_000_000 }, [1, 0]),
    makeRecord({ id: '7', model: 'Subaru Outback', color: 'black', city: 'Шымкент' }, [4, 3]),
  ]);
}

describe('parseSearchRequest', () => {
  it('trims the question and defaults top_k to 5', () => {
    expect(parseSearchRequest({ question: '  camry  ' })).toEqual({ question: 'camry', topK: 5 });
  });

  it('rejects empty questions and out-of-range top_k', () => {
    expect(() => parseSearchRequest({ question: '   ' })).toThrow(
      new InvalidQueryError('question must be a non-empty string')
    );
    expect(() => parseSearchRequest({ question: 'camry', topK: 0 })).toThrow(
      new InvalidQueryError('top_k must be between 1 and 20')
    );
    expect(() => parseSearchRequest({ question: 'camry', topK: 21 })).toThrow(
      new InvalidQueryError('top_k must be between 1 and 20')
    );
    expect(() => parseSearchRequest({ question: 42 })).toThrow(new InvalidQueryError('question must be a string'));
  });
});

describe('resolveQuery', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    return () => vi.restoreAllMocks();
  });

  it('narrows a model query by price, color and city', async () => {
    const models = fakeModels({ model: 'Toyota Camry', color: 'silver', max_price: 5_000_000, city: 'Almaty' });

    const resolved = await resolveQuery(
      { question: 'silver Toyota Camry under 5 million in Almaty' },
      { models, store: buildStore(), normalization }
    );

    expect(resolved.strategy).toEqual({ kind: 'vector-search' });
    expect(resolved.threshold).toBe(0.2);
    expect(resolved.filterSource).toBe('llm');
    expect(resolved.filters.city).toEqual({ value: 'Алматы', category: 'city', normalized: true });
    expect(resolved.results.map(result => [result.vehicle.id, result.score])).toEqual([
      ['1', 1],
      ['3', 0.6],
    ]);
    expect(resolved.answer).toBe('Here is what I found.');
    expect(models.extract).toHaveBeenCalledTimes(1);
    expect(models.embed).toHaveBeenCalledTimes(1);
    expect(models.embed).toHaveBeenCalledWith('silver Toyota Camry under 5 million in Almaty', {
      signal: undefined,
      timeoutMs: 10_000,
    });
  });

  it('searches a conceptual query by similarity alone at the base cutoff, the highest one, not the floor', async () => {
    const models = fakeModels({ model: null, color: null, city: null, max_price: null });
    const store = buildStore();
    const scan = vi.spyOn(store, 'scan');

    const resolved = await resolveQuery({ question: 'comfortable family offroad car' }, {
      models,
      store,
      normalization,
    });

    expect(resolved.filters).toEqual({});
    expect(resolved.threshold).toBe(0.4);
    expect(resolved.strategy).toEqual({ kind: 'vector-search' });
    expect(resolved.results.map(result => result.vehicle.id)).toEqual(['1', '2', '5', '6', '7']);
    expect(scan).not.toHaveBeenCalled();
  });

  it('reports no matches without failing', async () => {
    const models = fakeModels({ model: 'Subaru Outback', color: 'white' });

    const resolved = await resolveQuery({ question: 'Subaru Outback white' }, {
      models,
      store: buildStore(),
      normalization,
    });

    expect(resolved.results).toEqual([]);
    expect(models.compose).toHaveBeenCalledWith('Subaru Outback white', NO_MATCHES_TEXT, {
      signal: undefined,
      timeoutMs: 30_000,
    });
  });

  it('matches an unnormalized city literally and finds nothing', async () => {
    const models = fakeModels({ city: 'Almatyy' });

    const resolved = await resolveQuery({ question: 'cars in Almatyy' }, { models, store: buildStore(), normalization });

    expect(resolved.filters).toEqual({ city: { value: 'Almatyy', category: 'city', normalized: false } });
    expect(resolved.strategy).toEqual({ kind: 'filtered-scan', reason: 'exact-filters' });
    expect(resolved.results).toEqual([]);
    expect(models.embed).not.toHaveBeenCalled();
  });

  it('orders by year preference and trims to top_k', async () => {
    const models = fakeModels({ model: 'Toyota Camry', year_preference: 'newest' });

    const resolved = await resolveQuery({ question: 'newest camry', topK: 2 }, {
      models,
      store: buildStore(),
      normalization,
    });

    expect(resolved.results.map(result => result.vehicle.id)).toEqual(['3', '2']);
  });

  it('searches unconstrained when extraction fails', async () => {
    const models = fakeModels();
    models.extract.mockRejectedValue(new Error('timeout'));

    const resolved = await resolveQuery({ question: 'something reliable' }, {
      models,
      store: buildStore(),
      normalization,
    });

    expect(resolved.filterSource).toBe('fallback');
    expect(resolved.filters).toEqual({});
    expect(resolved.strategy).toEqual({ kind: 'vector-search' });
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    const models = fakeModels({ model: 'Toyota Camry' });
    models.extract.mockImplementation(async () => {
      controller.abort();
      return '{"model": "Toyota Camry"}';
    });

    await expect(
      resolveQuery({ question: 'camry' }, { models, store: buildStore(), normalization }, undefined, controller.signal)
    ).rejects.toThrow(new RequestAbortedError('retrieval'));
    expect(models.embed).not.toHaveBeenCalled();
    expect(models.compose).not.toHaveBeenCalled();
  });

  it('rejects an invalid request before calling any model', async () => {
    const models = fakeModels();
    await expect(
      resolveQuery({ question: '' }, { models, store: buildStore(), normalization })
    ).rejects.toBeInstanceOf(InvalidQueryError);
    expect(models.extract).not.toHaveBeenCalled();
  });
});
