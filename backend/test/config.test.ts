import { describe, expect, it } from 'vitest';
import { parseConfig } from '../src/config';

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig({});

    expect(config.port).toBe(8000);
    expect(config.vectorStore).toBe('qdrant');
    expect(config.qdrant).toEqual({ url: 'http://localhost:6333', apiKey: undefined, collection: 'cars' });
    expect(config.openai.chatModel).toBe('gpt-4o-mini');
    expect(config.openai.embeddingModel).toBe('text-embedding-3-small');
    expect(config.openai.extractionTemperature).toBe(0.1);
    expect(config.vectorSize).toBe(1536);
    expect(config.pipeline.threshold).toEqual({ base: 0.4, step: 0.05, floor: 0.2 });
    expect(config.pipeline.retrieval).toEqual({ candidateLimit: 100, scanCap: 200, embeddingTimeoutMs: 10_000 });
  });

  it('reads overrides from the environment', () => {
    const config = parseConfig({
      PORT: '9100',
      OPENAI_API_KEY: 'test-secret',
      VECTOR_STORE: 'memory',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
      SIMILARITY_BASE: '0.5',
      SIMILARITY_FLOOR: '0.25',
      SCAN_CAP: '50',
      INVENTORY_FILE: 'backend/data/sample-inventory.json',
    });

    expect(config.port).toBe(9100);
    expect(config.openai.apiKey).toBe('test-secret');
    expect(config.vectorStore).toBe('memory');
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.pipeline.threshold).toEqual({ base: 0.5, step: 0.05, floor: 0.25 });
    expect(config.pipeline.retrieval.scanCap).toBe(50);
    expect(config.inventoryFile).toBe('backend/data/sample-inventory.json');
  });

  it('rejects inconsistent similarity settings', () => {
    expect(() => parseConfig({ SIMILARITY_BASE: '0.3', SIMILARITY_FLOOR: '0.35' })).toThrow(
      'Invalid configuration: SIMILARITY_FLOOR: Similarity settings must satisfy 0 < SIMILARITY_FLOOR <= SIMILARITY_BASE < 1'
    );
  });

  it('rejects an unknown vector store', () => {
    expect(() => parseConfig({ VECTOR_STORE: 'redis' })).toThrow(/^Invalid configuration: VECTOR_STORE:/);
  });
});
