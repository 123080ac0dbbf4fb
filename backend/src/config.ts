import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_PIPELINE_CONFIG, PipelineConfig } from './search/pipeline';
import { DEFAULT_NORMALIZATION_TABLE_PATH } from './utils/normalization';
import { OpenAiSettings } from './utils/openaiService';
import { QdrantStoreSettings } from './utils/qdrantStore';

const numberFromEnv = (fallback: number) => z.coerce.number().finite().default(fallback);
const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    PORT: intFromEnv(8000),
    CORS_ORIGINS: z.string().default('http://localhost:9000'),

    OPENAI_API_KEY: z.string().optional(),
    CHAT_MODEL: z.string().default('gpt-4o-mini'),
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EXTRACTION_TEMPERATURE: numberFromEnv(0.1),
    ANSWER_TEMPERATURE: numberFromEnv(0.7),
    OPENAI_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    EXTRACTION_TIMEOUT_MS: intFromEnv(DEFAULT_PIPELINE_CONFIG.extractionTimeoutMs),
    EMBEDDING_TIMEOUT_MS: intFromEnv(DEFAULT_PIPELINE_CONFIG.retrieval.embeddingTimeoutMs),
    ANSWER_TIMEOUT_MS: intFromEnv(DEFAULT_PIPELINE_CONFIG.answerTimeoutMs),

    VECTOR_STORE: z.enum(['qdrant', 'memory']).default('qdrant'),
    QDRANT_URL: z.string().url().default('http://localhost:6333'),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().default('cars'),
    VECTOR_SIZE: intFromEnv(1536),

    SIMILARITY_BASE: numberFromEnv(DEFAULT_PIPELINE_CONFIG.threshold.base),
    SIMILARITY_STEP: numberFromEnv(DEFAULT_PIPELINE_CONFIG.threshold.step),
    SIMILARITY_FLOOR: numberFromEnv(DEFAULT_PIPELINE_CONFIG.threshold.floor),
    CANDIDATE_LIMIT: intFromEnv(DEFAULT_PIPELINE_CONFIG.retrieval.candidateLimit),
    SCAN_CAP: intFromEnv(DEFAULT_PIPELINE_CONFIG.retrieval.scanCap),

    NORMALIZATION_TABLE_PATH: z.string().default(DEFAULT_NORMALIZATION_TABLE_PATH),
    INVENTORY_FILE: z.string().optional(),
  })
  .refine(env => env.SIMILARITY_FLOOR > 0 && env.SIMILARITY_FLOOR <= env.SIMILARITY_BASE && env.SIMILARITY_BASE < 1, {
    message: 'Similarity settings must satisfy 0 < SIMILARITY_FLOOR <= SIMILARITY_BASE < 1',
    path: ['SIMILARITY_FLOOR'],
  })
  .refine(env => env.SIMILARITY_STEP >= 0, {
    message: 'SIMILARITY_STEP must not be negative',
    path: ['SIMILARITY_STEP'],
  });

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  openai: OpenAiSettings;
  vectorStore: 'qdrant' | 'memory';
  qdrant: QdrantStoreSettings;
  vectorSize: number;
  normalizationTablePath: string;
  // Loaded into the in-memory store at start-up
  inventoryFile?: string;
  pipeline: PipelineConfig;
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;

  return {
    port: values.PORT,
    corsOrigins: values.CORS_ORIGINS.split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    openai: {
      apiKey: values.OPENAI_API_KEY,
      chatModel: values.CHAT_MODEL,
      embeddingModel: values.EMBEDDING_MODEL,
      extractionTemperature: values.EXTRACTION_TEMPERATURE,
      answerTemperature: values.ANSWER_TEMPERATURE,
      maxRetries: values.OPENAI_MAX_RETRIES,
    },
    vectorStore: values.VECTOR_STORE,
    qdrant: {
      url: values.QDRANT_URL,
      apiKey: values.QDRANT_API_KEY,
      collection: values.QDRANT_COLLECTION,
    },
    vectorSize: values.VECTOR_SIZE,
    normalizationTablePath: values.NORMALIZATION_TABLE_PATH,
    inventoryFile: values.INVENTORY_FILE,
    pipeline: {
      threshold: {
        base: values.SIMILARITY_BASE,
        step: values.SIMILARITY_STEP,
        floor: values.SIMILARITY_FLOOR,
      },
      retrieval: {
        candidateLimit: values.CANDIDATE_LIMIT,
        scanCap: values.SCAN_CAP,
        embeddingTimeoutMs: values.EMBEDDING_TIMEOUT_MS,
      },
      extractionTimeoutMs: values.EXTRACTION_TIMEOUT_MS,
      answerTimeoutMs: values.ANSWER_TIMEOUT_MS,
    },
  };
}

/** Reads .env (if present) into process.env and parses the result. */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
