import OpenAI from 'openai';
import type { RequestOptions } from 'openai/core';
import { CallOptions, SearchModels } from '../types';

export interface OpenAiSettings {
  apiKey?: string;
  chatModel: string;
  embeddingModel: string;
  extractionTemperature: number;
  answerTemperature: number;
  maxRetries: number;
}

const EMBEDDING_BATCH_SIZE = 100;
const MAX_EMBEDDING_INPUT_CHARS = 8000;

export function getFilterExtractionPrompt(question: string): string {
  return `Extract search filters from this car shopping question.
Question: ${JSON.stringify(question)}

Fields (use null for anything not clearly stated; never guess):
- model: make and model, e.g. "Toyota Camry"
- min_price / max_price: price in tenge as a plain number ("до 15 млн" -> 15000000, "under 5 million" -> 5000000)
- min_mileage / max_mileage: mileage in km as a plain number
- color: the color exactly as written by the user
- city: the city exactly as written by the user
- year_preference: "newest", "oldest" or a specific model year number
- engine: engine description, e.g. "2.5 (бензин)"

Respond with a single JSON object containing exactly these keys:
{"model": null, "min_price": null, "max_price": null, "min_mileage": null, "max_mileage": null, "color": null, "city": null, "year_preference": null, "engine": null}`;
}

export function getAnswerSystemMessage(): string {
  return (
    'You are an experienced car consultant for a used car marketplace. ' +
    'Recommend vehicles only from the inventory you are given. Never invent cars, prices or links.'
  );
}

export function getAnswerUserPrompt(question: string, resultsText: string): string {
  return `A customer asks: ${JSON.stringify(question)}

Matching cars from our inventory (best match first):

${resultsText}

Guidelines:
1. Identify what the customer asked for (model, budget, mileage, color, city, year).
2. Recommend the best matching cars from the list and say briefly why each fits.
3. Include the URL of every car you recommend.
4. If the list is empty, say plainly that nothing in the inventory matches and suggest which criteria to relax. Do not describe cars that are not listed.
5. Answer in the language of the question, in a friendly, concise tone.`;
}

// Request-time calls run once within their timeout; only batch ingestion
// uses the client's retries.
function singleAttempt<Req>(options: CallOptions): RequestOptions<Req> {
  return { signal: options.signal, timeout: options.timeoutMs, maxRetries: 0 };
}

function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*/g, '').replace(/```/g, '').trim();
}

/**
 * SearchModels over the OpenAI API. The client is created on first use so the
 * process can start (and tests can run) without credentials.
 */
export class OpenAiSearchModels implements SearchModels {
  private client: OpenAI | null;

  constructor(private readonly settings: OpenAiSettings, client?: OpenAI) {
    this.client = client ?? null;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.settings.apiKey) {
        throw new Error('OPENAI_API_KEY is not set in environment variables');
      }
      this.client = new OpenAI({
        apiKey: this.settings.apiKey,
        maxRetries: this.settings.maxRetries,
      });
    }
    return this.client;
  }

  async extract(question: string, options: CallOptions = {}): Promise<string> {
    const response = await this.getClient().chat.completions.create(
      {
        model: this.settings.chatModel,
        messages: [
          {
            role: 'system',
            content: 'You extract structured data from search queries. Return only valid JSON.',
          },
          { role: 'user', content: getFilterExtractionPrompt(question) },
        ],
        temperature: this.settings.extractionTemperature,
        max_tokens: 200,
        response_format: { type: 'json_object' },
      },
      singleAttempt(options)
    );

    return stripCodeFences(response.choices[0]?.message.content ?? '');
  }

  async embed(text: string, options: CallOptions = {}): Promise<number[]> {
    const response = await this.getClient().embeddings.create(
      {
        model: this.settings.embeddingModel,
        input: text.trim(),
      },
      singleAttempt(options)
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error('Embedding response contained no vectors');
    }
    return embedding;
  }

  async compose(question: string, resultsText: string, options: CallOptions = {}): Promise<string> {
    const response = await this.getClient().chat.completions.create(
      {
        model: this.settings.chatModel,
        messages: [
          { role: 'system', content: getAnswerSystemMessage() },
          { role: 'user', content: getAnswerUserPrompt(question, resultsText) },
        ],
        temperature: this.settings.answerTemperature,
        max_tokens: 1000,
      },
      singleAttempt(options)
    );

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error('Chat response contained no text');
    }
    return content.trim();
  }

  /** Batch embedding for ingestion. Keeps input order. */
  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const client = this.getClient();
    const allEmbeddings: number[][] = [];
    const totalBatches = Math.ceil(texts.length / EMBEDDING_BATCH_SIZE);

    console.log(`Getting embeddings for ${texts.length} texts in batches of ${EMBEDDING_BATCH_SIZE}...`);

    for (let i = 0; i < texts.length; i += EMBEDDING_BATCH_SIZE) {
      const batchNum = Math.floor(i / EMBEDDING_BATCH_SIZE) + 1;
      const batch = texts.slice(i, i + EMBEDDING_BATCH_SIZE).map(t => {
        const trimmed = t.trim();
        return trimmed.length > MAX_EMBEDDING_INPUT_CHARS ? trimmed.substring(0, MAX_EMBEDDING_INPUT_CHARS) : trimmed;
      });

      const startTime = Date.now();
      const response = await client.embeddings.create({
        model: this.settings.embeddingModel,
        input: batch,
      });

      if (response.data.length !== batch.length) {
        throw new Error(
          `Embedding batch ${batchNum}: expected ${batch.length} embeddings, got ${response.data.length}`
        );
      }

      // Each item carries the index of its input
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      allEmbeddings.push(...ordered.map(item => item.embedding));
      console.log(`✓ Embedded batch ${batchNum}/${totalBatches} in ${Date.now() - startTime}ms`);

      if (i + EMBEDDING_BATCH_SIZE < texts.length) {
        await new Promise(resolve => setTimeout(resolve, 100));
      }
    }

    return allEmbeddings;
  }
}
