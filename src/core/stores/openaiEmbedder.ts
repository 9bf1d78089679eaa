import OpenAI from 'openai';
import type { Embedder } from '../embedding';
import { RequestCancelledError, StoreUnavailableError } from '../errors';

const REQUEST_TIMEOUT_MS = 7000;

/** Minimal slice of the OpenAI client, so tests can supply a stand-in. */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: { embedding: number[] }[] }>;
  };
}

export interface OpenAIEmbedderOptions {
  model: string;
  dim: number;
  apiKey?: string;
  client?: EmbeddingsClient;
}

/**
 * Connection failures, timeouts, rate limits and 5xx responses make the
 * vector source unavailable; anything else (bad key, bad request) does not.
 */
export function mapOpenAIError(e: unknown): unknown {
  if (e instanceof OpenAI.APIUserAbortError) return new RequestCancelledError('embedding');
  if (e instanceof OpenAI.APIConnectionTimeoutError) {
    return new StoreUnavailableError('vector', 'Embedding request timed out', { cause: e, reason: 'timeout' });
  }
  if (e instanceof OpenAI.APIConnectionError) {
    return new StoreUnavailableError('vector', 'Embedding service unreachable', { cause: e });
  }
  if (e instanceof OpenAI.APIError && typeof e.status === 'number' && (e.status === 429 || e.status >= 500)) {
    return new StoreUnavailableError('vector', `Embedding service returned ${e.status}`, { cause: e });
  }
  return e;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  readonly dim: number;
  private readonly client: EmbeddingsClient;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model;
    this.dim = options.dim;
    // Retries belong to the executor, not the client.
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0, timeout: REQUEST_TIMEOUT_MS });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let response: { data: { embedding: number[] }[] };
    try {
      response = await this.client.embeddings.create(
        { model: this.model, input: text.trim() || ' ', dimensions: this.dim },
        { signal }
      );
    } catch (e) {
      throw mapOpenAIError(e);
    }
    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) throw new Error(`Embedding response for ${this.model} was empty`);
    return embedding;
  }
}
