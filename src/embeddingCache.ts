import OpenAI from 'openai';

import type { EmbeddingService } from './catalog.js';
import { ConfigurationError } from './config.js';
import { describeError } from './errors.js';
import type { Logger } from './logging.js';

/**
 * Process-lifetime memo of text → vector. Concurrent requests for the same text
 * share one upstream call; failed calls are not remembered.
 */
export class EmbeddingCache implements EmbeddingService {
  private readonly vectors = new Map<string, Promise<number[]>>();

  constructor(private readonly service: EmbeddingService) {}

  embed(text: string): Promise<number[]> {
    const cached = this.vectors.get(text);
    if (cached) {
      return cached;
    }
    return this.remember(text, this.service.embed(text));
  }

  /** Texts not yet known are sent to the service as one batch. */
  embedMany(texts: readonly string[]): Promise<number[][]> {
    const missing = Array.from(new Set(texts.filter((text) => !this.vectors.has(text))));
    if (missing.length > 0) {
      const batch = this.service.embedMany(missing);
      missing.forEach((text, index) => {
        this.remember(
          text,
          batch.then((vectors) => {
            const vector = vectors[index];
            if (!vector) {
              throw new Error(`Embedding batch returned no vector for "${text}".`);
            }
            return vector;
          })
        );
      });
    }
    return Promise.all(texts.map((text) => this.embed(text)));
  }

  get size(): number {
    return this.vectors.size;
  }

  private remember(text: string, pending: Promise<number[]>): Promise<number[]> {
    this.vectors.set(text, pending);
    void pending.catch(() => {
      if (this.vectors.get(text) === pending) {
        this.vectors.delete(text);
      }
    });
    return pending;
  }
}

export interface OpenAIEmbeddingServiceOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
  logger?: Logger;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly logger?: Logger;

  constructor(options: OpenAIEmbeddingServiceOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseURL ? { baseURL: options.baseURL } : {})
    });
    this.model = options.model;
    this.logger = options.logger;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      const response = await this.client.embeddings.create({ model: this.model, input: [...texts] });
      const byIndex = new Map(response.data.map((entry): [number, number[]] => [entry.index, entry.embedding]));
      return texts.map((text, index) => {
        const vector = byIndex.get(index);
        if (!Array.isArray(vector) || vector.length === 0) {
          throw new Error(`Embedding response for "${text}" contained no vector.`);
        }
        return vector;
      });
    } catch (error) {
      if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
        throw new ConfigurationError(`Embedding provider rejected the configured credentials: ${error.message}`, {
          cause: error
        });
      }
      const more = texts.length > 1 ? ` and ${texts.length - 1} more` : '';
      this.logger?.(`Embedding request failed for "${texts[0]}"${more}: ${describeError(error)}`);
      throw error;
    }
  }
}
