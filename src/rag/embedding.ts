/**
 * @fileoverview Embedding providers
 *
 * The OpenAI provider is constructed once at startup and injected into the
 * semantic index and ingestion pipeline.
 */

import OpenAI from 'openai';
import { ConfigurationError, ProviderError, describeError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('embedding');

export interface EmbeddingProvider {
  readonly name: string;
  /** False when the provider lacks credentials; calls then fail fast */
  isAvailable(): boolean;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbeddingConfig {
  apiKey: string | undefined;
  model?: string;
  timeoutMs?: number;
}

/**
 * Minimal surface of the OpenAI client used here
 */
export interface EmbeddingsApi {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai-embeddings';
  private readonly client: EmbeddingsApi | null;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(config: OpenAIEmbeddingConfig, client?: EmbeddingsApi) {
    this.model = config.model ?? 'text-embedding-ada-002';
    this.timeoutMs = config.timeoutMs ?? 15000;

    if (client) {
      this.client = client;
    } else if (config.apiKey) {
      // Retries are the caller's business
      this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0, timeout: this.timeoutMs });
    } else {
      this.client = null;
      logger.warn('OPENAI_API_KEY is not set; embedding provider unavailable');
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    if (!embedding) {
      throw new ProviderError(this.name, 'Embedding response was empty');
    }
    return embedding;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (!this.client) {
      throw new ConfigurationError('Embedding provider is not configured (OPENAI_API_KEY missing)');
    }
    if (texts.length === 0) return [];

    let response: Awaited<ReturnType<EmbeddingsApi['embeddings']['create']>>;
    try {
      response = await withTimeout(
        this.client.embeddings.create({ model: this.model, input: texts }),
        this.timeoutMs,
        this.name
      );
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(this.name, `Embedding request failed: ${describeError(error)}`);
    }

    if (!Array.isArray(response.data) || response.data.length !== texts.length) {
      throw new ProviderError(
        this.name,
        `Expected ${texts.length} embeddings, received ${response.data?.length ?? 0}`
      );
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => {
        if (!Array.isArray(item.embedding) || item.embedding.length === 0) {
          throw new ProviderError(this.name, 'Embedding response item had no vector');
        }
        return item.embedding;
      });
  }
}
