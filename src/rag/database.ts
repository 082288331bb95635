/**
 * @fileoverview ChromaDB wrapper for transcript chunk storage and retrieval
 *
 * The collection lives on a Chroma server, so it survives restarts of this
 * process. Embeddings are always computed by the injected provider; the
 * collection never embeds on its own.
 */

import { ChromaClient, type Collection } from 'chromadb';
import type { EmbeddingProvider } from './embedding.js';
import { ProviderError, describeError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('lore-db');

/**
 * A chunk of a source document with its vector
 */
export interface ChunkRecord {
  id: string;
  sourceId: string;
  text: string;
  embedding: number[];
  metadata?: Record<string, string | number | boolean>;
}

export interface ScoredChunk {
  id: string;
  text: string;
  /** Cosine similarity, higher is closer */
  score: number;
  sourceId: string | undefined;
}

/**
 * Persistent vector store keyed by chunk id
 */
export interface VectorStore {
  initialize(): Promise<void>;
  isInitialized(): boolean;
  count(): Promise<number>;
  has(id: string): Promise<boolean>;
  /** Returns false when the id already exists and nothing was written */
  upsertIfAbsent(record: ChunkRecord): Promise<boolean>;
  /** Nearest neighbours, most similar first */
  query(embedding: number[], k: number): Promise<ScoredChunk[]>;
}

export interface LoreDatabaseOptions {
  url: string;
  collection: string;
  timeoutMs?: number;
}

export class LoreDatabase implements VectorStore {
  private readonly client: ChromaClient;
  private collection: Collection | null = null;
  private initialized = false;
  private readonly collectionName: string;
  private readonly timeoutMs: number;

  constructor(
    options: LoreDatabaseOptions,
    private readonly embedder: EmbeddingProvider
  ) {
    this.client = new ChromaClient({ path: options.url });
    this.collectionName = options.collection;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  /**
   * Open or create the collection
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      logger.info('Initializing ChromaDB connection...', { collection: this.collectionName });
      this.collection = await this.call(this.openCollection());

      const count = await this.call(this.collection.count());
      logger.info(`ChromaDB initialized. Collection has ${count} chunks.`);
      this.initialized = true;
    } catch (error) {
      logger.error('Failed to initialize ChromaDB', { error });
      throw error instanceof ProviderError
        ? error
        : new ProviderError('chromadb', `Could not open collection: ${describeError(error)}`);
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async count(): Promise<number> {
    if (!this.collection) return 0;
    return this.call(this.collection.count());
  }

  async has(id: string): Promise<boolean> {
    const collection = this.requireCollection();
    const existing = await this.call(collection.get({ ids: [id] }));
    return existing.ids.length > 0;
  }

  async upsertIfAbsent(record: ChunkRecord): Promise<boolean> {
    const collection = this.requireCollection();

    if (await this.has(record.id)) {
      logger.debug('Chunk already stored, skipping', { id: record.id });
      return false;
    }

    await this.call(
      collection.add({
        ids: [record.id],
        embeddings: [record.embedding],
        documents: [record.text],
        metadatas: [{ ...record.metadata, source_id: record.sourceId }],
      })
    );
    return true;
  }

  async query(embedding: number[], k: number): Promise<ScoredChunk[]> {
    const collection = this.requireCollection();

    const results = await this.call(
      collection.query({
        queryEmbeddings: [embedding],
        nResults: k,
      })
    );

    const ids = results.ids?.[0] ?? [];
    const documents = results.documents?.[0] ?? [];
    const distances = results.distances?.[0] ?? [];
    const metadatas = results.metadatas?.[0] ?? [];

    const chunks: ScoredChunk[] = [];
    for (let i = 0; i < documents.length; i++) {
      const text = documents[i];
      if (!text) continue;

      const sourceId = metadatas[i]?.source_id;
      chunks.push({
        id: ids[i] ?? '',
        text,
        // Cosine distance to similarity
        score: 1 - (distances[i] ?? 1),
        sourceId: typeof sourceId === 'string' ? sourceId : undefined,
      });
    }

    return chunks.sort((a, b) => b.score - a.score);
  }

  private openCollection(): Promise<Collection> {
    return this.client.getOrCreateCollection({
      name: this.collectionName,
      metadata: { 'hnsw:space': 'cosine' },
      embeddingFunction: { generate: texts => this.embedder.embedMany(texts) },
    });
  }

  private requireCollection(): Collection {
    if (!this.collection) {
      throw new ProviderError('chromadb', 'Database not initialized. Call initialize() first.');
    }
    return this.collection;
  }

  private call<T>(promise: Promise<T>): Promise<T> {
    return withTimeout(promise, this.timeoutMs, 'chromadb');
  }
}
