/**
 * @fileoverview Lore retrieval over the transcript index
 *
 * Expands a question into a few related sub-queries, collects the nearest
 * chunks for each, deduplicates them and cuts the result to a word budget.
 */

import type { EmbeddingProvider } from './embedding.js';
import type { ScoredChunk, VectorStore } from './database.js';
import { truncateWords } from './chunking.js';
import { describeError, toUserMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('rag');

export const LORE_UNAVAILABLE =
  'Error: my archive of recorded memories is not available right now.';

export interface RetrieveOptions {
  /** Nearest chunks fetched per sub-query */
  resultsPerQuery?: number;
  /** Hard cap on words in the returned context */
  wordBudget?: number;
}

export interface LoreSearchOptions {
  limit?: number;
  /** Minimum similarity (0-1) */
  minRelevance?: number;
}

export type RetrievalStatus = 'ok' | 'empty' | 'unavailable' | 'failed';

export interface RetrievalResult {
  status: RetrievalStatus;
  /** Context text, or a sentinel sentence when status is unavailable/failed */
  context: string;
  subQueries: string[];
  chunkCount: number;
  failedQueries: string[];
}

/**
 * The literal question plus templated variants that widen recall on
 * paraphrased lore references
 */
export function expandQuery(query: string): string[] {
  const q = query.trim();
  return [
    q,
    `Background information on ${q}`,
    `Historical context of ${q}`,
    `Key events related to ${q} in Hyrule's history`,
  ];
}

export class RAGService {
  private readonly resultsPerQuery: number;
  private readonly wordBudget: number;

  constructor(
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingProvider,
    defaults: RetrieveOptions = {}
  ) {
    this.resultsPerQuery = defaults.resultsPerQuery ?? 3;
    this.wordBudget = defaults.wordBudget ?? 4000;
  }

  /**
   * Open the backing store. Failure leaves the service unavailable rather
   * than stopping startup.
   */
  async initialize(): Promise<void> {
    try {
      await this.store.initialize();
      logger.info('RAG Service initialized');
    } catch (error) {
      logger.error('RAG Service unavailable', { error: describeError(error) });
    }
  }

  isReady(): boolean {
    return this.store.isInitialized() && this.embedder.isAvailable();
  }

  async getDocumentCount(): Promise<number> {
    if (!this.store.isInitialized()) return 0;
    return this.store.count();
  }

  /**
   * Single-query semantic search with scores
   */
  async search(query: string, options: LoreSearchOptions = {}): Promise<ScoredChunk[]> {
    const { limit = 5, minRelevance = 0 } = options;
    logger.info('Lore search', { query, limit });

    const embedding = await this.embedder.embed(query);
    const results = await this.store.query(embedding, limit);
    return results.filter(r => r.score >= minRelevance);
  }

  /**
   * Context string for the model. Never throws.
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<string> {
    const result = await this.retrieveDetailed(query, options);
    return result.context;
  }

  async retrieveDetailed(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const resultsPerQuery = options.resultsPerQuery ?? this.resultsPerQuery;
    const wordBudget = options.wordBudget ?? this.wordBudget;
    const subQueries = expandQuery(query);

    if (!this.isReady()) {
      logger.warn('Retrieval requested while lore index is unavailable', {
        storeReady: this.store.isInitialized(),
        embedderReady: this.embedder.isAvailable(),
      });
      return { status: 'unavailable', context: LORE_UNAVAILABLE, subQueries, chunkCount: 0, failedQueries: [] };
    }

    // Insertion-ordered set keyed by exact text
    const texts = new Set<string>();
    const failedQueries: string[] = [];
    let lastError: unknown;

    for (const subQuery of subQueries) {
      try {
        const embedding = await this.embedder.embed(subQuery);
        const results = await this.store.query(embedding, resultsPerQuery);
        for (const result of results) {
          texts.add(result.text);
        }
      } catch (error) {
        failedQueries.push(subQuery);
        lastError = error;
        logger.warn('Sub-query failed, skipping', { subQuery, error: describeError(error) });
      }
    }

    if (failedQueries.length === subQueries.length) {
      return {
        status: 'failed',
        context: toUserMessage(lastError),
        subQueries,
        chunkCount: 0,
        failedQueries,
      };
    }

    const context = truncateWords([...texts].join(' '), wordBudget);
    logger.debug('Retrieved lore context', { query, chunks: texts.size, failed: failedQueries.length });

    return {
      status: texts.size === 0 ? 'empty' : 'ok',
      context,
      subQueries,
      chunkCount: texts.size,
      failedQueries,
    };
  }
}
