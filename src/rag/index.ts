/**
 * @fileoverview RAG module exports
 */

export { LoreDatabase } from './database.js';
export type { ChunkRecord, ScoredChunk, VectorStore, LoreDatabaseOptions } from './database.js';
export { OpenAIEmbeddingProvider } from './embedding.js';
export type { EmbeddingProvider, EmbeddingsApi } from './embedding.js';
export { RAGService, expandQuery, LORE_UNAVAILABLE } from './service.js';
export type { RetrieveOptions, RetrievalResult, LoreSearchOptions } from './service.js';
export { TranscriptIngestor, IngestionLockedError } from './ingest.js';
export type { IngestSummary } from './ingest.js';
export { chunkText, truncateWords, chunkId, splitWords } from './chunking.js';
