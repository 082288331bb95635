/**
 * @fileoverview Offline transcript ingestion
 *
 * Only one ingestion may write at a time: an in-process flag guards this
 * process and an exclusive lock file guards against a second process.
 * Queries never take the lock.
 */

import { open, readFile, rm, type FileHandle } from 'fs/promises';
import type { EmbeddingProvider } from './embedding.js';
import type { VectorStore } from './database.js';
import { chunkId, chunkText, type ChunkOptions } from './chunking.js';
import { ConfigurationError, SlateError, ErrorCode, describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('ingest');

export interface IngestSummary {
  sourceId: string;
  chunks: number;
  added: number;
  skipped: number;
  failed: number;
}

export class IngestionLockedError extends SlateError {
  constructor(holder: string) {
    super(ErrorCode.INTERNAL, `Another ingestion is already running (${holder})`, { holder });
    this.name = 'IngestionLockedError';
  }
}

export interface IngestorOptions extends ChunkOptions {
  /** Lock file shared by every ingesting process; omit for in-process only */
  lockPath?: string;
  sourceType?: string;
}

export class TranscriptIngestor {
  private running = false;

  constructor(
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingProvider,
    private readonly options: IngestorOptions = {}
  ) {}

  /**
   * Ingest several sources under one lock
   */
  async ingestAll(sources: Array<{ sourceId: string; text: string }>): Promise<IngestSummary[]> {
    return this.exclusive(async () => {
      const summaries: IngestSummary[] = [];
      for (const source of sources) {
        summaries.push(await this.ingestSource(source.sourceId, source.text));
      }
      return summaries;
    });
  }

  async ingest(sourceId: string, text: string): Promise<IngestSummary> {
    return this.exclusive(() => this.ingestSource(sourceId, text));
  }

  private async ingestSource(sourceId: string, text: string): Promise<IngestSummary> {
    if (!this.embedder.isAvailable()) {
      throw new ConfigurationError('Cannot ingest without an embedding provider');
    }

    const chunks = chunkText(text, this.options);
    const summary: IngestSummary = { sourceId, chunks: chunks.length, added: 0, skipped: 0, failed: 0 };

    if (chunks.length === 0) {
      logger.warn('No chunks generated, skipping source', { sourceId });
      return summary;
    }

    logger.info(`Ingesting ${chunks.length} chunks`, { sourceId });

    for (const [ordinal, chunk] of chunks.entries()) {
      const id = chunkId(sourceId, ordinal);
      try {
        // Skip before embedding so re-runs cost nothing
        if (await this.store.has(id)) {
          summary.skipped++;
          continue;
        }
        const embedding = await this.embedder.embed(chunk);
        const added = await this.store.upsertIfAbsent({
          id,
          sourceId,
          text: chunk,
          embedding,
          metadata: { source_type: this.options.sourceType ?? 'transcript' },
        });
        if (added) summary.added++;
        else summary.skipped++;
      } catch (error) {
        summary.failed++;
        logger.error('Failed to ingest chunk', { id, error: describeError(error) });
      }
    }

    logger.info('Source ingested', { ...summary });
    return summary;
  }

  private async exclusive<T>(work: () => Promise<T>): Promise<T> {
    if (this.running) {
      throw new IngestionLockedError(`pid ${process.pid}`);
    }
    this.running = true;

    const lockPath = this.options.lockPath;
    let lock: FileHandle | undefined;
    try {
      if (lockPath) {
        lock = await this.acquireLock(lockPath);
      }
      return await work();
    } finally {
      if (lock && lockPath) {
        await lock.close();
        await rm(lockPath, { force: true });
      }
      this.running = false;
    }
  }

  private async acquireLock(lockPath: string): Promise<FileHandle> {
    try {
      const handle = await open(lockPath, 'wx');
      await handle.writeFile(JSON.stringify({ pid: process.pid, startedAt: new Date().toISOString() }));
      return handle;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        const holder = await readFile(lockPath, 'utf-8').catch(() => 'unknown holder');
        throw new IngestionLockedError(holder);
      }
      throw error;
    }
  }
}
