/**
 * @fileoverview Word-bounded text chunking for transcript ingestion
 */

import { ValidationError } from '../utils/errors.js';

export interface ChunkOptions {
  /** Words per chunk (the last chunk may be shorter) */
  maxWords?: number;
  /** Words shared by consecutive chunks */
  overlap?: number;
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(word => word.length > 0);
}

/**
 * Split text into overlapping chunks of whole words.
 *
 * Consecutive chunks share exactly `overlap` words. Throws when
 * `maxWords <= overlap`, since the window would never advance.
 */
export function chunkText(text: string, options: ChunkOptions = {}): string[] {
  const { maxWords = 300, overlap = 50 } = options;

  if (!Number.isInteger(maxWords) || maxWords < 1) {
    throw new ValidationError('maxWords', `expected a positive integer, got ${maxWords}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError('overlap', `expected a non-negative integer, got ${overlap}`);
  }
  if (maxWords <= overlap) {
    throw new ValidationError('overlap', `must be smaller than maxWords (${overlap} >= ${maxWords})`);
  }

  const words = splitWords(text);
  if (words.length === 0) return [];

  const step = maxWords - overlap;
  const chunks: string[] = [];
  for (let start = 0; start < words.length; start += step) {
    const end = start + maxWords;
    chunks.push(words.slice(start, end).join(' '));
    if (end >= words.length) break;
  }
  return chunks;
}

/**
 * Keep at most `maxWords` words, normalising whitespace when truncating
 */
export function truncateWords(text: string, maxWords: number): string {
  const words = splitWords(text);
  if (words.length <= maxWords) return text;
  return words.slice(0, maxWords).join(' ');
}

/**
 * Deterministic id so re-ingesting a source is idempotent
 */
export function chunkId(sourceId: string, ordinal: number): string {
  return `${sourceId}_chunk_${ordinal}`;
}
