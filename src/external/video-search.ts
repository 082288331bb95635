/**
 * @fileoverview Walkthrough video search on the YouTube Data API v3
 */

import { z } from 'zod';
import { ConfigurationError, ProviderError, describeError, toUserMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { silent, speak, type ResponseSegment } from '../protocol/tags.js';
import { createHttpClient, type HttpClient } from './http.js';

const logger = rootLogger.child('video');

const SEARCH_URL = 'https://www.googleapis.com/youtube/v3/search';

export const VIDEO_SEARCH_UNAVAILABLE =
  'I am sorry, but I cannot search for guidance at this time. The connection to the archives is unavailable.';

export const VIDEO_RESULTS_INTRO = 'Here are some visual records that may aid you on your quest:';

const searchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional() }),
        snippet: z.object({ title: z.string() }),
      })
    )
    .default([]),
});

export interface VideoResult {
  title: string;
  url: string;
}

export interface VideoSearchOptions {
  apiKey: string | undefined;
  maxResults?: number;
  timeoutMs?: number;
}

export function videoNotFound(query: string): string {
  return `I searched the archives but could not find specific guidance for '${query}'.`;
}

export class VideoSearchClient {
  private readonly http: HttpClient;
  private readonly maxResults: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly options: VideoSearchOptions,
    http?: HttpClient
  ) {
    this.maxResults = options.maxResults ?? 3;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.http = http ?? createHttpClient(this.timeoutMs);
  }

  isAvailable(): boolean {
    return Boolean(this.options.apiKey);
  }

  /**
   * Videos for a walkthrough query. Throws ConfigurationError without an
   * API key, ProviderError when the API call fails.
   */
  async findVideos(query: string, maxResults: number = this.maxResults): Promise<VideoResult[]> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new ConfigurationError('YOUTUBE_API_KEY is not set');
    }

    let data: unknown;
    try {
      const response = await withTimeout(
        this.http.get(SEARCH_URL, {
          params: {
            part: 'snippet',
            q: `Tears of the Kingdom ${query} walkthrough guide`,
            maxResults,
            type: 'video',
            key: apiKey,
          },
        }),
        this.timeoutMs,
        'youtube'
      );
      data = response.data;
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError('youtube', `Search failed: ${describeError(error)}`, { query });
    }

    const parsed = searchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('youtube', 'Unexpected search response shape', { query });
    }

    const videos: VideoResult[] = [];
    for (const item of parsed.data.items) {
      if (!item.id.videoId) continue;
      videos.push({ title: item.snippet.title, url: `https://www.youtube.com/watch?v=${item.id.videoId}` });
    }
    logger.info('Video search finished', { query, results: videos.length });
    return videos;
  }

  /**
   * Tagged answer: the intro is spoken, the links are display-only.
   * Failures come back as in-character sentences.
   */
  async search(query: string, maxResults?: number): Promise<ResponseSegment[]> {
    if (!this.isAvailable()) return [speak(VIDEO_SEARCH_UNAVAILABLE)];

    try {
      const videos = await this.findVideos(query, maxResults);
      if (videos.length === 0) return [speak(videoNotFound(query))];
      return [speak(VIDEO_RESULTS_INTRO), silent(videos.map(v => `- ${v.title}: ${v.url}`).join('\n'))];
    } catch (error) {
      logger.error('Video search failed', { query, error: describeError(error) });
      return [speak(toUserMessage(error))];
    }
  }
}
