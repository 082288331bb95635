/**
 * @fileoverview Game wiki lookup
 *
 * Finds the best page for a query through the MediaWiki opensearch API,
 * then pulls the first paragraph and first image out of the page body.
 */

import { JSDOM } from 'jsdom';
import { z } from 'zod';
import { ProviderError, describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { image, speak, type ResponseSegment } from '../protocol/tags.js';
import { createHttpClient, type HttpClient } from './http.js';

const logger = rootLogger.child('wiki');

// [search term, titles, descriptions, urls]
const openSearchSchema = z.tuple([z.string(), z.array(z.string()), z.array(z.string()), z.array(z.string())]);

export interface WikiPage {
  title: string;
  pageUrl: string;
  summary: string | null;
  imageUrl: string | null;
}

export interface WikiClientOptions {
  apiUrl: string;
  contentSelector?: string;
  timeoutMs?: number;
}

export const WIKI_NOT_FOUND = 'I could not find a relevant page on the wiki for that.';

/**
 * First non-empty paragraph and first image of a rendered wiki page
 */
export function extractPage(
  html: string,
  pageUrl: string,
  contentSelector: string
): Pick<WikiPage, 'summary' | 'imageUrl'> {
  const { document } = new JSDOM(html, { url: pageUrl }).window;
  const content = document.querySelector(contentSelector) ?? document.body;

  let summary: string | null = null;
  for (const paragraph of Array.from(content.querySelectorAll('p'))) {
    const text = (paragraph.textContent ?? '').replace(/\s+/g, ' ').trim();
    if (text) {
      summary = text;
      break;
    }
  }

  const src = content.querySelector('img[src]')?.getAttribute('src');
  const imageUrl = src ? new URL(src, pageUrl).href : null;

  return { summary, imageUrl };
}

export class WikiClient {
  private readonly http: HttpClient;
  private readonly contentSelector: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly options: WikiClientOptions,
    http?: HttpClient
  ) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.contentSelector = options.contentSelector ?? '.mw-parser-output';
    this.http = http ?? createHttpClient(this.timeoutMs);
  }

  /**
   * Returns null when no page matches or the page has neither text nor image.
   * Network and parse failures throw ProviderError.
   */
  async lookup(query: string): Promise<WikiPage | null> {
    const trimmed = query.trim();
    if (!trimmed) return null;

    const found = await this.search(trimmed);
    if (!found) {
      logger.debug('No wiki page for query', { query: trimmed });
      return null;
    }

    let html: unknown;
    try {
      const response = await withTimeout(
        this.http.get(found.pageUrl, { responseType: 'text' }),
        this.timeoutMs,
        'wiki'
      );
      html = response.data;
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError('wiki', `Page fetch failed: ${describeError(error)}`, { url: found.pageUrl });
    }
    if (typeof html !== 'string') {
      throw new ProviderError('wiki', 'Page response was not HTML', { url: found.pageUrl });
    }

    const { summary, imageUrl } = extractPage(html, found.pageUrl, this.contentSelector);
    logger.info('Wiki page scraped', {
      title: found.title,
      summary: summary !== null,
      image: imageUrl !== null,
    });
    if (!summary && !imageUrl) return null;

    return { ...found, summary, imageUrl };
  }

  private async search(query: string): Promise<{ title: string; pageUrl: string } | null> {
    let data: unknown;
    try {
      const response = await withTimeout(
        this.http.get(this.options.apiUrl, {
          params: { action: 'opensearch', search: query, limit: 1, namespace: 0, format: 'json' },
        }),
        this.timeoutMs,
        'wiki'
      );
      data = response.data;
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError('wiki', `Search failed: ${describeError(error)}`, { query });
    }

    const parsed = openSearchSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('wiki', 'Unexpected search response shape', { query });
    }
    const [, titles, , urls] = parsed.data;
    const title = titles[0];
    const pageUrl = urls[0];
    return title && pageUrl ? { title, pageUrl } : null;
  }
}

/**
 * Summary as prose, image marker after it
 */
export function wikiSegments(page: WikiPage | null): ResponseSegment[] {
  if (!page) return [speak(WIKI_NOT_FOUND)];
  const segments: ResponseSegment[] = [speak(page.summary ?? `Here is what the wiki shows of ${page.title}.`)];
  if (page.imageUrl) segments.push(image(page.imageUrl));
  return segments;
}
