import { describe, it, expect } from 'vitest';
import { WIKI_NOT_FOUND, WikiClient, extractPage, wikiSegments } from '../wiki-client.js';
import { ProviderError } from '../../utils/errors.js';
import { image, speak } from '../../protocol/tags.js';
import { FakeHttpClient } from './fake-http.js';

const API_URL = 'https://wiki.example/api.php';
const PAGE_URL = 'https://wiki.example/wiki/Lynel';

const LYNEL_HTML = `<html><body>
  <div class="sidebar"><p>Navigation</p></div>
  <div class="mw-parser-output">
    <p>   </p>
    <p>Lynels are   fearsome
      centaur-like beasts.</p>
    <p>Second paragraph.</p>
    <img src="/images/lynel.png">
  </div>
</body></html>`;

function wikiHttp(html: unknown = LYNEL_HTML, hits: string[] = ['Lynel']): FakeHttpClient {
  return new FakeHttpClient(url => {
    if (url === API_URL) {
      return ['lynel', hits, hits.map(() => ''), hits.map(() => PAGE_URL)];
    }
    return html;
  });
}

describe('extractPage', () => {
  it('takes the first non-empty paragraph of the content area and resolves the image', () => {
    expect(extractPage(LYNEL_HTML, PAGE_URL, '.mw-parser-output')).toEqual({
      summary: 'Lynels are fearsome centaur-like beasts.',
      imageUrl: 'https://wiki.example/images/lynel.png',
    });
  });

  it('falls back to the whole body when the selector matches nothing', () => {
    expect(extractPage(LYNEL_HTML, PAGE_URL, '#missing').summary).toBe('Navigation');
  });

  it('returns nulls for an empty page', () => {
    expect(extractPage('<p></p>', PAGE_URL, 'main')).toEqual({ summary: null, imageUrl: null });
  });
});

describe('WikiClient.lookup', () => {
  it('searches, then scrapes the best page', async () => {
    const http = wikiHttp();
    const client = new WikiClient({ apiUrl: API_URL }, http);

    const page = await client.lookup('  lynel ');

    expect(page).toEqual({
      title: 'Lynel',
      pageUrl: PAGE_URL,
      summary: 'Lynels are fearsome centaur-like beasts.',
      imageUrl: 'https://wiki.example/images/lynel.png',
    });
    expect(http.requests).toEqual([
      {
        url: API_URL,
        config: { params: { action: 'opensearch', search: 'lynel', limit: 1, namespace: 0, format: 'json' } },
      },
      { url: PAGE_URL, config: { responseType: 'text' } },
    ]);
  });

  it('returns null without calling out for a blank query', async () => {
    const http = wikiHttp();
    expect(await new WikiClient({ apiUrl: API_URL }, http).lookup('   ')).toBeNull();
    expect(http.requests).toHaveLength(0);
  });

  it('returns null when no page matches', async () => {
    const http = wikiHttp(LYNEL_HTML, []);
    expect(await new WikiClient({ apiUrl: API_URL }, http).lookup('zonai')).toBeNull();
    expect(http.requests).toHaveLength(1);
  });

  it('returns null when the page has neither text nor image', async () => {
    const client = new WikiClient({ apiUrl: API_URL }, wikiHttp('<div class="mw-parser-output"></div>'));
    expect(await client.lookup('lynel')).toBeNull();
  });

  it('wraps network failures as provider errors', async () => {
    const http = new FakeHttpClient(() => {
      throw new Error('ECONNRESET');
    });
    const lookup = new WikiClient({ apiUrl: API_URL }, http).lookup('lynel');

    await expect(lookup).rejects.toBeInstanceOf(ProviderError);
    await expect(lookup).rejects.toThrow('Search failed: Error: ECONNRESET');
  });

  it('rejects an unexpected search response', async () => {
    const client = new WikiClient({ apiUrl: API_URL }, new FakeHttpClient(() => ({ results: [] })));
    await expect(client.lookup('lynel')).rejects.toThrow('Unexpected search response shape');
  });

  it('rejects a page body that is not text', async () => {
    const client = new WikiClient({ apiUrl: API_URL }, wikiHttp({ html: LYNEL_HTML }));
    await expect(client.lookup('lynel')).rejects.toThrow('Page response was not HTML');
  });
});

describe('wikiSegments', () => {
  it('speaks the summary and shows the image', () => {
    expect(
      wikiSegments({ title: 'Lynel', pageUrl: PAGE_URL, summary: 'A beast.', imageUrl: 'https://wiki.example/l.png' })
    ).toEqual([speak('A beast.'), image('https://wiki.example/l.png')]);
  });

  it('introduces an image-only page by title', () => {
    expect(wikiSegments({ title: 'Lynel', pageUrl: PAGE_URL, summary: null, imageUrl: null })).toEqual([
      speak('Here is what the wiki shows of Lynel.'),
    ]);
  });

  it('says so when nothing was found', () => {
    expect(wikiSegments(null)).toEqual([speak(WIKI_NOT_FOUND)]);
  });
});
