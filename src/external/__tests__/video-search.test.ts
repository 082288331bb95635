import { describe, it, expect } from 'vitest';
import {
  VIDEO_RESULTS_INTRO,
  VIDEO_SEARCH_UNAVAILABLE,
  VideoSearchClient,
  videoNotFound,
} from '../video-search.js';
import { ConfigurationError, toUserMessage, ProviderError } from '../../utils/errors.js';
import { silent, speak } from '../../protocol/tags.js';
import { FakeHttpClient } from './fake-http.js';

const RESPONSE = {
  items: [
    { id: { videoId: 'abc123' }, snippet: { title: 'Jochi-ihiga Shrine guide' } },
    { id: { kind: 'youtube#channel' }, snippet: { title: 'A channel' } },
    { id: { videoId: 'def456' }, snippet: { title: 'All shrines in Hebra' } },
  ],
};

describe('VideoSearchClient.findVideos', () => {
  it('queries the search endpoint and keeps only videos', async () => {
    const http = new FakeHttpClient(() => RESPONSE);
    const client = new VideoSearchClient({ apiKey: 'test-key' }, http);

    const videos = await client.findVideos('Jochi-ihiga shrine');

    expect(videos).toEqual([
      { title: 'Jochi-ihiga Shrine guide', url: 'https://www.youtube.com/watch?v=abc123' },
      { title: 'All shrines in Hebra', url: 'https://www.youtube.com/watch?v=def456' },
    ]);
    expect(http.requests).toEqual([
      {
        url: 'https://www.googleapis.com/youtube/v3/search',
        config: {
          params: {
            part: 'snippet',
            q: 'Tears of the Kingdom Jochi-ihiga shrine walkthrough guide',
            maxResults: 3,
            type: 'video',
            key: 'test-key',
          },
        },
      },
    ]);
  });

  it('treats a missing items list as no results', async () => {
    const client = new VideoSearchClient({ apiKey: 'test-key' }, new FakeHttpClient(() => ({})));
    expect(await client.findVideos('anything', 5)).toEqual([]);
  });

  it('requires an API key', async () => {
    const client = new VideoSearchClient({ apiKey: undefined }, new FakeHttpClient(() => RESPONSE));
    await expect(client.findVideos('shrine')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('wraps request failures as provider errors', async () => {
    const http = new FakeHttpClient(() => {
      throw new Error('quota exceeded');
    });
    const client = new VideoSearchClient({ apiKey: 'test-key' }, http);
    await expect(client.findVideos('shrine')).rejects.toBeInstanceOf(ProviderError);
  });
});

describe('VideoSearchClient.search', () => {
  it('speaks the intro and lists the links as display-only text', async () => {
    const client = new VideoSearchClient({ apiKey: 'test-key', maxResults: 2 }, new FakeHttpClient(() => RESPONSE));

    expect(await client.search('Jochi-ihiga shrine')).toEqual([
      speak(VIDEO_RESULTS_INTRO),
      silent(
        '- Jochi-ihiga Shrine guide: https://www.youtube.com/watch?v=abc123\n' +
          '- All shrines in Hebra: https://www.youtube.com/watch?v=def456'
      ),
    ]);
  });

  it('apologises without a key and makes no request', async () => {
    const http = new FakeHttpClient(() => RESPONSE);
    const client = new VideoSearchClient({ apiKey: '' }, http);

    expect(client.isAvailable()).toBe(false);
    expect(await client.search('shrine')).toEqual([speak(VIDEO_SEARCH_UNAVAILABLE)]);
    expect(http.requests).toHaveLength(0);
  });

  it('says so when nothing was found', async () => {
    const client = new VideoSearchClient({ apiKey: 'test-key' }, new FakeHttpClient(() => ({ items: [] })));
    expect(await client.search('the lost temple')).toEqual([
      speak("I searched the archives but could not find specific guidance for 'the lost temple'."),
    ]);
    expect(videoNotFound('x')).toBe("I searched the archives but could not find specific guidance for 'x'.");
  });

  it('turns a failure into an in-character sentence', async () => {
    const client = new VideoSearchClient({ apiKey: 'test-key' }, new FakeHttpClient(() => 'not json'));
    expect(await client.search('shrine')).toEqual([
      speak(toUserMessage(new ProviderError('youtube', 'Unexpected search response shape'))),
    ]);
  });
});
