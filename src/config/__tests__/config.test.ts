import { describe, it, expect } from 'vitest';
import { loadConfig } from '../index.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('fills every default from an empty environment', () => {
    const config = loadConfig({});

    expect(config.embedding).toEqual({ apiKey: undefined, model: 'text-embedding-ada-002' });
    expect(config.chroma).toEqual({ url: 'http://localhost:8000', collection: 'totk_transcripts' });
    expect(config.retrieval).toEqual({ resultsPerQuery: 3, wordBudget: 4000 });
    expect(config.timeoutMs).toBe(15000);
    expect(config.maps.baseImageDir).toBeUndefined();
    expect(config.video).toEqual({ apiKey: undefined, maxResults: 3 });
    expect(config.logLevel).toBe('info');
  });

  it('reads and coerces values', () => {
    const config = loadConfig({
      OPENAI_API_KEY: ' test-secret ',
      RETRIEVAL_RESULTS_PER_QUERY: '5',
      REQUEST_TIMEOUT_MS: '2500',
      YOUTUBE_API_KEY: '   ',
      MAP_BASE_IMAGE_DIR: './assets/base_maps',
    });

    expect(config.embedding.apiKey).toBe('test-secret');
    expect(config.retrieval.resultsPerQuery).toBe(5);
    expect(config.timeoutMs).toBe(2500);
    expect(config.video.apiKey).toBeUndefined();
    expect(config.maps.baseImageDir).toBe('./assets/base_maps');
  });

  it('names every invalid variable', () => {
    const load = () => loadConfig({ CHROMADB_URL: 'not a url', RETRIEVAL_RESULTS_PER_QUERY: '0' });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow(/CHROMADB_URL: .*; RETRIEVAL_RESULTS_PER_QUERY: /);
  });
});
