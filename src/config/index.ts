/**
 * @fileoverview Environment-driven configuration
 *
 * Loaded once at startup. Credentials are optional here: a missing key makes
 * the dependent component report itself unavailable instead of stopping the
 * whole server.
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().default('text-embedding-ada-002'),
  CHROMADB_URL: z.string().url().default('http://localhost:8000'),
  CHROMA_COLLECTION: z.string().min(1).default('totk_transcripts'),
  RETRIEVAL_RESULTS_PER_QUERY: z.coerce.number().int().min(1).max(20).default(3),
  RETRIEVAL_WORD_BUDGET: z.coerce.number().int().min(1).default(4000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).default(15000),
  COMPENDIUM_PATH: z.string().default('./data/compendium/COMPENDIUM.json'),
  COMPENDIUM_IMAGE_BASE_URL: optionalString,
  MAP_DATA_DIR: z.string().default('./data/maps/source_json'),
  MAP_ICON_DIR: z.string().default('./assets/icons'),
  MAP_REGIONS_PATH: z.string().default('./data/maps/regions.json'),
  MAP_OUTPUT_DIR: z.string().default('./generated_maps'),
  MAP_BASE_IMAGE_DIR: optionalString,
  WIKI_API_URL: z.string().url().default('https://zeldawiki.wiki/w/api.php'),
  WIKI_CONTENT_SELECTOR: z.string().default('.mw-parser-output'),
  YOUTUBE_API_KEY: optionalString,
  VIDEO_MAX_RESULTS: z.coerce.number().int().min(1).max(10).default(3),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  embedding: { apiKey: string | undefined; model: string };
  chroma: { url: string; collection: string };
  retrieval: { resultsPerQuery: number; wordBudget: number };
  timeoutMs: number;
  compendium: { path: string; imageBaseUrl: string | undefined };
  maps: {
    dataDir: string;
    iconDir: string;
    regionsPath: string;
    outputDir: string;
    baseImageDir: string | undefined;
  };
  wiki: { apiUrl: string; contentSelector: string };
  video: { apiKey: string | undefined; maxResults: number };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Validate an environment record. Throws ConfigurationError naming every
 * invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }

  const e = parsed.data;
  return Object.freeze({
    embedding: { apiKey: e.OPENAI_API_KEY, model: e.EMBEDDING_MODEL },
    chroma: { url: e.CHROMADB_URL, collection: e.CHROMA_COLLECTION },
    retrieval: { resultsPerQuery: e.RETRIEVAL_RESULTS_PER_QUERY, wordBudget: e.RETRIEVAL_WORD_BUDGET },
    timeoutMs: e.REQUEST_TIMEOUT_MS,
    compendium: { path: e.COMPENDIUM_PATH, imageBaseUrl: e.COMPENDIUM_IMAGE_BASE_URL },
    maps: {
      dataDir: e.MAP_DATA_DIR,
      iconDir: e.MAP_ICON_DIR,
      regionsPath: e.MAP_REGIONS_PATH,
      outputDir: e.MAP_OUTPUT_DIR,
      baseImageDir: e.MAP_BASE_IMAGE_DIR,
    },
    wiki: { apiUrl: e.WIKI_API_URL, contentSelector: e.WIKI_CONTENT_SELECTOR },
    video: { apiKey: e.YOUTUBE_API_KEY, maxResults: e.VIDEO_MAX_RESULTS },
    logLevel: e.LOG_LEVEL,
  });
}
