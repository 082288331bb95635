export { createHttpClient } from './http.js';
export type { HttpClient, HttpRequestConfig } from './http.js';
export { WikiClient, extractPage, wikiSegments, WIKI_NOT_FOUND } from './wiki-client.js';
export type { WikiPage, WikiClientOptions } from './wiki-client.js';
export {
  VideoSearchClient,
  videoNotFound,
  VIDEO_SEARCH_UNAVAILABLE,
  VIDEO_RESULTS_INTRO,
} from './video-search.js';
export type { VideoResult, VideoSearchOptions } from './video-search.js';
