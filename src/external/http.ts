import axios from 'axios';

export interface HttpRequestConfig {
  params?: Record<string, string | number>;
  responseType?: 'json' | 'text';
}

/**
 * The slice of an axios instance the external clients use; tests pass a fake
 */
export interface HttpClient {
  get(url: string, config?: HttpRequestConfig): Promise<{ data: unknown }>;
}

export function createHttpClient(timeoutMs: number): HttpClient {
  return axios.create({
    timeout: timeoutMs,
    headers: { 'User-Agent': 'sheikah-slate-mcp (knowledge lookup)' },
  });
}
