import 'dotenv/config';
import path from 'path';

export type SearchEndpoint = 'blog' | 'cafearticle' | 'local';
export type TrendEndpoint = 'search' | 'shoppingCategories' | 'shoppingKeywords';

function parsePositiveNumber(input: string | undefined, fallback: number): number {
  if (!input) return fallback;
  const value = Number(input.trim());
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

export interface ApiConfig {
  port: number;
  apiBase: string;
  searchEndpoints: Record<SearchEndpoint, string>;
  trendEndpoints: Record<TrendEndpoint, string>;
  /** Largest `display` the search endpoints accept. */
  blockSize: number;
  /** Largest `start` the search endpoints accept. */
  startMax: number;
  defaultPageSize: number;
  localDisplayMax: number;
  searchTimeoutMs: number;
  trendTimeoutMs: number;
  cacheTtlMs: number;
  requestsPerSecond: number;
  secretsFile: string;
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const apiBase = stripTrailingSlash(env.NAVER_API_BASE ?? 'https://openapi.naver.com');

  return {
    port: parsePositiveNumber(env.PORT, 3001),
    apiBase,
    searchEndpoints: {
      blog: `${apiBase}/v1/search/blog.json`,
      cafearticle: `${apiBase}/v1/search/cafearticle.json`,
      local: `${apiBase}/v1/search/local.json`
    },
    trendEndpoints: {
      search: `${apiBase}/v1/datalab/search`,
      shoppingCategories: `${apiBase}/v1/datalab/shopping/categories`,
      shoppingKeywords: `${apiBase}/v1/datalab/shopping/category/keywords`
    },
    blockSize: 100,
    startMax: 1000,
    defaultPageSize: 20,
    localDisplayMax: 5,
    searchTimeoutMs: parsePositiveNumber(env.SEARCH_TIMEOUT_MS, 15_000),
    trendTimeoutMs: parsePositiveNumber(env.TREND_TIMEOUT_MS, 20_000),
    cacheTtlMs: parsePositiveNumber(env.CACHE_TTL_MS, 10 * 60 * 1000),
    requestsPerSecond: parsePositiveNumber(env.API_REQUESTS_PER_SECOND, 10),
    secretsFile: env.SECRETS_FILE ?? path.join(process.cwd(), 'config', 'secrets.json')
  };
}

export const API_CONFIG = loadApiConfig();
