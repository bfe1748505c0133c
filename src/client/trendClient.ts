import { API_CONFIG, type ApiConfig, type TrendEndpoint } from '../config';
import type { CredentialProvider } from '../credentials/credentialProvider';
import { RemoteApiError } from '../errors';
import { TtlCache, buildCacheKey, type ResponseCache } from '../cache/ttlCache';
import type {
  SearchTrendRequest,
  ShoppingCategoryTrendRequest,
  ShoppingKeywordTrendRequest,
  TrendFilters,
  TrendPoint,
  TrendSeries
} from '../types';
import { asNumber, asString, isRecord } from '../utils/validation';
import { requestJson } from './http';
import { HostThrottle } from './throttle';

type GroupNamer = (group: Record<string, unknown>) => string;

const searchGroupName: GroupNamer = group =>
  asString(group.title) || asString(group.keyword) || asString(group.groupName) || 'keyword';

const shoppingGroupName: GroupNamer = group => asString(group.title) || 'series';

function readPoints(raw: unknown): TrendPoint[] {
  if (!Array.isArray(raw)) return [];
  return raw.filter(isRecord).map(point => ({
    period: asString(point.period),
    ratio: asNumber(point.ratio)
  }));
}

/** Turns a DataLab `results` array into named series, one per group. */
export function parseTrendSeries(url: string, body: unknown, nameOf: GroupNamer): TrendSeries[] {
  if (!isRecord(body)) throw new RemoteApiError(url, 200, JSON.stringify(body));
  if (!Array.isArray(body.results)) return [];

  return body.results.filter(isRecord).map(group => ({
    name: nameOf(group),
    points: readPoints(group.data)
  }));
}

function filterFields(filters: TrendFilters): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    startDate: filters.startDate,
    endDate: filters.endDate,
    timeUnit: filters.timeUnit
  };
  if (filters.device) payload.device = filters.device;
  if (filters.ages && filters.ages.length) payload.ages = filters.ages;
  if (filters.gender) payload.gender = filters.gender;
  return payload;
}

export function buildSearchTrendPayload(request: SearchTrendRequest): Record<string, unknown> {
  return {
    ...filterFields(request),
    keywordGroups: request.keywords
      .filter(keyword => keyword.trim())
      .map(keyword => ({ groupName: keyword, keywords: [keyword] }))
  };
}

export function buildShoppingCategoryPayload(request: ShoppingCategoryTrendRequest): Record<string, unknown> {
  return {
    ...filterFields(request),
    category: request.categories
      .filter(category => category.name && category.id)
      .map(category => ({ name: category.name, param: [category.id] }))
  };
}

export function buildShoppingKeywordPayload(request: ShoppingKeywordTrendRequest): Record<string, unknown> {
  return {
    ...filterFields(request),
    category: request.categoryId,
    keyword: request.keywords
      .filter(pair => pair.name && pair.keyword)
      .map(pair => ({ name: pair.name, param: [pair.keyword] }))
  };
}

export interface TrendClientOptions {
  credentials: Pick<CredentialProvider, 'authHeaders' | 'resolve'>;
  cache?: ResponseCache<unknown>;
  throttle?: HostThrottle;
  config?: Pick<ApiConfig, 'trendEndpoints' | 'trendTimeoutMs' | 'cacheTtlMs' | 'requestsPerSecond'>;
}

export class NaverTrendClient {
  private readonly credentials: TrendClientOptions['credentials'];
  private readonly cache: ResponseCache<unknown>;
  private readonly throttle: HostThrottle;
  private readonly config: NonNullable<TrendClientOptions['config']>;

  constructor(options: TrendClientOptions) {
    this.credentials = options.credentials;
    this.config = options.config ?? API_CONFIG;
    this.cache = options.cache ?? new TtlCache<unknown>();
    this.throttle = options.throttle ?? new HostThrottle(this.config.requestsPerSecond);
  }

  searchTrend(request: SearchTrendRequest): Promise<TrendSeries[]> {
    return this.post('search', buildSearchTrendPayload(request), searchGroupName);
  }

  shoppingCategoryTrend(request: ShoppingCategoryTrendRequest): Promise<TrendSeries[]> {
    return this.post('shoppingCategories', buildShoppingCategoryPayload(request), shoppingGroupName);
  }

  shoppingKeywordTrend(request: ShoppingKeywordTrendRequest): Promise<TrendSeries[]> {
    return this.post('shoppingKeywords', buildShoppingKeywordPayload(request), shoppingGroupName);
  }

  private async post(endpoint: TrendEndpoint, payload: Record<string, unknown>, nameOf: GroupNamer) {
    const headers = this.credentials.authHeaders(true);
    const url = this.config.trendEndpoints[endpoint];
    const cacheKey = buildCacheKey('POST', url, payload, this.credentials.resolve().clientId);

    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) return parseTrendSeries(url, cached, nameOf);

    const body = await requestJson(
      { method: 'POST', url, headers, json: payload, timeoutMs: this.config.trendTimeoutMs },
      this.throttle
    );
    const series = parseTrendSeries(url, body, nameOf);
    this.cache.put(cacheKey, body, this.config.cacheTtlMs);
    return series;
  }
}
