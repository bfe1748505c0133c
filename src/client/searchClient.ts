import { API_CONFIG, type ApiConfig } from '../config';
import type { CredentialProvider } from '../credentials/credentialProvider';
import { RemoteApiError } from '../errors';
import { TtlCache, buildCacheKey, type ResponseCache } from '../cache/ttlCache';
import type {
  BlogItem,
  CafeArticleItem,
  LocalItem,
  SearchEndpoint,
  SearchItemByEndpoint,
  SearchRequest,
  SearchResponse
} from '../types';
import { asNumber, asText, isRecord } from '../utils/validation';
import { requestJson } from './http';
import { HostThrottle } from './throttle';

/** The single I/O primitive the exact-match aggregator consumes. */
export interface PagedFetchClient {
  search<E extends SearchEndpoint>(
    endpoint: E,
    request: SearchRequest
  ): Promise<SearchResponse<SearchItemByEndpoint[E]>>;
}

type ItemParsers = { [E in SearchEndpoint]: (raw: Record<string, unknown>) => SearchItemByEndpoint[E] };

const ITEM_PARSERS: ItemParsers = {
  blog: (raw): BlogItem => ({
    kind: 'blog',
    title: asText(raw.title),
    description: asText(raw.description),
    link: asText(raw.link),
    bloggername: asText(raw.bloggername),
    bloggerlink: asText(raw.bloggerlink),
    postdate: asText(raw.postdate)
  }),
  cafearticle: (raw): CafeArticleItem => ({
    kind: 'cafearticle',
    title: asText(raw.title),
    description: asText(raw.description),
    link: asText(raw.link),
    cafename: asText(raw.cafename),
    cafeurl: asText(raw.cafeurl)
  }),
  local: (raw): LocalItem => ({
    kind: 'local',
    title: asText(raw.title),
    description: asText(raw.description),
    link: asText(raw.link),
    category: asText(raw.category),
    telephone: asText(raw.telephone),
    address: asText(raw.address),
    roadAddress: asText(raw.roadAddress),
    mapx: asText(raw.mapx),
    mapy: asText(raw.mapy)
  })
};

export function parseSearchBody<E extends SearchEndpoint>(
  endpoint: E,
  url: string,
  body: unknown,
  requestedStart: number
): SearchResponse<SearchItemByEndpoint[E]> {
  if (!isRecord(body) || !Array.isArray(body.items)) {
    throw new RemoteApiError(url, 200, JSON.stringify(body));
  }

  const parseItem: (raw: Record<string, unknown>) => SearchItemByEndpoint[E] = ITEM_PARSERS[endpoint];
  const items = body.items.filter(isRecord).map(parseItem);

  return {
    statusCode: 200,
    items,
    total: asNumber(body.total) ?? items.length,
    start: asNumber(body.start) ?? requestedStart
  };
}

export interface NaverSearchClientOptions {
  credentials: Pick<CredentialProvider, 'authHeaders' | 'resolve'>;
  /** Holds decoded 200 bodies, keyed by every request parameter. */
  cache?: ResponseCache<unknown>;
  throttle?: HostThrottle;
  config?: Pick<ApiConfig, 'searchEndpoints' | 'searchTimeoutMs' | 'cacheTtlMs' | 'requestsPerSecond'>;
}

export class NaverSearchClient implements PagedFetchClient {
  private readonly credentials: NaverSearchClientOptions['credentials'];
  private readonly cache: ResponseCache<unknown>;
  private readonly throttle: HostThrottle;
  private readonly config: NonNullable<NaverSearchClientOptions['config']>;

  constructor(options: NaverSearchClientOptions) {
    this.credentials = options.credentials;
    this.config = options.config ?? API_CONFIG;
    this.cache = options.cache ?? new TtlCache<unknown>();
    this.throttle = options.throttle ?? new HostThrottle(this.config.requestsPerSecond);
  }

  async search<E extends SearchEndpoint>(
    endpoint: E,
    request: SearchRequest
  ): Promise<SearchResponse<SearchItemByEndpoint[E]>> {
    const headers = this.credentials.authHeaders();
    const url = this.config.searchEndpoints[endpoint];
    const cacheKey = buildCacheKey(
      'GET',
      url,
      request.query,
      request.start,
      request.display,
      request.sort,
      this.credentials.resolve().clientId
    );

    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      return parseSearchBody(endpoint, url, cached, request.start);
    }

    const body = await requestJson(
      {
        method: 'GET',
        url,
        headers,
        searchParams: {
          query: request.query,
          start: request.start,
          display: request.display,
          sort: request.sort
        },
        timeoutMs: this.config.searchTimeoutMs
      },
      this.throttle
    );
    const parsed = parseSearchBody(endpoint, url, body, request.start);
    this.cache.put(cacheKey, body, this.config.cacheTtlMs);
    return parsed;
  }
}
