import type { Server } from 'node:http';
import { DateTime } from 'luxon';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { PagedFetchClient } from '../../client/searchClient';
import { CredentialProvider } from '../../credentials/credentialProvider';
import { ConfigurationError, RemoteApiError } from '../../errors';
import { ExactMatchAggregator } from '../../search/exactMatchAggregator';
import type {
  BlogItem,
  LocalItem,
  SearchEndpoint,
  SearchItemByEndpoint,
  SearchRequest,
  SearchResponse,
  SearchTrendRequest,
  TrendSeries
} from '../../types';
import { createApp, type AppDependencies } from '../server';

function blogItem(index: number, title: string): BlogItem {
  return {
    kind: 'blog',
    title,
    description: '',
    link: `https://blog.example/${index}`,
    bloggername: 'writer',
    bloggerlink: 'https://blog.example',
    postdate: '20240105'
  };
}

const localItem: LocalItem = {
  kind: 'local',
  title: '<b>Cafe</b> One',
  description: '',
  link: 'https://place.example',
  category: 'Cafe',
  telephone: '',
  address: 'Old street 1',
  roadAddress: 'New road 2',
  mapx: '1',
  mapy: '2'
};

class StubSearchClient implements PagedFetchClient {
  readonly calls: Array<SearchRequest & { endpoint: SearchEndpoint }> = [];
  failWith?: Error;
  blog: BlogItem[] = Array.from({ length: 30 }, (_, index) =>
    blogItem(index, index % 2 === 0 ? `<b>exact</b> phrase ${index}` : `other ${index}`)
  );

  async search<E extends SearchEndpoint>(
    endpoint: E,
    request: SearchRequest
  ): Promise<SearchResponse<SearchItemByEndpoint[E]>> {
    this.calls.push({ endpoint, ...request });
    if (this.failWith) throw this.failWith;

    const pools: { [K in SearchEndpoint]: Array<SearchItemByEndpoint[K]> } = {
      blog: this.blog,
      cafearticle: [],
      local: [localItem]
    };
    const pool: Array<SearchItemByEndpoint[E]> = pools[endpoint];
    return {
      statusCode: 200,
      items: pool.slice(request.start - 1, request.start - 1 + request.display),
      total: pool.length,
      start: request.start
    };
  }
}

const trendSeries: TrendSeries[] = [
  { name: 'alpha', points: [{ period: '2024-01-01', ratio: 100 }] },
  { name: 'beta', points: [{ period: '2024-01-02', ratio: 50 }] }
];

let server: Server;
let baseUrl: string;
let searchClient: StubSearchClient;
let credentials: CredentialProvider;
const searchTrend = vi.fn(async (_request: SearchTrendRequest) => trendSeries);
const shoppingCategoryTrend = vi.fn(async () => trendSeries);
const shoppingKeywordTrend = vi.fn(async () => trendSeries);

async function start(env: NodeJS.ProcessEnv = { NAVER_CLIENT_ID: 'test-id', NAVER_CLIENT_SECRET: 'test-secret' }) {
  searchClient = new StubSearchClient();
  credentials = new CredentialProvider({ secretsFile: '/nonexistent/secrets.json', env });
  const deps: AppDependencies = {
    credentials,
    searchClient,
    aggregator: new ExactMatchAggregator(searchClient),
    trendClient: { searchTrend, shoppingCategoryTrend, shoppingKeywordTrend },
    config: { blockSize: 100, startMax: 1000, defaultPageSize: 20, localDisplayMax: 5 },
    now: () => DateTime.fromISO('2024-04-10')
  };

  server = await new Promise<Server>(resolve => {
    const listening = createApp(deps).listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port');
  baseUrl = `http://127.0.0.1:${address.port}`;
}

function postJson(path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body)
  });
}

beforeEach(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  searchTrend.mockClear();
  shoppingCategoryTrend.mockClear();
  shoppingKeywordTrend.mockClear();
  await start();
});

afterEach(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
});

describe('search routes', () => {
  it('serves an exact-match page', async () => {
    const response = await fetch(`${baseUrl}/search/blog?q=exact%20phrase&pageSize=5&page=2`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      mode: 'exact',
      query: 'exact phrase',
      page: 2,
      pageSize: 5,
      hasNext: true,
      matchedCount: 11,
      truncated: false,
      stopReason: 'enough-matches'
    });
    expect(body.items.map((item: BlogItem) => item.link)).toEqual(
      [10, 12, 14, 16, 18].map(n => `https://blog.example/${n}`)
    );
  });

  it('serves a raw page with the API total', async () => {
    const response = await fetch(`${baseUrl}/search/blog?q=anything&exact=false&start=21&pageSize=10&sort=date`);
    const body = await response.json();

    expect(body).toMatchObject({ mode: 'raw', query: 'anything', start: 21, pageSize: 10, total: 30, hasNext: false });
    expect(body.items).toHaveLength(10);
    expect(searchClient.calls).toEqual([
      { endpoint: 'blog', query: 'anything', start: 21, display: 10, sort: 'date' }
    ]);
  });

  it('answers an empty query with an empty result and no remote call', async () => {
    const response = await fetch(`${baseUrl}/search/cafearticle?q=%20%20`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ mode: 'exact', query: '', items: [], hasNext: false, matchedCount: 0 });
    expect(searchClient.calls).toHaveLength(0);
  });

  it('serves local results with the fixed display size', async () => {
    const response = await fetch(`${baseUrl}/search/local?q=cafe&sort=comment`);

    expect(await response.json()).toEqual({ query: 'cafe', items: [localItem] });
    expect(searchClient.calls).toEqual([{ endpoint: 'local', query: 'cafe', start: 1, display: 5, sort: 'comment' }]);
  });

  it('rejects unknown endpoints', async () => {
    const response = await fetch(`${baseUrl}/search/news?q=x`);
    expect(response.status).toBe(404);
  });
});

describe('error mapping', () => {
  it('maps validation failures to 400', async () => {
    const response = await fetch(`${baseUrl}/search/blog?q=x&pageSize=500`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'pageSize must be an integer between 1 and 100',
      code: 'VALIDATION_ERROR',
      field: 'pageSize'
    });
  });

  it('maps missing credentials to 412', async () => {
    searchClient.failWith = new ConfigurationError('credentials missing');

    const response = await fetch(`${baseUrl}/search/blog?q=x&exact=false`);

    expect(response.status).toBe(412);
    expect(await response.json()).toEqual({ error: 'credentials missing', code: 'CONFIGURATION_ERROR' });
  });

  it('maps remote failures to 502 with the upstream details', async () => {
    searchClient.failWith = new RemoteApiError('https://api.example/blog', 429, 'quota');

    const response = await fetch(`${baseUrl}/search/blog?q=x&exact=false`);

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: '[remote api] https://api.example/blog · HTTP 429',
      code: 'REMOTE_API_ERROR',
      endpoint: 'https://api.example/blog',
      statusCode: 429,
      body: 'quota'
    });
  });

  it('hides unexpected failures behind a 500', async () => {
    searchClient.failWith = new Error('boom');

    const response = await fetch(`${baseUrl}/search/blog?q=x&exact=false`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Internal server error' });
  });

  it('reports a truncated exact-match page as a success', async () => {
    searchClient.failWith = new RemoteApiError('https://api.example/blog', 500, 'down');

    const response = await fetch(`${baseUrl}/search/blog?q=x`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ items: [], truncated: true, stopReason: 'remote-error' });
  });
});

describe('export routes', () => {
  it('downloads the current blog page as CSV', async () => {
    searchClient.blog = [blogItem(1, '<b>exact</b> phrase, one')];

    const response = await fetch(`${baseUrl}/export/blog.csv?q=exact%20phrase`);

    expect(response.headers.get('content-type')).toBe('text/csv; charset=utf-8');
    expect(response.headers.get('content-disposition')).toBe('attachment; filename="blog-results.csv"');
    expect(await response.text()).toBe(
      'Title,Summary,Blogger,Date,URL\n"exact phrase, one",,writer,2024-01-05,https://blog.example/1\n'
    );
  });

  it('downloads a merged trend table as CSV', async () => {
    const response = await postJson('/export/trend/search.csv', { keywords: ['alpha', 'beta'] });

    expect(await response.text()).toBe('Period,alpha,beta\n2024-01-01,100,\n2024-01-02,,50\n');
  });
});

describe('trend routes', () => {
  it('merges search trend series and fills in the default date window', async () => {
    const response = await postJson('/trend/search', { keywords: 'alpha, beta', timeUnit: 'week', ages: ['20', 30] });

    expect(await response.json()).toEqual({
      columns: ['alpha', 'beta'],
      rows: [
        { period: '2024-01-01', values: [100, null] },
        { period: '2024-01-02', values: [null, 50] }
      ]
    });
    expect(searchTrend).toHaveBeenCalledWith({
      startDate: '2024-01-11',
      endDate: '2024-04-10',
      timeUnit: 'week',
      ages: ['20', '30'],
      keywords: ['alpha', 'beta']
    });
  });

  it('returns an empty table without calling out when nothing was asked', async () => {
    const response = await postJson('/trend/shopping/keywords', { categoryId: '', keywords: [] });

    expect(await response.json()).toEqual({ columns: [], rows: [] });
    expect(shoppingKeywordTrend).not.toHaveBeenCalled();
  });

  it('rejects an inverted date range', async () => {
    const response = await postJson('/trend/shopping/categories', {
      startDate: '2024-03-01',
      endDate: '2024-02-01',
      categories: [{ name: 'Fashion', id: '50000000' }]
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ field: 'startDate' });
  });
});

describe('credential routes', () => {
  it('reports and overrides the credential source', async () => {
    expect(await (await fetch(`${baseUrl}/credentials/status`)).json()).toEqual({
      configured: true,
      source: 'environment'
    });

    const applied = await postJson('/credentials', { clientId: ' session-id ', clientSecret: 'test-secret' });
    expect(await applied.json()).toEqual({ configured: true, source: 'session' });
    expect(credentials.resolve().clientId).toBe('session-id');
  });

  it('clears a session override', async () => {
    await postJson('/credentials', { clientId: 'session-id', clientSecret: 'test-secret' });

    const cleared = await fetch(`${baseUrl}/credentials`, { method: 'DELETE' });
    expect(await cleared.json()).toEqual({ configured: true, source: 'environment' });
    expect(credentials.resolve().clientId).toBe('test-id');
  });

  it('rejects blank credentials', async () => {
    const response = await postJson('/credentials', { clientId: '', clientSecret: 'test-secret' });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ code: 'VALIDATION_ERROR', field: 'clientId' });
  });

  it('reports an unconfigured server', async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
    await start({});

    expect(await (await fetch(`${baseUrl}/status`)).json()).toMatchObject({ status: 'ok', credentialsConfigured: false });
  });
});
