import http from 'node:http';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { CredentialProvider } from '../../credentials/credentialProvider';
import { ConfigurationError, RemoteApiError } from '../../errors';
import { NaverSearchClient } from '../searchClient';

interface RecordedRequest {
  path: string;
  params: URLSearchParams;
  headers: http.IncomingHttpHeaders;
}

const recorded: RecordedRequest[] = [];
let server: http.Server;
let baseUrl: string;

function portOf(target: http.Server): number {
  const address = target.address();
  if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port');
  return address.port;
}

function reply(res: http.ServerResponse, status: number, body: unknown, contentType = 'application/json; charset=utf-8') {
  res.statusCode = status;
  res.setHeader('content-type', contentType);
  res.end(typeof body === 'string' ? body : JSON.stringify(body));
}

beforeAll(async () => {
  server = http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    recorded.push({ path: url.pathname, params: url.searchParams, headers: req.headers });

    if (url.pathname === '/v1/search/blog.json') {
      return reply(res, 200, {
        total: 2,
        start: Number(url.searchParams.get('start')),
        display: 2,
        items: [
          {
            title: '<b>Test</b> review',
            description: 'desc',
            link: 'https://blog.example/1',
            bloggername: 'writer',
            bloggerlink: 'https://blog.example',
            postdate: '20240105'
          },
          { title: 'partial' },
          'not-an-item'
        ]
      });
    }
    if (url.pathname === '/v1/search/cafearticle.json') {
      return reply(res, 401, '{"errorMessage":"Authentication failed","errorCode":"024"}');
    }
    if (url.pathname === '/v1/search/local.json') {
      return reply(res, 200, { message: 'no items here' });
    }
    return reply(res, 404, 'not found', 'text/plain');
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  baseUrl = `http://127.0.0.1:${portOf(server)}`;
});

afterAll(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
});

beforeEach(() => {
  recorded.length = 0;
});

function createClient(env: NodeJS.ProcessEnv = { NAVER_CLIENT_ID: 'test-id', NAVER_CLIENT_SECRET: 'test-secret' }) {
  return new NaverSearchClient({
    credentials: new CredentialProvider({ secretsFile: '/nonexistent/secrets.json', env }),
    config: {
      searchEndpoints: {
        blog: `${baseUrl}/v1/search/blog.json`,
        cafearticle: `${baseUrl}/v1/search/cafearticle.json`,
        local: `${baseUrl}/v1/search/local.json`
      },
      searchTimeoutMs: 2000,
      cacheTtlMs: 60_000,
      requestsPerSecond: 100
    }
  });
}

describe('NaverSearchClient', () => {
  it('sends the query parameters with auth headers and types the items', async () => {
    const client = createClient();

    const response = await client.search('blog', { query: '리뷰 자동화', start: 101, display: 100, sort: 'date' });

    expect(recorded).toHaveLength(1);
    expect(recorded[0].params.get('query')).toBe('리뷰 자동화');
    expect(recorded[0].params.get('start')).toBe('101');
    expect(recorded[0].params.get('display')).toBe('100');
    expect(recorded[0].params.get('sort')).toBe('date');
    expect(recorded[0].headers['x-naver-client-id']).toBe('test-id');
    expect(recorded[0].headers['x-naver-client-secret']).toBe('test-secret');

    expect(response.statusCode).toBe(200);
    expect(response.total).toBe(2);
    expect(response.start).toBe(101);
    expect(response.items).toEqual([
      {
        kind: 'blog',
        title: '<b>Test</b> review',
        description: 'desc',
        link: 'https://blog.example/1',
        bloggername: 'writer',
        bloggerlink: 'https://blog.example',
        postdate: '20240105'
      },
      {
        kind: 'blog',
        title: 'partial',
        description: '',
        link: '',
        bloggername: '',
        bloggerlink: '',
        postdate: ''
      }
    ]);
  });

  it('serves identical requests from the cache', async () => {
    const client = createClient();
    const request = { query: 'cache', start: 1, display: 100, sort: 'sim' as const };

    await client.search('blog', request);
    await client.search('blog', request);
    expect(recorded).toHaveLength(1);

    await client.search('blog', { ...request, sort: 'date' });
    expect(recorded).toHaveLength(2);
  });

  it('surfaces non-200 answers with endpoint, status and raw body', async () => {
    const client = createClient();

    const failure = await client
      .search('cafearticle', { query: 'q', start: 1, display: 10, sort: 'sim' })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RemoteApiError);
    if (!(failure instanceof RemoteApiError)) return;
    expect(failure.endpoint).toBe(`${baseUrl}/v1/search/cafearticle.json`);
    expect(failure.statusCode).toBe(401);
    expect(failure.body).toBe('{"errorMessage":"Authentication failed","errorCode":"024"}');
  });

  it('does not cache failures', async () => {
    const client = createClient();
    const request = { query: 'q', start: 1, display: 10, sort: 'sim' as const };

    await expect(client.search('cafearticle', request)).rejects.toBeInstanceOf(RemoteApiError);
    await expect(client.search('cafearticle', request)).rejects.toBeInstanceOf(RemoteApiError);
    expect(recorded).toHaveLength(2);
  });

  it('rejects a body without an items array', async () => {
    const client = createClient();

    await expect(client.search('local', { query: 'q', start: 1, display: 5, sort: 'random' })).rejects.toMatchObject({
      name: 'RemoteApiError',
      statusCode: 200
    });
  });

  it('maps transport failures to status 0', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const closed = http.createServer();
    await new Promise<void>(resolve => closed.listen(0, '127.0.0.1', () => resolve()));
    const port = portOf(closed);
    await new Promise<void>(resolve => closed.close(() => resolve()));

    const client = new NaverSearchClient({
      credentials: new CredentialProvider({
        secretsFile: '/nonexistent/secrets.json',
        env: { NAVER_CLIENT_ID: 'test-id', NAVER_CLIENT_SECRET: 'test-secret' }
      }),
      config: {
        searchEndpoints: {
          blog: `http://127.0.0.1:${port}/v1/search/blog.json`,
          cafearticle: `http://127.0.0.1:${port}/v1/search/cafearticle.json`,
          local: `http://127.0.0.1:${port}/v1/search/local.json`
        },
        searchTimeoutMs: 2000,
        cacheTtlMs: 60_000,
        requestsPerSecond: 100
      }
    });

    await expect(client.search('blog', { query: 'q', start: 1, display: 10, sort: 'sim' })).rejects.toMatchObject({
      name: 'RemoteApiError',
      statusCode: 0
    });
  });

  it('stops before any call when credentials are missing', async () => {
    const client = createClient({});

    await expect(client.search('blog', { query: 'q', start: 1, display: 10, sort: 'sim' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(recorded).toHaveLength(0);
  });
});
