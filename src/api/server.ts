import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import { performance } from 'node:perf_hooks';
import { DateTime } from 'luxon';
import type { ApiConfig } from '../config';
import type { PagedFetchClient } from '../client/searchClient';
import type { NaverTrendClient } from '../client/trendClient';
import type { CredentialProvider } from '../credentials/credentialProvider';
import { ConfigurationError, RemoteApiError, ValidationError } from '../errors';
import { blogItemsToCsv, cafeItemsToCsv, localItemsToCsv, trendTableToCsv } from '../export/csvExport';
import type { ExactMatchAggregator } from '../search/exactMatchAggregator';
import { mergeTrendSeries } from '../search/trendMerger';
import type { PagedEndpoint, SearchItemByEndpoint, SearchPage, TrendTable } from '../types';
import { asString, isRecord } from '../utils/validation';
import {
  isPagedEndpoint,
  parseLocalSearchParams,
  parsePagedSearchParams,
  parseSearchTrendBody,
  parseShoppingCategoryBody,
  parseShoppingKeywordBody,
  type PagedSearchParams
} from './requestParsing';

export interface AppDependencies {
  credentials: Pick<CredentialProvider, 'resolve' | 'isConfigured' | 'apply' | 'clear'>;
  searchClient: PagedFetchClient;
  aggregator: Pick<ExactMatchAggregator, 'aggregate'>;
  trendClient: Pick<NaverTrendClient, 'searchTrend' | 'shoppingCategoryTrend' | 'shoppingKeywordTrend'>;
  config: Pick<ApiConfig, 'blockSize' | 'startMax' | 'defaultPageSize' | 'localDisplayMax'>;
  now?: () => DateTime;
}

type TrendKind = 'search' | 'shopping-categories' | 'shopping-keywords';

const TREND_KINDS: readonly TrendKind[] = ['search', 'shopping-categories', 'shopping-keywords'];

function emptyTable(): TrendTable {
  return { columns: [], rows: [] };
}

function asyncRoute(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function sendCsv(res: Response, filename: string, csv: string) {
  res.attachment(filename);
  res.type('text/csv; charset=utf-8');
  res.send(csv);
}

const handleErrors: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  if (error instanceof ConfigurationError) {
    res.status(412).json({ error: error.message, code: 'CONFIGURATION_ERROR' });
    return;
  }
  if (error instanceof RemoteApiError) {
    console.warn({ path: req.path, endpoint: error.endpoint, statusCode: error.statusCode }, 'Remote API call failed');
    res.status(502).json({
      error: error.message,
      code: 'REMOTE_API_ERROR',
      endpoint: error.endpoint,
      statusCode: error.statusCode,
      body: error.body
    });
    return;
  }
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, code: 'VALIDATION_ERROR', field: error.field });
    return;
  }

  console.error({ path: req.path, err: error }, 'Unhandled request error');
  res.status(500).json({ error: 'Internal server error' });
};

export function createApp(deps: AppDependencies) {
  const app = express();
  const today = deps.now ?? (() => DateTime.now());

  async function searchPage<E extends PagedEndpoint>(
    endpoint: E,
    params: PagedSearchParams
  ): Promise<SearchPage<SearchItemByEndpoint[E]>> {
    const { query, sort, pageSize, page, start, exact } = params;

    if (exact) {
      if (!query) {
        return {
          mode: 'exact',
          query,
          page,
          pageSize,
          items: [],
          hasNext: false,
          matchedCount: 0,
          truncated: false,
          stopReason: 'exhausted'
        };
      }
      const result = await deps.aggregator.aggregate(endpoint, { query, sort, pageSize, pageIndex: page });
      return { mode: 'exact', query, page, pageSize, ...result };
    }

    if (!query) {
      return { mode: 'raw', query, start, pageSize, total: 0, items: [], hasNext: false };
    }
    const response = await deps.searchClient.search(endpoint, { query, start, display: pageSize, sort });
    const reachable = Math.min(response.total, deps.config.startMax);
    return {
      mode: 'raw',
      query,
      start: response.start,
      pageSize,
      total: response.total,
      items: response.items,
      hasNext: start + pageSize <= reachable
    };
  }

  async function localItems(raw: Record<string, unknown>) {
    const { query, sort } = parseLocalSearchParams(raw);
    if (!query) return { query, items: [] };
    const response = await deps.searchClient.search('local', {
      query,
      start: 1,
      display: deps.config.localDisplayMax,
      sort
    });
    return { query, items: response.items };
  }

  const trendTables: Record<TrendKind, (body: unknown) => Promise<TrendTable>> = {
    search: async body => {
      const request = parseSearchTrendBody(body, today());
      if (!request.keywords.length) return emptyTable();
      return mergeTrendSeries(await deps.trendClient.searchTrend(request));
    },
    'shopping-categories': async body => {
      const request = parseShoppingCategoryBody(body, today());
      if (!request.categories.length) return emptyTable();
      return mergeTrendSeries(await deps.trendClient.shoppingCategoryTrend(request));
    },
    'shopping-keywords': async body => {
      const request = parseShoppingKeywordBody(body, today());
      if (!request.categoryId || !request.keywords.length) return emptyTable();
      return mergeTrendSeries(await deps.trendClient.shoppingKeywordTrend(request));
    }
  };

  app.use(cors());
  app.use(express.json());

  app.get('/status', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'Search Insights API',
      credentialsConfigured: deps.credentials.isConfigured(),
      timestamp: new Date().toISOString()
    });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  app.get('/credentials/status', (_req, res) => {
    res.json({ configured: deps.credentials.isConfigured(), source: deps.credentials.resolve().source });
  });

  app.post('/credentials', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body)) throw new ValidationError('body', 'body must be a JSON object');
    deps.credentials.apply(asString(body.clientId) ?? '', asString(body.clientSecret) ?? '');
    res.json({ configured: deps.credentials.isConfigured(), source: deps.credentials.resolve().source });
  });

  app.delete('/credentials', (_req, res) => {
    deps.credentials.clear();
    res.json({ configured: deps.credentials.isConfigured(), source: deps.credentials.resolve().source });
  });

  app.get(
    '/search/local',
    asyncRoute(async (req, res) => {
      res.json(await localItems(req.query));
    })
  );

  app.get(
    '/search/:endpoint',
    asyncRoute(async (req, res) => {
      const { endpoint } = req.params;
      if (!isPagedEndpoint(endpoint)) {
        return res.status(404).json({ error: `Unknown search endpoint: ${endpoint}` });
      }

      const started = performance.now();
      const params = parsePagedSearchParams(req.query, deps.config);
      const page = await searchPage(endpoint, params);
      const processingTime = Number((performance.now() - started).toFixed(2));

      if (page.mode === 'exact' && page.query) {
        console.log(
          { endpoint, page: page.page, matchedCount: page.matchedCount, stopReason: page.stopReason, processingTime },
          'Exact-match page served'
        );
      }
      res.json({ ...page, processingTime });
    })
  );

  app.get(
    '/export/:endpoint.csv',
    asyncRoute(async (req, res) => {
      const { endpoint } = req.params;

      if (endpoint === 'local') {
        const { items } = await localItems(req.query);
        return sendCsv(res, 'local-results.csv', localItemsToCsv(items));
      }
      if (endpoint === 'blog') {
        const page = await searchPage('blog', parsePagedSearchParams(req.query, deps.config));
        return sendCsv(res, 'blog-results.csv', blogItemsToCsv(page.items));
      }
      if (endpoint === 'cafearticle') {
        const page = await searchPage('cafearticle', parsePagedSearchParams(req.query, deps.config));
        return sendCsv(res, 'cafearticle-results.csv', cafeItemsToCsv(page.items));
      }
      return res.status(404).json({ error: `Unknown search endpoint: ${endpoint}` });
    })
  );

  app.post(
    '/trend/search',
    asyncRoute(async (req, res) => {
      res.json(await trendTables.search(req.body));
    })
  );

  app.post(
    '/trend/shopping/categories',
    asyncRoute(async (req, res) => {
      res.json(await trendTables['shopping-categories'](req.body));
    })
  );

  app.post(
    '/trend/shopping/keywords',
    asyncRoute(async (req, res) => {
      res.json(await trendTables['shopping-keywords'](req.body));
    })
  );

  app.post(
    '/export/trend/:kind.csv',
    asyncRoute(async (req, res) => {
      const kind = TREND_KINDS.find(candidate => candidate === req.params.kind);
      if (!kind) {
        return res.status(404).json({ error: `Unknown trend kind: ${req.params.kind}` });
      }
      const table = await trendTables[kind](req.body);
      return sendCsv(res, `trend-${kind}.csv`, trendTableToCsv(table));
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(handleErrors);

  return app;
}
