import type { SearchEndpoint } from './config';

export type { SearchEndpoint, TrendEndpoint } from './config';

/** The only two fields the exact-match filter inspects. */
export interface MatchableText {
  title: string;
  description: string;
}

export interface BlogItem extends MatchableText {
  kind: 'blog';
  link: string;
  bloggername: string;
  bloggerlink: string;
  /** yyyyMMdd as sent by the API. */
  postdate: string;
}

export interface CafeArticleItem extends MatchableText {
  kind: 'cafearticle';
  link: string;
  cafename: string;
  cafeurl: string;
}

export interface LocalItem extends MatchableText {
  kind: 'local';
  link: string;
  category: string;
  telephone: string;
  address: string;
  roadAddress: string;
  mapx: string;
  mapy: string;
}

export type SearchItem = BlogItem | CafeArticleItem | LocalItem;

export interface SearchItemByEndpoint {
  blog: BlogItem;
  cafearticle: CafeArticleItem;
  local: LocalItem;
}

/** Endpoints that support offset pagination up to the 1000 cap. */
export type PagedEndpoint = Exclude<SearchEndpoint, 'local'>;

export type BlogSort = 'sim' | 'date';
export type LocalSort = 'random' | 'comment';
export type SearchSort = BlogSort | LocalSort;

export interface SearchRequest {
  query: string;
  start: number;
  display: number;
  sort: SearchSort;
}

export interface SearchResponse<T extends SearchItem = SearchItem> {
  statusCode: number;
  items: T[];
  total: number;
  start: number;
}

export interface PageRequest {
  pageIndex: number;
  pageSize: number;
}

export type AggregationStopReason = 'enough-matches' | 'exhausted' | 'cap-reached' | 'remote-error';

export interface PageResult<T extends MatchableText = SearchItem> {
  items: T[];
  hasNext: boolean;
  /** Matches discovered during this run; a lower bound on the true total. */
  matchedCount: number;
  /** True when a remote failure cut the probe short. */
  truncated: boolean;
  stopReason: AggregationStopReason;
}

export type TimeUnit = 'date' | 'week' | 'month';
export type Device = 'pc' | 'mo';
export type Gender = 'm' | 'f';
export type AgeBand = '10' | '20' | '30' | '40' | '50' | '60';

export interface TrendFilters {
  startDate: string;
  endDate: string;
  timeUnit: TimeUnit;
  device?: Device;
  ages?: AgeBand[];
  gender?: Gender;
}

export interface SearchTrendRequest extends TrendFilters {
  keywords: string[];
}

export interface ShoppingCategoryTrendRequest extends TrendFilters {
  categories: Array<{ name: string; id: string }>;
}

export interface ShoppingKeywordTrendRequest extends TrendFilters {
  categoryId: string;
  keywords: Array<{ name: string; keyword: string }>;
}

export interface TrendPoint {
  period?: string;
  ratio?: number;
}

export interface TrendSeries {
  name: string;
  points: TrendPoint[];
}

export interface TrendRow {
  period: string;
  /** Aligned with `TrendTable.columns`. */
  values: Array<number | null>;
}

export interface TrendTable {
  columns: string[];
  rows: TrendRow[];
}

export interface ExactSearchPage<T extends SearchItem = SearchItem> extends PageResult<T> {
  mode: 'exact';
  query: string;
  page: number;
  pageSize: number;
}

export interface RawSearchPage<T extends SearchItem = SearchItem> {
  mode: 'raw';
  query: string;
  start: number;
  pageSize: number;
  total: number;
  items: T[];
  hasNext: boolean;
}

export type SearchPage<T extends SearchItem = SearchItem> = ExactSearchPage<T> | RawSearchPage<T>;
