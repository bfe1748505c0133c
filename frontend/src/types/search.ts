export type PagedEndpoint = 'blog' | 'cafearticle';
export type BlogSort = 'sim' | 'date';
export type LocalSort = 'random' | 'comment';
export type StopReason = 'enough-matches' | 'exhausted' | 'cap-reached' | 'remote-error';

export interface BlogItem {
  kind: 'blog';
  title: string;
  description: string;
  link: string;
  bloggername: string;
  bloggerlink: string;
  postdate: string;
}

export interface CafeArticleItem {
  kind: 'cafearticle';
  title: string;
  description: string;
  link: string;
  cafename: string;
  cafeurl: string;
}

export interface LocalItem {
  kind: 'local';
  title: string;
  description: string;
  link: string;
  category: string;
  telephone: string;
  address: string;
  roadAddress: string;
  mapx: string;
  mapy: string;
}

export type ArticleItem = BlogItem | CafeArticleItem;

export interface ExactSearchPage {
  mode: 'exact';
  query: string;
  page: number;
  pageSize: number;
  items: ArticleItem[];
  hasNext: boolean;
  matchedCount: number;
  truncated: boolean;
  stopReason: StopReason;
  processingTime?: number;
}

export interface RawSearchPage {
  mode: 'raw';
  query: string;
  start: number;
  pageSize: number;
  total: number;
  items: ArticleItem[];
  hasNext: boolean;
  processingTime?: number;
}

export type SearchPage = ExactSearchPage | RawSearchPage;

export interface LocalSearchResponse {
  query: string;
  items: LocalItem[];
}

export interface CredentialStatus {
  configured: boolean;
  source: 'session' | 'secret-store' | 'environment' | 'none';
}
