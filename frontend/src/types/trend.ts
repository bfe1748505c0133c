export type TimeUnit = 'date' | 'week' | 'month';
export type Device = '' | 'pc' | 'mo';
export type Gender = '' | 'm' | 'f';

export interface TrendFilters {
  startDate: string;
  endDate: string;
  timeUnit: TimeUnit;
  device?: 'pc' | 'mo';
  gender?: 'm' | 'f';
  ages?: string[];
}

export interface SearchTrendBody extends TrendFilters {
  keywords: string[];
}

export interface ShoppingCategoryBody extends TrendFilters {
  categories: Array<{ name: string; id: string }>;
}

export interface ShoppingKeywordBody extends TrendFilters {
  categoryId: string;
  keywords: Array<{ name: string; keyword: string }>;
}

export type TrendKind = 'search' | 'shopping-categories' | 'shopping-keywords';

export interface TrendTableData {
  columns: string[];
  rows: Array<{ period: string; values: Array<number | null> }>;
}
