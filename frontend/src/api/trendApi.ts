import type {
  SearchTrendBody,
  ShoppingCategoryBody,
  ShoppingKeywordBody,
  TrendKind,
  TrendTableData
} from '../types/trend';
import { postForBlob, postJson } from './httpClient';

export class TrendAPI {
  static searchTrend(body: SearchTrendBody): Promise<TrendTableData> {
    return postJson<TrendTableData>('/trend/search', body);
  }

  static shoppingCategories(body: ShoppingCategoryBody): Promise<TrendTableData> {
    return postJson<TrendTableData>('/trend/shopping/categories', body);
  }

  static shoppingKeywords(body: ShoppingKeywordBody): Promise<TrendTableData> {
    return postJson<TrendTableData>('/trend/shopping/keywords', body);
  }

  static exportCsv(kind: TrendKind, body: SearchTrendBody | ShoppingCategoryBody | ShoppingKeywordBody): Promise<Blob> {
    return postForBlob(`/export/trend/${kind}.csv`, body);
  }
}
