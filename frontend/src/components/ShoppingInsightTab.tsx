import { useState, type FormEvent } from 'react';
import { TrendAPI } from '../api/trendApi';
import type { ShoppingCategoryBody, ShoppingKeywordBody, TrendKind, TrendTableData } from '../types/trend';
import { saveBlob } from '../utils/download';
import { defaultTrendRange } from '../utils/format';
import { parseNamedPairs } from '../utils/pairs';
import { ErrorMessage } from './ErrorMessage';
import { LoadingState } from './LoadingState';
import { TrendFiltersForm, toTrendFilters, type TrendFilterValues } from './TrendFiltersForm';
import { TrendTableView } from './TrendTableView';

type ShoppingMode = 'categories' | 'keywords';

type LastRequest =
  | { kind: 'shopping-categories'; body: ShoppingCategoryBody }
  | { kind: 'shopping-keywords'; body: ShoppingKeywordBody };

export function ShoppingInsightTab() {
  const [mode, setMode] = useState<ShoppingMode>('categories');
  const [categoriesInput, setCategoriesInput] = useState('Fashion=50000000');
  const [categoryId, setCategoryId] = useState('50000000');
  const [keywordsInput, setKeywordsInput] = useState('');
  const [filters, setFilters] = useState<TrendFilterValues>(() => ({
    ...defaultTrendRange(),
    timeUnit: 'date',
    device: '',
    gender: '',
    ages: []
  }));
  const [table, setTable] = useState<TrendTableData | null>(null);
  const [lastRequest, setLastRequest] = useState<LastRequest | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const runRequest = async (): Promise<LastRequest | null> => {
    if (mode === 'categories') {
      const categories = parseNamedPairs(categoriesInput).map(pair => ({ name: pair.name, id: pair.value }));
      if (!categories.length) {
        setError('Enter at least one name=code category');
        return null;
      }
      const body: ShoppingCategoryBody = { ...toTrendFilters(filters), categories };
      setTable(await TrendAPI.shoppingCategories(body));
      return { kind: 'shopping-categories', body };
    }

    const keywords = parseNamedPairs(keywordsInput).map(pair => ({ name: pair.name, keyword: pair.value }));
    if (!categoryId.trim() || !keywords.length) {
      setError('Enter a category code and at least one name=keyword pair');
      return null;
    }
    const body: ShoppingKeywordBody = { ...toTrendFilters(filters), categoryId: categoryId.trim(), keywords };
    setTable(await TrendAPI.shoppingKeywords(body));
    return { kind: 'shopping-keywords', body };
  };

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    setIsLoading(true);
    setError(null);
    try {
      const request = await runRequest();
      if (request) setLastRequest(request);
    } catch (err) {
      setTable(null);
      setError(err instanceof Error ? err.message : 'Shopping insight request failed');
    } finally {
      setIsLoading(false);
    }
  };

  const handleDownload = async () => {
    if (!lastRequest) return;
    const kind: TrendKind = lastRequest.kind;
    try {
      saveBlob(await TrendAPI.exportCsv(kind, lastRequest.body), `${kind}.csv`);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'CSV download failed');
    }
  };

  return (
    <section className="tab-panel" aria-label="Shopping insight">
      <h2>Shopping insight</h2>
      <div className="tab-controls" role="radiogroup" aria-label="Shopping insight mode">
        <label>
          <input type="radio" checked={mode === 'categories'} onChange={() => setMode('categories')} />
          Category trend
        </label>
        <label>
          <input type="radio" checked={mode === 'keywords'} onChange={() => setMode('keywords')} />
          Keywords within a category
        </label>
      </div>

      <form onSubmit={handleSubmit}>
        {mode === 'categories' ? (
          <label>
            Categories (name=code, separated by commas or lines)
            <textarea value={categoriesInput} onChange={(event) => setCategoriesInput(event.target.value)} />
          </label>
        ) : (
          <>
            <label>
              Category code
              <input type="text" value={categoryId} onChange={(event) => setCategoryId(event.target.value)} />
            </label>
            <label>
              Keywords (name=keyword, separated by commas or lines)
              <textarea value={keywordsInput} onChange={(event) => setKeywordsInput(event.target.value)} />
            </label>
          </>
        )}
        <TrendFiltersForm values={filters} onChange={setFilters} />
        <button type="submit" disabled={isLoading}>
          Show trend
        </button>
      </form>

      {isLoading && <LoadingState />}
      {!isLoading && error && <ErrorMessage message={error} />}
      {!isLoading && !error && table && (
        <>
          <TrendTableView table={table} />
          {table.columns.length > 0 && (
            <button type="button" className="csv-download" onClick={handleDownload}>
              Download CSV
            </button>
          )}
        </>
      )}
    </section>
  );
}
