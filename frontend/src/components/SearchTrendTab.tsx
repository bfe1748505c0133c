import { useState, type FormEvent } from 'react';
import { TrendAPI } from '../api/trendApi';
import type { SearchTrendBody, TrendTableData } from '../types/trend';
import { saveBlob } from '../utils/download';
import { defaultTrendRange } from '../utils/format';
import { splitKeywords } from '../utils/pairs';
import { ErrorMessage } from './ErrorMessage';
import { LoadingState } from './LoadingState';
import { TrendFiltersForm, toTrendFilters, type TrendFilterValues } from './TrendFiltersForm';
import { TrendTableView } from './TrendTableView';

interface SearchTrendTabProps {
  query: string;
}

export function SearchTrendTab({ query }: SearchTrendTabProps) {
  const [keywordsInput, setKeywordsInput] = useState('');
  const [filters, setFilters] = useState<TrendFilterValues>(() => ({
    ...defaultTrendRange(),
    timeUnit: 'date',
    device: '',
    gender: '',
    ages: []
  }));
  const [table, setTable] = useState<TrendTableData | null>(null);
  const [lastBody, setLastBody] = useState<SearchTrendBody | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  // An empty keyword box searches the whole shared query as one keyword.
  const sharedQuery = query.trim();
  const keywords = keywordsInput.trim() ? splitKeywords(keywordsInput) : sharedQuery ? [sharedQuery] : [];

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!keywords.length) {
      setError('Enter trend keywords or a shared query');
      return;
    }

    const body: SearchTrendBody = { ...toTrendFilters(filters), keywords };
    setIsLoading(true);
    setError(null);
    try {
      setTable(await TrendAPI.searchTrend(body));
      setLastBody(body);
    } catch (err) {
      setTable(null);
      setError(err instanceof Error ? err.message : 'Trend request failed');
    } finally {
      setIsLoading(false);
    }
  };

  const handleDownload = async () => {
    if (!lastBody) return;
    try {
      saveBlob(await TrendAPI.exportCsv('search', lastBody), 'search-trend.csv');
    } catch (err) {
      setError(err instanceof Error ? err.message : 'CSV download failed');
    }
  };

  return (
    <section className="tab-panel" aria-label="Search trend">
      <h2>Search trend</h2>
      <form onSubmit={handleSubmit}>
        <label>
          Trend keywords (comma separated, empty uses the shared query)
          <input type="text" value={keywordsInput} onChange={(event) => setKeywordsInput(event.target.value)} />
        </label>
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
