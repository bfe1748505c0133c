import { useEffect, useMemo, useState, type Dispatch } from 'react';
import { SearchAPI } from '../api/searchApi';
import type { DashboardAction, TabState } from '../state/dashboardState';
import { MAX_PAGE_SIZE, clampPageSize } from '../state/dashboardState';
import type { BlogSort, PagedEndpoint, SearchPage } from '../types/search';
import { compileHighlighter } from '../utils/highlighter';
import { describePage } from '../utils/pagingInfo';
import { EmptyState } from './EmptyState';
import { ErrorMessage } from './ErrorMessage';
import { LoadingState } from './LoadingState';
import { PaginationControls } from './PaginationControls';
import { ResultCard } from './ResultCard';
import { ResultsTable } from './ResultsTable';

interface ArticleSearchTabProps {
  endpoint: PagedEndpoint;
  title: string;
  query: string;
  tab: TabState;
  dispatch: Dispatch<DashboardAction>;
}

const SORT_OPTIONS: Array<{ value: BlogSort; label: string }> = [
  { value: 'sim', label: 'Accuracy' },
  { value: 'date', label: 'Date' }
];

export function ArticleSearchTab({ endpoint, title, query, tab, dispatch }: ArticleSearchTabProps) {
  const [page, setPage] = useState<SearchPage | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [view, setView] = useState<'table' | 'cards'>('table');
  const [pageSizeDraft, setPageSizeDraft] = useState(String(tab.pageSize));

  useEffect(() => {
    setPageSizeDraft(String(tab.pageSize));
  }, [tab.pageSize]);

  // Each page size starts a new scan, so typing only edits the draft.
  const commitPageSize = () => {
    const pageSize = clampPageSize(Number(pageSizeDraft));
    setPageSizeDraft(String(pageSize));
    if (pageSize === tab.pageSize) return;
    dispatch({ type: 'setPageSize', tab: endpoint, pageSize });
  };

  const highlight = useMemo(() => compileHighlighter(query), [query]);

  useEffect(() => {
    if (!query.trim()) {
      setPage(null);
      setError(null);
      return;
    }

    let cancelled = false;
    setIsLoading(true);
    setError(null);

    SearchAPI.searchPage(endpoint, query, tab)
      .then(result => {
        if (!cancelled) setPage(result);
      })
      .catch(err => {
        if (cancelled) return;
        setPage(null);
        setError(err instanceof Error ? err.message : 'Search failed');
      })
      .finally(() => {
        if (!cancelled) setIsLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, [endpoint, query, tab]);

  const info = page ? describePage(page) : null;

  return (
    <section className="tab-panel" aria-label={title}>
      <h2>{title}</h2>

      <div className="tab-controls">
        <label>
          Sort
          <select
            value={tab.sort}
            onChange={(event) => {
              const sort = SORT_OPTIONS.find(option => option.value === event.target.value);
              if (sort) dispatch({ type: 'setSort', tab: endpoint, sort: sort.value });
            }}
          >
            {SORT_OPTIONS.map(option => (
              <option key={option.value} value={option.value}>
                {option.label}
              </option>
            ))}
          </select>
        </label>

        <label>
          Results per page (1-{MAX_PAGE_SIZE})
          <input
            type="number"
            min={1}
            max={MAX_PAGE_SIZE}
            value={pageSizeDraft}
            onChange={(event) => setPageSizeDraft(event.target.value)}
            onBlur={commitPageSize}
            onKeyDown={(event) => {
              if (event.key === 'Enter') commitPageSize();
            }}
          />
        </label>

        <label title="Only items whose title or summary contains the query verbatim (case and spacing included)">
          <input type="checkbox" checked={tab.exact} onChange={() => dispatch({ type: 'toggleExact', tab: endpoint })} />
          Exact-match filter
        </label>

        <label>
          <input
            type="checkbox"
            checked={view === 'cards'}
            onChange={() => setView(view === 'cards' ? 'table' : 'cards')}
          />
          Card view
        </label>
      </div>

      {!query.trim() && <EmptyState message="Enter a query to search" />}
      {isLoading && <LoadingState />}
      {!isLoading && error && <ErrorMessage message={error} />}

      {!isLoading && !error && page && info && (
        <>
          <p className="results-caption">{info.caption}</p>
          {page.mode === 'exact' && page.truncated && (
            <p className="results-warning" role="status">
              The remote API failed part-way through the scan; these results may be incomplete.
            </p>
          )}

          {page.items.length === 0 ? (
            <EmptyState />
          ) : view === 'table' ? (
            <ResultsTable items={page.items} highlight={highlight} />
          ) : (
            <div className="results-list">
              {page.items.map((item, index) => (
                <ResultCard key={`${item.link}-${index}`} item={item} highlight={highlight} />
              ))}
            </div>
          )}

          <PaginationControls
            label={`${page.mode === 'exact' ? 'Filtered' : 'All'} · ${info.position}`}
            prevDisabled={info.prevDisabled}
            nextDisabled={info.nextDisabled}
            onPrevious={() => dispatch({ type: 'previousPage', tab: endpoint })}
            onNext={() => dispatch({ type: 'nextPage', tab: endpoint })}
          />

          {page.items.length > 0 && (
            <a className="csv-download" href={SearchAPI.exportUrl(endpoint, query, tab)} download>
              Download CSV
            </a>
          )}
        </>
      )}
    </section>
  );
}
