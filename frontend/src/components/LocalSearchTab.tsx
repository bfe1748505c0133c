import { useEffect, useMemo, useState } from 'react';
import { SearchAPI } from '../api/searchApi';
import type { LocalItem, LocalSort } from '../types/search';
import { stripEmphasis } from '../utils/format';
import { compileHighlighter } from '../utils/highlighter';
import { EmptyState } from './EmptyState';
import { ErrorMessage } from './ErrorMessage';
import { LoadingState } from './LoadingState';

interface LocalSearchTabProps {
  query: string;
}

export function LocalSearchTab({ query }: LocalSearchTabProps) {
  const [sort, setSort] = useState<LocalSort>('random');
  const [items, setItems] = useState<LocalItem[]>([]);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [hasSearched, setHasSearched] = useState(false);

  const highlight = useMemo(() => compileHighlighter(query), [query]);

  useEffect(() => {
    if (!query.trim()) {
      setItems([]);
      setHasSearched(false);
      return;
    }

    let cancelled = false;
    setIsLoading(true);
    setError(null);

    SearchAPI.searchLocal(query, sort)
      .then(response => {
        if (!cancelled) setItems(response.items);
      })
      .catch(err => {
        if (cancelled) return;
        setItems([]);
        setError(err instanceof Error ? err.message : 'Local search failed');
      })
      .finally(() => {
        if (cancelled) return;
        setIsLoading(false);
        setHasSearched(true);
      });

    return () => {
      cancelled = true;
    };
  }, [query, sort]);

  return (
    <section className="tab-panel" aria-label="Local search">
      <h2>Local search</h2>
      <p className="results-caption">The local endpoint returns at most 5 places and does not page.</p>

      <div className="tab-controls">
        <label>
          Sort
          <select
            value={sort}
            onChange={(event) => setSort(event.target.value === 'comment' ? 'comment' : 'random')}
          >
            <option value="random">Accuracy</option>
            <option value="comment">Most reviewed</option>
          </select>
        </label>
      </div>

      {!query.trim() && <EmptyState message="Enter a query to search" />}
      {isLoading && <LoadingState />}
      {!isLoading && error && <ErrorMessage message={error} />}
      {!isLoading && !error && hasSearched && items.length === 0 && <EmptyState />}

      {!isLoading && !error && items.length > 0 && (
        <>
          <table className="results-table">
            <thead>
              <tr>
                <th>Name</th>
                <th>Category</th>
                <th>Address</th>
                <th>Phone</th>
                <th>Link</th>
              </tr>
            </thead>
            <tbody>
              {items.map((item, index) => (
                <tr key={`${item.title}-${index}`}>
                  <td dangerouslySetInnerHTML={{ __html: highlight(item.title) }} />
                  <td>{stripEmphasis(item.category)}</td>
                  <td>{item.roadAddress || item.address}</td>
                  <td>{item.telephone}</td>
                  <td>
                    {item.link ? (
                      <a href={item.link} target="_blank" rel="noopener noreferrer">
                        Open
                      </a>
                    ) : null}
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
          <a className="csv-download" href={SearchAPI.localExportUrl(query, sort)} download>
            Download CSV
          </a>
        </>
      )}
    </section>
  );
}
