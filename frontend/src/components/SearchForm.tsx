import { useEffect, useState, type FormEvent } from 'react';

interface SearchFormProps {
  query: string;
  isSearching: boolean;
  onSubmit: (query: string) => void;
}

/** Shared query for every tab; it is committed on submit so typing does not refetch. */
export function SearchForm({ query, isSearching, onSubmit }: SearchFormProps) {
  const [draft, setDraft] = useState(query);

  useEffect(() => {
    setDraft(query);
  }, [query]);

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onSubmit(draft);
  };

  return (
    <form className="search-form" onSubmit={handleSubmit}>
      <div className="search-container">
        <div className="search-input-wrapper">
          <label htmlFor="searchInput" className="sr-only">
            Shared query
          </label>
          <input
            type="text"
            id="searchInput"
            placeholder="Query shared by blog, cafe, local and trend tabs"
            autoComplete="off"
            value={draft}
            onChange={(event) => setDraft(event.target.value)}
          />
          <button type="submit" className="search-btn" disabled={isSearching}>
            Search
          </button>
        </div>
      </div>
    </form>
  );
}
