import { useEffect, useReducer, useState } from 'react';
import { SearchAPI } from './api/searchApi';
import { ArticleSearchTab } from './components/ArticleSearchTab';
import { CredentialsPanel } from './components/CredentialsPanel';
import { ErrorMessage } from './components/ErrorMessage';
import { LocalSearchTab } from './components/LocalSearchTab';
import { SearchForm } from './components/SearchForm';
import { SearchTrendTab } from './components/SearchTrendTab';
import { ShoppingInsightTab } from './components/ShoppingInsightTab';
import { createDashboardState, dashboardReducer } from './state/dashboardState';
import './styles.css';

type TabId = 'blog' | 'cafearticle' | 'trend' | 'local' | 'shopping';

const PAGE_TABS: Array<{ id: TabId; label: string }> = [
  { id: 'blog', label: 'Blog' },
  { id: 'cafearticle', label: 'Cafe articles' },
  { id: 'trend', label: 'Search trend' },
  { id: 'local', label: 'Local' },
  { id: 'shopping', label: 'Shopping insight' }
];

export default function App() {
  const [state, dispatch] = useReducer(dashboardReducer, '리뷰 자동화', createDashboardState);
  const [activeTab, setActiveTab] = useState<TabId>('blog');
  const [apiError, setApiError] = useState<string | null>(null);

  useEffect(() => {
    SearchAPI.health().then((healthy) => {
      if (!healthy) {
        setApiError('The API is not reachable. Check that the server is running on localhost:3001');
      }
    });
  }, []);

  return (
    <div id="app">
      <header className="header">
        <div className="hero-content">
          <h1 className="hero-title">🔎 Search Insights</h1>
          <p className="hero-subtitle">Blog, cafe, local, search trend and shopping insight in one place</p>
        </div>
      </header>

      <main className="main">
        <CredentialsPanel />

        {apiError && <ErrorMessage message={apiError} />}

        <SearchForm
          query={state.query}
          isSearching={false}
          onSubmit={(query) => dispatch({ type: 'setQuery', query })}
        />

        <div className="page-switcher" role="tablist">
          {PAGE_TABS.map(tab => (
            <button
              key={tab.id}
              role="tab"
              aria-selected={activeTab === tab.id}
              className={`page-switcher__button ${activeTab === tab.id ? 'is-active' : ''}`}
              onClick={() => setActiveTab(tab.id)}
            >
              {tab.label}
            </button>
          ))}
        </div>

        {activeTab === 'blog' && (
          <ArticleSearchTab endpoint="blog" title="Blog search" query={state.query} tab={state.tabs.blog} dispatch={dispatch} />
        )}
        {activeTab === 'cafearticle' && (
          <ArticleSearchTab
            endpoint="cafearticle"
            title="Cafe article search"
            query={state.query}
            tab={state.tabs.cafearticle}
            dispatch={dispatch}
          />
        )}
        {activeTab === 'trend' && <SearchTrendTab query={state.query} />}
        {activeTab === 'local' && <LocalSearchTab query={state.query} />}
        {activeTab === 'shopping' && <ShoppingInsightTab />}
      </main>

      <footer className="footer">
        <p>Search Insights · results are cached for 10 minutes per request</p>
      </footer>
    </div>
  );
}
