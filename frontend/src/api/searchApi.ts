import type { TabState } from '../state/dashboardState';
import type { CredentialStatus, LocalSearchResponse, LocalSort, PagedEndpoint, SearchPage } from '../types/search';
import { API_BASE, deleteJson, getJson, postJson } from './httpClient';

function pageParams(query: string, tab: TabState): URLSearchParams {
  return new URLSearchParams({
    q: query,
    sort: tab.sort,
    pageSize: String(tab.pageSize),
    page: String(tab.page),
    start: String(tab.start),
    exact: String(tab.exact)
  });
}

export class SearchAPI {
  static searchPage(endpoint: PagedEndpoint, query: string, tab: TabState): Promise<SearchPage> {
    return getJson<SearchPage>(`/search/${endpoint}`, pageParams(query, tab));
  }

  static searchLocal(query: string, sort: LocalSort): Promise<LocalSearchResponse> {
    return getJson<LocalSearchResponse>('/search/local', new URLSearchParams({ q: query, sort }));
  }

  static exportUrl(endpoint: PagedEndpoint, query: string, tab: TabState): string {
    return `${API_BASE}/export/${endpoint}.csv?${pageParams(query, tab).toString()}`;
  }

  static localExportUrl(query: string, sort: LocalSort): string {
    return `${API_BASE}/export/local.csv?${new URLSearchParams({ q: query, sort }).toString()}`;
  }

  static async health(): Promise<boolean> {
    try {
      const response = await fetch(`${API_BASE}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}

export class CredentialsAPI {
  static status(): Promise<CredentialStatus> {
    return getJson<CredentialStatus>('/credentials/status');
  }

  static apply(clientId: string, clientSecret: string): Promise<CredentialStatus> {
    return postJson<CredentialStatus>('/credentials', { clientId, clientSecret });
  }

  static clear(): Promise<CredentialStatus> {
    return deleteJson<CredentialStatus>('/credentials');
  }
}
