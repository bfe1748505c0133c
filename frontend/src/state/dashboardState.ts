import type { BlogSort, PagedEndpoint } from '../types/search';

export interface TabState {
  sort: BlogSort;
  pageSize: number;
  exact: boolean;
  /** Page index used in exact mode. */
  page: number;
  /** Raw offset used when the exact filter is off. */
  start: number;
}

export interface DashboardState {
  query: string;
  tabs: Record<PagedEndpoint, TabState>;
}

export type DashboardAction =
  | { type: 'setQuery'; query: string }
  | { type: 'setSort'; tab: PagedEndpoint; sort: BlogSort }
  | { type: 'setPageSize'; tab: PagedEndpoint; pageSize: number }
  | { type: 'toggleExact'; tab: PagedEndpoint }
  | { type: 'nextPage'; tab: PagedEndpoint }
  | { type: 'previousPage'; tab: PagedEndpoint };

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

function initialTab(): TabState {
  return { sort: 'sim', pageSize: DEFAULT_PAGE_SIZE, exact: true, page: 1, start: 1 };
}

export function createDashboardState(query = ''): DashboardState {
  return { query, tabs: { blog: initialTab(), cafearticle: initialTab() } };
}

export function clampPageSize(pageSize: number): number {
  if (!Number.isFinite(pageSize)) return DEFAULT_PAGE_SIZE;
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(pageSize)));
}

function updateTab(state: DashboardState, tab: PagedEndpoint, patch: Partial<TabState>): DashboardState {
  return { ...state, tabs: { ...state.tabs, [tab]: { ...state.tabs[tab], ...patch } } };
}

const RESET_PAGING = { page: 1, start: 1 } as const;

export function dashboardReducer(state: DashboardState, action: DashboardAction): DashboardState {
  switch (action.type) {
    case 'setQuery': {
      if (action.query === state.query) return state;
      return {
        query: action.query,
        tabs: {
          blog: { ...state.tabs.blog, ...RESET_PAGING },
          cafearticle: { ...state.tabs.cafearticle, ...RESET_PAGING }
        }
      };
    }
    case 'setSort':
      return updateTab(state, action.tab, { sort: action.sort, ...RESET_PAGING });
    case 'setPageSize':
      return updateTab(state, action.tab, { pageSize: clampPageSize(action.pageSize), ...RESET_PAGING });
    case 'toggleExact':
      return updateTab(state, action.tab, { exact: !state.tabs[action.tab].exact, ...RESET_PAGING });
    case 'nextPage': {
      const current = state.tabs[action.tab];
      return current.exact
        ? updateTab(state, action.tab, { page: current.page + 1 })
        : updateTab(state, action.tab, { start: current.start + current.pageSize });
    }
    case 'previousPage': {
      const current = state.tabs[action.tab];
      return current.exact
        ? updateTab(state, action.tab, { page: Math.max(1, current.page - 1) })
        : updateTab(state, action.tab, { start: Math.max(1, current.start - current.pageSize) });
    }
    default:
      return state;
  }
}
