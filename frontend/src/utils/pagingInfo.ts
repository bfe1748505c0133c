import type { SearchPage } from '../types/search';

export interface PagingInfo {
  caption: string;
  position: string;
  prevDisabled: boolean;
  nextDisabled: boolean;
}

const numberFormat = new Intl.NumberFormat('en-US');

export function describePage(page: SearchPage): PagingInfo {
  if (page.mode === 'exact') {
    return {
      caption: `Exact-match filter · ${numberFormat.format(page.matchedCount)} matches found (≤ 1,000 scanned) · page ${page.page}`,
      position: `page=${page.page}`,
      prevDisabled: page.page <= 1,
      nextDisabled: !page.hasNext
    };
  }

  const last = Math.min(page.start + page.pageSize - 1, page.total);
  return {
    caption: `All results · API total ${numberFormat.format(page.total)} · showing ${page.start} to ${numberFormat.format(last)}`,
    position: `start=${page.start}`,
    prevDisabled: page.start <= 1,
    nextDisabled: !page.hasNext
  };
}
