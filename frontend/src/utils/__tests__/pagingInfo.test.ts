import { describe, expect, it } from 'vitest';
import { describePage } from '../pagingInfo';

describe('describePage', () => {
  it('describes exact-match pages by index', () => {
    expect(
      describePage({
        mode: 'exact',
        query: 'q',
        page: 1,
        pageSize: 20,
        items: [],
        hasNext: true,
        matchedCount: 1000,
        truncated: false,
        stopReason: 'cap-reached'
      })
    ).toEqual({
      caption: 'Exact-match filter · 1,000 matches found (≤ 1,000 scanned) · page 1',
      position: 'page=1',
      prevDisabled: true,
      nextDisabled: false
    });
  });

  it('describes raw pages by offset and clamps the range to the total', () => {
    expect(
      describePage({ mode: 'raw', query: 'q', start: 41, pageSize: 20, total: 52, items: [], hasNext: false })
    ).toEqual({
      caption: 'All results · API total 52 · showing 41 to 52',
      position: 'start=41',
      prevDisabled: false,
      nextDisabled: true
    });
  });
});
