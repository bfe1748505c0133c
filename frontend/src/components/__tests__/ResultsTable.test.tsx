// @vitest-environment jsdom
import { cleanup, render } from '@testing-library/react';
import { afterEach, describe, expect, it } from 'vitest';
import type { CafeArticleItem } from '../../types/search';
import { compileHighlighter } from '../../utils/highlighter';
import { ResultsTable } from '../ResultsTable';

afterEach(cleanup);

const cafe: CafeArticleItem = {
  kind: 'cafearticle',
  title: '<b>exact</b> phrase one',
  description: 'a <script>x</script> phrase',
  link: 'https://cafe.example/1',
  cafename: 'club',
  cafeurl: ''
};

describe('ResultsTable', () => {
  it('renders highlighted, escaped cells and the cafe column', () => {
    const { container } = render(<ResultsTable items={[cafe]} highlight={compileHighlighter('exact phrase')} />);

    const headers = Array.from(container.querySelectorAll('th')).map(cell => cell.textContent);
    expect(headers).toEqual(['Title', 'Summary', 'Cafe', 'Date', 'Link']);

    const cells = container.querySelectorAll('tbody td');
    expect(cells[0].innerHTML).toBe('<mark><mark>exact</mark></mark> <mark>phrase</mark> one');
    expect(cells[1].innerHTML).toBe('a &lt;script&gt;x&lt;/script&gt; <mark>phrase</mark>');
    expect(cells[2].textContent).toBe('club');
    expect(container.querySelector('script')).toBeNull();
  });
});
