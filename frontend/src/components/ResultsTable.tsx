import type { ArticleItem } from '../types/search';
import { formatPostDate } from '../utils/format';
import type { Highlighter } from '../utils/highlighter';

interface ResultsTableProps {
  items: ArticleItem[];
  highlight: Highlighter;
}

function sourceOf(item: ArticleItem): string {
  return item.kind === 'blog' ? item.bloggername : item.cafename;
}

export function ResultsTable({ items, highlight }: ResultsTableProps) {
  const sourceLabel = items[0]?.kind === 'cafearticle' ? 'Cafe' : 'Blogger';

  return (
    <table className="results-table">
      <thead>
        <tr>
          <th>Title</th>
          <th>Summary</th>
          <th>{sourceLabel}</th>
          <th>Date</th>
          <th>Link</th>
        </tr>
      </thead>
      <tbody>
        {items.map((item, index) => (
          <tr key={`${item.link}-${index}`}>
            <td dangerouslySetInnerHTML={{ __html: highlight(item.title) }} />
            <td dangerouslySetInnerHTML={{ __html: highlight(item.description) }} />
            <td>{sourceOf(item)}</td>
            <td>{item.kind === 'blog' ? formatPostDate(item.postdate) : ''}</td>
            <td>
              <a href={item.link} target="_blank" rel="noopener noreferrer">
                Open
              </a>
            </td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
