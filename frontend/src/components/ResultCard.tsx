import type { ArticleItem } from '../types/search';
import { formatPostDate } from '../utils/format';
import type { Highlighter } from '../utils/highlighter';

interface ResultCardProps {
  item: ArticleItem;
  highlight: Highlighter;
}

export function ResultCard({ item, highlight }: ResultCardProps) {
  const hostname = safeHostname(item.link);
  const source = item.kind === 'blog' ? item.bloggername : item.cafename;
  const date = item.kind === 'blog' ? formatPostDate(item.postdate) : '';

  return (
    <article className="result-card">
      <div className="result-header">
        <span className="result-source">{[source, date].filter(Boolean).join(' · ')}</span>
      </div>

      <h3 className="result-title">
        <a
          href={item.link}
          target="_blank"
          rel="noopener noreferrer"
          dangerouslySetInnerHTML={{ __html: highlight(item.title) }}
        />
      </h3>

      <p className="result-snippet" dangerouslySetInnerHTML={{ __html: highlight(item.description) }} />

      <div className="result-footer">
        <span className="result-url">{hostname}</span>
      </div>
    </article>
  );
}

function safeHostname(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return url;
  }
}
