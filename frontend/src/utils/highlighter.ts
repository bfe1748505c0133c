export type Highlighter = (text: string | null | undefined) => string;

const TOKEN_PATTERN = /[0-9A-Za-z가-힣]+/g;
const MIN_TOKEN_LENGTH = 2;

// Generated tags and the entities escapeHtml emits; token wrapping skips them.
const PROTECTED_PATTERN = /(<\/?mark>|&(?:amp|lt|gt|quot|#39);)/;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/** Turns the escaped `<b>`/`</b>` the search API sends into `<mark>` tags. */
export function emphasizeApiMarkup(escaped: string): string {
  return escaped.replace(/&lt;b&gt;/g, '<mark>').replace(/&lt;\/b&gt;/g, '</mark>');
}

export function extractTokens(query: string): string[] {
  const seen = new Set<string>();
  const tokens: string[] = [];
  for (const token of query.match(TOKEN_PATTERN) ?? []) {
    const key = token.toLowerCase();
    if (token.length < MIN_TOKEN_LENGTH || seen.has(key)) continue;
    seen.add(key);
    tokens.push(token);
  }
  return tokens;
}

/**
 * Builds an HTML highlighter for one query. The output is escaped, keeps the
 * API's own emphasis as `<mark>`, and wraps every case-insensitive occurrence
 * of a query token in `<mark>` as well. It is only ever used for display.
 */
export function compileHighlighter(query: string): Highlighter {
  const tokens = extractTokens(query).sort((a, b) => b.length - a.length);
  const tokenPattern = tokens.length ? new RegExp(tokens.join('|'), 'gi') : null;

  return text => {
    if (!text) return '';
    const emphasized = emphasizeApiMarkup(escapeHtml(text));
    if (!tokenPattern) return emphasized;

    return emphasized
      .split(PROTECTED_PATTERN)
      .map((part, index) => (index % 2 === 1 ? part : part.replace(tokenPattern, match => `<mark>${match}</mark>`)))
      .join('');
  };
}
