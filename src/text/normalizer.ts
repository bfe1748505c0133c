const EMPHASIS_TAG = /<\/?b>/g;

/**
 * Removes the `<b>`/`</b>` pairs the search API wraps around query hits.
 * Anything that is not a non-empty string comes back untouched.
 */
export function stripEmphasis(text: string): string;
export function stripEmphasis<T>(text: T): T;
export function stripEmphasis(text: unknown): unknown {
  if (typeof text !== 'string' || !text) return text;
  return text.replace(EMPHASIS_TAG, '');
}

/** Case-sensitive, verbatim substring test against markup-free title or description. */
export function containsExactQuery(query: string, item: { title: string; description: string }): boolean {
  return stripEmphasis(item.title).includes(query) || stripEmphasis(item.description).includes(query);
}
