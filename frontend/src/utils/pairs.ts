export interface NamedValue {
  name: string;
  value: string;
}

/** Reads `name=value` entries separated by commas or new lines; incomplete entries are dropped. */
export function parseNamedPairs(input: string): NamedValue[] {
  return input
    .split(/[,\n]/)
    .map(entry => {
      const separator = entry.indexOf('=');
      if (separator < 0) return { name: '', value: '' };
      return { name: entry.slice(0, separator).trim(), value: entry.slice(separator + 1).trim() };
    })
    .filter(pair => pair.name && pair.value);
}

export function splitKeywords(input: string): string[] {
  return input
    .split(',')
    .map(keyword => keyword.trim())
    .filter(Boolean);
}
