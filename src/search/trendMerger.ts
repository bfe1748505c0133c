import type { TrendSeries, TrendTable } from '../types';

function uniqueColumnName(name: string, taken: Set<string>): string {
  if (!taken.has(name)) return name;
  let suffix = 2;
  while (taken.has(`${name} (${suffix})`)) suffix++;
  return `${name} (${suffix})`;
}

/**
 * Outer-joins independent series on `period`: one row per period seen in any
 * series, one column per surviving series, rows in ascending period order.
 *
 * A series is dropped when it has no points, or when none of its points carries
 * a period or a ratio. Points without a period are skipped; a period a series
 * does not report reads as null.
 */
export function mergeTrendSeries(series: TrendSeries[]): TrendTable {
  const columns: string[] = [];
  const valuesByColumn: Array<Map<string, number | null>> = [];
  const taken = new Set<string>();

  for (const group of series) {
    if (!group.points.length) continue;
    if (!group.points.some(point => typeof point.period === 'string')) continue;
    if (!group.points.some(point => typeof point.ratio === 'number')) continue;

    const values = new Map<string, number | null>();
    for (const point of group.points) {
      if (typeof point.period !== 'string') continue;
      values.set(point.period, typeof point.ratio === 'number' ? point.ratio : null);
    }

    const column = uniqueColumnName(group.name, taken);
    taken.add(column);
    columns.push(column);
    valuesByColumn.push(values);
  }

  if (!columns.length) return { columns: [], rows: [] };

  const periods = new Set<string>();
  for (const values of valuesByColumn) {
    for (const period of values.keys()) periods.add(period);
  }

  const rows = Array.from(periods)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map(period => ({
      period,
      values: valuesByColumn.map(values => values.get(period) ?? null)
    }));

  return { columns, rows };
}
