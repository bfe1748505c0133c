import type { TrendTableData } from '../types/trend';

const WIDTH = 600;
const HEIGHT = 200;
const PADDING = 20;
const SERIES_COLORS = ['#38bdf8', '#f472b6', '#a3e635', '#facc15', '#c084fc', '#fb923c'];

interface TrendChartProps {
  table: TrendTableData;
}

function coordinate(value: number) {
  return String(Number(value.toFixed(1)));
}

/**
 * SVG path for one column. A missing value breaks the line, so the next
 * present point starts a new segment.
 */
export function seriesPath(table: TrendTableData, columnIndex: number): string {
  const plotWidth = WIDTH - PADDING * 2;
  const plotHeight = HEIGHT - PADDING * 2;
  const step = plotWidth / Math.max(table.rows.length - 1, 1);
  const maxValue = Math.max(
    1,
    ...table.rows.flatMap(row => row.values.filter((value): value is number => value !== null))
  );

  const commands: string[] = [];
  let penDown = false;
  table.rows.forEach((row, rowIndex) => {
    const value = row.values[columnIndex];
    if (value === null || value === undefined) {
      penDown = false;
      return;
    }
    const x = PADDING + rowIndex * step;
    const y = PADDING + plotHeight - (value / maxValue) * plotHeight;
    commands.push(`${penDown ? 'L' : 'M'}${coordinate(x)},${coordinate(y)}`);
    penDown = true;
  });
  return commands.join(' ');
}

export function TrendChart({ table }: TrendChartProps) {
  if (!table.columns.length || !table.rows.length) return null;

  const firstPeriod = table.rows[0]?.period ?? '';
  const lastPeriod = table.rows[table.rows.length - 1]?.period ?? '';

  return (
    <figure className="trend-chart">
      <svg viewBox={`0 0 ${WIDTH} ${HEIGHT}`} role="img" aria-label="Trend chart">
        <line
          className="trend-chart__axis"
          x1={PADDING}
          y1={HEIGHT - PADDING}
          x2={WIDTH - PADDING}
          y2={HEIGHT - PADDING}
        />
        {table.columns.map((column, index) => (
          <path
            key={column}
            className="trend-chart__series"
            data-series={column}
            d={seriesPath(table, index)}
            fill="none"
            stroke={SERIES_COLORS[index % SERIES_COLORS.length]}
            strokeWidth={2}
          />
        ))}
      </svg>
      <figcaption>
        <span className="trend-chart__range">
          {firstPeriod} to {lastPeriod}
        </span>
        <ul className="trend-chart__legend">
          {table.columns.map((column, index) => (
            <li key={column} style={{ color: SERIES_COLORS[index % SERIES_COLORS.length] }}>
              {column}
            </li>
          ))}
        </ul>
      </figcaption>
    </figure>
  );
}
