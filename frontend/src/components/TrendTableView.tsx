import type { TrendTableData } from '../types/trend';
import { EmptyState } from './EmptyState';
import { TrendChart } from './TrendChart';

interface TrendTableViewProps {
  table: TrendTableData;
}

export function TrendTableView({ table }: TrendTableViewProps) {
  if (!table.columns.length) {
    return <EmptyState message="No trend data for these settings" />;
  }

  return (
    <>
      <table className="results-table trend-table">
        <thead>
          <tr>
            <th>Period</th>
            {table.columns.map(column => (
              <th key={column}>{column}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {table.rows.map(row => (
            <tr key={row.period}>
              <td>{row.period}</td>
              {row.values.map((value, index) => (
                <td key={table.columns[index]}>{value === null ? '' : value}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
      <TrendChart table={table} />
    </>
  );
}
