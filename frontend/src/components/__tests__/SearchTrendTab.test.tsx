// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { TrendAPI } from '../../api/trendApi';
import { SearchTrendTab } from '../SearchTrendTab';

afterEach(cleanup);

const table = {
  columns: ['alpha'],
  rows: [{ period: '2024-01-01', values: [100] }]
};

describe('SearchTrendTab', () => {
  it('uses the whole shared query as one keyword when the box is empty', async () => {
    const trendSpy = vi.spyOn(TrendAPI, 'searchTrend').mockResolvedValue(table);

    render(<SearchTrendTab query="  alpha, beta  " />);
    fireEvent.click(screen.getByRole('button', { name: 'Show trend' }));

    await screen.findByRole('img', { name: 'Trend chart' });
    expect(trendSpy).toHaveBeenCalledWith(expect.objectContaining({ keywords: ['alpha, beta'] }));
  });

  it('splits the keyword box on commas', async () => {
    const trendSpy = vi.spyOn(TrendAPI, 'searchTrend').mockResolvedValue(table);

    render(<SearchTrendTab query="shared" />);
    fireEvent.change(screen.getByLabelText(/Trend keywords/), { target: { value: 'alpha, beta' } });
    fireEvent.click(screen.getByRole('button', { name: 'Show trend' }));

    await screen.findByRole('img', { name: 'Trend chart' });
    expect(trendSpy).toHaveBeenCalledWith(expect.objectContaining({ keywords: ['alpha', 'beta'] }));
  });

  it('asks for input when both the box and the shared query are blank', () => {
    const trendSpy = vi.spyOn(TrendAPI, 'searchTrend').mockResolvedValue(table);

    render(<SearchTrendTab query="   " />);
    fireEvent.click(screen.getByRole('button', { name: 'Show trend' }));

    expect(screen.getByRole('alert').textContent).toContain('Enter trend keywords or a shared query');
    expect(trendSpy).not.toHaveBeenCalled();
  });
});
