import { DateTime } from 'luxon';

export function formatPostDate(value: string): string {
  if (!value) return '';
  const parsed = DateTime.fromFormat(value, 'yyyyMMdd');
  return parsed.isValid ? parsed.toFormat('yyyy-MM-dd') : value;
}

export function stripEmphasis(text: string): string {
  return text.replace(/<\/?b>/g, '');
}

export function defaultTrendRange(today: DateTime = DateTime.now()): { startDate: string; endDate: string } {
  return {
    startDate: today.minus({ days: 90 }).toFormat('yyyy-MM-dd'),
    endDate: today.toFormat('yyyy-MM-dd')
  };
}
