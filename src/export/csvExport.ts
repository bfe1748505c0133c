import * as CsvWriter from 'csv-writer';
import { DateTime } from 'luxon';
import { stripEmphasis } from '../text/normalizer';
import type { BlogItem, CafeArticleItem, LocalItem, TrendTable } from '../types';

type CsvHeader = Array<{ id: string; title: string }>;
type CsvRecord = Record<string, string>;

function toCsv(header: CsvHeader, records: CsvRecord[]): string {
  const stringifier = CsvWriter.createObjectCsvStringifier({ header });
  const headerLine = stringifier.getHeaderString() ?? '';
  // The stringifier emits a lone newline for an empty record list.
  return records.length ? headerLine + stringifier.stringifyRecords(records) : headerLine;
}

/** `yyyyMMdd` becomes `yyyy-MM-dd`; anything that does not parse is kept as sent. */
export function formatPostDate(value: string): string {
  if (!value) return '';
  const parsed = DateTime.fromFormat(value, 'yyyyMMdd');
  return parsed.isValid ? parsed.toFormat('yyyy-MM-dd') : value;
}

function articleHeader(sourceTitle: string): CsvHeader {
  return [
    { id: 'title', title: 'Title' },
    { id: 'summary', title: 'Summary' },
    { id: 'source', title: sourceTitle },
    { id: 'date', title: 'Date' },
    { id: 'url', title: 'URL' }
  ];
}

export function blogItemsToCsv(items: BlogItem[]): string {
  return toCsv(
    articleHeader('Blogger'),
    items.map(item => ({
      title: stripEmphasis(item.title),
      summary: stripEmphasis(item.description),
      source: item.bloggername,
      date: formatPostDate(item.postdate),
      url: item.link
    }))
  );
}

export function cafeItemsToCsv(items: CafeArticleItem[]): string {
  return toCsv(
    articleHeader('Cafe'),
    items.map(item => ({
      title: stripEmphasis(item.title),
      summary: stripEmphasis(item.description),
      source: item.cafename,
      date: '',
      url: item.link
    }))
  );
}

export function localItemsToCsv(items: LocalItem[]): string {
  return toCsv(
    [
      { id: 'name', title: 'Name' },
      { id: 'category', title: 'Category' },
      { id: 'description', title: 'Description' },
      { id: 'address', title: 'Address' },
      { id: 'roadAddress', title: 'RoadAddress' },
      { id: 'url', title: 'URL' },
      { id: 'mapx', title: 'MapX' },
      { id: 'mapy', title: 'MapY' }
    ],
    items.map(item => ({
      name: stripEmphasis(item.title),
      category: stripEmphasis(item.category),
      description: stripEmphasis(item.description),
      address: item.address,
      roadAddress: item.roadAddress,
      url: item.link,
      mapx: item.mapx,
      mapy: item.mapy
    }))
  );
}

export function trendTableToCsv(table: TrendTable): string {
  // Group names are user input, so columns are keyed by position.
  const header: CsvHeader = [
    { id: 'period', title: 'Period' },
    ...table.columns.map((title, index) => ({ id: `g${index}`, title }))
  ];

  return toCsv(
    header,
    table.rows.map(row => {
      const record: CsvRecord = { period: row.period };
      row.values.forEach((value, index) => {
        record[`g${index}`] = value === null ? '' : String(value);
      });
      return record;
    })
  );
}
