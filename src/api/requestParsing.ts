import { DateTime } from 'luxon';
import { ValidationError } from '../errors';
import type {
  AgeBand,
  BlogSort,
  Device,
  Gender,
  LocalSort,
  PagedEndpoint,
  SearchTrendRequest,
  ShoppingCategoryTrendRequest,
  ShoppingKeywordTrendRequest,
  TimeUnit,
  TrendFilters
} from '../types';
import { asInt, asString, isRecord } from '../utils/validation';

const DATE_FORMAT = 'yyyy-MM-dd';
const DEFAULT_TREND_WINDOW_DAYS = 90;

const BLOG_SORTS: readonly BlogSort[] = ['sim', 'date'];
const LOCAL_SORTS: readonly LocalSort[] = ['random', 'comment'];
const PAGED_ENDPOINTS: readonly PagedEndpoint[] = ['blog', 'cafearticle'];
const TIME_UNITS: readonly TimeUnit[] = ['date', 'week', 'month'];
const DEVICES: readonly Device[] = ['pc', 'mo'];
const GENDERS: readonly Gender[] = ['m', 'f'];
const AGE_BANDS: readonly AgeBand[] = ['10', '20', '30', '40', '50', '60'];

function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find(candidate => candidate === value);
}

function pickOption<T extends string>(field: string, allowed: readonly T[], value: unknown, fallback: T): T {
  if (value === undefined || value === '') return fallback;
  const picked = oneOf(allowed, value);
  if (!picked) throw new ValidationError(field, `${field} must be one of ${allowed.join(', ')}`);
  return picked;
}

function optionalOption<T extends string>(field: string, allowed: readonly T[], value: unknown): T | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const picked = oneOf(allowed, value);
  if (!picked) throw new ValidationError(field, `${field} must be one of ${allowed.join(', ')}`);
  return picked;
}

function intParam(field: string, value: unknown, fallback: number, min: number, max?: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = asInt(value);
  if (parsed === undefined || parsed < min || (max !== undefined && parsed > max)) {
    const range = max === undefined ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ValidationError(field, `${field} must be an integer ${range}`);
  }
  return parsed;
}

function boolParam(value: unknown, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['false', '0', 'off', 'no'].includes(String(value).toLowerCase());
}

export function isPagedEndpoint(value: string): value is PagedEndpoint {
  return oneOf(PAGED_ENDPOINTS, value) !== undefined;
}

/** The query is passed through as typed; only whitespace-only input counts as empty. */
export function readQuery(raw: unknown): string {
  const query = asString(raw) ?? '';
  return query.trim() ? query : '';
}

export interface PagedSearchParams {
  query: string;
  sort: BlogSort;
  pageSize: number;
  page: number;
  start: number;
  exact: boolean;
}

export interface PagingLimits {
  blockSize: number;
  startMax: number;
  defaultPageSize: number;
}

export function parsePagedSearchParams(raw: Record<string, unknown>, limits: PagingLimits): PagedSearchParams {
  return {
    query: readQuery(raw.q),
    sort: pickOption('sort', BLOG_SORTS, raw.sort, 'sim'),
    pageSize: intParam('pageSize', raw.pageSize, limits.defaultPageSize, 1, limits.blockSize),
    page: intParam('page', raw.page, 1, 1),
    start: intParam('start', raw.start, 1, 1, limits.startMax),
    exact: boolParam(raw.exact, true)
  };
}

export function parseLocalSearchParams(raw: Record<string, unknown>): { query: string; sort: LocalSort } {
  return {
    query: readQuery(raw.q),
    sort: pickOption('sort', LOCAL_SORTS, raw.sort, 'random')
  };
}

function parseDate(field: string, value: unknown, fallback: DateTime): DateTime {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = DateTime.fromFormat(asString(value) ?? '', DATE_FORMAT);
  if (!parsed.isValid) throw new ValidationError(field, `${field} must be a ${DATE_FORMAT} date`);
  return parsed;
}

function parseAges(value: unknown): AgeBand[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new ValidationError('ages', 'ages must be an array');
  return value.map(age => {
    const band = oneOf(AGE_BANDS, String(age));
    if (!band) throw new ValidationError('ages', `ages must be within ${AGE_BANDS.join(', ')}`);
    return band;
  });
}

/** Missing dates default to the last 90 days ending `today`. */
export function parseTrendFilters(body: Record<string, unknown>, today: DateTime): TrendFilters {
  const endDate = parseDate('endDate', body.endDate, today.startOf('day'));
  const startDate = parseDate('startDate', body.startDate, endDate.minus({ days: DEFAULT_TREND_WINDOW_DAYS }));
  if (startDate.toMillis() > endDate.toMillis()) throw new ValidationError('startDate', 'startDate must not be after endDate');

  const filters: TrendFilters = {
    startDate: startDate.toFormat(DATE_FORMAT),
    endDate: endDate.toFormat(DATE_FORMAT),
    timeUnit: pickOption('timeUnit', TIME_UNITS, body.timeUnit, 'date')
  };

  const device = optionalOption('device', DEVICES, body.device);
  const gender = optionalOption('gender', GENDERS, body.gender);
  const ages = parseAges(body.ages);
  if (device) filters.device = device;
  if (gender) filters.gender = gender;
  if (ages && ages.length) filters.ages = ages;
  return filters;
}

function stringList(field: string, value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return value.split(',').map(part => part.trim()).filter(Boolean);
  if (!Array.isArray(value)) throw new ValidationError(field, `${field} must be a list`);
  return value.map(entry => asString(entry)?.trim() ?? '').filter(Boolean);
}

function namedPairs(field: string, value: unknown, valueKey: string): Array<{ name: string; value: string }> {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ValidationError(field, `${field} must be a list`);
  return value
    .filter(isRecord)
    .map(pair => ({ name: asString(pair.name)?.trim() ?? '', value: asString(pair[valueKey])?.trim() ?? '' }))
    .filter(pair => pair.name && pair.value);
}

export function parseSearchTrendBody(body: unknown, today: DateTime): SearchTrendRequest {
  const record = isRecord(body) ? body : {};
  return { ...parseTrendFilters(record, today), keywords: stringList('keywords', record.keywords) };
}

export function parseShoppingCategoryBody(body: unknown, today: DateTime): ShoppingCategoryTrendRequest {
  const record = isRecord(body) ? body : {};
  return {
    ...parseTrendFilters(record, today),
    categories: namedPairs('categories', record.categories, 'id').map(pair => ({ name: pair.name, id: pair.value }))
  };
}

export function parseShoppingKeywordBody(body: unknown, today: DateTime): ShoppingKeywordTrendRequest {
  const record = isRecord(body) ? body : {};
  return {
    ...parseTrendFilters(record, today),
    categoryId: asString(record.categoryId)?.trim() ?? '',
    keywords: namedPairs('keywords', record.keywords, 'keyword').map(pair => ({ name: pair.name, keyword: pair.value }))
  };
}
