import type { Request } from 'express';
import { NotFoundError } from '../lib/errors.js';
import type { MenuSort, MenuSortField, OrderSort, OrderSortField, SortDirection } from '../repositories/types.js';

/** First string value of a query parameter; arrays and nested objects yield their first string. */
export function queryString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.find((v): v is string => typeof v === 'string');
  return undefined;
}

/** Every value of a repeated and/or comma-separated parameter. */
export function queryList(value: unknown): string[] {
  const raw = Array.isArray(value) ? value : [value];
  return raw
    .filter((v): v is string => typeof v === 'string')
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter(Boolean);
}

function directed(term: string): { key: string; direction: SortDirection } {
  return term.startsWith('-') ? { key: term.slice(1), direction: -1 } : { key: term, direction: 1 };
}

const MENU_ORDERING: Record<string, MenuSortField> = {
  price: 'price',
  title: 'title',
  category__title: 'categoryTitle',
};

/** `ordering=price,-title` → sort keys; unknown keys are dropped. */
export function parseMenuOrdering(value: unknown): MenuSort[] {
  const sort: MenuSort[] = [];
  for (const term of queryList(value)) {
    const { key, direction } = directed(term);
    const field = MENU_ORDERING[key];
    if (field && !sort.some((s) => s.field === field)) sort.push({ field, direction });
  }
  return sort;
}

const ORDER_ORDERING: Record<string, OrderSortField> = {
  id: 'id',
  total: 'total',
  created: 'created',
};

export function parseOrderOrdering(value: unknown): OrderSort | undefined {
  const raw = queryString(value);
  if (!raw) return undefined;
  const { key, direction } = directed(raw.trim());
  const field = ORDER_ORDERING[key];
  return field ? { field, direction } : undefined;
}

export function parseTitleOrdering(value: unknown): SortDirection | undefined {
  const raw = queryString(value)?.trim();
  if (raw === 'title') return 1;
  if (raw === '-title') return -1;
  return undefined;
}

/** Positive integer or undefined. */
export function positiveInt(value: unknown): number | undefined {
  const raw = queryString(value);
  if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

export interface PageRequest {
  page: number;
  pageSize: number;
  offset: number;
}

export interface PageSettings {
  pageSize: number;
  maxPageSize: number;
}

export const INVALID_PAGE = 'Invalid page.';

export function parsePageRequest(query: Request['query'], settings: PageSettings): PageRequest {
  let page = 1;
  if (query.page !== undefined) {
    const parsed = positiveInt(query.page);
    if (parsed === undefined) throw new NotFoundError(INVALID_PAGE);
    page = parsed;
  }
  const requested = positiveInt(query.page_size);
  const pageSize = requested === undefined ? settings.pageSize : Math.min(requested, settings.maxPageSize);
  return { page, pageSize, offset: (page - 1) * pageSize };
}

export function pageCount(count: number, pageSize: number): number {
  return Math.max(1, Math.ceil(count / pageSize));
}

/** Absolute link to another page of the same listing; page 1 drops the parameter. */
export function pageLink(req: Request, page: number): string {
  const url = new URL(req.originalUrl, `${req.protocol}://${req.get('host') ?? 'localhost'}`);
  if (page <= 1) url.searchParams.delete('page');
  else url.searchParams.set('page', String(page));
  return url.toString();
}
