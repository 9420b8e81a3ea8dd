/**
 * Result Set
 * One page of a listing plus its pagination metadata
 */

import { expectObject, isJsonRecord, type JsonRecord } from './json.js';

export interface ResultSetMeta {
  pagination?: {
    next?: string | null;
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

/**
 * Cursor for the next page. The API sends either the bare cursor or a link
 * such as `/v2/contacts?next=abc`; links are reduced to their `next` value.
 */
export function extractNextCursor(next: string | null | undefined): string | undefined {
  if (!next) return undefined;

  const queryStart = next.indexOf('?');
  if (queryStart === -1) {
    return next;
  }
  return new URLSearchParams(next.slice(queryStart + 1)).get('next') ?? next;
}

export class ResultSet<T> {
  readonly results: T[];
  readonly meta: ResultSetMeta;
  /** Pass as the `next` parameter of the same listing call to fetch the next page */
  readonly next: string | undefined;

  constructor(results: T[], meta: ResultSetMeta = {}) {
    this.results = results;
    this.meta = meta;
    this.next = extractNextCursor(meta.pagination?.next);
  }

  hasNext(): boolean {
    return this.next !== undefined;
  }
}

function toMeta(value: unknown): ResultSetMeta {
  if (!isJsonRecord(value)) return {};
  const pagination = value.pagination;
  if (!isJsonRecord(pagination)) {
    return { ...value, pagination: undefined };
  }
  const next = pagination.next;
  return {
    ...value,
    pagination: { ...pagination, next: typeof next === 'string' ? next : undefined },
  };
}

/**
 * Decode a `{ results: [...], meta: {...} }` body, keeping item order
 */
export function decodeResultSet<T>(
  body: unknown,
  url: string,
  decode: (item: JsonRecord) => T
): ResultSet<T> {
  const obj = expectObject(body, url);
  const results = Array.isArray(obj.results) ? obj.results.filter(isJsonRecord).map(decode) : [];
  return new ResultSet(results, toMeta(obj.meta));
}
