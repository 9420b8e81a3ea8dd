/**
 * Helpers for reading decoded JSON into typed models
 */

import { ResponseFormatError } from './errors.js';

export type JsonRecord = Record<string, unknown>;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Response body as an object, or a ResponseFormatError naming the URL
 */
export function expectObject(body: unknown, url: string): JsonRecord {
  if (!isJsonRecord(body)) {
    throw new ResponseFormatError('Expected a JSON object in the response body', url, body);
  }
  return body;
}

export function expectArray(body: unknown, url: string): unknown[] {
  if (!Array.isArray(body)) {
    throw new ResponseFormatError('Expected a JSON array in the response body', url, body);
  }
  return body;
}

export function optString(obj: JsonRecord, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

export function optNumber(obj: JsonRecord, key: string): number | undefined {
  const value = obj[key];
  return typeof value === 'number' ? value : undefined;
}

export function optBoolean(obj: JsonRecord, key: string): boolean | undefined {
  const value = obj[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Ids arrive as strings from most endpoints and as numbers from a few
 */
export function optId(obj: JsonRecord, key: string): string | undefined {
  const value = obj[key];
  if (typeof value === 'number') return String(value);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Decode each object element of an array field; non-objects are dropped
 */
export function optArray<T>(
  obj: JsonRecord,
  key: string,
  decode: (item: JsonRecord) => T
): T[] | undefined {
  const value = obj[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter(isJsonRecord).map(decode);
}

export function optObject<T>(
  obj: JsonRecord,
  key: string,
  decode: (item: JsonRecord) => T
): T | undefined {
  const value = obj[key];
  return isJsonRecord(value) ? decode(value) : undefined;
}
