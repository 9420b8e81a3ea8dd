/**
 * Query string encoding
 */

export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue>;

/**
 * Append `params` to `url` in insertion order, form-encoded
 * (`application/x-www-form-urlencoded`). `null` and `undefined` values are left out.
 */
export function withQuery(url: string, params: QueryParams = {}): string {
  const entries = Object.entries(params).filter(
    (entry): entry is [string, string | number | boolean] => entry[1] !== undefined && entry[1] !== null
  );

  if (entries.length === 0) {
    return url;
  }

  const parsed = new URL(url);
  for (const [key, value] of entries) {
    parsed.searchParams.append(key, String(value));
  }
  return parsed.toString();
}
