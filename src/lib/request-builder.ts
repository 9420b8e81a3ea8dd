/**
 * Request Builder
 * Prepared requests shared by the OAuth2 flow and every service
 */

import { withQuery, type QueryParams } from './query.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type RequestBody = string | FormData;

export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: RequestBody;
}

/**
 * Bearer-authenticated request with `queryParams` merged into the URL.
 * The body is left unset; attach one with `withJsonBody` or `withMultipartBody`.
 */
export function createRequest(
  accessToken: string,
  method: HttpMethod,
  baseUrl: string,
  queryParams: QueryParams = {}
): PreparedRequest {
  return {
    method,
    url: withQuery(baseUrl, queryParams),
    headers: {
      Authorization: `Bearer ${accessToken}`,
      Accept: 'application/json',
    },
  };
}

export function withJsonBody(request: PreparedRequest, payload: unknown): PreparedRequest {
  return {
    ...request,
    headers: { ...request.headers, 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  };
}

/**
 * The form encoder sets `Content-Type: multipart/form-data; boundary=...` itself;
 * a hand-written header would lose the boundary.
 */
export function withMultipartBody(request: PreparedRequest, form: FormData): PreparedRequest {
  const headers = { ...request.headers };
  delete headers['Content-Type'];
  return { ...request, headers, body: form };
}
