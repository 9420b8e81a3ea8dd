/**
 * Fetch Mock Helpers
 * Responses and errors for tests that mock ofetch with:
 *
 *   vi.mock('ofetch', () => {
 *     class FetchError extends Error {}
 *     return { ofetch: { raw: vi.fn() }, FetchError };
 *   });
 */

import { FetchError, type FetchResponse } from 'ofetch';

/**
 * Response as returned by ofetch.raw: a real Response plus the decoded `_data`
 */
export function fakeResponse<T>(status: number, data?: T): FetchResponse<T> {
  return Object.assign(new Response(null, { status }), { _data: data });
}

/**
 * FetchError for a non-2xx response; `data` is the decoded error body
 */
export function httpError(status: number, data: unknown, message = `${status} Error`): FetchError {
  return Object.assign(new FetchError(message), {
    response: fakeResponse(status, data),
    data,
    status,
    statusCode: status,
  });
}

/**
 * FetchError without a response (DNS failure, refused connection)
 */
export function networkError(message = 'fetch failed'): FetchError {
  return new FetchError(message);
}
