/**
 * Error types and the translator from HTTP failures to them
 */

import { FetchError } from 'ofetch';

export interface ApiErrorDetails {
  statusCode?: number;
  /** Exact URL of the failing request */
  url: string;
  /** Parsed error body, wrapped in a single-element array; empty when the body was empty */
  errors: readonly unknown[];
}

/**
 * HTTP 4xx/5xx from a resource endpoint
 */
export class ApiError extends Error {
  readonly statusCode: number | undefined;
  readonly url: string;
  readonly errors: readonly unknown[];

  constructor(message: string, details: ApiErrorDetails) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = details.statusCode;
    this.url = details.url;
    this.errors = details.errors;
  }
}

/**
 * HTTP 4xx/5xx from an OAuth2 endpoint
 */
export class OAuth2Error extends ApiError {
  constructor(message: string, details: ApiErrorDetails) {
    super(message, details);
    this.name = 'OAuth2Error';
  }
}

/**
 * No HTTP response was obtained (DNS, refused connection, timeout)
 */
export class TransportError extends Error {
  readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
    this.url = url;
  }
}

/**
 * A 2xx response whose body is not the JSON shape the call expects
 */
export class ResponseFormatError extends Error {
  readonly url: string;
  readonly body: unknown;

  constructor(message: string, url: string, body: unknown) {
    super(message);
    this.name = 'ResponseFormatError';
    this.url = url;
    this.body = body;
  }
}

/**
 * Missing credentials, token or settings
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ApiErrorType = new (message: string, details: ApiErrorDetails) => ApiError;

/**
 * Error body as the `errors` collection: JSON bodies arrive decoded, other bodies as raw text
 */
export function toErrorList(body: unknown): unknown[] {
  if (body === undefined || body === null || body === '') {
    return [];
  }
  return [body];
}

/**
 * Translate what the transport threw for `url`.
 * FetchErrors with a response become `ErrorType`, those without one a TransportError;
 * anything else is returned unchanged.
 */
export function toApiError(error: unknown, url: string, ErrorType: ApiErrorType = ApiError): unknown {
  if (!(error instanceof FetchError)) {
    return error;
  }

  if (!error.response) {
    return new TransportError(error.message, url, { cause: error });
  }

  return new ErrorType(error.message, {
    statusCode: error.statusCode ?? error.response.status,
    url,
    errors: toErrorList(error.data),
  });
}
