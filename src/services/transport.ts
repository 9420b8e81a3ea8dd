/**
 * HTTP Transport
 * One reusable client that sends prepared requests through ofetch
 */

import { ofetch, FetchError } from 'ofetch';
import { loggers, redactUrl } from '../lib/logger.js';
import type { PreparedRequest } from '../lib/request-builder.js';

export interface TransportResponse<T = unknown> {
  status: number;
  /** Decoded body; undefined for empty bodies such as 204 */
  data: T | undefined;
  url: string;
}

export interface TransportOptions {
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

export class HttpTransport {
  private timeoutMs: number | undefined;

  constructor(options: TransportOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Send the request once. Non-2xx responses and network failures reject with
   * ofetch's FetchError; callers translate it.
   */
  async send<T = unknown>(request: PreparedRequest): Promise<TransportResponse<T>> {
    const startTime = Date.now();
    const logContext = { method: request.method, url: redactUrl(request.url) };

    loggers.http.debug('HTTP request started', logContext);

    try {
      const response = await ofetch.raw<T>(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        // single attempt
        retry: 0,
        timeout: this.timeoutMs,
      });

      loggers.http.debug('HTTP request completed', {
        ...logContext,
        statusCode: response.status,
        duration: Date.now() - startTime,
      });

      return { status: response.status, data: response._data, url: request.url };
    } catch (error) {
      const duration = Date.now() - startTime;

      if (error instanceof FetchError && error.response) {
        loggers.http.warn('HTTP request failed', {
          ...logContext,
          statusCode: error.response.status,
          duration,
        });
      } else {
        loggers.http.error(
          'HTTP request failed without a response',
          error instanceof Error ? error : new Error(String(error)),
          { ...logContext, duration }
        );
      }

      throw error;
    }
  }
}
