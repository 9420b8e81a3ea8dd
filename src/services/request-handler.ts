/**
 * API Request Handler
 * Request building, sending and error translation shared by every service.
 * Services hold one instance; `execute` is the only place errors are translated.
 */

import { createRequest, withJsonBody, withMultipartBody } from '../lib/request-builder.js';
import type { HttpMethod, PreparedRequest } from '../lib/request-builder.js';
import { resolveEndpoint, type PathParam } from '../lib/endpoints.js';
import { toApiError, ApiError, type ApiErrorType } from '../lib/errors.js';
import type { QueryParams } from '../lib/query.js';
import type { EndpointName, SdkConfig } from '../types/config.js';
import type { HttpTransport, TransportResponse } from './transport.js';

export class ApiRequestHandler {
  readonly config: SdkConfig;
  private transport: HttpTransport;

  constructor(config: SdkConfig, transport: HttpTransport) {
    this.config = config;
    this.transport = transport;
  }

  /**
   * Absolute URL of a named endpoint with its path parameters filled in
   */
  url(name: EndpointName, ...params: PathParam[]): string {
    return resolveEndpoint(this.config, name, ...params);
  }

  /**
   * Bearer request for a resource endpoint; `api_key` follows the caller's parameters when configured
   */
  createRequest(
    accessToken: string,
    method: HttpMethod,
    url: string,
    query: QueryParams = {}
  ): PreparedRequest {
    const params: QueryParams = this.config.apiKey ? { ...query, api_key: this.config.apiKey } : query;
    return createRequest(accessToken, method, url, params);
  }

  /**
   * Send a prepared request, translating HTTP failures into `ErrorType`
   */
  async execute<T = unknown>(
    request: PreparedRequest,
    ErrorType: ApiErrorType = ApiError
  ): Promise<TransportResponse<T>> {
    try {
      return await this.transport.send<T>(request);
    } catch (error) {
      throw toApiError(error, request.url, ErrorType);
    }
  }

  async get(accessToken: string, url: string, query: QueryParams = {}): Promise<unknown> {
    const response = await this.execute(this.createRequest(accessToken, 'GET', url, query));
    return response.data;
  }

  async post(accessToken: string, url: string, payload: unknown, query: QueryParams = {}): Promise<unknown> {
    const request = withJsonBody(this.createRequest(accessToken, 'POST', url, query), payload);
    const response = await this.execute(request);
    return response.data;
  }

  async put(accessToken: string, url: string, payload: unknown, query: QueryParams = {}): Promise<unknown> {
    const request = withJsonBody(this.createRequest(accessToken, 'PUT', url, query), payload);
    const response = await this.execute(request);
    return response.data;
  }

  /**
   * True only for 204 No Content
   */
  async delete(accessToken: string, url: string, query: QueryParams = {}): Promise<boolean> {
    const response = await this.execute(this.createRequest(accessToken, 'DELETE', url, query));
    return response.status === 204;
  }

  async upload(accessToken: string, url: string, form: FormData): Promise<unknown> {
    const request = withMultipartBody(this.createRequest(accessToken, 'POST', url), form);
    const response = await this.execute(request);
    return response.data;
  }
}
