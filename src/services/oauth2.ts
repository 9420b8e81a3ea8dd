/**
 * OAuth2 Flow
 * Authorization URL, authorization-code exchange and token introspection.
 * Credentials travel in the query string on all three endpoints.
 */

import { joinUrl } from '../lib/endpoints.js';
import { OAuth2Error } from '../lib/errors.js';
import { expectObject } from '../lib/json.js';
import { loggers } from '../lib/logger.js';
import { withQuery, type QueryParams } from '../lib/query.js';
import type { PreparedRequest } from '../lib/request-builder.js';
import type { AuthorizationRequest, OAuth2Credentials, TokenInfo, TokenResponse } from '../types/auth.js';
import type { AuthSettings } from '../types/config.js';
import type { ApiRequestHandler } from './request-handler.js';

export class OAuth2Flow {
  private credentials: Readonly<OAuth2Credentials>;
  private handler: ApiRequestHandler;

  constructor(credentials: OAuth2Credentials, handler: ApiRequestHandler) {
    this.credentials = Object.freeze({ ...credentials });
    this.handler = handler;
  }

  private get settings(): AuthSettings {
    return this.handler.config.auth;
  }

  /**
   * URL to send the user to for granting access.
   * @param useServerFlow - `code` response type when true, `token` (implicit flow) when false
   * @param state - echoed back on the redirect; left out only when undefined or null
   */
  buildAuthorizationUrl(useServerFlow: boolean = true, state?: string | null): string {
    const params: AuthorizationRequest = {
      response_type: useServerFlow ? this.settings.responseTypeCode : this.settings.responseTypeToken,
      client_id: this.credentials.clientId,
      redirect_uri: this.credentials.redirectUri,
    };

    if (state !== undefined && state !== null) {
      params.state = state;
    }

    const baseUrl = joinUrl(this.settings.baseUrl, this.settings.authorizationEndpoint);
    return withQuery(baseUrl, { ...params });
  }

  /**
   * Exchange the code from the redirect for an access token
   * @throws OAuth2Error on an HTTP error response
   */
  async exchangeCodeForToken(code: string): Promise<TokenResponse> {
    const url = this.endpointUrl(this.settings.tokenEndpoint, {
      grant_type: this.settings.authorizationCodeGrantType,
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      code,
      redirect_uri: this.credentials.redirectUri,
    });

    loggers.oauth.debug('Exchanging authorization code');
    return this.post(url);
  }

  /**
   * Metadata about an access token
   * @throws OAuth2Error on an HTTP error response
   */
  async fetchTokenInfo(accessToken: string): Promise<TokenInfo> {
    const url = this.endpointUrl(this.settings.tokenInfoEndpoint, { access_token: accessToken });
    return this.post(url);
  }

  private endpointUrl(path: string, params: QueryParams): string {
    return withQuery(joinUrl(this.settings.baseUrl, path), params);
  }

  private async post(url: string): Promise<Record<string, unknown>> {
    const request: PreparedRequest = {
      method: 'POST',
      url,
      headers: { Accept: 'application/json' },
    };
    const response = await this.handler.execute(request, OAuth2Error);
    return expectObject(response.data, url);
  }
}
