/**
 * OAuth2 types
 */

/**
 * Application credentials, fixed for the lifetime of an OAuth2Flow
 */
export interface OAuth2Credentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * Query parameters of the authorization URL
 */
export interface AuthorizationRequest {
  response_type: string;
  client_id: string;
  redirect_uri: string;
  state?: string;
}

/**
 * Token endpoint response as decoded from the provider (typically
 * `access_token`, `token_type`, `expires_in`); no schema is enforced
 */
export type TokenResponse = Record<string, unknown>;

/**
 * Token introspection response (typically `client_id`, `user_name`, `expires_in`)
 */
export type TokenInfo = Record<string, unknown>;
