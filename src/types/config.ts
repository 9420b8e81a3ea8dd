/**
 * Configuration types
 */

/**
 * Logical names of the resource endpoints
 */
export type EndpointName =
  | 'account_verified_addresses'
  | 'account_info'
  | 'activities'
  | 'activity'
  | 'add_contacts_activity'
  | 'clear_lists_activity'
  | 'export_contacts_activity'
  | 'remove_from_lists_activity'
  | 'campaigns'
  | 'campaign'
  | 'campaign_preview'
  | 'contacts'
  | 'contact'
  | 'lists'
  | 'list'
  | 'list_contacts';

/**
 * Path templates relative to `apiBaseUrl`. `%s` marks a path parameter.
 */
export type EndpointRegistry = Record<EndpointName, string>;

export interface AuthSettings {
  baseUrl: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  tokenInfoEndpoint: string;
  responseTypeCode: string;
  responseTypeToken: string;
  authorizationCodeGrantType: string;
}

/**
 * Explicit SDK configuration, built once and handed to the OAuth2 flow and
 * every service.
 */
export interface SdkConfig {
  apiBaseUrl: string;
  /** Sent as `api_key` on resource calls when set */
  apiKey?: string;
  endpoints: EndpointRegistry;
  auth: AuthSettings;
  /** Per-request timeout in milliseconds, off when unset */
  timeoutMs?: number;
}

export interface SdkConfigOverrides {
  apiBaseUrl?: string;
  apiKey?: string;
  endpoints?: Partial<EndpointRegistry>;
  auth?: Partial<AuthSettings>;
  timeoutMs?: number;
}

/**
 * CLI config file structure
 */
export interface AppConfig {
  /** OAuth2 client id (also used as the API key) */
  clientId?: string;
  /** OAuth2 client secret */
  clientSecret?: string;
  /** Redirect URI registered for the application */
  redirectUri?: string;
  /** API key sent with resource calls */
  apiKey?: string;
  /** Resource API base URL override */
  apiBaseUrl?: string;
  /** OAuth2 base URL override */
  authBaseUrl?: string;
  /** Default output format */
  format?: 'json' | 'table';
}

export type ConfigKey = keyof AppConfig;
