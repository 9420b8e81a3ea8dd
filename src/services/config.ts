/**
 * Config Service
 * SDK configuration defaults, plus the CLI's config file and environment lookup
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { loggers } from '../lib/logger.js';
import type {
  AppConfig,
  ConfigKey,
  AuthSettings,
  EndpointRegistry,
  SdkConfig,
  SdkConfigOverrides,
} from '../types/config.js';

export const DEFAULT_API_BASE_URL = 'https://api.constantcontact.com/v2/';

export const DEFAULT_ENDPOINTS: Readonly<EndpointRegistry> = {
  account_verified_addresses: 'account/verifiedemailaddresses',
  account_info: 'account/info',
  activities: 'activities',
  activity: 'activities/%s',
  add_contacts_activity: 'activities/addcontacts',
  clear_lists_activity: 'activities/clearlists',
  export_contacts_activity: 'activities/exportcontacts',
  remove_from_lists_activity: 'activities/removefromlists',
  campaigns: 'emailmarketing/campaigns',
  campaign: 'emailmarketing/campaigns/%s',
  campaign_preview: 'emailmarketing/campaigns/%s/preview',
  contacts: 'contacts',
  contact: 'contacts/%s',
  lists: 'lists',
  list: 'lists/%s',
  list_contacts: 'lists/%s/contacts',
};

export const DEFAULT_AUTH_SETTINGS: Readonly<AuthSettings> = {
  baseUrl: 'https://oauth2.constantcontact.com',
  authorizationEndpoint: '/idp/oauth2/authorize',
  tokenEndpoint: '/idp/oauth2/token',
  tokenInfoEndpoint: '/idp/oauth2/tokeninfo',
  responseTypeCode: 'code',
  responseTypeToken: 'token',
  authorizationCodeGrantType: 'authorization_code',
};

/**
 * Build an SDK config from the defaults and the given overrides.
 * Nested `endpoints` and `auth` are merged key by key.
 */
export function createSdkConfig(overrides: SdkConfigOverrides = {}): SdkConfig {
  const config: SdkConfig = {
    apiBaseUrl: overrides.apiBaseUrl ?? DEFAULT_API_BASE_URL,
    endpoints: { ...DEFAULT_ENDPOINTS, ...overrides.endpoints },
    auth: { ...DEFAULT_AUTH_SETTINGS, ...overrides.auth },
  };

  if (overrides.apiKey !== undefined) {
    config.apiKey = overrides.apiKey;
  }
  if (overrides.timeoutMs !== undefined) {
    config.timeoutMs = overrides.timeoutMs;
  }

  return config;
}

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'marketing-api');
const DEFAULT_CONFIG_FILE = 'config.json';

/**
 * Environment variables that take precedence over the config file
 */
const ENV_KEYS: Partial<Record<ConfigKey, string>> = {
  clientId: 'MKT_CLIENT_ID',
  clientSecret: 'MKT_CLIENT_SECRET',
  redirectUri: 'MKT_REDIRECT_URI',
  apiKey: 'MKT_API_KEY',
  apiBaseUrl: 'MKT_API_BASE_URL',
  authBaseUrl: 'MKT_AUTH_BASE_URL',
};

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'clientId',
  'clientSecret',
  'redirectUri',
  'apiKey',
  'apiBaseUrl',
  'authBaseUrl',
  'format',
];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value && value.length > 0 ? value : undefined;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath =
      configPath || readEnv('MKT_CONFIG_PATH') || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * Load the config file; a missing or unreadable file yields an empty config
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      return pickAppConfig(parsed);
    } catch (error) {
      loggers.cli.warn('Ignoring unreadable config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  /**
   * Stored value only; use `resolve` to apply environment overrides
   */
  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Value for a string setting, environment first
   */
  resolve(key: Exclude<ConfigKey, 'format'>): string | undefined {
    const envName = ENV_KEYS[key];
    const envValue = envName ? readEnv(envName) : undefined;
    return envValue ?? this.config[key];
  }

  /**
   * Access token from the environment. Tokens are never read from or written to the config file.
   */
  getAccessToken(): string | undefined {
    return readEnv('MKT_ACCESS_TOKEN');
  }

  /**
   * SDK config built from the resolved settings
   */
  toSdkConfig(): SdkConfig {
    const overrides: SdkConfigOverrides = {};
    const apiBaseUrl = this.resolve('apiBaseUrl');
    const authBaseUrl = this.resolve('authBaseUrl');
    const apiKey = this.resolve('apiKey') ?? this.resolve('clientId');

    if (apiBaseUrl) overrides.apiBaseUrl = apiBaseUrl;
    if (authBaseUrl) overrides.auth = { baseUrl: authBaseUrl };
    if (apiKey) overrides.apiKey = apiKey;

    return createSdkConfig(overrides);
  }
}

/**
 * Keep the known keys with values of the right shape
 */
function pickAppConfig(value: unknown): AppConfig {
  const config: AppConfig = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return config;
  }

  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'string' || !isConfigKey(key)) continue;
    if (key === 'format') {
      if (v === 'json' || v === 'table') config.format = v;
    } else {
      config[key] = v;
    }
  }
  return config;
}

let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}

/**
 * Drop the shared instance (tests)
 */
export function resetConfigService(): void {
  defaultInstance = null;
}
