/**
 * API Client Helper
 * Shared client construction and global option handling for CLI commands
 */

import type { Command } from 'commander';
import { MarketingApiClient } from '../services/client.js';
import { getConfigService } from '../services/config.js';
import type { OAuth2Flow } from '../services/oauth2.js';
import { ConfigError } from './errors.js';
import { isValidFormat, reportError, type OutputFormat } from './output-formatter.js';

export interface GlobalOptions {
  format: OutputFormat;
  token?: string;
}

/**
 * Global options; the format falls back to the config file, then json
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts: Record<string, unknown> = cmd.optsWithGlobals();
  const requested = typeof opts.format === 'string' ? opts.format : undefined;
  const fallback = getConfigService().get('format') ?? 'json';
  const format = requested && isValidFormat(requested) ? requested : fallback;
  const token = typeof opts.token === 'string' ? opts.token : undefined;
  return { format, token };
}

let cachedClient: MarketingApiClient | null = null;

export function getApiClient(): MarketingApiClient {
  if (!cachedClient) {
    cachedClient = new MarketingApiClient({ config: getConfigService().toSdkConfig() });
  }
  return cachedClient;
}

/**
 * Drop the cached client (tests)
 */
export function clearApiClientCache(): void {
  cachedClient = null;
}

/**
 * Access token from --token or MKT_ACCESS_TOKEN
 * @throws ConfigError when neither is set
 */
export function requireAccessToken(options: GlobalOptions): string {
  const token = options.token ?? getConfigService().getAccessToken();
  if (!token) {
    throw new ConfigError('No access token: pass --token or set MKT_ACCESS_TOKEN');
  }
  return token;
}

/**
 * OAuth2 flow from the configured client id, secret and redirect URI
 * @throws ConfigError when any of them is missing
 */
export function getOAuth2Flow(): OAuth2Flow {
  const config = getConfigService();
  const clientId = config.resolve('clientId');
  const clientSecret = config.resolve('clientSecret');
  const redirectUri = config.resolve('redirectUri');

  if (!clientId || !clientSecret || !redirectUri) {
    throw new ConfigError(
      'OAuth2 credentials incomplete: set MKT_CLIENT_ID, MKT_CLIENT_SECRET and MKT_REDIRECT_URI, or run "mkt config set"'
    );
  }

  return getApiClient().oauth2({ clientId, clientSecret, redirectUri });
}

/**
 * Run a command body with the global options, reporting any error in the selected format
 */
export async function runAction(
  cmd: Command,
  body: (options: GlobalOptions) => Promise<void> | void
): Promise<void> {
  const options = getGlobalOptions(cmd);
  try {
    await body(options);
  } catch (error) {
    reportError(error, options.format);
  }
}
