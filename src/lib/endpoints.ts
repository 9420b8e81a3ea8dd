/**
 * Endpoint path resolution
 */

import type { EndpointName, SdkConfig } from '../types/config.js';

export type PathParam = string | number;

/**
 * Join a base URL and a path with exactly one slash between them
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * Substitute each `%s` in order with the URI-encoded parameter
 * @throws Error when the number of placeholders and parameters differ
 */
export function formatPath(template: string, ...params: PathParam[]): string {
  const placeholders = template.split('%s').length - 1;
  if (placeholders !== params.length) {
    throw new Error(
      `Path template "${template}" expects ${placeholders} parameter(s), got ${params.length}`
    );
  }

  let index = 0;
  return template.replace(/%s/g, () => encodeURIComponent(String(params[index++])));
}

/**
 * Absolute URL of a named resource endpoint
 */
export function resolveEndpoint(config: SdkConfig, name: EndpointName, ...params: PathParam[]): string {
  return joinUrl(config.apiBaseUrl, formatPath(config.endpoints[name], ...params));
}
