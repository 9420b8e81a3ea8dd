export { MarketingApiClient } from './services/client.js';
export type { ClientOptions } from './services/client.js';
export { OAuth2Flow } from './services/oauth2.js';
export { AccountService } from './services/account.js';
export type { VerifiedEmailQuery } from './services/account.js';
export { ActivityService } from './services/activity.js';
export type { ActivityQuery, ListIds } from './services/activity.js';
export { EmailMarketingService } from './services/email-marketing.js';
export type { CampaignQuery } from './services/email-marketing.js';
export { ContactService } from './services/contact.js';
export type { ContactQuery, ContactWriteOptions } from './services/contact.js';
export { ListService } from './services/list.js';
export type { ListQuery, ListContactsQuery } from './services/list.js';
export { ApiRequestHandler } from './services/request-handler.js';
export { HttpTransport } from './services/transport.js';
export type { TransportOptions, TransportResponse } from './services/transport.js';
export { createSdkConfig, DEFAULT_API_BASE_URL, DEFAULT_AUTH_SETTINGS, DEFAULT_ENDPOINTS } from './services/config.js';

export { createRequest, withJsonBody, withMultipartBody } from './lib/request-builder.js';
export type { HttpMethod, PreparedRequest, RequestBody } from './lib/request-builder.js';
export { withQuery } from './lib/query.js';
export type { QueryParams, QueryValue } from './lib/query.js';
export { formatPath, joinUrl, resolveEndpoint } from './lib/endpoints.js';
export {
  ApiError,
  OAuth2Error,
  TransportError,
  ResponseFormatError,
  ConfigError,
  toApiError,
} from './lib/errors.js';
export type { ApiErrorDetails, ApiErrorType } from './lib/errors.js';
export { ResultSet, extractNextCursor } from './lib/result-set.js';
export type { ResultSetMeta } from './lib/result-set.js';
export { loggers, StructuredLogger, setLogLevel } from './lib/logger.js';
export type { LogLevel, LogContext, LogEntry } from './lib/logger.js';

export * from './models/account.js';
export * from './models/activity.js';
export * from './models/campaign.js';
export * from './models/contact.js';
export * from './models/list.js';
export type * from './types/auth.js';
export type * from './types/config.js';
