/**
 * Marketing API Client
 * Wires one config, one transport and one request handler into every service
 */

import { createSdkConfig } from './config.js';
import { HttpTransport } from './transport.js';
import { ApiRequestHandler } from './request-handler.js';
import { OAuth2Flow } from './oauth2.js';
import { AccountService } from './account.js';
import { ActivityService } from './activity.js';
import { EmailMarketingService } from './email-marketing.js';
import { ContactService } from './contact.js';
import { ListService } from './list.js';
import type { OAuth2Credentials } from '../types/auth.js';
import type { SdkConfig, SdkConfigOverrides } from '../types/config.js';

export interface ClientOptions {
  /** Ready-made config; takes precedence over `overrides` */
  config?: SdkConfig;
  overrides?: SdkConfigOverrides;
  transport?: HttpTransport;
}

export class MarketingApiClient {
  readonly config: SdkConfig;
  readonly account: AccountService;
  readonly activities: ActivityService;
  readonly emailMarketing: EmailMarketingService;
  readonly contacts: ContactService;
  readonly lists: ListService;

  private handler: ApiRequestHandler;

  constructor(options: ClientOptions = {}) {
    this.config = options.config ?? createSdkConfig(options.overrides);
    const transport = options.transport ?? new HttpTransport({ timeoutMs: this.config.timeoutMs });
    this.handler = new ApiRequestHandler(this.config, transport);

    this.account = new AccountService(this.handler);
    this.activities = new ActivityService(this.handler);
    this.emailMarketing = new EmailMarketingService(this.handler);
    this.contacts = new ContactService(this.handler);
    this.lists = new ListService(this.handler);
  }

  /**
   * OAuth2 flow sharing this client's config and transport
   */
  oauth2(credentials: OAuth2Credentials): OAuth2Flow {
    return new OAuth2Flow(credentials, this.handler);
  }
}
