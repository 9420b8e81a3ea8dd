/**
 * Account Service
 * Account info and verified sender addresses
 */

import { expectArray, expectObject, isJsonRecord } from '../lib/json.js';
import {
  createAccountInfo,
  createVerifiedEmailAddress,
  type AccountInfo,
  type VerifiedEmailAddress,
  type VerifiedEmailStatus,
} from '../models/account.js';
import type { ApiRequestHandler } from './request-handler.js';

export interface VerifiedEmailQuery {
  status?: VerifiedEmailStatus | 'ALL';
}

export class AccountService {
  private api: ApiRequestHandler;

  constructor(api: ApiRequestHandler) {
    this.api = api;
  }

  /**
   * All verified email addresses of the account
   */
  async getVerifiedEmailAddresses(
    accessToken: string,
    params: VerifiedEmailQuery = {}
  ): Promise<VerifiedEmailAddress[]> {
    const url = this.api.url('account_verified_addresses');
    const body = await this.api.get(accessToken, url, { ...params });
    return expectArray(body, url).filter(isJsonRecord).map(createVerifiedEmailAddress);
  }

  /**
   * Add a verified address; the API then sends a verification email to it
   */
  async createVerifiedEmailAddress(
    accessToken: string,
    emailAddress: string
  ): Promise<VerifiedEmailAddress[]> {
    const url = this.api.url('account_verified_addresses');
    const body = await this.api.post(accessToken, url, [{ email_address: emailAddress }]);
    return expectArray(body, url).filter(isJsonRecord).map(createVerifiedEmailAddress);
  }

  async getAccountInfo(accessToken: string): Promise<AccountInfo> {
    const url = this.api.url('account_info');
    const body = await this.api.get(accessToken, url);
    return createAccountInfo(expectObject(body, url));
  }

  async updateAccountInfo(accessToken: string, accountInfo: AccountInfo): Promise<AccountInfo> {
    const url = this.api.url('account_info');
    const body = await this.api.put(accessToken, url, accountInfo);
    return createAccountInfo(expectObject(body, url));
  }
}
