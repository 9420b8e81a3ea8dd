/**
 * Email Marketing Service
 * Campaign CRUD and previews
 */

import { expectObject } from '../lib/json.js';
import { decodeResultSet, type ResultSet } from '../lib/result-set.js';
import {
  createCampaign,
  createCampaignPreview,
  createCampaignSummary,
  type Campaign,
  type CampaignPreview,
  type CampaignStatus,
} from '../models/campaign.js';
import type { PathParam } from '../lib/endpoints.js';
import type { ApiRequestHandler } from './request-handler.js';

export interface CampaignQuery {
  /** Page size, 1-500 (API default 50) */
  limit?: number;
  /** ISO-8601 timestamp */
  modified_since?: string;
  status?: CampaignStatus | 'ALL';
  /** Cursor from a previous ResultSet; must be used on its own */
  next?: string;
}

export class EmailMarketingService {
  private api: ApiRequestHandler;

  constructor(api: ApiRequestHandler) {
    this.api = api;
  }

  /**
   * Create a campaign. A null or missing `message_footer` is left out of the payload.
   */
  async addCampaign(accessToken: string, campaign: Campaign): Promise<Campaign> {
    const url = this.api.url('campaigns');
    const { message_footer, ...rest } = campaign;
    const payload = message_footer ? campaign : rest;

    const body = await this.api.post(accessToken, url, payload);
    return createCampaign(expectObject(body, url));
  }

  /**
   * One page of campaign summaries
   */
  async getCampaigns(accessToken: string, params: CampaignQuery = {}): Promise<ResultSet<Campaign>> {
    const url = this.api.url('campaigns');
    const body = await this.api.get(accessToken, url, { ...params });
    return decodeResultSet(body, url, createCampaignSummary);
  }

  async getCampaign(accessToken: string, campaignId: PathParam): Promise<Campaign> {
    const url = this.api.url('campaign', campaignId);
    const body = await this.api.get(accessToken, url);
    return createCampaign(expectObject(body, url));
  }

  /**
   * @returns true when the API answered 204 No Content
   */
  async deleteCampaign(accessToken: string, campaignId: PathParam): Promise<boolean> {
    return this.api.delete(accessToken, this.api.url('campaign', campaignId));
  }

  async updateCampaign(accessToken: string, campaign: Campaign): Promise<Campaign> {
    if (!campaign.id) {
      throw new Error('updateCampaign requires a campaign id');
    }
    const url = this.api.url('campaign', campaign.id);
    const body = await this.api.put(accessToken, url, campaign);
    return createCampaign(expectObject(body, url));
  }

  async getPreview(accessToken: string, campaignId: PathParam): Promise<CampaignPreview> {
    const url = this.api.url('campaign_preview', campaignId);
    const body = await this.api.get(accessToken, url);
    return createCampaignPreview(expectObject(body, url));
  }
}
