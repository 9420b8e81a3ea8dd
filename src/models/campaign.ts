/**
 * Email campaign models
 */

import {
  optArray,
  optBoolean,
  optId,
  optNumber,
  optObject,
  optString,
  type JsonRecord,
} from '../lib/json.js';

export type CampaignStatus = 'DRAFT' | 'RUNNING' | 'SENT' | 'SCHEDULED' | 'DELETED';

export interface MessageFooter {
  city?: string;
  state?: string;
  country?: string;
  organization_name?: string;
  address_line_1?: string;
  address_line_2?: string;
  address_line_3?: string;
  international_state?: string;
  postal_code?: string;
  include_forward_email?: boolean;
  forward_email_link_text?: string;
  include_subscribe_link?: boolean;
  subscribe_link_text?: string;
}

export interface TrackingSummary {
  sends?: number;
  opens?: number;
  clicks?: number;
  forwards?: number;
  unsubscribes?: number;
  bounces?: number;
  spam_count?: number;
}

export interface SentContactList {
  id?: string;
}

export interface ClickThroughDetails {
  url?: string;
  url_uid?: string;
  click_count?: number;
}

export interface Campaign {
  id?: string;
  name?: string;
  subject?: string;
  status?: string;
  from_name?: string;
  from_email?: string;
  reply_to_email?: string;
  template_type?: string;
  created_date?: string;
  modified_date?: string;
  last_run_date?: string;
  next_run_date?: string;
  permalink_url?: string;
  is_permission_reminder_enabled?: boolean;
  permission_reminder_text?: string;
  is_view_as_webpage_enabled?: boolean;
  view_as_web_page_text?: string;
  view_as_web_page_link_text?: string;
  greeting_salutations?: string;
  greeting_name?: string;
  greeting_string?: string;
  email_content?: string;
  text_content?: string;
  email_content_format?: string;
  style_sheet?: string;
  message_footer?: MessageFooter | null;
  tracking_summary?: TrackingSummary;
  sent_to_contact_lists?: SentContactList[];
  click_through_details?: ClickThroughDetails[];
}

export interface CampaignPreview {
  from_email?: string;
  reply_to_email?: string;
  subject?: string;
  preview_email_content?: string;
  preview_text_content?: string;
}

export function createMessageFooter(props: JsonRecord): MessageFooter {
  return {
    city: optString(props, 'city'),
    state: optString(props, 'state'),
    country: optString(props, 'country'),
    organization_name: optString(props, 'organization_name'),
    address_line_1: optString(props, 'address_line_1'),
    address_line_2: optString(props, 'address_line_2'),
    address_line_3: optString(props, 'address_line_3'),
    international_state: optString(props, 'international_state'),
    postal_code: optString(props, 'postal_code'),
    include_forward_email: optBoolean(props, 'include_forward_email'),
    forward_email_link_text: optString(props, 'forward_email_link_text'),
    include_subscribe_link: optBoolean(props, 'include_subscribe_link'),
    subscribe_link_text: optString(props, 'subscribe_link_text'),
  };
}

export function createTrackingSummary(props: JsonRecord): TrackingSummary {
  return {
    sends: optNumber(props, 'sends'),
    opens: optNumber(props, 'opens'),
    clicks: optNumber(props, 'clicks'),
    forwards: optNumber(props, 'forwards'),
    unsubscribes: optNumber(props, 'unsubscribes'),
    bounces: optNumber(props, 'bounces'),
    spam_count: optNumber(props, 'spam_count'),
  };
}

export function createSentContactList(props: JsonRecord): SentContactList {
  return { id: optId(props, 'id') };
}

export function createClickThroughDetails(props: JsonRecord): ClickThroughDetails {
  return {
    url: optString(props, 'url'),
    url_uid: optString(props, 'url_uid'),
    click_count: optNumber(props, 'click_count'),
  };
}

export function createCampaign(props: JsonRecord): Campaign {
  return {
    id: optId(props, 'id'),
    name: optString(props, 'name'),
    subject: optString(props, 'subject'),
    status: optString(props, 'status'),
    from_name: optString(props, 'from_name'),
    from_email: optString(props, 'from_email'),
    reply_to_email: optString(props, 'reply_to_email'),
    template_type: optString(props, 'template_type'),
    created_date: optString(props, 'created_date'),
    modified_date: optString(props, 'modified_date'),
    last_run_date: optString(props, 'last_run_date'),
    next_run_date: optString(props, 'next_run_date'),
    permalink_url: optString(props, 'permalink_url'),
    is_permission_reminder_enabled: optBoolean(props, 'is_permission_reminder_enabled'),
    permission_reminder_text: optString(props, 'permission_reminder_text'),
    is_view_as_webpage_enabled: optBoolean(props, 'is_view_as_webpage_enabled'),
    view_as_web_page_text: optString(props, 'view_as_web_page_text'),
    view_as_web_page_link_text: optString(props, 'view_as_web_page_link_text'),
    greeting_salutations: optString(props, 'greeting_salutations'),
    greeting_name: optString(props, 'greeting_name'),
    greeting_string: optString(props, 'greeting_string'),
    email_content: optString(props, 'email_content'),
    text_content: optString(props, 'text_content'),
    email_content_format: optString(props, 'email_content_format'),
    style_sheet: optString(props, 'style_sheet'),
    message_footer: optObject(props, 'message_footer', createMessageFooter),
    tracking_summary: optObject(props, 'tracking_summary', createTrackingSummary),
    sent_to_contact_lists: optArray(props, 'sent_to_contact_lists', createSentContactList),
    click_through_details: optArray(props, 'click_through_details', createClickThroughDetails),
  };
}

/**
 * Listing endpoints return only these fields
 */
export function createCampaignSummary(props: JsonRecord): Campaign {
  return {
    id: optId(props, 'id'),
    name: optString(props, 'name'),
    status: optString(props, 'status'),
    modified_date: optString(props, 'modified_date'),
    last_run_date: optString(props, 'last_run_date'),
    next_run_date: optString(props, 'next_run_date'),
  };
}

export function createCampaignPreview(props: JsonRecord): CampaignPreview {
  return {
    from_email: optString(props, 'from_email'),
    reply_to_email: optString(props, 'reply_to_email'),
    subject: optString(props, 'subject'),
    preview_email_content: optString(props, 'preview_email_content'),
    preview_text_content: optString(props, 'preview_text_content'),
  };
}
