/**
 * Contact Service
 */

import { expectObject } from '../lib/json.js';
import { decodeResultSet, type ResultSet } from '../lib/result-set.js';
import { createContact, type Contact } from '../models/contact.js';
import type { PathParam } from '../lib/endpoints.js';
import type { ApiRequestHandler } from './request-handler.js';

export interface ContactQuery {
  /** Page size, 1-500 */
  limit?: number;
  /** Exact email address match */
  email?: string;
  modified_since?: string;
  status?: 'ALL' | 'ACTIVE' | 'UNCONFIRMED' | 'OPTOUT' | 'REMOVED';
  next?: string;
}

export interface ContactWriteOptions {
  /** `ACTION_BY_VISITOR` sends the contact a welcome email */
  action_by?: 'ACTION_BY_OWNER' | 'ACTION_BY_VISITOR';
}

export class ContactService {
  private api: ApiRequestHandler;

  constructor(api: ApiRequestHandler) {
    this.api = api;
  }

  async getContacts(accessToken: string, params: ContactQuery = {}): Promise<ResultSet<Contact>> {
    const url = this.api.url('contacts');
    const body = await this.api.get(accessToken, url, { ...params });
    return decodeResultSet(body, url, createContact);
  }

  async getContact(accessToken: string, contactId: PathParam): Promise<Contact> {
    const url = this.api.url('contact', contactId);
    const body = await this.api.get(accessToken, url);
    return createContact(expectObject(body, url));
  }

  async addContact(
    accessToken: string,
    contact: Contact,
    options: ContactWriteOptions = {}
  ): Promise<Contact> {
    const url = this.api.url('contacts');
    const body = await this.api.post(accessToken, url, contact, { ...options });
    return createContact(expectObject(body, url));
  }

  async updateContact(
    accessToken: string,
    contact: Contact,
    options: ContactWriteOptions = {}
  ): Promise<Contact> {
    if (!contact.id) {
      throw new Error('updateContact requires a contact id');
    }
    const url = this.api.url('contact', contact.id);
    const body = await this.api.put(accessToken, url, contact, { ...options });
    return createContact(expectObject(body, url));
  }

  /**
   * Opt the contact out of all lists
   * @returns true when the API answered 204 No Content
   */
  async deleteContact(accessToken: string, contactId: PathParam): Promise<boolean> {
    return this.api.delete(accessToken, this.api.url('contact', contactId));
  }
}
