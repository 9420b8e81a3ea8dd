/**
 * List Service
 */

import { expectArray, expectObject, isJsonRecord } from '../lib/json.js';
import { decodeResultSet, type ResultSet } from '../lib/result-set.js';
import { createContactList, type ContactList } from '../models/list.js';
import { createContact, type Contact } from '../models/contact.js';
import type { PathParam } from '../lib/endpoints.js';
import type { ApiRequestHandler } from './request-handler.js';

export interface ListQuery {
  modified_since?: string;
}

export interface ListContactsQuery {
  limit?: number;
  modified_since?: string;
  next?: string;
}

export class ListService {
  private api: ApiRequestHandler;

  constructor(api: ApiRequestHandler) {
    this.api = api;
  }

  async getLists(accessToken: string, params: ListQuery = {}): Promise<ContactList[]> {
    const url = this.api.url('lists');
    const body = await this.api.get(accessToken, url, { ...params });
    return expectArray(body, url).filter(isJsonRecord).map(createContactList);
  }

  async getList(accessToken: string, listId: PathParam): Promise<ContactList> {
    const url = this.api.url('list', listId);
    const body = await this.api.get(accessToken, url);
    return createContactList(expectObject(body, url));
  }

  async addList(accessToken: string, list: ContactList): Promise<ContactList> {
    const url = this.api.url('lists');
    const body = await this.api.post(accessToken, url, list);
    return createContactList(expectObject(body, url));
  }

  async updateList(accessToken: string, list: ContactList): Promise<ContactList> {
    if (!list.id) {
      throw new Error('updateList requires a list id');
    }
    const url = this.api.url('list', list.id);
    const body = await this.api.put(accessToken, url, list);
    return createContactList(expectObject(body, url));
  }

  /**
   * @returns true when the API answered 204 No Content
   */
  async deleteList(accessToken: string, listId: PathParam): Promise<boolean> {
    return this.api.delete(accessToken, this.api.url('list', listId));
  }

  async getContactsFromList(
    accessToken: string,
    listId: PathParam,
    params: ListContactsQuery = {}
  ): Promise<ResultSet<Contact>> {
    const url = this.api.url('list_contacts', listId);
    const body = await this.api.get(accessToken, url, { ...params });
    return decodeResultSet(body, url, createContact);
  }
}
