/**
 * Contact list model
 */

import { optId, optNumber, optString, type JsonRecord } from '../lib/json.js';

export type ContactListStatus = 'ACTIVE' | 'HIDDEN' | 'REMOVED';

export interface ContactList {
  id?: string;
  name?: string;
  status?: string;
  contact_count?: number;
  created_date?: string;
  modified_date?: string;
}

export function createContactList(props: JsonRecord): ContactList {
  return {
    id: optId(props, 'id'),
    name: optString(props, 'name'),
    status: optString(props, 'status'),
    contact_count: optNumber(props, 'contact_count'),
    created_date: optString(props, 'created_date'),
    modified_date: optString(props, 'modified_date'),
  };
}
