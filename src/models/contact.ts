/**
 * Contact models
 */

import {
  optArray,
  optBoolean,
  optId,
  optString,
  type JsonRecord,
} from '../lib/json.js';
import { createContactList, type ContactList } from './list.js';

export interface EmailAddress {
  id?: string;
  status?: string;
  confirm_status?: string;
  opt_in_source?: string;
  opt_in_date?: string;
  opt_out_date?: string;
  email_address?: string;
}

export interface Address {
  id?: string;
  line1?: string;
  line2?: string;
  line3?: string;
  city?: string;
  address_type?: string;
  state_code?: string;
  state?: string;
  country_code?: string;
  postal_code?: string;
  sub_postal_code?: string;
}

export interface CustomField {
  name?: string;
  value?: string;
}

export interface Note {
  id?: string;
  note?: string;
  created_date?: string;
  modified_date?: string;
}

export interface Contact {
  id?: string;
  status?: string;
  first_name?: string;
  middle_name?: string;
  last_name?: string;
  confirmed?: boolean;
  source?: string;
  email_addresses?: EmailAddress[];
  prefix_name?: string;
  job_title?: string;
  addresses?: Address[];
  notes?: Note[];
  company_name?: string;
  home_phone?: string;
  work_phone?: string;
  cell_phone?: string;
  fax?: string;
  custom_fields?: CustomField[];
  lists?: ContactList[];
  source_details?: string;
  created_date?: string;
  modified_date?: string;
}

export function createEmailAddress(props: JsonRecord): EmailAddress {
  return {
    id: optId(props, 'id'),
    status: optString(props, 'status'),
    confirm_status: optString(props, 'confirm_status'),
    opt_in_source: optString(props, 'opt_in_source'),
    opt_in_date: optString(props, 'opt_in_date'),
    opt_out_date: optString(props, 'opt_out_date'),
    email_address: optString(props, 'email_address'),
  };
}

export function createAddress(props: JsonRecord): Address {
  return {
    id: optId(props, 'id'),
    line1: optString(props, 'line1'),
    line2: optString(props, 'line2'),
    line3: optString(props, 'line3'),
    city: optString(props, 'city'),
    address_type: optString(props, 'address_type'),
    state_code: optString(props, 'state_code'),
    state: optString(props, 'state'),
    country_code: optString(props, 'country_code'),
    postal_code: optString(props, 'postal_code'),
    sub_postal_code: optString(props, 'sub_postal_code'),
  };
}

export function createCustomField(props: JsonRecord): CustomField {
  return {
    name: optString(props, 'name'),
    value: optString(props, 'value'),
  };
}

export function createNote(props: JsonRecord): Note {
  return {
    id: optId(props, 'id'),
    note: optString(props, 'note'),
    created_date: optString(props, 'created_date'),
    modified_date: optString(props, 'modified_date'),
  };
}

export function createContact(props: JsonRecord): Contact {
  return {
    id: optId(props, 'id'),
    status: optString(props, 'status'),
    first_name: optString(props, 'first_name'),
    middle_name: optString(props, 'middle_name'),
    last_name: optString(props, 'last_name'),
    confirmed: optBoolean(props, 'confirmed'),
    source: optString(props, 'source'),
    email_addresses: optArray(props, 'email_addresses', createEmailAddress),
    prefix_name: optString(props, 'prefix_name'),
    job_title: optString(props, 'job_title'),
    addresses: optArray(props, 'addresses', createAddress),
    notes: optArray(props, 'notes', createNote),
    company_name: optString(props, 'company_name'),
    home_phone: optString(props, 'home_phone'),
    work_phone: optString(props, 'work_phone'),
    cell_phone: optString(props, 'cell_phone'),
    fax: optString(props, 'fax'),
    custom_fields: optArray(props, 'custom_fields', createCustomField),
    lists: optArray(props, 'lists', createContactList),
    source_details: optString(props, 'source_details'),
    created_date: optString(props, 'created_date'),
    modified_date: optString(props, 'modified_date'),
  };
}
