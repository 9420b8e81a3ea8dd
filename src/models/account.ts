/**
 * Account models
 */

import { optArray, optString, type JsonRecord } from '../lib/json.js';

export interface AccountAddress {
  line1?: string;
  line2?: string;
  line3?: string;
  city?: string;
  state_code?: string;
  state?: string;
  country_code?: string;
  postal_code?: string;
}

export interface AccountInfo {
  website?: string;
  organization_name?: string;
  time_zone?: string;
  first_name?: string;
  last_name?: string;
  email?: string;
  phone?: string;
  company_logo?: string;
  country_code?: string;
  state_code?: string;
  organization_addresses?: AccountAddress[];
}

export type VerifiedEmailStatus = 'CONFIRMED' | 'UNCONFIRMED';

export interface VerifiedEmailAddress {
  email_address?: string;
  status?: string;
}

export function createAccountAddress(props: JsonRecord): AccountAddress {
  return {
    line1: optString(props, 'line1'),
    line2: optString(props, 'line2'),
    line3: optString(props, 'line3'),
    city: optString(props, 'city'),
    state_code: optString(props, 'state_code'),
    state: optString(props, 'state'),
    country_code: optString(props, 'country_code'),
    postal_code: optString(props, 'postal_code'),
  };
}

export function createAccountInfo(props: JsonRecord): AccountInfo {
  return {
    website: optString(props, 'website'),
    organization_name: optString(props, 'organization_name'),
    time_zone: optString(props, 'time_zone'),
    first_name: optString(props, 'first_name'),
    last_name: optString(props, 'last_name'),
    email: optString(props, 'email'),
    phone: optString(props, 'phone'),
    company_logo: optString(props, 'company_logo'),
    country_code: optString(props, 'country_code'),
    state_code: optString(props, 'state_code'),
    organization_addresses: optArray(props, 'organization_addresses', createAccountAddress),
  };
}

export function createVerifiedEmailAddress(props: JsonRecord): VerifiedEmailAddress {
  return {
    email_address: optString(props, 'email_address'),
    status: optString(props, 'status'),
  };
}
