/**
 * Bulk activity models
 */

import { optArray, optId, optNumber, optString, type JsonRecord } from '../lib/json.js';
import type { Address, CustomField } from './contact.js';

export type ActivityStatus = 'UNCONFIRMED' | 'PENDING' | 'QUEUED' | 'RUNNING' | 'COMPLETE' | 'ERROR';

export type ActivityType =
  | 'ADD_CONTACTS'
  | 'REMOVE_CONTACTS_FROM_LISTS'
  | 'CLEAR_CONTACTS_FROM_LISTS'
  | 'EXPORT_CONTACTS';

export interface ActivityError {
  message?: string;
  line_number?: number;
  email_address?: string;
}

export interface Activity {
  id?: string;
  type?: string;
  status?: string;
  file_name?: string;
  created_date?: string;
  start_date?: string;
  finish_date?: string;
  contact_count?: number;
  error_count?: number;
  errors?: ActivityError[];
  warnings?: ActivityError[];
}

export interface AddContactsImportData {
  email_addresses: string[];
  first_name?: string;
  middle_name?: string;
  last_name?: string;
  job_title?: string;
  company_name?: string;
  work_phone?: string;
  home_phone?: string;
  birthday_day?: number;
  birthday_month?: number;
  anniversary?: string;
  addresses?: Address[];
  custom_fields?: CustomField[];
}

export interface AddContacts {
  import_data: AddContactsImportData[];
  lists: string[];
  column_names: string[];
}

export type ExportFileType = 'CSV' | 'TXT';

export interface ExportContacts {
  file_type: ExportFileType;
  sort_by: 'EMAIL_ADDRESS' | 'DATE_DESC';
  export_date_added: boolean;
  export_added_by: boolean;
  lists: string[];
  column_names: string[];
}

export function createActivityError(props: JsonRecord): ActivityError {
  return {
    message: optString(props, 'message'),
    line_number: optNumber(props, 'line_number'),
    email_address: optString(props, 'email_address'),
  };
}

export function createActivity(props: JsonRecord): Activity {
  return {
    id: optId(props, 'id'),
    type: optString(props, 'type'),
    status: optString(props, 'status'),
    file_name: optString(props, 'file_name'),
    created_date: optString(props, 'created_date'),
    start_date: optString(props, 'start_date'),
    finish_date: optString(props, 'finish_date'),
    contact_count: optNumber(props, 'contact_count'),
    error_count: optNumber(props, 'error_count'),
    errors: optArray(props, 'errors', createActivityError),
    warnings: optArray(props, 'warnings', createActivityError),
  };
}

const SIMPLE_COLUMNS: ReadonlyArray<[keyof AddContactsImportData, string]> = [
  ['email_addresses', 'EMAIL'],
  ['first_name', 'FIRST NAME'],
  ['middle_name', 'MIDDLE NAME'],
  ['last_name', 'LAST NAME'],
  ['job_title', 'JOB TITLE'],
  ['company_name', 'COMPANY NAME'],
  ['work_phone', 'WORK PHONE'],
  ['home_phone', 'HOME PHONE'],
  ['birthday_day', 'BIRTHDAY_DAY'],
  ['birthday_month', 'BIRTHDAY_MONTH'],
  ['anniversary', 'ANNIVERSARY'],
];

const ADDRESS_COLUMNS: ReadonlyArray<[keyof Address, string]> = [
  ['line1', 'ADDRESS LINE 1'],
  ['line2', 'ADDRESS LINE 2'],
  ['line3', 'ADDRESS LINE 3'],
  ['city', 'CITY'],
  ['state_code', 'STATE'],
  ['state', 'STATE/PROVINCE (INTL)'],
  ['country_code', 'COUNTRY'],
  ['postal_code', 'ZIP/POSTAL CODE'],
  ['sub_postal_code', 'SUB ZIP/POSTAL CODE'],
];

/**
 * Column names for the fields used by at least one row.
 * Custom fields named `CustomField<n>` map to `CUSTOM FIELD <n>`.
 */
export function deriveColumnNames(importData: readonly AddContactsImportData[]): string[] {
  const columns: string[] = [];
  const add = (column: string): void => {
    if (!columns.includes(column)) columns.push(column);
  };

  for (const [field, column] of SIMPLE_COLUMNS) {
    if (importData.some((row) => row[field] !== undefined)) add(column);
  }

  for (const [field, column] of ADDRESS_COLUMNS) {
    if (importData.some((row) => row.addresses?.some((address) => address[field] !== undefined))) {
      add(column);
    }
  }

  for (const row of importData) {
    for (const field of row.custom_fields ?? []) {
      const match = /^CustomField(\d+)$/i.exec(field.name ?? '');
      if (match) add(`CUSTOM FIELD ${match[1]}`);
    }
  }

  return columns;
}

export function createAddContacts(
  importData: AddContactsImportData[],
  lists: string[],
  columnNames?: string[]
): AddContacts {
  return {
    import_data: importData,
    lists,
    column_names: columnNames ?? deriveColumnNames(importData),
  };
}

export function createExportContacts(
  lists: string[],
  options: Partial<Omit<ExportContacts, 'lists'>> = {}
): ExportContacts {
  return {
    file_type: options.file_type ?? 'CSV',
    sort_by: options.sort_by ?? 'EMAIL_ADDRESS',
    export_date_added: options.export_date_added ?? true,
    export_added_by: options.export_added_by ?? true,
    lists,
    column_names: options.column_names ?? ['EMAIL', 'FIRST NAME', 'LAST NAME'],
  };
}
