/**
 * Activity Service
 * Submits and looks up bulk contact activities. Completion is not polled.
 */

import { openAsBlob } from 'node:fs';
import path from 'node:path';
import { expectArray, expectObject, isJsonRecord } from '../lib/json.js';
import {
  createActivity,
  type Activity,
  type ActivityStatus,
  type ActivityType,
  type AddContacts,
  type ExportContacts,
} from '../models/activity.js';
import type { ApiRequestHandler } from './request-handler.js';

export interface ActivityQuery {
  status?: ActivityStatus;
  type?: ActivityType;
}

/**
 * List ids for a file upload, either already comma-separated or as an array
 */
export type ListIds = string | readonly string[];

function joinListIds(lists: ListIds): string {
  return typeof lists === 'string' ? lists : lists.join(',');
}

export class ActivityService {
  private api: ApiRequestHandler;

  constructor(api: ApiRequestHandler) {
    this.api = api;
  }

  async getActivities(accessToken: string, params: ActivityQuery = {}): Promise<Activity[]> {
    const url = this.api.url('activities');
    const body = await this.api.get(accessToken, url, { ...params });
    return expectArray(body, url).filter(isJsonRecord).map(createActivity);
  }

  async getActivity(accessToken: string, activityId: string): Promise<Activity> {
    const url = this.api.url('activity', activityId);
    const body = await this.api.get(accessToken, url);
    return createActivity(expectObject(body, url));
  }

  async createAddContactsActivity(accessToken: string, addContacts: AddContacts): Promise<Activity> {
    const url = this.api.url('add_contacts_activity');
    const body = await this.api.post(accessToken, url, addContacts);
    return createActivity(expectObject(body, url));
  }

  /**
   * Add contacts from a txt, csv, xls or xlsx file
   * @param fileName - name reported to the API, e.g. `contacts.csv`
   * @param fileLocation - path of the file to upload
   */
  async createAddContactsActivityFromFile(
    accessToken: string,
    fileName: string,
    fileLocation: string,
    lists: ListIds
  ): Promise<Activity> {
    return this.uploadActivity(accessToken, 'add_contacts_activity', fileName, fileLocation, lists);
  }

  /**
   * Remove every contact from the given lists, keeping the lists
   */
  async addClearListsActivity(accessToken: string, lists: string[]): Promise<Activity> {
    const url = this.api.url('clear_lists_activity');
    const body = await this.api.post(accessToken, url, { lists });
    return createActivity(expectObject(body, url));
  }

  async addExportContactsActivity(accessToken: string, exportContacts: ExportContacts): Promise<Activity> {
    const url = this.api.url('export_contacts_activity');
    const body = await this.api.post(accessToken, url, exportContacts);
    return createActivity(expectObject(body, url));
  }

  async addRemoveContactsFromListsActivity(
    accessToken: string,
    emailAddresses: string[],
    lists: string[]
  ): Promise<Activity> {
    const url = this.api.url('remove_from_lists_activity');
    const payload = {
      import_data: emailAddresses.map((emailAddress) => ({ email_addresses: [emailAddress] })),
      lists,
    };
    const body = await this.api.post(accessToken, url, payload);
    return createActivity(expectObject(body, url));
  }

  async addRemoveContactsFromListsActivityFromFile(
    accessToken: string,
    fileName: string,
    fileLocation: string,
    lists: ListIds
  ): Promise<Activity> {
    return this.uploadActivity(accessToken, 'remove_from_lists_activity', fileName, fileLocation, lists);
  }

  private async uploadActivity(
    accessToken: string,
    endpoint: 'add_contacts_activity' | 'remove_from_lists_activity',
    fileName: string,
    fileLocation: string,
    lists: ListIds
  ): Promise<Activity> {
    const url = this.api.url(endpoint);
    const file = await openAsBlob(fileLocation);

    const form = new FormData();
    form.append('file_name', fileName);
    form.append('lists', joinListIds(lists));
    form.append('data', file, path.basename(fileLocation));

    const body = await this.api.upload(accessToken, url, form);
    return createActivity(expectObject(body, url));
  }
}
