import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

vi.mock('ofetch', () => {
  class FetchError extends Error {
    response?: Response;
    data?: unknown;
    statusCode?: number;
    status?: number;

    constructor(message: string) {
      super(message);
      this.name = 'FetchError';
    }
  }

  return {
    ofetch: { raw: vi.fn() },
    FetchError,
  };
});

import { ofetch } from 'ofetch';
import { MarketingApiClient } from '../../src/services/client.js';
import { createAddContacts, createExportContacts } from '../../src/models/activity.js';
import { fakeResponse } from '../helpers/fetch-mock.js';

describe('ActivityService', () => {
  const rawMock = vi.mocked(ofetch.raw);
  const base = 'https://api.example.test/v2';
  const client = new MarketingApiClient({ overrides: { apiBaseUrl: `${base}/` } });
  const queued = { id: 'act1', type: 'ADD_CONTACTS', status: 'QUEUED' };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should list activities by status and type', async () => {
    rawMock.mockResolvedValueOnce(fakeResponse(200, [queued]));

    const activities = await client.activities.getActivities('test-token', {
      status: 'COMPLETE',
      type: 'ADD_CONTACTS',
    });

    expect(activities).toEqual([queued]);
    expect(rawMock.mock.calls[0][0]).toBe(`${base}/activities?status=COMPLETE&type=ADD_CONTACTS`);
  });

  it('should get one activity', async () => {
    rawMock.mockResolvedValueOnce(fakeResponse(200, { ...queued, status: 'COMPLETE', contact_count: 2 }));

    const activity = await client.activities.getActivity('test-token', 'act1');

    expect(activity).toEqual({ id: 'act1', type: 'ADD_CONTACTS', status: 'COMPLETE', contact_count: 2 });
    expect(rawMock.mock.calls[0][0]).toBe(`${base}/activities/act1`);
  });

  it('should POST add-contacts payloads', async () => {
    rawMock.mockResolvedValueOnce(fakeResponse(201, queued));
    const addContacts = createAddContacts([{ email_addresses: ['ann@example.com'] }], ['1']);

    await client.activities.createAddContactsActivity('test-token', addContacts);

    const [url, options] = rawMock.mock.calls[0];
    expect(url).toBe(`${base}/activities/addcontacts`);
    expect(options?.body).toBe(
      '{"import_data":[{"email_addresses":["ann@example.com"]}],"lists":["1"],"column_names":["EMAIL"]}'
    );
  });

  it('should POST clear-lists payloads', async () => {
    rawMock.mockResolvedValueOnce(fakeResponse(201, { ...queued, type: 'CLEAR_CONTACTS_FROM_LISTS' }));

    const activity = await client.activities.addClearListsActivity('test-token', ['1', '2']);

    expect(activity.type).toBe('CLEAR_CONTACTS_FROM_LISTS');
    expect(rawMock.mock.calls[0][0]).toBe(`${base}/activities/clearlists`);
    expect(rawMock.mock.calls[0][1]?.body).toBe('{"lists":["1","2"]}');
  });

  it('should POST export payloads', async () => {
    rawMock.mockResolvedValueOnce(fakeResponse(201, { ...queued, type: 'EXPORT_CONTACTS' }));

    await client.activities.addExportContactsActivity('test-token', createExportContacts(['1']));

    expect(rawMock.mock.calls[0][0]).toBe(`${base}/activities/exportcontacts`);
    expect(rawMock.mock.calls[0][1]?.body).toBe(
      '{"file_type":"CSV","sort_by":"EMAIL_ADDRESS","export_date_added":true,"export_added_by":true,"lists":["1"],"column_names":["EMAIL","FIRST NAME","LAST NAME"]}'
    );
  });

  it('should POST one import row per removed address', async () => {
    rawMock.mockResolvedValueOnce(fakeResponse(201, { ...queued, type: 'REMOVE_CONTACTS_FROM_LISTS' }));

    await client.activities.addRemoveContactsFromListsActivity(
      'test-token',
      ['a@example.com', 'b@example.com'],
      ['1']
    );

    expect(rawMock.mock.calls[0][0]).toBe(`${base}/activities/removefromlists`);
    expect(rawMock.mock.calls[0][1]?.body).toBe(
      '{"import_data":[{"email_addresses":["a@example.com"]},{"email_addresses":["b@example.com"]}],"lists":["1"]}'
    );
  });

  describe('file uploads', () => {
    let tempDir: string;
    let filePath: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mkt-upload-'));
      filePath = path.join(tempDir, 'upload.csv');
      fs.writeFileSync(filePath, 'EMAIL\nann@example.com\n');
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should upload an add-contacts file as multipart form data', async () => {
      rawMock.mockResolvedValueOnce(fakeResponse(201, queued));

      const activity = await client.activities.createAddContactsActivityFromFile(
        'test-token',
        'contacts.csv',
        filePath,
        ['1', '2']
      );

      expect(activity).toEqual(queued);
      const [url, options] = rawMock.mock.calls[0];
      expect(url).toBe(`${base}/activities/addcontacts`);
      expect(options?.method).toBe('POST');
      expect(options?.headers).toEqual({ Authorization: 'Bearer test-token', Accept: 'application/json' });

      const form = options?.body;
      if (!(form instanceof FormData)) {
        throw new Error('expected a FormData body');
      }
      expect(form.get('file_name')).toBe('contacts.csv');
      expect(form.get('lists')).toBe('1,2');

      const data = form.get('data');
      if (data === null || typeof data === 'string') {
        throw new Error('expected a file part');
      }
      expect(data.name).toBe('upload.csv');
      await expect(data.text()).resolves.toBe('EMAIL\nann@example.com\n');
    });

    it('should accept already comma-separated list ids', async () => {
      rawMock.mockResolvedValueOnce(fakeResponse(201, { ...queued, type: 'REMOVE_CONTACTS_FROM_LISTS' }));

      await client.activities.addRemoveContactsFromListsActivityFromFile(
        'test-token',
        'remove.csv',
        filePath,
        '3,4'
      );

      const [url, options] = rawMock.mock.calls[0];
      expect(url).toBe(`${base}/activities/removefromlists`);
      const form = options?.body;
      if (!(form instanceof FormData)) {
        throw new Error('expected a FormData body');
      }
      expect(form.get('file_name')).toBe('remove.csv');
      expect(form.get('lists')).toBe('3,4');
    });

    it('should fail before sending when the file is missing', async () => {
      await expect(
        client.activities.createAddContactsActivityFromFile(
          'test-token',
          'contacts.csv',
          path.join(tempDir, 'missing.csv'),
          ['1']
        )
      ).rejects.toThrow();
      expect(rawMock).not.toHaveBeenCalled();
    });
  });
});
