import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import http from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { MarketingApiClient } from '../../src/services/client.js';
import { ApiError } from '../../src/lib/errors.js';

interface ReceivedRequest {
  method?: string;
  url?: string;
  contentType?: string;
  body: string;
}

/**
 * Real ofetch against a local server: body decoding and multipart encoding
 */
describe('HTTP round trips', () => {
  const received: ReceivedRequest[] = [];
  let server: http.Server;
  let base: string;
  let client: MarketingApiClient;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        received.push({
          method: req.method,
          url: req.url,
          contentType: req.headers['content-type'],
          body: Buffer.concat(chunks).toString('utf-8'),
        });

        if (req.url === '/v2/account/info') {
          res.writeHead(500, { 'Content-Type': 'text/html' });
          res.end('<h1>Server Error</h1>');
        } else if (req.url === '/v2/activities/addcontacts') {
          res.writeHead(201, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ id: 'act1', type: 'ADD_CONTACTS', status: 'QUEUED' }));
        } else if (req.url === '/v2/emailmarketing/campaigns/42' && req.method === 'DELETE') {
          res.writeHead(204);
          res.end();
        } else {
          res.writeHead(404, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify([{ error_key: 'http.status.not_found', error_message: 'Not found' }]));
        }
      });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    base = `http://127.0.0.1:${address.port}/v2`;
    client = new MarketingApiClient({ overrides: { apiBaseUrl: `${base}/` } });
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    received.length = 0;
  });

  it('should keep a non-JSON error body as raw text', async () => {
    const error: unknown = await client.account.getAccountInfo('test-token').catch((e: unknown) => e);

    if (!(error instanceof ApiError)) {
      throw new Error('expected an ApiError');
    }
    expect(error.statusCode).toBe(500);
    expect(error.url).toBe(`${base}/account/info`);
    expect(error.errors).toEqual(['<h1>Server Error</h1>']);
  });

  it('should decode a JSON error body', async () => {
    const error: unknown = await client.lists.getList('test-token', '9').catch((e: unknown) => e);

    if (!(error instanceof ApiError)) {
      throw new Error('expected an ApiError');
    }
    expect(error.statusCode).toBe(404);
    expect(error.errors).toEqual([[{ error_key: 'http.status.not_found', error_message: 'Not found' }]]);
  });

  it('should report 204 deletes as true', async () => {
    await expect(client.emailMarketing.deleteCampaign('test-token', '42')).resolves.toBe(true);
    expect(received[0].method).toBe('DELETE');
  });

  describe('file uploads', () => {
    let tempDir: string;
    let filePath: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mkt-http-'));
      filePath = path.join(tempDir, 'upload.csv');
      fs.writeFileSync(filePath, 'EMAIL\nann@example.com\n');
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should send a multipart body with its boundary', async () => {
      const activity = await client.activities.createAddContactsActivityFromFile(
        'test-token',
        'contacts.csv',
        filePath,
        ['1', '2']
      );

      expect(activity).toEqual({ id: 'act1', type: 'ADD_CONTACTS', status: 'QUEUED' });

      const request = received[0];
      expect(request.method).toBe('POST');

      const match = /^multipart\/form-data; boundary=(.+)$/.exec(request.contentType ?? '');
      if (!match) {
        throw new Error(`expected a multipart content type, got ${request.contentType}`);
      }
      expect(request.body.startsWith(`--${match[1]}\r\n`)).toBe(true);
      expect(request.body).toContain('name="file_name"\r\n\r\ncontacts.csv\r\n');
      expect(request.body).toContain('name="lists"\r\n\r\n1,2\r\n');
      expect(request.body).toContain('name="data"; filename="upload.csv"');
      expect(request.body).toContain('EMAIL\nann@example.com\n');
    });
  });
});
