import { describe, it, expect } from 'vitest';
import { formatPath, joinUrl, resolveEndpoint } from '../../src/lib/endpoints.js';
import { createSdkConfig } from '../../src/services/config.js';

describe('joinUrl', () => {
  it('joins with exactly one slash', () => {
    expect(joinUrl('https://api.example.test/v2/', '/contacts')).toBe('https://api.example.test/v2/contacts');
    expect(joinUrl('https://api.example.test/v2', 'contacts')).toBe('https://api.example.test/v2/contacts');
    expect(joinUrl('https://auth.example.test//', '//idp/token')).toBe('https://auth.example.test/idp/token');
  });
});

describe('formatPath', () => {
  it('substitutes parameters in order', () => {
    expect(formatPath('lists/%s/contacts', 7)).toBe('lists/7/contacts');
    expect(formatPath('a/%s/b/%s', 'x', 'y')).toBe('a/x/b/y');
  });

  it('URI-encodes each parameter', () => {
    expect(formatPath('contacts/%s', 'a/b c')).toBe('contacts/a%2Fb%20c');
  });

  it('returns templates without placeholders as they are', () => {
    expect(formatPath('contacts')).toBe('contacts');
  });

  it('throws when the parameter count does not match', () => {
    expect(() => formatPath('contacts/%s')).toThrow(
      'Path template "contacts/%s" expects 1 parameter(s), got 0'
    );
    expect(() => formatPath('contacts', 1)).toThrow(
      'Path template "contacts" expects 0 parameter(s), got 1'
    );
  });
});

describe('resolveEndpoint', () => {
  it('builds absolute URLs from the registry', () => {
    const config = createSdkConfig({ apiBaseUrl: 'https://api.example.test/v2/' });

    expect(resolveEndpoint(config, 'contacts')).toBe('https://api.example.test/v2/contacts');
    expect(resolveEndpoint(config, 'campaign_preview', '42')).toBe(
      'https://api.example.test/v2/emailmarketing/campaigns/42/preview'
    );
  });

  it('uses overridden templates', () => {
    const config = createSdkConfig({
      apiBaseUrl: 'https://api.example.test/v3',
      endpoints: { contact: 'people/%s' },
    });

    expect(resolveEndpoint(config, 'contact', 9)).toBe('https://api.example.test/v3/people/9');
    expect(resolveEndpoint(config, 'lists')).toBe('https://api.example.test/v3/lists');
  });
});
