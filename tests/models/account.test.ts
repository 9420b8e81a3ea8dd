import { describe, it, expect } from 'vitest';
import { createAccountInfo, createVerifiedEmailAddress } from '../../src/models/account.js';
import { createContact } from '../../src/models/contact.js';
import { isJsonRecord, type JsonRecord } from '../../src/lib/json.js';

function reparse(value: unknown): JsonRecord {
  const parsed: unknown = JSON.parse(JSON.stringify(value));
  if (!isJsonRecord(parsed)) throw new Error('expected a JSON object');
  return parsed;
}

describe('Account models', () => {
  it('decodes account info with organization addresses', () => {
    expect(
      createAccountInfo({
        website: 'https://example.com',
        organization_name: 'Example Shop',
        time_zone: 'US/Eastern',
        email: 'owner@example.com',
        organization_addresses: [{ line1: '1 Main St', city: 'Springfield', country_code: 'US' }],
      })
    ).toEqual({
      website: 'https://example.com',
      organization_name: 'Example Shop',
      time_zone: 'US/Eastern',
      email: 'owner@example.com',
      organization_addresses: [{ line1: '1 Main St', city: 'Springfield', country_code: 'US' }],
    });
  });

  it('decodes its own serialized form to an equal object', () => {
    const info = createAccountInfo({
      website: 'https://example.com',
      organization_name: 'Example Shop',
      time_zone: 'US/Eastern',
      first_name: 'Ann',
      last_name: 'Lee',
      phone: '555-0100',
      country_code: 'US',
      state_code: 'MA',
      organization_addresses: [
        { line1: '1 Main St', line2: 'Suite 2', city: 'Springfield', state_code: 'MA', postal_code: '01101' },
        { line1: '9 Side Rd', city: 'Shelbyville', country_code: 'US' },
      ],
    });

    expect(createAccountInfo(reparse(info))).toEqual(info);
    expect(createAccountInfo(reparse(info)).organization_addresses).toHaveLength(2);
  });

  it('decodes verified addresses', () => {
    expect(createVerifiedEmailAddress({ email_address: 'owner@example.com', status: 'CONFIRMED' })).toEqual({
      email_address: 'owner@example.com',
      status: 'CONFIRMED',
    });
  });
});

describe('Contact model', () => {
  it('decodes nested email addresses and lists', () => {
    const contact = createContact({
      id: 238,
      first_name: 'Ann',
      confirmed: false,
      email_addresses: [{ id: 'e1', email_address: 'ann@example.com', status: 'ACTIVE' }],
      lists: [{ id: 1, status: 'ACTIVE' }],
      custom_fields: [{ name: 'CustomField1', value: 'gold' }],
    });

    expect(contact).toEqual({
      id: '238',
      first_name: 'Ann',
      confirmed: false,
      email_addresses: [{ id: 'e1', email_address: 'ann@example.com', status: 'ACTIVE' }],
      lists: [{ id: '1', status: 'ACTIVE' }],
      custom_fields: [{ name: 'CustomField1', value: 'gold' }],
    });
  });
});
