import { describe, it, expect } from 'vitest';
import {
  expectArray,
  expectObject,
  isJsonRecord,
  optArray,
  optBoolean,
  optId,
  optNumber,
  optObject,
  optString,
} from '../../src/lib/json.js';
import { ResponseFormatError } from '../../src/lib/errors.js';

const url = 'https://api.example.test/v2/account/info';

describe('isJsonRecord', () => {
  it('accepts plain objects only', () => {
    expect(isJsonRecord({})).toBe(true);
    expect(isJsonRecord([])).toBe(false);
    expect(isJsonRecord(null)).toBe(false);
    expect(isJsonRecord('text')).toBe(false);
  });
});

describe('expectObject / expectArray', () => {
  it('return matching bodies', () => {
    const body = { a: 1 };
    expect(expectObject(body, url)).toBe(body);
    expect(expectArray([1], url)).toEqual([1]);
  });

  it('throw ResponseFormatError carrying the url and body', () => {
    try {
      expectObject('not json', url);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ResponseFormatError);
      expect(error).toMatchObject({ url, body: 'not json' });
    }

    expect(() => expectArray({}, url)).toThrow('Expected a JSON array in the response body');
  });
});

describe('optional field readers', () => {
  const obj = {
    name: 'Ann',
    count: 3,
    active: true,
    numericId: 42,
    tags: ['a', 1, 'b'],
    items: [{ name: 'x' }, 'skip'],
    nested: { name: 'inner' },
  };

  it('read values of the expected type', () => {
    expect(optString(obj, 'name')).toBe('Ann');
    expect(optNumber(obj, 'count')).toBe(3);
    expect(optBoolean(obj, 'active')).toBe(true);
  });

  it('return undefined for values of another type', () => {
    expect(optString(obj, 'count')).toBeUndefined();
    expect(optNumber(obj, 'name')).toBeUndefined();
    expect(optBoolean(obj, 'missing')).toBeUndefined();
  });

  it('read numeric ids as strings', () => {
    expect(optId(obj, 'numericId')).toBe('42');
    expect(optId(obj, 'name')).toBe('Ann');
    expect(optId(obj, 'active')).toBeUndefined();
  });

  it('filter arrays', () => {
    expect(optArray(obj, 'items', (item) => optString(item, 'name'))).toEqual(['x']);
    expect(optArray(obj, 'name', (item) => item)).toBeUndefined();
  });

  it('decode nested objects', () => {
    expect(optObject(obj, 'nested', (item) => optString(item, 'name'))).toBe('inner');
    expect(optObject(obj, 'tags', (item) => item)).toBeUndefined();
  });
});
