/**
 * Unit tests for JSON Value Utilities
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  formatJsonValue,
  isJsonObject,
  jsonEqual,
  readPath,
  toJsonValue,
} from '../../../src/lib/json.js';

describe('isJsonObject', () => {
  it('should accept plain objects only', () => {
    assert.strictEqual(isJsonObject({ a: 1 }), true);
    assert.strictEqual(isJsonObject([]), false);
    assert.strictEqual(isJsonObject(null), false);
    assert.strictEqual(isJsonObject('text'), false);
  });
});

describe('toJsonValue', () => {
  it('should convert dates to ISO strings', () => {
    assert.deepStrictEqual(toJsonValue({ at: new Date('2024-01-02T03:04:05.000Z') }), {
      at: '2024-01-02T03:04:05.000Z',
    });
  });

  it('should keep nested lists and maps', () => {
    assert.deepStrictEqual(toJsonValue({ a: [1, 'b', { c: null }] }), { a: [1, 'b', { c: null }] });
  });

  it('should return undefined for values with no JSON form', () => {
    assert.strictEqual(toJsonValue(Number.NaN), undefined);
    assert.strictEqual(toJsonValue({ fn: () => 1 }), undefined);
    assert.strictEqual(toJsonValue([1, Symbol('x')]), undefined);
  });
});

describe('jsonEqual', () => {
  it('should compare structurally regardless of key order', () => {
    assert.strictEqual(jsonEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 }), true);
  });

  it('should distinguish list order and types', () => {
    assert.strictEqual(jsonEqual([1, 2], [2, 1]), false);
    assert.strictEqual(jsonEqual('1', 1), false);
  });
});

describe('readPath', () => {
  const value = { properties: { ipConfigurations: [{ properties: { privateIPAddress: '10.0.1.4' } }] } };

  it('should walk objects and numeric list indexes', () => {
    assert.strictEqual(
      readPath(value, ['properties', 'ipConfigurations', '0', 'properties', 'privateIPAddress']),
      '10.0.1.4'
    );
  });

  it('should not read inherited object properties', () => {
    assert.strictEqual(readPath(value, ['properties', 'constructor']), undefined);
    assert.strictEqual(readPath({}, ['toString']), undefined);
  });

  it('should return undefined for missing steps', () => {
    assert.strictEqual(readPath(value, ['properties', 'missing', 'x']), undefined);
    assert.strictEqual(readPath(value, ['properties', 'ipConfigurations', '5']), undefined);
  });

  it('should return the value itself for an empty path', () => {
    assert.strictEqual(readPath('text', []), 'text');
  });
});

describe('formatJsonValue', () => {
  it('should print strings as-is and other values as JSON', () => {
    assert.strictEqual(formatJsonValue('eastus'), 'eastus');
    assert.strictEqual(formatJsonValue(['a', 'b']), '["a","b"]');
    assert.strictEqual(formatJsonValue(null), 'null');
  });
});
