import { CounterStoreError } from '@throttlekit/core';
import { describe, it, expect } from 'vitest';
import {
  assertCounterKey,
  counterItemKey,
  expiryFor,
  isExpired,
} from './dynamodb-utils.js';

describe('assertCounterKey', () => {
  it('accepts ordinary keys', () => {
    expect(() =>
      assertCounterKey('rate_limit:fixed:60:ip:8.8.8.8:29453760'),
    ).not.toThrow();
  });

  it('rejects empty keys', () => {
    expect(() => assertCounterKey('')).toThrow('Counter key must not be empty');
  });

  it.each(['a\u0000b', 'a\tb', 'a\nb', 'a\u007fb'])(
    'rejects control characters in %j',
    (key) => {
      expect(() => assertCounterKey(key)).toThrow(CounterStoreError);
    },
  );

  it('measures length in UTF-8 bytes', () => {
    expect(() => assertCounterKey('é'.repeat(3), 5)).toThrow(
      'Counter key exceeds maximum length of 5 bytes',
    );
    expect(() => assertCounterKey('é'.repeat(2), 5)).not.toThrow();
  });
});

describe('counterItemKey', () => {
  it('builds the item key', () => {
    expect(counterItemKey('user:42')).toEqual({
      pk: 'COUNTER#user:42',
      sk: 'COUNTER',
    });
  });
});

describe('expiry helpers', () => {
  it('converts a TTL to epoch seconds', () => {
    expect(expiryFor(60, 1_000_500)).toBe(1_060);
    expect(expiryFor(0, 1_000_500)).toBeUndefined();
  });

  it('treats items at or past their ttl as expired', () => {
    expect(isExpired(1_000, 1_000_000)).toBe(true);
    expect(isExpired(1_001, 1_000_000)).toBe(false);
    expect(isExpired(undefined, 1_000_000)).toBe(false);
  });
});
