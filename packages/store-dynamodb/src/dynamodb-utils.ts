import { CounterStoreError } from '@throttlekit/core';

// DynamoDB allows 2048 bytes for a partition key; leave room for the prefix.
const MAX_COUNTER_KEY_BYTES = 1024;

export const COUNTER_PK_PREFIX = 'COUNTER#';
export const COUNTER_SK = 'COUNTER';

export function assertCounterKey(
  key: string,
  maxBytes = MAX_COUNTER_KEY_BYTES,
): void {
  if (key.length === 0) {
    throw new CounterStoreError('Counter key must not be empty');
  }

  for (let i = 0; i < key.length; i++) {
    const charCode = key.charCodeAt(i);
    if (charCode < 0x20 || charCode === 0x7f) {
      throw new CounterStoreError(
        'Counter key contains unsupported control characters',
      );
    }
  }

  if (Buffer.byteLength(key, 'utf8') > maxBytes) {
    throw new CounterStoreError(
      `Counter key exceeds maximum length of ${maxBytes} bytes`,
    );
  }
}

export function counterItemKey(key: string): { pk: string; sk: string } {
  assertCounterKey(key);
  return { pk: `${COUNTER_PK_PREFIX}${key}`, sk: COUNTER_SK };
}

/** Epoch seconds at which DynamoDB may drop the item; undefined for none. */
export function expiryFor(ttlSeconds: number, nowMs: number): number | undefined {
  if (ttlSeconds === 0) return undefined;
  return Math.floor(nowMs / 1000) + Math.ceil(ttlSeconds);
}

export function isExpired(ttl: unknown, nowMs: number): boolean {
  return typeof ttl === 'number' && ttl * 1000 <= nowMs;
}
