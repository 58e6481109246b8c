import type { ServerResponse } from 'http';
import type { RateLimitExceededError } from '@throttlekit/core';

export function sendJson(
  res: ServerResponse,
  data: unknown,
  status: number = 200,
  headers: Readonly<Record<string, string>> = {},
): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    ...headers,
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
    'Cache-Control': 'no-store',
  });
  res.end(body);
}

export function sendTooManyRequests(
  res: ServerResponse,
  error: RateLimitExceededError,
): void {
  sendJson(
    res,
    { error: error.message, retryAfter: error.retryAfter },
    error.statusCode,
    error.headers,
  );
}
