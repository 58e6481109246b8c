import type { IncomingMessage } from 'http';
import { createRateLimitRequest, type RateLimitRequest } from '@throttlekit/core';
import { DEFAULT_SESSION_COOKIE, type UserIdLookup } from './config.js';

export interface RequestAdapterOptions {
  getUserId?: UserIdLookup;
  sessionCookie?: string;
}

export function readCookie(
  header: string | undefined,
  name: string,
): string | undefined {
  if (!header) return undefined;

  for (const pair of header.split(';')) {
    const separator = pair.indexOf('=');
    if (separator === -1 || pair.slice(0, separator).trim() !== name) continue;

    const raw = pair.slice(separator + 1).trim();
    try {
      return decodeURIComponent(raw);
    } catch (error: unknown) {
      // Malformed escapes are kept verbatim.
      if (error instanceof URIError) return raw;
      throw error;
    }
  }
  return undefined;
}

/** Adapts a Node request to the shape key resolvers read. */
export function toRateLimitRequest(
  req: IncomingMessage,
  { getUserId, sessionCookie = DEFAULT_SESSION_COOKIE }: RequestAdapterOptions = {},
): RateLimitRequest {
  return createRateLimitRequest({
    remoteAddress: req.socket.remoteAddress,
    headers: req.headers,
    userId: getUserId?.(req),
    sessionId: readCookie(req.headers.cookie, sessionCookie) || undefined,
  });
}
