/**
 * The slice of an inbound HTTP request the limiter reads.
 *
 * Framework adapters (see `@throttlekit/http`) map their own request objects
 * onto this shape so that key resolvers never touch framework types.
 */
export interface RateLimitRequest {
  /** Peer address of the transport connection, if known. */
  remoteAddress?: string;
  /** Case-insensitive header lookup. Repeated headers are joined with `, `. */
  header(name: string): string | undefined;
  /** Authenticated user identity, when the auth layer resolved one. */
  userId?: string;
  /** Session identifier, usually read from the session cookie. */
  sessionId?: string;
}

/** Anything headers can be written to, e.g. a Node `ServerResponse`. */
export interface HeaderSink {
  setHeader(name: string, value: string): unknown;
}

export interface RateLimitRequestInit {
  remoteAddress?: string;
  headers?: Record<string, string | ReadonlyArray<string> | undefined>;
  userId?: string;
  sessionId?: string;
}

/**
 * Builds a {@link RateLimitRequest} from plain values. Useful for adapters
 * that already have the headers as a record, and for tests.
 */
export function createRateLimitRequest(
  init: RateLimitRequestInit = {},
): RateLimitRequest {
  const headers = new Map<string, string>();
  for (const [name, value] of Object.entries(init.headers ?? {})) {
    if (value === undefined) continue;
    headers.set(
      name.toLowerCase(),
      typeof value === 'string' ? value : value.join(', '),
    );
  }

  return {
    remoteAddress: init.remoteAddress,
    userId: init.userId,
    sessionId: init.sessionId,
    header(name: string) {
      return headers.get(name.toLowerCase());
    },
  };
}
