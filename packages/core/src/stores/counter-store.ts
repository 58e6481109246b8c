/**
 * Key/value contract every counter backend implements.
 *
 * Values are opaque strings (the strategies store JSON records). Missing or
 * expired keys read as `undefined`. Any operation may reject; the engine
 * recovers by admitting the request.
 */
export interface CounterStore {
  get(key: string): Promise<string | undefined>;
  /**
   * Stores a value that expires `ttlSeconds` from now. The TTL is always at
   * least as long as the window the value describes.
   */
  put(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /**
   * Atomically adds one to an integer counter and returns the new value.
   * A missing or expired counter starts from zero and takes `ttlSeconds`;
   * an existing one keeps its original expiry.
   *
   * Optional: stores without it fall back to read-then-write.
   */
  increment?(key: string, ttlSeconds: number): Promise<number>;
  /** Releases connections or timers owned by the store. */
  close?(): Promise<void>;
}
