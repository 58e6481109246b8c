/**
 * Raised by counter stores when the backing storage cannot be read or
 * written. The engine treats any store rejection as a reason to fail open.
 */
export class CounterStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CounterStoreError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
