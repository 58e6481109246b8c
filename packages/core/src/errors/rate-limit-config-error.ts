import type { ZodError } from 'zod';

/**
 * Thrown while building a rate-limit configuration. Never raised while
 * handling a request.
 */
export class RateLimitConfigError extends Error {
  /** One human-readable entry per rejected field. */
  public readonly issues: ReadonlyArray<string>;

  constructor(message: string, issues: ReadonlyArray<string> = [message]) {
    super(message);
    this.name = 'RateLimitConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static fromZodError(error: ZodError, subject = 'rate limit'): RateLimitConfigError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    );
    return new RateLimitConfigError(
      `Invalid ${subject} configuration: ${issues.join('; ')}`,
      issues,
    );
  }
}
