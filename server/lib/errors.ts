/**
 * Error taxonomy for the mentor core.
 *
 * Every error carries an HTTP status and one stable message that is safe to
 * show the learner. The detail (and the underlying `cause`) is for logs only.
 */

export abstract class MentorError extends Error {
  abstract readonly status: number;
  abstract readonly publicMessage: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad credentials. Unknown user and wrong password look the same. */
export class AuthError extends MentorError {
  readonly status = 401;
  readonly publicMessage = 'Login failed.';

  constructor(message = 'Invalid credentials') {
    super(message);
  }
}

/** Missing or malformed startup configuration. Fatal. */
export class ConfigError extends MentorError {
  readonly status = 500;
  readonly publicMessage = 'The mentor is not configured correctly.';
}

/** Store unreachable or a constraint was violated. */
export class StorageError extends MentorError {
  readonly status = 500;
  readonly publicMessage = 'Something went wrong. Please try again.';
}

export type ProviderFailure = 'timeout' | 'failed';

/** The LLM call failed, returned nothing usable, or timed out. */
export class ProviderError extends MentorError {
  readonly publicMessage = 'The mentor is unavailable right now. Please try again.';
  readonly reason: ProviderFailure;

  constructor(message: string, reason: ProviderFailure = 'failed', options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
  }

  get status(): number {
    return this.reason === 'timeout' ? 504 : 502;
  }
}

/** A session that does not exist or belongs to someone else. */
export class NotFoundError extends MentorError {
  readonly status = 404;
  readonly publicMessage = 'Session not found.';
}

/** Maps any thrown value to the status and body the HTTP layer sends. */
export function toHttpError(error: unknown): { status: number; body: { error: string } } {
  if (error instanceof MentorError) {
    return { status: error.status, body: { error: error.publicMessage } };
  }
  return { status: 500, body: { error: 'Something went wrong. Please try again.' } };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (cause: ${error.cause.message})` : '';
    return `${error.name}: ${error.message}${cause}`;
  }
  return String(error);
}
