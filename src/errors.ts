// CHANGE: Error taxonomy shared by the API client, loader and dispatcher.
// WHY: Callers distinguish authentication, rate-limit and generic API failures by class.

/**
 * Base class for every error raised by repodeck itself.
 */
export class RepodeckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing, invalid or expired credentials.
 */
export class AuthenticationError extends RepodeckError {}

/**
 * GitHub answered with an error status or could not be reached.
 *
 * @property status - HTTP status when a response was received.
 */
export class ApiError extends RepodeckError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

export class RateLimitError extends ApiError {}

/**
 * Human-readable cause string for notifications and logs.
 *
 * @param cause - Anything thrown or rejected.
 * @returns Message text, never empty.
 */
export function describeError(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message || cause.name;
  }
  if (typeof cause === "string" && cause.length > 0) {
    return cause;
  }
  return "Unknown error";
}
