/**
 * Error taxonomy for the datastore client.
 *
 * Every failure surfaced by the library is a `DatastoreError`; the two
 * subclasses mark the cases callers commonly branch on.
 */

export interface DatastoreErrorOptions {
  /** HTTP status of the response that caused the failure, if any. */
  status?: number;
  /** Raw response body, if any. */
  body?: string;
  cause?: unknown;
}

/** Transport failures, malformed responses and non-success statuses. */
export class DatastoreError extends Error {
  public readonly status?: number;
  public readonly body?: string;

  constructor(message: string, options: DatastoreErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DatastoreError';
    this.status = options.status;
    this.body = options.body;
  }
}

/** No credential could be resolved. Raised before any network activity. */
export class AuthenticationError extends DatastoreError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'AuthenticationError';
  }
}

/** The polling deadline passed while the request was still pending. */
export class PollTimeoutError extends DatastoreError {
  public readonly requestId: string;
  public readonly timeoutMs: number;

  constructor(requestId: string, timeoutMs: number, cause?: unknown) {
    super(`Polling for request ${requestId} timed out after ${timeoutMs / 1000}s`, { cause });
    this.name = 'PollTimeoutError';
    this.requestId = requestId;
    this.timeoutMs = timeoutMs;
  }
}

const MESSAGE_FIELDS = ['message', 'error', 'detail'] as const;

/**
 * Build the message for a non-success response.
 *
 * A JSON body's `message`, `error` or `detail` string is preferred over the
 * raw text.
 */
export function describeResponseError(status: number, body: string): string {
  const trimmed = body.trim();
  if (trimmed === '') {
    return `Unexpected status ${status}: (empty body)`;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return `Unexpected status ${status}: ${trimmed}`;
  }

  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    const fields = new Map<string, unknown>(Object.entries(parsed));
    for (const field of MESSAGE_FIELDS) {
      const value = fields.get(field);
      if (typeof value === 'string' && value.trim() !== '') {
        return `Unexpected status ${status}: ${value.trim()}`;
      }
    }
  }
  return `Unexpected status ${status}: ${trimmed}`;
}
