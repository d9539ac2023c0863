/**
 * datastore-client: key/value datastore client with request-id polling.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Core utilities
// ---------------------------------------------------------------------------

export { type Clock, SystemClock, ManualClock } from './clock.js';
export { parseDuration, formatDuration } from './duration.js';
export { type Config, DEFAULT_CONFIG, parseConfig, clientOptionsFromConfig } from './config.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export {
  DatastoreError,
  AuthenticationError,
  PollTimeoutError,
  describeResponseError,
  type DatastoreErrorOptions,
} from './errors.js';

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export {
  DatastoreClient,
  getValue,
  updateValue,
  resolveApiKey,
  DEFAULT_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  API_KEY_ENV_VARS,
  type ClientOptions,
  type PollOptions,
  type Env,
} from './client/client.js';
export {
  DEFAULT_POLLING_POLICY,
  resolvePollingPolicy,
  parseRetryAfter,
  waitFor,
  nextInterval,
  type PollingPolicy,
  type PollingStrategy,
} from './client/polling.js';
export {
  encodeValue,
  decodeBody,
  extractRequestId,
  isPending,
  encodePathSegment,
  type StoredValue,
  type JsonValue,
  type JsonObject,
  type JsonPrimitive,
} from './client/payload.js';
export { HttpSession, normalizeBaseUrl, buildUrl, type FetchLike, type HttpResponse } from './client/session.js';

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

export * from './credentials/index.js';
