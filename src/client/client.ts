import { SystemClock, type Clock } from '../clock.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { AuthenticationError, DatastoreError, PollTimeoutError, describeResponseError } from '../errors.js';
import {
  decodeBody,
  encodePathSegment,
  encodeValue,
  extractRequestId,
  isPending,
  type StoredValue,
} from './payload.js';
import {
  nextInterval,
  parseRetryAfter,
  resolvePollingPolicy,
  waitFor,
  type PollingPolicy,
} from './polling.js';
import { HttpSession, isTimeoutError, type FetchLike, type HttpResponse } from './session.js';

export const DEFAULT_BASE_URL = 'https://voidsdatastore.net/api/v1/';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/** Environment variables consulted, in order, when no key is passed. */
export const API_KEY_ENV_VARS = ['VOIDS_DATASTORE_API_KEY', 'API_KEY'] as const;

export const USER_AGENT = 'datastore-client/0.1.0';

export type Env = Record<string, string | undefined>;

export interface ClientOptions {
  /** Credential sent as the Authorization header. Falls back to {@link API_KEY_ENV_VARS}. */
  apiKey?: string;
  /** Defaults to {@link DEFAULT_BASE_URL}. */
  baseUrl?: string;
  /** Timeout of each individual HTTP request (ms). */
  requestTimeoutMs?: number;
  polling?: Partial<PollingPolicy>;
  fetch?: FetchLike;
  clock?: Clock;
  /** Environment used for the credential fallback. Defaults to `process.env`. */
  env?: Env;
  debug?: boolean;
}

/** Per-call overrides of the polling policy. */
export interface PollOptions {
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
}

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) return null;
  return value.trim() === '' ? null : value;
}

/**
 * Resolve the credential: explicit key, then each environment variable in
 * {@link API_KEY_ENV_VARS}. Blank values are skipped.
 */
export function resolveApiKey(apiKey: string | undefined, env: Env): string {
  const explicit = nonEmpty(apiKey);
  if (explicit !== null) return explicit;
  for (const name of API_KEY_ENV_VARS) {
    const fromEnv = nonEmpty(env[name]);
    if (fromEnv !== null) return fromEnv;
  }
  throw new AuthenticationError(
    `API key required. Set ${API_KEY_ENV_VARS[0]} (or ${API_KEY_ENV_VARS[1]}) or pass apiKey explicitly.`,
  );
}

function checkSegment(name: string, value: string): void {
  if (value === '') {
    throw new DatastoreError(`${name} must not be empty`);
  }
}

/**
 * Client for the key/value datastore.
 *
 * Reads and writes either complete immediately (200) or return a request id
 * (202) that is polled at `status/{id}` until the server stops reporting
 * `{"status": "pending"}`. Every call ends with a final value or a thrown
 * {@link DatastoreError}; pending markers never reach the caller.
 */
export class DatastoreClient {
  readonly baseUrl: string;
  readonly requestTimeoutMs: number;
  readonly polling: Readonly<PollingPolicy>;
  private readonly session: HttpSession;
  private readonly clock: Clock;

  constructor(options: ClientOptions = {}) {
    const apiKey = resolveApiKey(options.apiKey, options.env ?? process.env);

    const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    if (!Number.isFinite(requestTimeoutMs) || requestTimeoutMs <= 0) {
      throw new DatastoreError(`requestTimeoutMs must be a positive number, got ${requestTimeoutMs}`);
    }

    this.requestTimeoutMs = requestTimeoutMs;
    this.polling = resolvePollingPolicy(options.polling);
    this.clock = options.clock ?? new SystemClock();
    this.session = new HttpSession({
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
      headers: {
        Authorization: apiKey,
        Accept: 'application/json, text/plain;q=0.9',
        'User-Agent': USER_AGENT,
      },
      fetch: options.fetch,
      debug: options.debug,
    });
    this.baseUrl = this.session.baseUrl;
  }

  /**
   * Build a client whose key comes from a credential store (`api_key`, or
   * `api-key`). Falls back to the environment when the store has neither.
   * A store that cannot be read at all (missing `pass` entry or binary) is an
   * {@link AuthenticationError}; the environment is not consulted then.
   */
  static async fromCredentials(
    store: CredentialStore,
    options: Omit<ClientOptions, 'apiKey'> = {},
  ): Promise<DatastoreClient> {
    let stored: string | null;
    try {
      stored = (await store.get('api_key')) ?? (await store.get('api-key'));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new AuthenticationError(`Could not read API key from credential store: ${reason}`, err);
    }
    return new DatastoreClient({ ...options, apiKey: stored ?? undefined });
  }

  /** Read the value stored under `(namespace, key)`. */
  async getKey(namespace: string, key: string, opts: PollOptions = {}): Promise<StoredValue> {
    const path = this.keyPath(namespace, key);
    const policy = this.policyFor(opts);
    const resp = await this.session.request('GET', path, { timeoutMs: this.requestTimeoutMs });
    return this.settle(resp, policy);
  }

  /**
   * Write `value` under `(namespace, key)`. Writing `null` deletes the key.
   * Resolves with whatever the server returns for the write.
   */
  async updateKey(namespace: string, key: string, value: StoredValue, opts: PollOptions = {}): Promise<StoredValue> {
    const path = this.keyPath(namespace, key);
    const policy = this.policyFor(opts);
    const { body, contentType } = encodeValue(value);
    const resp = await this.session.request('POST', path, {
      body,
      contentType,
      timeoutMs: this.requestTimeoutMs,
    });
    return this.settle(resp, policy);
  }

  get(namespace: string, key: string, opts?: PollOptions): Promise<StoredValue> {
    return this.getKey(namespace, key, opts);
  }

  update(namespace: string, key: string, value: StoredValue, opts?: PollOptions): Promise<StoredValue> {
    return this.updateKey(namespace, key, value, opts);
  }

  private keyPath(namespace: string, key: string): string {
    checkSegment('namespace', namespace);
    checkSegment('key', key);
    return `key/${encodePathSegment(namespace)}/${encodePathSegment(key)}`;
  }

  /** The client's policy with per-call overrides, validated before any request. */
  private policyFor(opts: PollOptions): PollingPolicy {
    return resolvePollingPolicy({
      ...this.polling,
      intervalMs: opts.pollIntervalMs ?? this.polling.intervalMs,
      timeoutMs: opts.pollTimeoutMs ?? this.polling.timeoutMs,
    });
  }

  private async settle(resp: HttpResponse, policy: PollingPolicy): Promise<StoredValue> {
    if (resp.status === 200) {
      return decodeBody(resp.text);
    }
    if (resp.status === 202) {
      const requestId = extractRequestId(resp.text);
      return this.pollStatus(requestId, policy);
    }
    throw new DatastoreError(describeResponseError(resp.status, resp.text), {
      status: resp.status,
      body: resp.text,
    });
  }

  /**
   * Poll `status/{requestId}` until the body is no longer pending.
   *
   * The deadline is fixed when polling starts. No request is issued once it
   * has passed, and no single request may outlive it: a status request cut
   * off by the remaining budget ends polling with {@link PollTimeoutError}.
   */
  private async pollStatus(requestId: string, policy: PollingPolicy): Promise<StoredValue> {
    const path = `status/${encodePathSegment(requestId)}`;
    const deadline = this.clock.now() + policy.timeoutMs;
    let interval = policy.intervalMs;

    for (;;) {
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        throw new PollTimeoutError(requestId, policy.timeoutMs);
      }

      let resp: HttpResponse;
      try {
        resp = await this.session.request('GET', path, {
          timeoutMs: Math.min(this.requestTimeoutMs, remaining),
        });
      } catch (err: unknown) {
        const budgetLimited = remaining <= this.requestTimeoutMs;
        if (err instanceof DatastoreError && budgetLimited && isTimeoutError(err.cause)) {
          throw new PollTimeoutError(requestId, policy.timeoutMs, err);
        }
        throw err;
      }
      if (resp.status < 200 || resp.status >= 300) {
        throw new DatastoreError(describeResponseError(resp.status, resp.text), {
          status: resp.status,
          body: resp.text,
        });
      }

      const value = decodeBody(resp.text);
      if (!isPending(value)) {
        return value;
      }

      const retryAfterHeader = resp.headers.get('Retry-After');
      const retryAfter = parseRetryAfter(retryAfterHeader);
      if (retryAfterHeader !== null && retryAfter === null) {
        console.warn(`Ignoring unparseable Retry-After header ${JSON.stringify(retryAfterHeader)}`);
      }

      const wait = waitFor(policy, interval, retryAfter);
      await this.clock.sleep(Math.min(wait, Math.max(0, deadline - this.clock.now())));
      interval = nextInterval(policy, interval);
    }
  }
}

/** One-shot read with a client built from `options`. */
export async function getValue(
  namespace: string,
  key: string,
  options: ClientOptions & PollOptions = {},
): Promise<StoredValue> {
  const client = new DatastoreClient(options);
  return client.getKey(namespace, key, options);
}

/** One-shot write with a client built from `options`. */
export async function updateValue(
  namespace: string,
  key: string,
  value: StoredValue,
  options: ClientOptions & PollOptions = {},
): Promise<StoredValue> {
  const client = new DatastoreClient(options);
  return client.updateKey(namespace, key, value, options);
}
