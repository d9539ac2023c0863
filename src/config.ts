/**
 * Configuration module for the datastore client.
 *
 * Parses TOML configuration and fills in defaults. Durations are
 * human-readable strings (e.g. "5s", "250ms") converted to milliseconds.
 *
 * ```toml
 * base_url = "https://datastore.example.test/api/v1/"
 * request_timeout = "10s"
 *
 * [polling]
 * strategy = "exponential"
 * interval = "5s"
 * min_interval = "1s"
 * max_interval = "30s"
 * timeout = "60s"
 *
 * [credentials]
 * backend = "pass"
 * path = "services/datastore"
 * ```
 */

import toml from 'toml';

import { DEFAULT_BASE_URL, DEFAULT_REQUEST_TIMEOUT_MS, type ClientOptions } from './client/client.js';
import { DEFAULT_POLLING_POLICY, isPollingStrategy, type PollingPolicy } from './client/polling.js';
import { parseCredentialConfigValue, type CredentialConfig } from './credentials/credential-config.js';
import { parseDuration } from './duration.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface Config {
  /** Base address of the datastore API. */
  base_url: string;
  /** Timeout of each HTTP request (ms). */
  request_timeout: number;
  /** Polling of deferred requests. */
  polling: PollingPolicy;
  /** Where the API key comes from; absent means flag or environment only. */
  credentials?: CredentialConfig;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: Readonly<Config> = {
  base_url: DEFAULT_BASE_URL,
  request_timeout: DEFAULT_REQUEST_TIMEOUT_MS,
  polling: { ...DEFAULT_POLLING_POLICY },
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function asTable(value: unknown, name: string): Map<string, unknown> {
  if (value === undefined) return new Map();
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return new Map(Object.entries(value));
}

function durationField(table: Map<string, unknown>, field: string, fallback: number): number {
  const value = table.get(field);
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new Error(`${field} must be a duration string like "5s"`);
  }
  try {
    return parseDuration(value);
  } catch (e: unknown) {
    throw new Error(`Invalid ${field}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing fields are filled with defaults.
 *
 * @throws Error on invalid TOML, a malformed duration or an unknown strategy.
 */
export function parseConfig(tomlStr: string): Config {
  // toml.parse throws on invalid TOML; an empty string yields an empty object.
  const raw = asTable(tomlStr.trim().length === 0 ? {} : toml.parse(tomlStr), 'root');
  const pollingRaw = asTable(raw.get('polling'), 'polling');

  let baseUrl = DEFAULT_CONFIG.base_url;
  const baseUrlRaw = raw.get('base_url');
  if (baseUrlRaw !== undefined) {
    if (typeof baseUrlRaw !== 'string' || baseUrlRaw.trim() === '') {
      throw new Error('base_url must be a non-empty string');
    }
    baseUrl = baseUrlRaw;
  }

  const strategy = pollingRaw.get('strategy') ?? DEFAULT_POLLING_POLICY.strategy;
  if (!isPollingStrategy(strategy)) {
    throw new Error(`polling.strategy must be "exponential" or "fixed", got ${JSON.stringify(strategy)}`);
  }

  const config: Config = {
    base_url: baseUrl,
    request_timeout: durationField(raw, 'request_timeout', DEFAULT_CONFIG.request_timeout),
    polling: {
      strategy,
      intervalMs: durationField(pollingRaw, 'interval', DEFAULT_POLLING_POLICY.intervalMs),
      minIntervalMs: durationField(pollingRaw, 'min_interval', DEFAULT_POLLING_POLICY.minIntervalMs),
      maxIntervalMs: durationField(pollingRaw, 'max_interval', DEFAULT_POLLING_POLICY.maxIntervalMs),
      timeoutMs: durationField(pollingRaw, 'timeout', DEFAULT_POLLING_POLICY.timeoutMs),
    },
  };

  const credentials = raw.get('credentials');
  if (credentials !== undefined) {
    config.credentials = parseCredentialConfigValue(credentials);
  }

  return config;
}

/** Map a parsed config onto client options (the credential is resolved separately). */
export function clientOptionsFromConfig(config: Config): ClientOptions {
  return {
    baseUrl: config.base_url,
    requestTimeoutMs: config.request_timeout,
    polling: { ...config.polling },
  };
}
