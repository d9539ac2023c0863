/**
 * Command implementations behind the CLI. Each returns the value to print so
 * that the commander wiring in `cli/main.ts` stays thin.
 */

import { DatastoreClient, type ClientOptions, type Env } from '../client/client.js';
import type { FetchLike } from '../client/session.js';
import type { PollingPolicy } from '../client/polling.js';
import type { StoredValue } from '../client/payload.js';
import { clientOptionsFromConfig, type Config } from '../config.js';
import { credentialStoreFromConfig } from '../credentials/credential-config.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { parseDuration } from '../duration.js';

export type GlobalOptions = {
  apiKey?: string;
  baseUrl?: string;
  pollInterval?: string;
  pollTimeout?: string;
  fixedDelay?: boolean;
  verbose?: boolean;
};

export interface ClientDeps {
  env?: Env;
  fetch?: FetchLike;
  /** Overrides the store built from `config.credentials`. */
  credentialStore?: CredentialStore;
}

/** Parse a CLI value as JSON when possible, else keep the literal string. */
export function parseCliValue(raw: string): StoredValue {
  try {
    const value: StoredValue = JSON.parse(raw);
    return value;
  } catch {
    return raw;
  }
}

/** Structured values are pretty-printed JSON; scalars print as they are. */
export function formatResult(value: StoredValue): string {
  if (value === null || typeof value === 'object') {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

function durationFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  try {
    return parseDuration(value);
  } catch (e: unknown) {
    throw new Error(`Invalid ${flag}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/** Client options from the config file with command-line flags layered on top. */
export function resolveClientOptions(config: Config, opts: GlobalOptions, deps: ClientDeps = {}): ClientOptions {
  const base = clientOptionsFromConfig(config);
  const polling: Partial<PollingPolicy> = { ...base.polling };

  const interval = durationFlag('--poll-interval', opts.pollInterval);
  if (interval !== undefined) polling.intervalMs = interval;
  const timeout = durationFlag('--poll-timeout', opts.pollTimeout);
  if (timeout !== undefined) polling.timeoutMs = timeout;
  if (opts.fixedDelay === true) polling.strategy = 'fixed';

  return {
    ...base,
    baseUrl: opts.baseUrl ?? base.baseUrl,
    polling,
    env: deps.env,
    fetch: deps.fetch,
    debug: opts.verbose === true,
  };
}

/**
 * Build the client. Credential precedence: `--api-key`, then the configured
 * credential store, then the environment.
 */
export async function createClient(config: Config, opts: GlobalOptions, deps: ClientDeps = {}): Promise<DatastoreClient> {
  const options = resolveClientOptions(config, opts, deps);
  if (opts.apiKey !== undefined && opts.apiKey.trim() !== '') {
    return new DatastoreClient({ ...options, apiKey: opts.apiKey });
  }

  const store =
    deps.credentialStore ??
    (config.credentials !== undefined ? credentialStoreFromConfig(config.credentials, deps.env) : undefined);
  if (store !== undefined) {
    return DatastoreClient.fromCredentials(store, options);
  }
  return new DatastoreClient(options);
}

export function getCommand(client: DatastoreClient, namespace: string, key: string): Promise<StoredValue> {
  return client.getKey(namespace, key);
}

export function setCommand(client: DatastoreClient, namespace: string, key: string, raw: string): Promise<StoredValue> {
  return client.updateKey(namespace, key, parseCliValue(raw));
}

/** Writing null removes the key. */
export function deleteCommand(client: DatastoreClient, namespace: string, key: string): Promise<StoredValue> {
  return client.updateKey(namespace, key, null);
}
