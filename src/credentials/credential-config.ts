/**
 * Credential backend configuration, as found in the `[credentials]` table of
 * the configuration file. A discriminated union tagged on `backend`.
 */
import toml from 'toml';

import type { CredentialStore } from './credential-store.js';
import { EnvCredentialStore } from './env.js';
import { PassCredentialStore } from './pass.js';
import type { Env } from '../client/client.js';

/** Configuration for the `pass` credential backend. */
export interface PassConfig {
  backend: 'pass';
  /** Entry in the password store (e.g. "services/datastore"). */
  path: string;
  /** Maps credential key names to field names within the pass entry. */
  fields: Record<string, string>;
}

/** Read the key from the environment variable chain. */
export interface EnvConfig {
  backend: 'env';
}

export type CredentialConfig = PassConfig | EnvConfig;

/**
 * Parse a TOML string into a `CredentialConfig`.
 *
 * ```toml
 * backend = "pass"
 * path = "services/datastore"
 *
 * [fields]
 * api_key = "token"
 * ```
 *
 * @throws Error if the TOML is invalid or required fields are missing.
 */
export function parseCredentialConfig(input: string): CredentialConfig {
  const raw: unknown = toml.parse(input);
  return parseCredentialConfigValue(raw);
}

function parseFields(rawFields: unknown): Record<string, string> {
  if (rawFields === undefined || rawFields === null) {
    return {};
  }
  if (typeof rawFields !== 'object' || Array.isArray(rawFields)) {
    throw new Error('"fields" must be a table/object');
  }
  const fields: Record<string, string> = {};
  for (const [k, v] of Object.entries(rawFields)) {
    if (typeof v !== 'string') {
      throw new Error(`Field "${k}" must be a string, got ${typeof v}`);
    }
    fields[k] = v;
  }
  return fields;
}

/** Parse an already-decoded value (e.g. the `[credentials]` table). */
export function parseCredentialConfigValue(input: unknown): CredentialConfig {
  if (input === null || typeof input !== 'object' || Array.isArray(input)) {
    throw new Error('Credential config must be a table/object');
  }

  const raw = new Map<string, unknown>(Object.entries(input));
  const backend = raw.get('backend');
  if (typeof backend !== 'string') {
    throw new Error('Missing or invalid "backend" field in credential config');
  }

  if (backend === 'env') {
    return { backend: 'env' };
  }
  if (backend !== 'pass') {
    throw new Error(`Unsupported credential backend: "${backend}"`);
  }

  const path = raw.get('path');
  if (typeof path !== 'string' || path.trim() === '') {
    throw new Error('Missing or invalid "path" field in credential config');
  }

  return { backend: 'pass', path, fields: parseFields(raw.get('fields')) };
}

export function credentialStoreFromConfig(config: CredentialConfig, env?: Env): CredentialStore {
  switch (config.backend) {
    case 'pass':
      return new PassCredentialStore(config);
    case 'env':
      return new EnvCredentialStore(env);
  }
}
