import type { CredentialStore } from './credential-store.js';
import { API_KEY_ENV_VARS, type Env } from '../client/client.js';

const API_KEY_NAMES = new Set(['api_key', 'api-key']);

/**
 * Store over an environment object. `api_key` resolves through
 * the same variable chain the client falls back to; any other key is looked
 * up verbatim.
 */
export class EnvCredentialStore implements CredentialStore {
  private readonly env: Env;

  constructor(env: Env = process.env) {
    this.env = env;
  }

  async get(key: string): Promise<string | null> {
    const names: readonly string[] = API_KEY_NAMES.has(key) ? API_KEY_ENV_VARS : [key];
    for (const name of names) {
      const value = this.env[name];
      if (value !== undefined && value.trim() !== '') return value;
    }
    return null;
  }
}
