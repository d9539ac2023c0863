import { describe, it, expect, vi } from 'vitest';

import { DEFAULT_CONFIG, type Config } from '../config.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { AuthenticationError } from '../errors.js';
import {
  createClient,
  deleteCommand,
  formatResult,
  getCommand,
  parseCliValue,
  resolveClientOptions,
  setCommand,
} from './commands.js';

function okFetch(body: string) {
  const requests: Array<{ url: string; init: RequestInit | undefined }> = [];
  const fetch = vi.fn(async (input: string | URL, init?: RequestInit) => {
    requests.push({ url: String(input), init });
    return new Response(body, { status: 200 });
  });
  return { fetch, requests };
}

function config(overrides: Partial<Config> = {}): Config {
  return { ...DEFAULT_CONFIG, polling: { ...DEFAULT_CONFIG.polling }, ...overrides };
}

function memoryStore(values: Record<string, string>): CredentialStore {
  return {
    async get(key: string) {
      return values[key] ?? null;
    },
  };
}

describe('parseCliValue', () => {
  it('parses JSON objects and arrays', () => {
    expect(parseCliValue('{"Balance":42}')).toEqual({ Balance: 42 });
    expect(parseCliValue('[1,2]')).toEqual([1, 2]);
  });

  it('parses JSON scalars', () => {
    expect(parseCliValue('42')).toBe(42);
    expect(parseCliValue('null')).toBeNull();
    expect(parseCliValue('"quoted"')).toBe('quoted');
  });

  it('keeps anything else as a literal string', () => {
    expect(parseCliValue('hello')).toBe('hello');
    expect(parseCliValue('{broken')).toBe('{broken');
  });
});

describe('formatResult', () => {
  it('pretty-prints structured values', () => {
    expect(formatResult({ a: [1, 2] })).toBe('{\n  "a": [\n    1,\n    2\n  ]\n}');
  });

  it('prints scalars raw', () => {
    expect(formatResult('text')).toBe('text');
    expect(formatResult(7)).toBe('7');
    expect(formatResult(false)).toBe('false');
  });

  it('prints null as null', () => {
    expect(formatResult(null)).toBe('null');
  });
});

describe('resolveClientOptions', () => {
  it('layers flags over the config file', () => {
    const options = resolveClientOptions(config({ base_url: 'http://from-config/' }), {
      baseUrl: 'http://from-flag/',
      pollInterval: '2s',
      pollTimeout: '1m',
      fixedDelay: true,
      verbose: true,
    });
    expect(options.baseUrl).toBe('http://from-flag/');
    expect(options.polling).toEqual({
      strategy: 'fixed',
      intervalMs: 2_000,
      minIntervalMs: 1_000,
      maxIntervalMs: 30_000,
      timeoutMs: 60_000,
    });
    expect(options.debug).toBe(true);
  });

  it('keeps config values without flags', () => {
    const options = resolveClientOptions(config({ request_timeout: 3_000 }), {});
    expect(options.baseUrl).toBe('https://voidsdatastore.net/api/v1/');
    expect(options.requestTimeoutMs).toBe(3_000);
    expect(options.polling).toEqual(DEFAULT_CONFIG.polling);
    expect(options.debug).toBe(false);
  });

  it('names the flag on a bad duration', () => {
    expect(() => resolveClientOptions(config(), { pollTimeout: 'forever' })).toThrow(
      "Invalid --poll-timeout: Invalid duration 'forever'",
    );
  });
});

describe('createClient', () => {
  it('prefers --api-key', async () => {
    const { fetch, requests } = okFetch('1');
    const client = await createClient(config(), { apiKey: 'flag-key' }, {
      fetch,
      env: { API_KEY: 'env-key' },
      credentialStore: memoryStore({ api_key: 'store-key' }),
    });
    await client.getKey('g1', 'k');
    expect(new Headers(requests[0].init?.headers).get('Authorization')).toBe('flag-key');
  });

  it('uses the credential store before the environment', async () => {
    const { fetch, requests } = okFetch('1');
    const client = await createClient(config(), {}, {
      fetch,
      env: { API_KEY: 'env-key' },
      credentialStore: memoryStore({ api_key: 'store-key' }),
    });
    await client.getKey('g1', 'k');
    expect(new Headers(requests[0].init?.headers).get('Authorization')).toBe('store-key');
  });

  it('builds an env store from the config', async () => {
    const { fetch, requests } = okFetch('1');
    const client = await createClient(config({ credentials: { backend: 'env' } }), {}, {
      fetch,
      env: { VOIDS_DATASTORE_API_KEY: 'env-key' },
    });
    await client.getKey('g1', 'k');
    expect(new Headers(requests[0].init?.headers).get('Authorization')).toBe('env-key');
  });

  it('falls back to the environment', async () => {
    const { fetch, requests } = okFetch('1');
    const client = await createClient(config(), {}, { fetch, env: { API_KEY: 'env-key' } });
    await client.getKey('g1', 'k');
    expect(new Headers(requests[0].init?.headers).get('Authorization')).toBe('env-key');
  });

  it('fails without any credential and without a request', async () => {
    const { fetch } = okFetch('1');
    await expect(createClient(config(), {}, { fetch, env: {} })).rejects.toBeInstanceOf(AuthenticationError);
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('commands', () => {
  async function clientFor(body: string) {
    const { fetch, requests } = okFetch(body);
    const client = await createClient(config({ base_url: 'http://localhost:1/v1' }), { apiKey: 'test-secret' }, {
      fetch,
    });
    return { client, requests };
  }

  it('get reads the key', async () => {
    const { client, requests } = await clientFor('{"Balance":42}');
    expect(await getCommand(client, 'g1', 'bits')).toEqual({ Balance: 42 });
    expect(requests[0].url).toBe('http://localhost:1/v1/key/g1/bits');
    expect(requests[0].init?.method).toBe('GET');
  });

  it('set sends JSON values as JSON', async () => {
    const { client, requests } = await clientFor('{"Balance":42}');
    await setCommand(client, 'g1', 'bits', '{"Balance":42}');
    expect(requests[0].init?.body).toBe('{"Balance":42}');
    expect(new Headers(requests[0].init?.headers).get('Content-Type')).toBe('application/json');
  });

  it('set sends other values as text', async () => {
    const { client, requests } = await clientFor('ok');
    await setCommand(client, 'g1', 'greeting', 'hello there');
    expect(requests[0].init?.body).toBe('hello there');
    expect(new Headers(requests[0].init?.headers).get('Content-Type')).toBe('text/plain; charset=utf-8');
  });

  it('delete writes null', async () => {
    const { client, requests } = await clientFor('');
    expect(await deleteCommand(client, 'g1', 'bits')).toBeNull();
    expect(requests[0].init?.method).toBe('POST');
    expect(requests[0].init?.body).toBe('null');
  });
});
