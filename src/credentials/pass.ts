import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import type { CredentialStore } from './credential-store.js';
import type { PassConfig } from './credential-config.js';

const execFileAsync = promisify(execFile);

/** First line of a pass entry plus its `field: value` lines. */
export interface PassEntry {
  password: string | null;
  fields: Map<string, string>;
}

/**
 * Parse `pass show` output. The first line is the password (also exposed as
 * field `password`); later lines of the form `name: value` become fields,
 * with `\n` escapes turned into newlines. Other lines are ignored.
 */
export function parsePassEntry(content: string): PassEntry {
  const [first = '', ...rest] = content.split(/\r?\n/);
  const password = first === '' ? null : first;
  const fields = new Map<string, string>();
  if (password !== null) fields.set('password', password);

  for (const line of rest) {
    const idx = line.indexOf(': ');
    if (idx <= 0) continue;
    fields.set(line.slice(0, idx), line.slice(idx + 2).replace(/\\n/g, '\n'));
  }
  return { password, fields };
}

/**
 * Credential store backed by password-store (`pass show`).
 *
 * `config.fields` renames keys: with `{ api_key: "token" }`, `get('api_key')`
 * reads the `token:` line of the entry.
 */
export class PassCredentialStore implements CredentialStore {
  private readonly config: PassConfig;

  constructor(config: PassConfig) {
    this.config = config;
  }

  private fieldName(key: string): string {
    return this.config.fields[key] ?? key;
  }

  private async readEntry(): Promise<PassEntry> {
    const { stdout } = await execFileAsync('pass', ['show', this.config.path], {
      encoding: 'utf8',
      maxBuffer: 1024 * 1024,
    });
    return parsePassEntry(stdout);
  }

  async get(key: string): Promise<string | null> {
    const entry = await this.readEntry();
    return entry.fields.get(this.fieldName(key)) ?? null;
  }
}
