/**
 * Read-only async access to secrets by key name.
 *
 * The client only ever asks for `api_key` (or `api-key`); stores may hold
 * other fields.
 */
export interface CredentialStore {
  /** Returns `null` when the key is not present. */
  get(key: string): Promise<string | null>;
}
