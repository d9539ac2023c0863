export type { CredentialStore } from './credential-store.js';
export type { PassConfig, EnvConfig, CredentialConfig } from './credential-config.js';
export { parseCredentialConfig, parseCredentialConfigValue, credentialStoreFromConfig } from './credential-config.js';
export { PassCredentialStore, parsePassEntry, type PassEntry } from './pass.js';
export { EnvCredentialStore } from './env.js';
