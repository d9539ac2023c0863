/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML, and producing the JSON
 * output shape of the `config` command.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import { type Config, DEFAULT_CONFIG, parseConfig } from '../config.js';
import { formatDuration } from '../duration.js';
import type { Env } from '../client/client.js';

export const CONFIG_FILE_NAME = 'datastore.toml';

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./datastore.toml` if it exists in the current working directory.
 * 2. `$XDG_CONFIG_HOME/datastore/datastore.toml` (or
 *    `~/.config/datastore/datastore.toml` when `XDG_CONFIG_HOME` is not set),
 *    whether or not it exists.
 */
export function defaultConfigPath(env: Env = process.env, cwd: string = process.cwd()): string {
  const localConfig = path.resolve(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'datastore', CONFIG_FILE_NAME);
}

/**
 * Load the configuration.
 *
 * @param configPath - Explicit path to a TOML config file. When omitted the
 *   result of {@link defaultConfigPath} is used; a missing default file yields
 *   the defaults, a missing explicit file is an error.
 */
export async function loadConfig(
  configPath?: string,
  env: Env = process.env,
  cwd: string = process.cwd(),
): Promise<{ configPath: string; config: Config; exists: boolean }> {
  const resolvedPath = configPath ? path.resolve(cwd, configPath) : defaultConfigPath(env, cwd);

  let tomlStr: string;
  try {
    tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
  } catch (err: unknown) {
    if (configPath === undefined && err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {
        configPath: resolvedPath,
        config: { ...DEFAULT_CONFIG, polling: { ...DEFAULT_CONFIG.polling } },
        exists: false,
      };
    }
    throw err;
  }

  try {
    return { configPath: resolvedPath, config: parseConfig(tomlStr), exists: true };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid config file ${resolvedPath}: ${message}`, { cause: err });
  }
}

/** JSON-serialisable output of the `config` command. Never includes a secret. */
export function configOutput(configPath: string, exists: boolean, config: Config): object {
  return {
    config_file: configPath,
    config_file_exists: exists,
    base_url: config.base_url,
    request_timeout: formatDuration(config.request_timeout),
    polling: {
      strategy: config.polling.strategy,
      interval: formatDuration(config.polling.intervalMs),
      min_interval: formatDuration(config.polling.minIntervalMs),
      max_interval: formatDuration(config.polling.maxIntervalMs),
      timeout: formatDuration(config.polling.timeoutMs),
    },
    credentials: config.credentials?.backend ?? 'env',
  };
}
