import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';

import { err, ok, type Result } from './result.js';
import { ConnectionConfigSchema, type ConnectionConfig } from './types.js';

/**
 * Shape of `config.json`. Unknown keys are ignored; the connection block is
 * validated separately once environment overrides are applied.
 */
const ConfigFileSchema = z.object({
  debug: z.boolean().optional(),
  connection: z.record(z.unknown()).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Environment variables that override the matching connection key.
 */
export const CONNECTION_ENV_VARS = {
  ENDPOINT: 'TAXOGRAPH_ENDPOINT',
  PORT: 'TAXOGRAPH_PORT',
  DBNAME: 'TAXOGRAPH_DBNAME',
  USER: 'TAXOGRAPH_USER',
  PASSWORD: 'TAXOGRAPH_PASSWORD',
} as const;

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

/**
 * Returns the taxograph configuration directory.
 * Default: ~/.taxograph/
 *
 * Supports TAXOGRAPH_CONFIG_DIR env var override for testing.
 */
export function getConfigDir(): string {
  return process.env.TAXOGRAPH_CONFIG_DIR || join(homedir(), '.taxograph');
}

/**
 * Reads and validates `config.json` from the config directory.
 * A missing or malformed file reads as an empty config.
 */
function readConfigFile(): ConfigFile {
  const configPath = join(getConfigDir(), 'config.json');

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    // Written straight to stderr: debug() itself depends on this file
    if (process.env.TAXOGRAPH_DEBUG === '1' || process.env.TAXOGRAPH_DEBUG === 'true') {
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[TAXOGRAPH:config] No usable config file: ${reason}\n`);
    }
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `TAXOGRAPH_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `config.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 *
 * The result is cached after the first call.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.TAXOGRAPH_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  _debugCached = readConfigFile().debug === true;
  return _debugCached;
}

/**
 * Loads the connection mapping: the `connection` block of config.json with
 * any TAXOGRAPH_* environment variables laid over it, then validated.
 */
export function loadConnectionConfig(): Result<ConnectionConfig> {
  const merged: Record<string, unknown> = { ...readConfigFile().connection };

  for (const [key, envName] of Object.entries(CONNECTION_ENV_VARS)) {
    const value = process.env[envName];
    if (value !== undefined && value !== '') {
      merged[key] = value;
    }
  }

  const parsed = ConnectionConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    return err({
      kind: 'ConnectionError',
      message: `Invalid connection configuration (${fields})`,
      cause: parsed.error,
    });
  }

  return ok(parsed.data);
}
