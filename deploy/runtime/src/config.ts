/**
 * Runtime Configuration — maps process.env to a typed RuntimeConfig
 *
 * Reads from the environment once at startup and wires in defaults for
 * optional fields. Fails fast on missing or malformed variables, listing
 * every problem at once.
 */

import type { KeyStoreOptions } from '../../../api/src/index.js';

// ---------------------------------------------------------------------------
// Config shape
// ---------------------------------------------------------------------------

export interface RuntimeConfig {
  port: number;
  host: string;
  logLevel: string;
  serviceName: string;
  store: KeyStoreOptions;
  /** Admin API is disabled when unset */
  adminToken?: string;
}

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

export class EnvValidationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Invalid environment configuration:\n  ${problems.join('\n  ')}\n\n` +
        'Set them in your .env or deployment configuration.',
    );
    this.name = 'EnvValidationError';
    this.problems = problems;
  }
}

function read(env: Env, key: string, fallback?: string): string {
  const value = env[key];
  return value !== undefined && value !== '' ? value : fallback ?? '';
}

function requireEnv(env: Env, keys: string[], problems: string[]): void {
  for (const k of keys) {
    if (!env[k]) problems.push(`${k} is required`);
  }
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

function buildStoreOptions(env: Env, problems: string[]): KeyStoreOptions {
  const backend = read(env, 'KEY_STORE', 'memory').toLowerCase();

  switch (backend) {
    case 'memory':
      return { backend: 'memory' };
    case 'redis':
      requireEnv(env, ['REDIS_URL'], problems);
      return {
        backend: 'redis',
        url: read(env, 'REDIS_URL'),
        prefix: read(env, 'REDIS_PREFIX', 'license:'),
      };
    case 'postgrest':
      requireEnv(env, ['POSTGREST_URL', 'POSTGREST_KEY'], problems);
      return {
        backend: 'postgrest',
        url: read(env, 'POSTGREST_URL').replace(/\/+$/, ''),
        apiKey: read(env, 'POSTGREST_KEY'),
        table: read(env, 'POSTGREST_TABLE', 'license_keys'),
      };
    default:
      problems.push(`KEY_STORE must be one of memory, redis, postgrest (got "${backend}")`);
      return { backend: 'memory' };
  }
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const problems: string[] = [];

  const rawPort = read(env, 'PORT', '8787');
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    problems.push(`PORT must be an integer between 0 and 65535 (got "${rawPort}")`);
  }

  const store = buildStoreOptions(env, problems);

  if (problems.length > 0) {
    throw new EnvValidationError(problems);
  }

  const adminToken = read(env, 'ADMIN_TOKEN');
  return {
    port,
    host: read(env, 'HOST', '0.0.0.0'),
    logLevel: read(env, 'LOG_LEVEL', 'info'),
    serviceName: read(env, 'SERVICE_NAME', 'keybind'),
    store,
    ...(adminToken ? { adminToken } : {}),
  };
}
