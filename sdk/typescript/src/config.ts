/**
 * Portal SDK - Configuration
 *
 * Builds client options from PORTAL_* environment variables, optionally
 * loaded from a .env file.
 */

import dotenv from 'dotenv';

import { PortalClient } from './client.js';
import { ConfigurationError } from './errors.js';
import type { ClientOptions } from './types.js';

export const ENV_KEYS = {
  server: 'PORTAL_SERVER',
  login: 'PORTAL_LOGIN',
  key: 'PORTAL_KEY',
  timeout: 'PORTAL_TIMEOUT',
} as const;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  const options: ClientOptions = {};

  if (env[ENV_KEYS.server]) options.server = env[ENV_KEYS.server];
  if (env[ENV_KEYS.login]) options.login = env[ENV_KEYS.login];
  if (env[ENV_KEYS.key]) options.key = env[ENV_KEYS.key];

  const rawTimeout = env[ENV_KEYS.timeout];
  if (rawTimeout) {
    const timeout = Number.parseInt(rawTimeout, 10);
    if (!Number.isFinite(timeout) || timeout <= 0 || String(timeout) !== rawTimeout.trim()) {
      throw new ConfigurationError(
        'timeout',
        `${ENV_KEYS.timeout} must be a positive integer, got "${rawTimeout}"`
      );
    }
    options.timeout = timeout;
  }

  return options;
}

export interface CreateClientOptions extends ClientOptions {
  /** Path of a .env file to load first. Pass `false` to skip loading. */
  envFile?: string | false;
  env?: NodeJS.ProcessEnv;
}

export function createPortalClient(config: CreateClientOptions = {}): PortalClient {
  const { envFile, env, ...overrides } = config;

  if (envFile !== false) {
    dotenv.config(envFile ? { path: envFile } : undefined);
  }

  const fromEnv = loadConfig(env ?? process.env);

  return new PortalClient({
    server: overrides.server ?? fromEnv.server,
    login: overrides.login ?? fromEnv.login,
    key: overrides.key ?? fromEnv.key,
    timeout: overrides.timeout ?? fromEnv.timeout,
    logger: overrides.logger,
  });
}
