// src/config.ts

import { DEFAULT_CLIENT_TIMEOUT, DEFAULT_HOST, DEFAULT_PORT } from './constants/constants.js';
import { SpiConfigError } from './errors.js';
import type { ClientConfig, ServerConfig } from './types/emulator-types.js';

type Env = Record<string, string | undefined>;

export const SERVER_ENV = { host: 'SPI_SIM_HOST', port: 'SPI_SIM_PORT' } as const;
export const CLIENT_ENV = { host: 'HAL_SPI_SOCKET_HOST', port: 'HAL_SPI_SOCKET_PORT' } as const;

function parsePort(value: string | number, source: string): number {
  const port = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
    throw new SpiConfigError(`Invalid port from ${source}: ${value}`);
  }
  return port;
}

function parseHost(value: string, source: string): string {
  const host = value.trim();
  if (host.length === 0) {
    throw new SpiConfigError(`Empty host from ${source}`);
  }
  return host;
}

/**
 * Resolves host and port: explicit options, then environment, then defaults.
 */
function resolveEndpoint(
  options: Partial<ServerConfig>,
  env: Env,
  names: { host: string; port: string }
): ServerConfig {
  const envHost = env[names.host];
  const envPort = env[names.port];

  const host =
    options.host !== undefined
      ? parseHost(options.host, 'options')
      : envHost !== undefined && envHost !== ''
        ? parseHost(envHost, names.host)
        : DEFAULT_HOST;

  const port =
    options.port !== undefined
      ? parsePort(options.port, 'options')
      : envPort !== undefined && envPort !== ''
        ? parsePort(envPort, names.port)
        : DEFAULT_PORT;

  return { host, port };
}

export function resolveServerConfig(
  options: Partial<ServerConfig> = {},
  env: Env = process.env
): ServerConfig {
  return resolveEndpoint(options, env, SERVER_ENV);
}

export function resolveClientConfig(
  options: Partial<ClientConfig> = {},
  env: Env = process.env
): ClientConfig {
  const timeout = options.timeout ?? DEFAULT_CLIENT_TIMEOUT;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new SpiConfigError(`Invalid timeout: ${timeout}`);
  }
  return { ...resolveEndpoint(options, env, CLIENT_ENV), timeout };
}
