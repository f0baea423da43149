// src/cli.ts

import { SERVER_ENV } from './config.js';
import { DEFAULT_HOST, DEFAULT_PORT } from './constants/constants.js';
import { SpiConfigError } from './errors.js';
import { rootLogger } from './logger.js';
import { SpiSocketServer } from './server/socket-server.js';
import type { LogLevel, SpiSocketServerOptions } from './types/emulator-types.js';

const logger = rootLogger.createLogger('cli');

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export const USAGE = `Usage: spi-hss-sim [options]

SPI socket server emulating a 4-channel high-side switch.

Options:
  --host <addr>        Listen address (default ${DEFAULT_HOST}, env ${SERVER_ENV.host})
  --port <n>           Listen port (default ${DEFAULT_PORT}, env ${SERVER_ENV.port})
  --log-level <level>  ${LOG_LEVELS.join(' | ')} (default info)
  --no-color           Plain log output
  --help               Show this text`;

export interface CliOptions extends SpiSocketServerOptions {
  color: boolean;
  help: boolean;
}

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new SpiConfigError(`Missing value for ${flag}`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Parses command-line flags. Values not given stay undefined so the
 * environment and defaults apply.
 * @throws SpiConfigError On a missing value or an unknown log level
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    color: !args.includes('--no-color'),
    help: args.includes('--help') || args.includes('-h'),
  };

  const host = getArg(args, '--host');
  if (host !== undefined) options.host = host;

  const port = getArg(args, '--port');
  if (port !== undefined) options.port = Number(port);

  const level = getArg(args, '--log-level');
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new SpiConfigError(`Unknown log level: ${level}`);
    }
    options.logLevel = level;
  }

  return options;
}

/**
 * Runs the server until SIGINT or SIGTERM.
 * @returns the process exit code
 */
export async function main(args: string[]): Promise<number> {
  let options: CliOptions;
  let server: SpiSocketServer;
  try {
    options = parseCliArgs(args);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }
    if (!options.color) rootLogger.disableColors();
    server = new SpiSocketServer(options);
  } catch (err: unknown) {
    logger.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 1;
  }

  try {
    await server.start();
  } catch (err: unknown) {
    logger.error('Server failed to start', err);
    return 1;
  }

  return new Promise<number>(resolve => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`${signal} received, shutting down`);
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      server.stop().then(
        () => resolve(0),
        (err: unknown) => {
          logger.error('Error while stopping', err);
          resolve(1);
        }
      );
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });
}
