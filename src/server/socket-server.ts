// src/server/socket-server.ts

import * as net from 'node:net';
import { Mutex } from 'async-mutex';
import { resolveServerConfig } from '../config.js';
import { HighSideSwitchEmulator } from '../emulator/hss-emulator.js';
import { SpiAlreadyConnectedError, SpiTruncatedFrameError } from '../errors.js';
import { readMessage, writeResponse } from '../framers/message-framer.js';
import { StreamReader } from '../framers/stream-reader.js';
import { rootLogger } from '../logger.js';
import type { ServerConfig, SpiSocketServerOptions } from '../types/emulator-types.js';
import { DeviceSession } from './device-session.js';
import { Dispatcher } from './dispatcher.js';

const logger = rootLogger.createLogger('SpiSocketServer');

/**
 * TCP front end of the emulator.
 *
 * Sessions are served strictly one after another: a connection accepted
 * while another is active waits on the session mutex until the active one
 * closes. The emulator is shared by all sessions and outlives them; the
 * device configuration table belongs to a single session.
 */
export class SpiSocketServer {
  readonly config: ServerConfig;
  readonly emulator: HighSideSwitchEmulator;

  private server: net.Server | null = null;
  private sessionMutex: Mutex = new Mutex();
  private sockets: Set<net.Socket> = new Set();
  private sessions: Set<Promise<void>> = new Set();
  private servedSessions: number = 0;

  constructor(options: SpiSocketServerOptions = {}) {
    this.config = resolveServerConfig(options);
    if (options.logLevel) {
      rootLogger.setLevel(options.logLevel);
    }
    this.emulator = new HighSideSwitchEmulator();
  }

  get isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Number of sessions that have run to completion */
  get completedSessions(): number {
    return this.servedSessions;
  }

  /**
   * Binds and starts accepting connections.
   * @returns the address actually bound (port 0 resolves to the assigned port)
   * @throws the bind/listen error; the server is unusable afterwards
   */
  async start(): Promise<ServerConfig> {
    if (this.server) throw new SpiAlreadyConnectedError();

    const server = net.createServer(socket => this._onConnection(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        server.off('listening', onListening);
        logger.error(`Failed to listen on ${this.config.host}:${this.config.port}`, err);
        this.server = null;
        reject(err);
      };
      const onListening = () => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.config.port, this.config.host);
    });

    server.on('error', err => logger.error('Listener error', err));

    const bound = this.address();
    logger.info(`Listening on ${bound.host}:${bound.port}`);
    return bound;
  }

  address(): ServerConfig {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') {
      return { host: addr.address, port: addr.port };
    }
    return { ...this.config };
  }

  /**
   * Stops listening, drops every open connection and waits for their sessions to end.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await Promise.all([closed, ...this.sessions]);
    logger.info('Server stopped');
  }

  private _onConnection(socket: net.Socket): void {
    const remote = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
    this.sockets.add(socket);
    socket.setNoDelay(true);
    // keeps a socket that fails while queued from raising an unhandled 'error'
    socket.on('error', err => logger.warn(`Socket error from ${remote}: ${err.message}`));
    socket.once('close', () => this.sockets.delete(socket));

    if (this.sessionMutex.isLocked()) {
      logger.info(`Client ${remote} queued until the active session ends`);
    }

    const task: Promise<void> = this.sessionMutex
      .runExclusive(() => this._runSession(socket, remote))
      .finally(() => this.sessions.delete(task));
    this.sessions.add(task);
  }

  private async _runSession(socket: net.Socket, remote: string): Promise<void> {
    if (socket.destroyed) {
      logger.info(`Client ${remote} left before its session started`);
      return;
    }

    logger.info(`Client connected from ${remote}`, { remote });
    const reader = new StreamReader(socket);
    const dispatcher = new Dispatcher(new DeviceSession(this.emulator));

    try {
      for (;;) {
        const message = await readMessage(reader);
        if (!message) break;

        const reply = dispatcher.handle(message);
        await writeResponse(socket, message.header.deviceId, message.header.sequence, reply);
      }
    } catch (err: unknown) {
      if (err instanceof SpiTruncatedFrameError) {
        logger.warn(`Session ended on truncated message: ${err.message}`, { remote });
      } else if (err instanceof Error) {
        logger.error(`Client error: ${err.message}`, { remote });
      } else {
        logger.error(`Client error: ${String(err)}`, { remote });
      }
    } finally {
      reader.release();
      socket.destroy();
      this.servedSessions += 1;
      logger.info(`Client ${remote} disconnected`, { remote });
    }
  }
}
