// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'node:net';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array, toHex } from '../../utils/utils.js';
import { rootLogger } from '../../logger.js';
import {
  SpiAlreadyConnectedError,
  SpiConnectionClosedError,
  SpiFlushError,
  SpiNotConnectedError,
  SpiTimeoutError,
} from '../../errors.js';
import type { NodeTcpTransportOptions, Transport } from '../../types/emulator-types.js';

const logger = rootLogger.createLogger('NodeTcpTransport');

const POLL_INTERVAL_MS = 10;

/**
 * Client side of the SPI socket: a TCP connection with a buffered,
 * length-based read.
 */
export class NodeTcpTransport implements Transport {
  public isOpen: boolean = false;
  private host: string;
  private port: number;
  private options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);

  private _isConnecting: boolean = false;
  private _isFlushing: boolean = false;
  private _peerClosed: boolean = false;
  private _readMutex: Mutex = new Mutex();
  private _writeMutex: Mutex = new Mutex();

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      readTimeout: options.readTimeout || 1000,
      writeTimeout: options.writeTimeout || 1000,
      maxBufferSize: options.maxBufferSize || 0x20000,
    };
  }

  public async connect(): Promise<void> {
    if (this.isOpen) throw new SpiAlreadyConnectedError();
    if (this._isConnecting) return;
    this._isConnecting = true;
    this._peerClosed = false;
    this.readBuffer = allocUint8Array(0);

    return new Promise((resolve, reject) => {
      logger.info(`Connecting to ${this.host}:${this.port}...`);

      const socket = net.connect({ host: this.host, port: this.port }, () => {
        this.isOpen = true;
        this._isConnecting = false;
        socket.setNoDelay(true);
        socket.setTimeout(0);
        logger.info(`Connected to ${this.host}:${this.port}`);
        resolve();
      });
      this.socket = socket;

      socket.on('data', (data: Buffer) => this._onData(data));

      socket.on('error', err => {
        if (this._isConnecting) {
          this._isConnecting = false;
          this.socket = null;
          reject(err);
        }
        logger.error(`Socket error: ${err.message}`);
      });

      socket.on('close', () => this._onClose(socket));

      socket.setTimeout(this.options.readTimeout);
      socket.once('timeout', () => {
        if (this._isConnecting) {
          this._isConnecting = false;
          socket.destroy();
          reject(new SpiTimeoutError('TCP connection timeout'));
        }
      });
    });
  }

  private _onData(data: Buffer): void {
    const chunk = new Uint8Array(data);
    logger.trace(`RX ${chunk.length} bytes: ${toHex(chunk, ' ')}`);
    if (this.readBuffer.length + chunk.length > this.options.maxBufferSize) {
      logger.warn(`Read buffer overflow (${this.options.maxBufferSize} bytes), dropping data`);
      this.readBuffer = allocUint8Array(0);
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
  }

  private _onClose(socket: net.Socket): void {
    if (this.socket !== socket) return;
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this._peerClosed = true;
    this.socket = null;
    if (wasOpen) {
      logger.warn(`Connection closed for ${this.host}:${this.port}`);
    }
  }

  public async write(buffer: Uint8Array): Promise<void> {
    await this._writeMutex.runExclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          const socket = this.socket;
          if (!this.isOpen || !socket) {
            reject(new SpiNotConnectedError());
            return;
          }
          logger.trace(`TX ${buffer.length} bytes: ${toHex(buffer, ' ')}`);

          const timer = setTimeout(
            () => reject(new SpiTimeoutError('Write timeout')),
            this.options.writeTimeout
          );
          socket.write(buffer, err => {
            clearTimeout(timer);
            if (err) reject(err);
            else resolve();
          });
        })
    );
  }

  /**
   * Waits until `length` bytes are buffered and takes them.
   * @throws SpiTimeoutError If they do not arrive within `timeout` ms
   * @throws SpiConnectionClosedError If the peer closed before they arrived
   * @throws SpiFlushError If {@link NodeTcpTransport.flush} ran meanwhile
   */
  public async read(
    length: number,
    timeout: number = this.options.readTimeout
  ): Promise<Uint8Array> {
    return this._readMutex.runExclusive(() => {
      const start = Date.now();
      return new Promise<Uint8Array>((resolve, reject) => {
        const check = () => {
          if (this._isFlushing) return reject(new SpiFlushError());
          if (this.readBuffer.length >= length) {
            const data = sliceUint8Array(this.readBuffer, 0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, length);
            return resolve(data);
          }
          if (this._peerClosed) {
            return reject(
              new SpiConnectionClosedError(
                `Connection closed with ${this.readBuffer.length} of ${length} bytes received`
              )
            );
          }
          if (Date.now() - start > timeout) return reject(new SpiTimeoutError());
          setTimeout(check, POLL_INTERVAL_MS);
        };
        check();
      });
    });
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    return new Promise(resolve => {
      socket.once('close', () => resolve());
      socket.end(() => socket.destroy());
    });
  }

  /**
   * Drops buffered bytes; a read waiting at that moment fails with SpiFlushError.
   */
  public async flush(): Promise<void> {
    this._isFlushing = true;
    this.readBuffer = allocUint8Array(0);
    // let a polling read observe the flag before clearing it
    await new Promise<void>(resolve => setTimeout(resolve, POLL_INTERVAL_MS + 1));
    this._isFlushing = false;
  }
}

export default NodeTcpTransport;
