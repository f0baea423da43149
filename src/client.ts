// src/client.ts

import { Mutex } from 'async-mutex';
import { resolveClientConfig } from './config.js';
import {
  HEADER_SIZE,
  MAX_PAYLOAD_LENGTH,
  MESSAGE_TYPE_NAMES,
  SpiMessageType,
  STATUS_REPLY,
} from './constants/constants.js';
import {
  SpiConfigError,
  SpiInvalidDeviceIdError,
  SpiInvalidFrameLengthError,
  SpiInvalidSequenceError,
  SpiInvalidValueError,
  SpiPayloadTooLargeError,
  SpiProtocolError,
  SpiUnexpectedResponseError,
} from './errors.js';
import {
  buildMessage,
  decodeHeader,
  encodeConfigPayload,
  encodeReceiveRequest,
} from './framers/message-framer.js';
import { rootLogger } from './logger.js';
import { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
import type {
  ClientConfig,
  DeviceStats,
  SpiClientOptions,
  SpiConfig,
  StatusReply,
  Transport,
} from './types/emulator-types.js';
import { isUint16, isUint32, isUint8, toHex } from './utils/utils.js';

const logger = rootLogger.createLogger('SpiClient');

function freshStats(): DeviceStats {
  return { state: 'reset', txCount: 0, rxCount: 0, errorCount: 0, busy: false };
}

/**
 * Checks an SPI configuration before it is put on the wire.
 * @throws SpiConfigError
 */
export function validateSpiConfig(config: SpiConfig): void {
  if (!isUint32(config.baudrate) || config.baudrate === 0) {
    throw new SpiConfigError(`Invalid baudrate: ${config.baudrate}`);
  }
  if (!Number.isInteger(config.mode) || config.mode < 0 || config.mode > 3) {
    throw new SpiConfigError(`Invalid SPI mode: ${config.mode}. Must be 0-3.`);
  }
  if (config.bitOrder !== 0 && config.bitOrder !== 1) {
    throw new SpiConfigError(`Invalid bit order: ${config.bitOrder}. Must be 0 (MSB) or 1 (LSB).`);
  }
  if (!Number.isInteger(config.dataBits) || config.dataBits < 1 || config.dataBits > 32) {
    throw new SpiConfigError(`Invalid data bits: ${config.dataBits}. Must be 1-32.`);
  }
}

/**
 * HAL-side client of the SPI socket server.
 *
 * One request is in flight at a time; every request carries the next
 * sequence number and its reply is checked against it.
 */
export class SpiClient {
  readonly config: ClientConfig;
  private transport: Transport;
  private sequence: number = 0;
  private _mutex: Mutex = new Mutex();
  private stats: Map<number, DeviceStats> = new Map();

  constructor(options: SpiClientOptions = {}, transport?: Transport) {
    this.config = resolveClientConfig(options);
    if (options.logLevel) {
      logger.setLevel(options.logLevel);
    }
    this.transport =
      transport ??
      new NodeTcpTransport(this.config.host, this.config.port, {
        readTimeout: this.config.timeout,
        writeTimeout: this.config.timeout,
      });
  }

  get isConnected(): boolean {
    return this.transport.isOpen;
  }

  /** Sequence number the next request will carry */
  get nextSequence(): number {
    return this.sequence;
  }

  async connect(): Promise<void> {
    await this.transport.connect();
  }

  async disconnect(): Promise<void> {
    await this.transport.disconnect();
  }

  /**
   * Sends INIT. The server resets the switch emulator on every INIT.
   */
  async init(deviceId: number, config: SpiConfig): Promise<void> {
    validateSpiConfig(config);
    await this._tracked(deviceId, async () => {
      await this._request(SpiMessageType.INIT, deviceId, encodeConfigPayload(config));
    });
    const stats = freshStats();
    stats.state = 'ready';
    this.stats.set(deviceId, stats);
    logger.info(`Device ${deviceId} initialized`, { deviceId });
  }

  async deinit(deviceId: number): Promise<void> {
    await this._tracked(deviceId, async () => {
      await this._request(SpiMessageType.DEINIT, deviceId);
    });
    this.stats.set(deviceId, freshStats());
    logger.info(`Device ${deviceId} deinitialized`, { deviceId });
  }

  /**
   * Full-duplex transfer.
   * @returns bytes clocked out by the device, as many as were sent
   * @throws SpiInvalidFrameLengthError If the reply length differs from `tx.length`
   */
  async transfer(deviceId: number, tx: Uint8Array): Promise<Uint8Array> {
    return this._tracked(deviceId, async stats => {
      const rx = await this._request(SpiMessageType.TRANSFER, deviceId, tx);
      if (rx.length !== tx.length) {
        throw new SpiInvalidFrameLengthError(rx.length, tx.length);
      }
      stats.txCount += tx.length;
      stats.rxCount += rx.length;
      return rx;
    });
  }

  /** Transmit only; the device's output is discarded by the server. */
  async send(deviceId: number, data: Uint8Array): Promise<void> {
    await this._tracked(deviceId, async stats => {
      await this._request(SpiMessageType.SEND, deviceId, data);
      stats.txCount += data.length;
    });
  }

  /**
   * Receive only. The emulated device has nothing queued, so the bytes are zero.
   */
  async receive(deviceId: number, length: number): Promise<Uint8Array> {
    if (!isUint16(length)) {
      throw new SpiInvalidValueError(length, 'length between 0 and 65535');
    }
    return this._tracked(deviceId, async stats => {
      const rx = await this._request(
        SpiMessageType.RECEIVE,
        deviceId,
        encodeReceiveRequest(length)
      );
      stats.rxCount += rx.length;
      return rx;
    });
  }

  async setConfig(deviceId: number, config: SpiConfig): Promise<void> {
    validateSpiConfig(config);
    await this._tracked(deviceId, async () => {
      await this._request(SpiMessageType.SET_CONFIG, deviceId, encodeConfigPayload(config));
    });
  }

  async getStatus(deviceId: number): Promise<StatusReply> {
    return this._tracked(deviceId, async () => {
      const reply = await this._request(SpiMessageType.GET_STATUS, deviceId);
      const [ready, faults] = reply;
      if (ready === undefined || faults === undefined) {
        throw new SpiInvalidFrameLengthError(reply.length, STATUS_REPLY.length);
      }
      return { ready: ready === 1, faults };
    });
  }

  /**
   * Locally kept statistics of a device; a device never initialized reports `reset`.
   */
  getStats(deviceId: number): DeviceStats {
    const stats = this.stats.get(deviceId);
    return stats ? { ...stats } : freshStats();
  }

  /**
   * Runs an operation with the device marked busy, counting failures.
   */
  private async _tracked<T>(deviceId: number, op: (stats: DeviceStats) => Promise<T>): Promise<T> {
    if (!isUint8(deviceId)) {
      throw new SpiInvalidDeviceIdError(deviceId);
    }
    let stats = this.stats.get(deviceId);
    if (!stats) {
      stats = freshStats();
      this.stats.set(deviceId, stats);
    }

    stats.busy = true;
    stats.state = 'busy';
    try {
      const result = await op(stats);
      stats.state = 'ready';
      return result;
    } catch (err: unknown) {
      stats.errorCount += 1;
      stats.state = 'error';
      throw err;
    } finally {
      stats.busy = false;
    }
  }

  /**
   * Sends one message and reads its reply.
   * @returns the reply payload
   */
  private async _request(
    type: SpiMessageType,
    deviceId: number,
    payload: Uint8Array = new Uint8Array(0),
    timeout: number = this.config.timeout
  ): Promise<Uint8Array> {
    if (payload.length > MAX_PAYLOAD_LENGTH) {
      throw new SpiPayloadTooLargeError(payload.length, MAX_PAYLOAD_LENGTH);
    }

    const release = await this._mutex.acquire();
    try {
      const sequence = this.sequence;
      this.sequence = (this.sequence + 1) >>> 0;
      const context = { deviceId, msgType: type, sequence };
      const startTime = Date.now();

      try {
        await this.transport.write(buildMessage(type, deviceId, sequence, payload));
        logger.debug(`${MESSAGE_TYPE_NAMES[type] ?? 'UNKNOWN'} sent`, {
          ...context,
          bytes: payload.length,
        });

        const header = decodeHeader(await this.transport.read(HEADER_SIZE, timeout));
        if (header.type !== SpiMessageType.RESPONSE) {
          throw new SpiUnexpectedResponseError(header.type);
        }
        if (header.sequence !== sequence) {
          throw new SpiInvalidSequenceError(header.sequence, sequence);
        }
        if (header.deviceId !== deviceId) {
          throw new SpiProtocolError(
            `Reply for device ${header.deviceId}, expected device ${deviceId}`
          );
        }

        const timeLeft = Math.max(1, timeout - (Date.now() - startTime));
        const reply =
          header.length > 0
            ? await this.transport.read(header.length, timeLeft)
            : new Uint8Array(0);

        logger.debug('Response received', {
          ...context,
          rx: toHex(reply),
          responseTime: Date.now() - startTime,
        });
        return reply;
      } catch (err: unknown) {
        logger.warn(
          `${MESSAGE_TYPE_NAMES[type] ?? 'UNKNOWN'} failed: ${err instanceof Error ? err.message : String(err)}`,
          context
        );
        if (this.transport.isOpen) {
          await this.transport.flush();
        }
        throw err;
      }
    } finally {
      release();
    }
  }
}

export default SpiClient;
