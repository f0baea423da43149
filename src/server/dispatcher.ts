// src/server/dispatcher.ts

import { MESSAGE_TYPE_NAMES, SpiMessageType, STATUS_REPLY } from '../constants/constants.js';
import { parseConfigPayload, parseReceiveLength } from '../framers/message-framer.js';
import { rootLogger } from '../logger.js';
import type { LoggerInstance, SpiMessage, SpiRequest } from '../types/emulator-types.js';
import { allocUint8Array } from '../utils/utils.js';
import type { DeviceSession } from './device-session.js';

const EMPTY = new Uint8Array(0);

function assertNever(value: never): never {
  throw new Error(`Unhandled request: ${JSON.stringify(value)}`);
}

/**
 * Turns a framed message into a typed request.
 */
export function decodeRequest(message: SpiMessage): SpiRequest {
  const { type, deviceId } = message.header;
  const payload = message.payload;

  switch (type) {
    case SpiMessageType.INIT:
      return { kind: 'init', deviceId, config: parseConfigPayload(payload) };
    case SpiMessageType.DEINIT:
      return { kind: 'deinit', deviceId };
    case SpiMessageType.TRANSFER:
      return { kind: 'transfer', deviceId, data: payload };
    case SpiMessageType.SEND:
      return { kind: 'send', deviceId, data: payload };
    case SpiMessageType.RECEIVE:
      return { kind: 'receive', deviceId, length: parseReceiveLength(payload) };
    case SpiMessageType.SET_CONFIG:
      return { kind: 'setConfig', deviceId, config: parseConfigPayload(payload) };
    case SpiMessageType.GET_STATUS:
      return { kind: 'getStatus', deviceId };
    default:
      return { kind: 'unknown', deviceId, type };
  }
}

/**
 * Maps requests onto the session and its emulator and produces reply payloads.
 */
export class Dispatcher {
  private logger: LoggerInstance;

  constructor(
    private readonly session: DeviceSession,
    logger: LoggerInstance = rootLogger.createLogger('Dispatcher')
  ) {
    this.logger = logger;
  }

  handle(message: SpiMessage): Uint8Array {
    const { type, deviceId, sequence, length } = message.header;
    this.logger.debug(`${MESSAGE_TYPE_NAMES[type] ?? 'UNKNOWN'} request, ${length} bytes`, {
      deviceId,
      msgType: type,
      sequence,
    });
    return this.dispatch(decodeRequest(message));
  }

  dispatch(request: SpiRequest): Uint8Array {
    switch (request.kind) {
      case 'init':
        this.session.initDevice(request.deviceId, request.config);
        return EMPTY;

      case 'deinit':
        this.session.deinitDevice(request.deviceId);
        return EMPTY;

      case 'transfer':
        return this.session.emulator.transfer(request.data);

      case 'send':
        this.session.emulator.transfer(request.data);
        return EMPTY;

      case 'receive':
        // no register interaction: the device has nothing queued to shift out
        return request.length === null ? EMPTY : allocUint8Array(request.length);

      case 'setConfig':
        if (request.config) {
          this.session.updateConfig(request.deviceId, request.config);
        }
        return EMPTY;

      case 'getStatus':
        return Uint8Array.from(STATUS_REPLY);

      case 'unknown':
        this.logger.warn(`Unknown message type: 0x${request.type.toString(16)}`, {
          deviceId: request.deviceId,
        });
        return EMPTY;

      default:
        return assertNever(request);
    }
  }
}
