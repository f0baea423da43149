// src/framers/message-framer.ts

import type { Writable } from 'node:stream';
import {
  CONFIG_PAYLOAD_SIZE,
  HEADER_SIZE,
  MAX_PAYLOAD_LENGTH,
  RECEIVE_REQUEST_SIZE,
  SpiMessageType,
} from '../constants/constants.js';
import {
  SpiInvalidDeviceIdError,
  SpiInvalidValueError,
  SpiPayloadTooLargeError,
  SpiProtocolError,
  SpiTruncatedFrameError,
} from '../errors.js';
import type { MessageHeader, SpiConfig, SpiMessage } from '../types/emulator-types.js';
import { concatUint8Arrays, isUint32, isUint8 } from '../utils/utils.js';
import { StreamReader } from './stream-reader.js';

/**
 * Encodes the 8-byte header: type(1) | deviceId(1) | length(2, LE) | sequence(4, LE)
 */
export function encodeHeader(header: MessageHeader): Uint8Array {
  if (!isUint8(header.type)) {
    throw new SpiInvalidValueError(header.type, 'message type between 0 and 255');
  }
  if (!isUint8(header.deviceId)) {
    throw new SpiInvalidDeviceIdError(header.deviceId);
  }
  if (!Number.isInteger(header.length) || header.length < 0 || header.length > MAX_PAYLOAD_LENGTH) {
    throw new SpiPayloadTooLargeError(header.length, MAX_PAYLOAD_LENGTH);
  }
  if (!isUint32(header.sequence)) {
    throw new SpiInvalidValueError(header.sequence, 'sequence between 0 and 2^32-1');
  }

  const bytes = new Uint8Array(HEADER_SIZE);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, header.type);
  view.setUint8(1, header.deviceId);
  view.setUint16(2, header.length, true);
  view.setUint32(4, header.sequence, true);
  return bytes;
}

/**
 * Decodes an 8-byte header.
 * @throws SpiProtocolError If fewer than 8 bytes are given
 */
export function decodeHeader(bytes: Uint8Array): MessageHeader {
  if (bytes.length < HEADER_SIZE) {
    throw new SpiProtocolError(`Header too short: ${bytes.length} bytes`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE);
  return {
    type: view.getUint8(0),
    deviceId: view.getUint8(1),
    length: view.getUint16(2, true),
    sequence: view.getUint32(4, true),
  };
}

/**
 * Builds a complete message: header followed by payload.
 */
export function buildMessage(
  type: number,
  deviceId: number,
  sequence: number,
  payload: Uint8Array = new Uint8Array(0)
): Uint8Array {
  const header = encodeHeader({ type, deviceId, length: payload.length, sequence });
  return concatUint8Arrays([header, payload]);
}

/**
 * Builds a reply. The type is always RESPONSE; deviceId and sequence echo the request.
 */
export function buildResponse(deviceId: number, sequence: number, payload: Uint8Array): Uint8Array {
  return buildMessage(SpiMessageType.RESPONSE, deviceId, sequence, payload);
}

/**
 * Reads one message from the stream.
 * @returns the message, or `null` when the stream ended cleanly between messages
 * @throws SpiTruncatedFrameError If the stream ended inside a header or payload
 */
export async function readMessage(reader: StreamReader): Promise<SpiMessage | null> {
  const headerBytes = await reader.readExact(HEADER_SIZE);
  if (headerBytes.length === 0) {
    return null;
  }
  if (headerBytes.length < HEADER_SIZE) {
    throw new SpiTruncatedFrameError('header', headerBytes.length, HEADER_SIZE);
  }

  const header = decodeHeader(headerBytes);
  if (header.length === 0) {
    return { header, payload: new Uint8Array(0) };
  }

  const payload = await reader.readExact(header.length);
  if (payload.length < header.length) {
    throw new SpiTruncatedFrameError('payload', payload.length, header.length);
  }
  return { header, payload };
}

/**
 * Writes a reply as a single write.
 */
export function writeResponse(
  stream: Writable,
  deviceId: number,
  sequence: number,
  payload: Uint8Array
): Promise<void> {
  const bytes = buildResponse(deviceId, sequence, payload);
  return new Promise((resolve, reject) => {
    stream.write(bytes, err => {
      if (err) reject(err);
      else resolve();
    });
  });
}

// --- Payload codecs ---

/**
 * Parses the INIT / SET_CONFIG payload: baudrate(4, LE) | mode | bitOrder | dataBits.
 * @returns `null` when the payload is shorter than 7 bytes; extra bytes are ignored
 */
export function parseConfigPayload(payload: Uint8Array): SpiConfig | null {
  if (payload.length < CONFIG_PAYLOAD_SIZE) return null;
  const view = new DataView(payload.buffer, payload.byteOffset, CONFIG_PAYLOAD_SIZE);
  return {
    baudrate: view.getUint32(0, true),
    mode: view.getUint8(4),
    bitOrder: view.getUint8(5),
    dataBits: view.getUint8(6),
  };
}

export function encodeConfigPayload(config: SpiConfig): Uint8Array {
  const bytes = new Uint8Array(CONFIG_PAYLOAD_SIZE);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, config.baudrate, true);
  view.setUint8(4, config.mode);
  view.setUint8(5, config.bitOrder);
  view.setUint8(6, config.dataBits);
  return bytes;
}

/**
 * Parses the RECEIVE payload. Unlike the header length, the requested length
 * is big-endian.
 * @returns `null` when the payload is shorter than 2 bytes
 */
export function parseReceiveLength(payload: Uint8Array): number | null {
  if (payload.length < RECEIVE_REQUEST_SIZE) return null;
  return new DataView(payload.buffer, payload.byteOffset, RECEIVE_REQUEST_SIZE).getUint16(0, false);
}

export function encodeReceiveRequest(length: number): Uint8Array {
  const bytes = new Uint8Array(RECEIVE_REQUEST_SIZE);
  new DataView(bytes.buffer).setUint16(0, length, false);
  return bytes;
}
