// src/errors.ts

import { MESSAGE_TYPE_NAMES } from './constants/constants.js';

/**
 * Base class for all emulator and client errors
 */
export class SpiEmulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpiEmulatorError';
  }
}

/**
 * Error class for a reply that did not arrive in time
 */
export class SpiTimeoutError extends SpiEmulatorError {
  constructor(message: string = 'SPI socket request timed out') {
    super(message);
    this.name = 'SpiTimeoutError';
  }
}

/**
 * Error class for a stream that closed in the middle of a header or payload
 */
export class SpiTruncatedFrameError extends SpiEmulatorError {
  received: number;
  expected: number;

  constructor(part: 'header' | 'payload', received: number, expected: number) {
    super(`Truncated ${part}: received ${received} of ${expected} bytes`);
    this.name = 'SpiTruncatedFrameError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Error class for malformed protocol data
 */
export class SpiProtocolError extends SpiEmulatorError {
  constructor(message: string = 'Invalid SPI socket message') {
    super(message);
    this.name = 'SpiProtocolError';
  }
}

/**
 * Error class for a reply whose header type is not RESPONSE
 */
export class SpiUnexpectedResponseError extends SpiProtocolError {
  constructor(received: number) {
    super(
      `Unexpected reply type 0x${received.toString(16)} (${MESSAGE_TYPE_NAMES[received] ?? 'UNKNOWN'})`
    );
    this.name = 'SpiUnexpectedResponseError';
  }
}

/**
 * Error class for a reply carrying another request's sequence number
 */
export class SpiInvalidSequenceError extends SpiProtocolError {
  constructor(received: number, expected: number) {
    super(`Invalid sequence: received ${received}, expected ${expected}`);
    this.name = 'SpiInvalidSequenceError';
  }
}

/**
 * Error class for a reply whose length does not match the request
 */
export class SpiInvalidFrameLengthError extends SpiProtocolError {
  constructor(received: number, expected: number) {
    super(`Invalid reply length: received ${received}, expected ${expected}`);
    this.name = 'SpiInvalidFrameLengthError';
  }
}

// --- Errors for Data Validation ---

/**
 * Error class for a device id outside 0-255
 */
export class SpiInvalidDeviceIdError extends SpiEmulatorError {
  constructor(deviceId: number) {
    super(`Invalid device id: ${deviceId}. Must be an integer between 0-255.`);
    this.name = 'SpiInvalidDeviceIdError';
  }
}

/**
 * Error class for a register address outside the 4-bit address space
 */
export class SpiInvalidAddressError extends SpiEmulatorError {
  constructor(address: number) {
    super(`Invalid register address: ${address}. Must be between 0x0-0xF.`);
    this.name = 'SpiInvalidAddressError';
  }
}

/**
 * Error class for a value outside its field width
 */
export class SpiInvalidValueError extends SpiEmulatorError {
  constructor(value: number | string, expected: string) {
    super(`Invalid value: ${value}, expected ${expected}`);
    this.name = 'SpiInvalidValueError';
  }
}

/**
 * Error class for a payload that does not fit the 16-bit length field
 */
export class SpiPayloadTooLargeError extends SpiEmulatorError {
  constructor(length: number, max: number) {
    super(`Payload of ${length} bytes exceeds the maximum of ${max}`);
    this.name = 'SpiPayloadTooLargeError';
  }
}

/**
 * Error class for invalid server, transport or client configuration
 */
export class SpiConfigError extends SpiEmulatorError {
  constructor(message: string) {
    super(message);
    this.name = 'SpiConfigError';
  }
}

// --- Errors for Connection and Transport ---

/**
 * Error class for operations on a transport that is not open
 */
export class SpiNotConnectedError extends SpiEmulatorError {
  constructor() {
    super('Not connected to SPI socket server');
    this.name = 'SpiNotConnectedError';
  }
}

/**
 * Error class for connecting twice
 */
export class SpiAlreadyConnectedError extends SpiEmulatorError {
  constructor() {
    super('Already connected to SPI socket server');
    this.name = 'SpiAlreadyConnectedError';
  }
}

/**
 * Error class for a peer that closed the connection while a read was pending
 */
export class SpiConnectionClosedError extends SpiEmulatorError {
  constructor(message: string = 'Connection closed by peer') {
    super(message);
    this.name = 'SpiConnectionClosedError';
  }
}

/**
 * Error class for a read interrupted by a transport flush
 */
export class SpiFlushError extends SpiEmulatorError {
  constructor(message: string = 'Operation interrupted by transport flush') {
    super(message);
    this.name = 'SpiFlushError';
  }
}
