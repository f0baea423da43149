// src/utils/parity.ts

import {
  SpiCommand,
  FRAME_ADDR_SHIFT,
  FRAME_CMD_SHIFT,
  FRAME_DATA_SHIFT,
  FRAME_PARITY_BIT,
} from '../constants/constants.js';
import type { DecodedCommand, DecodedResponse } from '../types/emulator-types.js';
import { SpiInvalidAddressError, SpiInvalidValueError } from '../errors.js';
import { isUint8 } from './utils.js';

/**
 * Even parity (XOR reduction) over the low 14 bits.
 * @param bits14 - value whose bits 13..0 are covered
 * @returns 1 when the number of set bits is odd, 0 otherwise
 */
function parityOf14(bits14: number): number {
  let temp: number = bits14 & 0x3fff;
  let parity: number = 0;
  for (let i: number = 0; i < 14; i++) {
    parity ^= temp & 1;
    temp >>= 1;
  }
  return parity;
}

/**
 * Builds a device response frame. CMD and the reserved bit are always 0.
 * @param addr - 4-bit register address
 * @param data - 8-bit register value
 * @returns 16-bit frame with the parity bit set for even parity over bits 15..2
 */
function encodeResponse(addr: number, data: number): number {
  let frame: number = ((addr & 0x0f) << FRAME_ADDR_SHIFT) | ((data & 0xff) << FRAME_DATA_SHIFT);
  frame |= parityOf14(frame >> FRAME_DATA_SHIFT) << FRAME_PARITY_BIT;
  return frame;
}

/**
 * Splits a command frame into its fields. The parity bit is not checked.
 */
function decodeCommand(frame16: number): DecodedCommand {
  return {
    cmd: (frame16 >> FRAME_CMD_SHIFT) & 0x03,
    addr: (frame16 >> FRAME_ADDR_SHIFT) & 0x0f,
    data: (frame16 >> FRAME_DATA_SHIFT) & 0xff,
  };
}

/**
 * Builds a command frame as the HAL side sends it, with even parity over bits 15..2.
 * @param cmd - 2-bit command (0 = READ, 1 = WRITE)
 * @param addr - 4-bit register address
 * @param data - 8-bit payload, ignored by the device for READ
 * @throws SpiInvalidValueError If cmd or data is outside its field
 * @throws SpiInvalidAddressError If addr is outside 0x0-0xF
 */
function encodeCommand(cmd: number, addr: number, data: number = 0): number {
  if (!Number.isInteger(cmd) || cmd < 0 || cmd > 0x03) {
    throw new SpiInvalidValueError(cmd, 'command between 0 and 3');
  }
  if (!Number.isInteger(addr) || addr < 0 || addr > 0x0f) {
    throw new SpiInvalidAddressError(addr);
  }
  if (!isUint8(data)) {
    throw new SpiInvalidValueError(data, 'byte between 0 and 255');
  }
  let frame: number =
    (cmd << FRAME_CMD_SHIFT) | (addr << FRAME_ADDR_SHIFT) | (data << FRAME_DATA_SHIFT);
  frame |= parityOf14(frame >> FRAME_DATA_SHIFT) << FRAME_PARITY_BIT;
  return frame;
}

/**
 * Checks that bits 15..1 of a frame hold an even number of set bits.
 */
function hasEvenParity(frame16: number): boolean {
  const parityBit = (frame16 >> FRAME_PARITY_BIT) & 1;
  return parityOf14(frame16 >> FRAME_DATA_SHIFT) === parityBit;
}

/**
 * Splits a device response frame and verifies its parity.
 */
function decodeResponse(frame16: number): DecodedResponse {
  return {
    addr: (frame16 >> FRAME_ADDR_SHIFT) & 0x0f,
    data: (frame16 >> FRAME_DATA_SHIFT) & 0xff,
    parityOk: hasEvenParity(frame16),
  };
}

const buildReadCommand = (addr: number): number => encodeCommand(SpiCommand.READ, addr);

const buildWriteCommand = (addr: number, data: number): number =>
  encodeCommand(SpiCommand.WRITE, addr, data);

export {
  parityOf14,
  encodeResponse,
  decodeCommand,
  encodeCommand,
  hasEvenParity,
  decodeResponse,
  buildReadCommand,
  buildWriteCommand,
};
