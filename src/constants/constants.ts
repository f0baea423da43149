// src/constants/constants.ts

/**
 * Message types carried in the first byte of every socket message header
 */
export enum SpiMessageType {
  INIT = 0x01,
  DEINIT = 0x02,
  TRANSFER = 0x03,
  SEND = 0x04,
  RECEIVE = 0x05,
  SET_CONFIG = 0x06,
  GET_STATUS = 0x07,
  RESPONSE = 0x80,
}

export const MESSAGE_TYPE_NAMES: Readonly<Record<number, string>> = {
  [SpiMessageType.INIT]: 'INIT',
  [SpiMessageType.DEINIT]: 'DEINIT',
  [SpiMessageType.TRANSFER]: 'TRANSFER',
  [SpiMessageType.SEND]: 'SEND',
  [SpiMessageType.RECEIVE]: 'RECEIVE',
  [SpiMessageType.SET_CONFIG]: 'SET_CONFIG',
  [SpiMessageType.GET_STATUS]: 'GET_STATUS',
  [SpiMessageType.RESPONSE]: 'RESPONSE',
};

/**
 * 2-bit command field of a 16-bit SPI command frame
 */
export enum SpiCommand {
  READ = 0x00,
  WRITE = 0x01,
}

/**
 * Register map of the simulated high-side switch
 */
export const REGISTERS = {
  CTRL1: 0x00,
  CTRL2: 0x01,
  CTRL3: 0x02,
  CFG: 0x03,
  DIAG: 0x04,
  WDG: 0x05,
  ICR: 0x06,
  HWCR: 0x07,
  DEVID: 0x08,
} as const;

export type RegisterName = keyof typeof REGISTERS;

/** Value reported by the read-only DEVID register */
export const DEVICE_ID = 0x5a;

/** Highest defined register address; everything above reads as 0 */
export const LAST_DEFINED_REGISTER = REGISTERS.DEVID;
export const REGISTER_SPACE_SIZE = 16;

export const WATCHDOG_REPORT_INTERVAL = 10;

// Command frame layout: CMD(2) | ADDR(4) | DATA(8) | PARITY(1) | RESERVED(1)
export const FRAME_CMD_SHIFT = 14;
export const FRAME_ADDR_SHIFT = 10;
export const FRAME_DATA_SHIFT = 2;
export const FRAME_PARITY_BIT = 1;

export const HEADER_SIZE = 8;
export const MAX_PAYLOAD_LENGTH = 0xffff;
export const CONFIG_PAYLOAD_SIZE = 7;
export const RECEIVE_REQUEST_SIZE = 2;

/** Fixed GET_STATUS reply: ready flag, fault flags */
export const STATUS_REPLY = Uint8Array.of(0x01, 0x00);

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 9000;
export const DEFAULT_CLIENT_TIMEOUT = 1000;
