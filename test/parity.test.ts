import { describe, expect, it } from 'vitest';
import { SpiInvalidAddressError, SpiInvalidValueError } from '../src/errors.js';
import {
  buildReadCommand,
  buildWriteCommand,
  decodeCommand,
  decodeResponse,
  encodeCommand,
  encodeResponse,
  hasEvenParity,
  parityOf14,
} from '../src/utils/parity.js';

describe('parityOf14', () => {
  it('is 1 for an odd number of set bits', () => {
    expect(parityOf14(0b111)).toBe(1);
    expect(parityOf14(0b1)).toBe(1);
  });

  it('is 0 for an even number of set bits', () => {
    expect(parityOf14(0)).toBe(0);
    expect(parityOf14(0b11)).toBe(0);
    expect(parityOf14(0x3fff)).toBe(0); // 14 ones
  });

  it('only looks at the low 14 bits', () => {
    expect(parityOf14(0x4000)).toBe(0);
    expect(parityOf14(0xc001)).toBe(1);
  });
});

describe('encodeResponse', () => {
  it('encodes the device id response', () => {
    // (0x8 << 10) | (0x5A << 2) = 0x2168, nine set bits -> parity bit set
    expect(encodeResponse(0x08, 0x5a)).toBe(0x216a);
  });

  it('encodes the reset value as all zeros', () => {
    expect(encodeResponse(0, 0)).toBe(0x0000);
  });

  it('sets parity only when the covered bits are odd', () => {
    expect(encodeResponse(0x05, 0x01)).toBe(0x1406);
    expect(encodeResponse(0x00, 0x0f)).toBe(0x003c);
    expect(encodeResponse(0x01, 0x80)).toBe(0x0600);
  });

  it('masks address and data to their field widths', () => {
    expect(encodeResponse(0x18, 0x15a)).toBe(encodeResponse(0x08, 0x5a));
  });

  it('always leaves CMD and the reserved bit clear and keeps parity even', () => {
    for (let addr = 0; addr < 16; addr++) {
      for (let data = 0; data < 256; data++) {
        const frame = encodeResponse(addr, data);
        expect(frame & 0xc001).toBe(0);
        expect(hasEvenParity(frame)).toBe(true);
      }
    }
  });
});

describe('decodeCommand', () => {
  it('extracts cmd, addr and data', () => {
    expect(decodeCommand(0x403e)).toEqual({ cmd: 1, addr: 0x0, data: 0x0f });
    expect(decodeCommand(0x2002)).toEqual({ cmd: 0, addr: 0x8, data: 0x00 });
  });

  it('keeps unknown command values', () => {
    expect(decodeCommand(0xc402)).toEqual({ cmd: 3, addr: 0x1, data: 0x00 });
  });

  it('ignores the parity and reserved bits', () => {
    expect(decodeCommand(0x2000)).toEqual(decodeCommand(0x2003));
  });
});

describe('encodeCommand', () => {
  it('builds frames with even parity', () => {
    expect(encodeCommand(1, 0x0, 0x0f)).toBe(0x403e);
    expect(encodeCommand(1, 0x8, 0x12)).toBe(0x6048);
    expect(encodeCommand(0, 0x4)).toBe(0x1002);
  });

  it('has read and write shorthands', () => {
    expect(buildReadCommand(0x8)).toBe(0x2002);
    expect(buildWriteCommand(0x5, 0x01)).toBe(0x5404);
    expect(buildWriteCommand(0x9, 0xaa)).toBe(0x66aa);
  });

  it('rejects out-of-range fields', () => {
    expect(() => encodeCommand(4, 0)).toThrow(SpiInvalidValueError);
    expect(() => encodeCommand(0, 16)).toThrow(SpiInvalidAddressError);
    expect(() => encodeCommand(1, 0, 256)).toThrow(SpiInvalidValueError);
    expect(() => encodeCommand(1, 0, 1.5)).toThrow(SpiInvalidValueError);
  });
});

describe('decodeResponse', () => {
  it('splits a valid response', () => {
    expect(decodeResponse(0x216a)).toEqual({ addr: 0x8, data: 0x5a, parityOk: true });
  });

  it('flags a parity error', () => {
    expect(decodeResponse(0x2168)).toEqual({ addr: 0x8, data: 0x5a, parityOk: false });
    expect(hasEvenParity(0x2168)).toBe(false);
  });
});
