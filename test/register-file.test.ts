import { describe, expect, it } from 'vitest';
import { DEVICE_ID, REGISTERS } from '../src/constants/constants.js';
import { RegisterFile } from '../src/emulator/register-file.js';
import { SpiInvalidAddressError, SpiInvalidValueError } from '../src/errors.js';
import { createFakeLogger } from './helpers.js';

describe('RegisterFile', () => {
  it('starts with every register 0 except DEVID', () => {
    const regs = new RegisterFile();
    expect(regs.dump()).toEqual({
      CTRL1: 0,
      CTRL2: 0,
      CTRL3: 0,
      CFG: 0,
      DIAG: 0,
      WDG: 0,
      ICR: 0,
      HWCR: 0,
      DEVID: DEVICE_ID,
    });
  });

  it('stores writes to writable registers', () => {
    const regs = new RegisterFile();
    regs.write(REGISTERS.CTRL1, 0xab);
    regs.write(REGISTERS.HWCR, 0xff);
    expect(regs.read(REGISTERS.CTRL1)).toBe(0xab);
    expect(regs.read(REGISTERS.HWCR)).toBe(0xff);
    expect(regs.read(REGISTERS.CTRL2)).toBe(0);
  });

  it('ignores writes to DEVID and warns', () => {
    const logger = createFakeLogger();
    const regs = new RegisterFile(logger);
    regs.write(REGISTERS.DEVID, 0x12);
    expect(regs.read(REGISTERS.DEVID)).toBe(0x5a);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Write to read-only DEVID register ignored', {
      address: 8,
      value: '0x12',
    });
  });

  it('reads 0 from unmapped addresses, even after a write', () => {
    const regs = new RegisterFile();
    for (let addr = 0x9; addr <= 0xf; addr++) {
      regs.write(addr, 0xaa);
      expect(regs.read(addr)).toBe(0);
    }
  });

  it('rejects addresses outside 0x0-0xF', () => {
    const regs = new RegisterFile();
    expect(() => regs.read(16)).toThrow(SpiInvalidAddressError);
    expect(() => regs.write(-1, 0)).toThrow(SpiInvalidAddressError);
  });

  it('rejects values that are not bytes', () => {
    const regs = new RegisterFile();
    expect(() => regs.write(REGISTERS.CTRL1, 256)).toThrow(SpiInvalidValueError);
    expect(regs.read(REGISTERS.CTRL1)).toBe(0);
  });
});
