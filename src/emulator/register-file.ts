// src/emulator/register-file.ts

import {
  DEVICE_ID,
  LAST_DEFINED_REGISTER,
  REGISTER_SPACE_SIZE,
  REGISTERS,
  type RegisterName,
} from '../constants/constants.js';
import { SpiInvalidAddressError, SpiInvalidValueError } from '../errors.js';
import { rootLogger } from '../logger.js';
import type { LoggerInstance } from '../types/emulator-types.js';
import { hex, isUint8 } from '../utils/utils.js';

/**
 * Register storage of the simulated switch. Addresses 0x0-0x8 are backed by a
 * fixed array; 0x9-0xF always read 0. DEVID never changes.
 */
export class RegisterFile {
  private readonly registers: Uint8Array;
  private logger: LoggerInstance;

  constructor(logger: LoggerInstance = rootLogger.createLogger('RegisterFile')) {
    this.logger = logger;
    this.registers = new Uint8Array(REGISTER_SPACE_SIZE);
    this.registers[REGISTERS.DEVID] = DEVICE_ID;
  }

  private _validateAddress(addr: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= REGISTER_SPACE_SIZE) {
      throw new SpiInvalidAddressError(addr);
    }
  }

  read(addr: number): number {
    this._validateAddress(addr);
    if (addr > LAST_DEFINED_REGISTER) return 0;
    return this.registers[addr] ?? 0;
  }

  write(addr: number, value: number): void {
    this._validateAddress(addr);
    if (!isUint8(value)) {
      throw new SpiInvalidValueError(value, 'byte between 0 and 255');
    }

    if (addr === REGISTERS.DEVID) {
      this.logger.warn('Write to read-only DEVID register ignored', {
        address: addr,
        value: hex(value),
      });
      return;
    }
    if (addr > LAST_DEFINED_REGISTER) {
      this.logger.debug('Write to unmapped register dropped', { address: addr, value: hex(value) });
      return;
    }

    const old = this.registers[addr] ?? 0;
    this.registers[addr] = value;
    this.logger.debug(`WRITE reg[${hex(addr, 1)}] = ${hex(value)} (was ${hex(old)})`, {
      address: addr,
    });
  }

  /**
   * Snapshot of the defined registers keyed by name.
   */
  dump(): Record<RegisterName, number> {
    return {
      CTRL1: this.read(REGISTERS.CTRL1),
      CTRL2: this.read(REGISTERS.CTRL2),
      CTRL3: this.read(REGISTERS.CTRL3),
      CFG: this.read(REGISTERS.CFG),
      DIAG: this.read(REGISTERS.DIAG),
      WDG: this.read(REGISTERS.WDG),
      ICR: this.read(REGISTERS.ICR),
      HWCR: this.read(REGISTERS.HWCR),
      DEVID: this.read(REGISTERS.DEVID),
    };
  }
}
