// src/emulator/hss-emulator.ts

import { DEVICE_ID, type RegisterName } from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import type { LoggerInstance } from '../types/emulator-types.js';
import { bytesToUint16BE, toHex } from '../utils/utils.js';
import { PipelineEngine } from './pipeline-engine.js';

/**
 * The simulated 4-channel high-side switch. Owns the current
 * {@link PipelineEngine}; {@link HighSideSwitchEmulator.reset} swaps it for a
 * fresh one (registers back to defaults, pipeline cleared, watchdog count 0).
 */
export class HighSideSwitchEmulator {
  private _engine: PipelineEngine;
  private _resets: number = 0;
  private logger: LoggerInstance;

  constructor(logger: LoggerInstance = rootLogger.createLogger('HssEmulator')) {
    this.logger = logger;
    this._engine = new PipelineEngine();
    this.logger.info(`Initialized. Device ID=0x${DEVICE_ID.toString(16).toUpperCase()}`);
  }

  get engine(): PipelineEngine {
    return this._engine;
  }

  get resetCount(): number {
    return this._resets;
  }

  reset(): void {
    this._engine = new PipelineEngine();
    this._resets += 1;
    this.logger.info(`Re-initialized (reset #${this._resets})`);
  }

  /**
   * Clocks a payload of big-endian 16-bit command frames through the engine.
   *
   * Payloads shorter than one frame are echoed back. An odd trailing byte is
   * not processed and is answered with 0x00, so the reply is always as long
   * as the request.
   */
  transfer(payload: Uint8Array): Uint8Array {
    if (payload.length < 2) {
      return Uint8Array.from(payload);
    }

    const response = new Uint8Array(payload.length);
    const view = new DataView(response.buffer);
    for (let i = 0; i + 1 < payload.length; i += 2) {
      const txFrame = bytesToUint16BE(payload, i);
      view.setUint16(i, this._engine.process(txFrame), false);
    }
    // the trailing byte of an odd payload stays 0x00

    this.logger.debug('Transfer', { tx: toHex(payload), rx: toHex(response) });
    return response;
  }

  getRegisterDump(): Record<RegisterName, number> {
    return this._engine.registers.dump();
  }
}
