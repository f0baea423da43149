// src/driver/hss-driver.ts

import { REGISTERS } from '../constants/constants.js';
import { SpiInvalidFrameLengthError, SpiProtocolError } from '../errors.js';
import type { SpiClient } from '../client.js';
import type { DecodedResponse } from '../types/emulator-types.js';
import { buildReadCommand, buildWriteCommand, decodeResponse } from '../utils/parity.js';
import { bytesToUint16BE, hex } from '../utils/utils.js';

/**
 * Register-level access to the high-side switch over an {@link SpiClient}.
 *
 * The device answers each frame with the result of the previous one, so
 * every access is sent together with a READ of DEVID that clocks its
 * result out.
 */
export class HighSideSwitchDriver {
  constructor(
    private readonly client: SpiClient,
    readonly deviceId: number = 0
  ) {}

  async readRegister(addr: number): Promise<number> {
    const [, result] = await this._exchange([
      buildReadCommand(addr),
      buildReadCommand(REGISTERS.DEVID),
    ]);
    return this._expect(result, addr);
  }

  /**
   * @returns the value the register holds after the write
   */
  async writeRegister(addr: number, value: number): Promise<number> {
    const [, result] = await this._exchange([
      buildWriteCommand(addr, value),
      buildReadCommand(REGISTERS.DEVID),
    ]);
    return this._expect(result, addr);
  }

  readDeviceId(): Promise<number> {
    return this.readRegister(REGISTERS.DEVID);
  }

  serviceWatchdog(value: number): Promise<number> {
    return this.writeRegister(REGISTERS.WDG, value);
  }

  readDiagnostics(): Promise<number> {
    return this.readRegister(REGISTERS.DIAG);
  }

  private async _exchange(frames: number[]): Promise<DecodedResponse[]> {
    const tx = new Uint8Array(frames.length * 2);
    const view = new DataView(tx.buffer);
    frames.forEach((frame, i) => view.setUint16(i * 2, frame, false));

    const rx = await this.client.transfer(this.deviceId, tx);
    const responses: DecodedResponse[] = [];
    for (let i = 0; i + 1 < rx.length; i += 2) {
      responses.push(decodeResponse(bytesToUint16BE(rx, i)));
    }
    return responses;
  }

  private _expect(response: DecodedResponse | undefined, addr: number): number {
    if (!response) {
      throw new SpiInvalidFrameLengthError(0, 2);
    }
    if (!response.parityOk) {
      throw new SpiProtocolError(`Parity error in response for register ${hex(addr, 1)}`);
    }
    if (response.addr !== addr) {
      throw new SpiProtocolError(
        `Response for register ${hex(response.addr, 1)}, expected ${hex(addr, 1)}`
      );
    }
    return response.data;
  }
}
