// src/emulator/pipeline-engine.ts

import { REGISTERS, SpiCommand, WATCHDOG_REPORT_INTERVAL } from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import type { LoggerInstance, PendingResponse } from '../types/emulator-types.js';
import { decodeCommand, encodeResponse } from '../utils/parity.js';
import { hex } from '../utils/utils.js';
import { RegisterFile } from './register-file.js';

const logger = rootLogger.createLogger('PipelineEngine');

/**
 * One-stage SPI pipeline of the simulated switch.
 *
 * Each call to {@link PipelineEngine.process} applies one register
 * transaction and returns the result of the *previous* call, the way the
 * device shifts out the last transaction's data while clocking in the next
 * command. The first response after construction is (0x0, 0x00).
 */
export class PipelineEngine {
  readonly registers: RegisterFile;
  private pending: PendingResponse = { addr: 0, data: 0 };
  private watchdogCount: number = 0;
  private logger: LoggerInstance;

  constructor(registers: RegisterFile = new RegisterFile(), engineLogger: LoggerInstance = logger) {
    this.registers = registers;
    this.logger = engineLogger;
  }

  /**
   * Runs one 16-bit command frame through the pipeline.
   * @param frame16 - command frame as received, parity not checked
   * @returns response frame encoding the previous transaction's (addr, data)
   */
  process(frame16: number): number {
    const reply = encodeResponse(this.pending.addr, this.pending.data);
    const { cmd, addr, data } = decodeCommand(frame16);

    switch (cmd) {
      case SpiCommand.READ: {
        const value = this.registers.read(addr);
        this.pending = { addr, data: value };
        this.logger.debug(`READ  reg[${hex(addr, 1)}] -> ${hex(value)}`, { address: addr });
        break;
      }
      case SpiCommand.WRITE: {
        this.registers.write(addr, data);
        if (addr === REGISTERS.WDG) {
          this._countWatchdog();
        }
        this.pending = { addr, data: this.registers.read(addr) };
        break;
      }
      default:
        this.logger.warn(`Unknown CMD=${hex(cmd, 1)}`, { frame: hex(frame16, 4) });
        this.pending = { addr: 0, data: 0 };
    }

    return reply;
  }

  private _countWatchdog(): void {
    this.watchdogCount += 1;
    if (this.watchdogCount % WATCHDOG_REPORT_INTERVAL === 0) {
      this.logger.info(`Watchdog serviced ${this.watchdogCount} times`, {
        watchdogCount: this.watchdogCount,
      });
    }
  }

  get watchdogServiceCount(): number {
    return this.watchdogCount;
  }

  /** Transaction result the next response will carry */
  get pendingResponse(): PendingResponse {
    return { ...this.pending };
  }
}
