// src/server/device-session.ts

import type { HighSideSwitchEmulator } from '../emulator/hss-emulator.js';
import { rootLogger } from '../logger.js';
import type { DeviceConfig, LoggerInstance, SpiConfig } from '../types/emulator-types.js';

/**
 * State of one client connection: the SPI configuration of every logical
 * device the client initialized, plus the switch emulator all of those
 * devices talk to. There is no per-device register file.
 */
export class DeviceSession {
  private devices: Map<number, DeviceConfig> = new Map();
  private logger: LoggerInstance;

  constructor(
    readonly emulator: HighSideSwitchEmulator,
    logger: LoggerInstance = rootLogger.createLogger('Session')
  ) {
    this.logger = logger;
  }

  /**
   * Stores the configuration (when given) and always resets the emulator,
   * whichever device id asked for it.
   */
  initDevice(deviceId: number, config: SpiConfig | null): void {
    if (config) {
      this.devices.set(deviceId, { ...config, initialized: true });
      this.logger.info(
        `Device ${deviceId} initialized: ${config.baudrate}Hz, mode=${config.mode}, ${config.dataBits}-bit`,
        { deviceId }
      );
    } else {
      this.logger.warn('INIT payload shorter than 7 bytes, configuration not stored', {
        deviceId,
      });
    }
    this.emulator.reset();
  }

  /**
   * @returns whether a configuration was removed
   */
  deinitDevice(deviceId: number): boolean {
    const removed = this.devices.delete(deviceId);
    if (removed) {
      this.logger.info(`Device ${deviceId} deinitialized`, { deviceId });
    }
    return removed;
  }

  /**
   * Updates a known device in place; unknown ids are left alone.
   * @returns whether the device was known
   */
  updateConfig(deviceId: number, config: SpiConfig): boolean {
    const current = this.devices.get(deviceId);
    if (!current) {
      this.logger.debug('SET_CONFIG for unknown device ignored', { deviceId });
      return false;
    }
    this.devices.set(deviceId, { ...current, ...config });
    this.logger.info(`Device ${deviceId} reconfigured`, { deviceId });
    return true;
  }

  getConfig(deviceId: number): DeviceConfig | undefined {
    const config = this.devices.get(deviceId);
    return config ? { ...config } : undefined;
  }

  listDevices(): number[] {
    return Array.from(this.devices.keys()).sort((a, b) => a - b);
  }
}
