import { vi } from 'vitest';
import { SpiMessageType } from '../src/constants/constants.js';
import type { LoggerInstance, SpiMessage } from '../src/types/emulator-types.js';

export function createFakeLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    setLevel: vi.fn(),
    pause: vi.fn(),
    resume: vi.fn(),
  } satisfies LoggerInstance;
}

export function message(
  type: SpiMessageType | number,
  deviceId: number,
  payload: number[] = [],
  sequence: number = 1
): SpiMessage {
  return {
    header: { type, deviceId, length: payload.length, sequence },
    payload: Uint8Array.from(payload),
  };
}
