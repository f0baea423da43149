import { describe, expect, it, vi } from 'vitest';
import { SpiMessageType } from '../src/constants/constants.js';
import { HighSideSwitchEmulator } from '../src/emulator/hss-emulator.js';
import { encodeConfigPayload } from '../src/framers/message-framer.js';
import { DeviceSession } from '../src/server/device-session.js';
import { decodeRequest, Dispatcher } from '../src/server/dispatcher.js';
import type { SpiConfig } from '../src/types/emulator-types.js';
import { createFakeLogger, message } from './helpers.js';

const CONFIG: SpiConfig = { baudrate: 1000000, mode: 0, bitOrder: 0, dataBits: 8 };
const configBytes = (config: SpiConfig = CONFIG) => Array.from(encodeConfigPayload(config));

function setup() {
  const emulator = new HighSideSwitchEmulator(createFakeLogger());
  const session = new DeviceSession(emulator, createFakeLogger());
  const logger = createFakeLogger();
  const dispatcher = new Dispatcher(session, logger);
  return { emulator, session, dispatcher, logger };
}

describe('decodeRequest', () => {
  it('maps message types to request kinds', () => {
    expect(decodeRequest(message(SpiMessageType.INIT, 1, configBytes()))).toEqual({
      kind: 'init',
      deviceId: 1,
      config: CONFIG,
    });
    expect(decodeRequest(message(SpiMessageType.INIT, 1, [1, 2]))).toEqual({
      kind: 'init',
      deviceId: 1,
      config: null,
    });
    expect(decodeRequest(message(SpiMessageType.RECEIVE, 2, [0x00, 0x05]))).toEqual({
      kind: 'receive',
      deviceId: 2,
      length: 5,
    });
    expect(decodeRequest(message(SpiMessageType.GET_STATUS, 3))).toEqual({
      kind: 'getStatus',
      deviceId: 3,
    });
    expect(decodeRequest(message(0x80, 4))).toEqual({ kind: 'unknown', deviceId: 4, type: 0x80 });
  });
});

describe('Dispatcher', () => {
  it('INIT stores the configuration and resets the emulator', () => {
    const { emulator, session, dispatcher } = setup();
    const reset = vi.spyOn(emulator, 'reset');

    const reply = dispatcher.handle(message(SpiMessageType.INIT, 1, configBytes()));

    expect(reply).toEqual(new Uint8Array(0));
    expect(reset).toHaveBeenCalledTimes(1);
    expect(session.getConfig(1)).toEqual({ ...CONFIG, initialized: true });
  });

  it('INIT with a short payload still resets the emulator', () => {
    const { emulator, session, dispatcher } = setup();
    dispatcher.handle(message(SpiMessageType.TRANSFER, 0, [0x40, 0x3e]));

    expect(dispatcher.handle(message(SpiMessageType.INIT, 1, [1, 2, 3]))).toEqual(new Uint8Array(0));

    expect(emulator.resetCount).toBe(1);
    expect(emulator.getRegisterDump().CTRL1).toBe(0);
    expect(session.getConfig(1)).toBeUndefined();
  });

  it('INIT clears the pipeline', () => {
    const { dispatcher } = setup();
    dispatcher.handle(message(SpiMessageType.TRANSFER, 0, [0x20, 0x02]));
    dispatcher.handle(message(SpiMessageType.INIT, 0, configBytes()));
    expect(dispatcher.handle(message(SpiMessageType.TRANSFER, 0, [0x00, 0x00]))).toEqual(
      Uint8Array.of(0x00, 0x00)
    );
  });

  it('DEINIT removes the configuration', () => {
    const { session, dispatcher } = setup();
    dispatcher.handle(message(SpiMessageType.INIT, 2, configBytes()));
    dispatcher.handle(message(SpiMessageType.INIT, 1, configBytes()));
    expect(session.listDevices()).toEqual([1, 2]);

    expect(dispatcher.handle(message(SpiMessageType.DEINIT, 2))).toEqual(new Uint8Array(0));
    expect(session.listDevices()).toEqual([1]);
  });

  it('TRANSFER replies with as many bytes as were sent', () => {
    const { dispatcher } = setup();
    dispatcher.handle(message(SpiMessageType.TRANSFER, 0, [0x20, 0x00]));
    expect(dispatcher.handle(message(SpiMessageType.TRANSFER, 0, [0x00, 0x00]))).toEqual(
      Uint8Array.of(0x21, 0x6a)
    );
    expect(dispatcher.handle(message(SpiMessageType.TRANSFER, 0, [0x00, 0x00, 0xaa]))).toEqual(
      Uint8Array.of(0x00, 0x00, 0x00)
    );
  });

  it('SEND advances the pipeline but replies empty', () => {
    const { dispatcher } = setup();
    expect(dispatcher.handle(message(SpiMessageType.SEND, 0, [0x20, 0x00]))).toEqual(
      new Uint8Array(0)
    );
    expect(dispatcher.handle(message(SpiMessageType.TRANSFER, 0, [0x00, 0x00]))).toEqual(
      Uint8Array.of(0x21, 0x6a)
    );
  });

  it('RECEIVE replies with the requested number of zero bytes', () => {
    const { dispatcher } = setup();
    dispatcher.handle(message(SpiMessageType.TRANSFER, 0, [0x20, 0x00]));
    expect(dispatcher.handle(message(SpiMessageType.RECEIVE, 0, [0x00, 0x05]))).toEqual(
      new Uint8Array(5)
    );
    expect(dispatcher.handle(message(SpiMessageType.RECEIVE, 0, [0x01, 0x00])).length).toBe(256);
    expect(dispatcher.handle(message(SpiMessageType.RECEIVE, 0, [0x05]))).toEqual(new Uint8Array(0));
  });

  it('SET_CONFIG updates only known devices', () => {
    const { session, dispatcher } = setup();
    const updated: SpiConfig = { baudrate: 2000000, mode: 3, bitOrder: 0, dataBits: 8 };
    dispatcher.handle(message(SpiMessageType.INIT, 1, configBytes()));

    expect(dispatcher.handle(message(SpiMessageType.SET_CONFIG, 1, configBytes(updated)))).toEqual(
      new Uint8Array(0)
    );
    dispatcher.handle(message(SpiMessageType.SET_CONFIG, 9, configBytes(updated)));

    expect(session.getConfig(1)).toEqual({ ...updated, initialized: true });
    expect(session.getConfig(9)).toBeUndefined();
  });

  it('GET_STATUS always replies [1, 0]', () => {
    const { dispatcher } = setup();
    const first = dispatcher.handle(message(SpiMessageType.GET_STATUS, 200, [9, 9, 9]));
    expect(first).toEqual(Uint8Array.of(0x01, 0x00));
    first[0] = 0x55;
    expect(dispatcher.handle(message(SpiMessageType.GET_STATUS, 0))).toEqual(
      Uint8Array.of(0x01, 0x00)
    );
  });

  it('answers unknown types with an empty reply', () => {
    const { dispatcher, logger } = setup();
    expect(dispatcher.handle(message(0x42, 6, [1, 2]))).toEqual(new Uint8Array(0));
    expect(logger.warn).toHaveBeenCalledWith('Unknown message type: 0x42', { deviceId: 6 });
  });

  it('shares one emulator across device ids', () => {
    const { dispatcher } = setup();
    dispatcher.handle(message(SpiMessageType.TRANSFER, 1, [0x20, 0x00]));
    expect(dispatcher.handle(message(SpiMessageType.TRANSFER, 2, [0x00, 0x00]))).toEqual(
      Uint8Array.of(0x21, 0x6a)
    );
  });
});
