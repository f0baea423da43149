// src/index.ts

export * from './constants/constants.js';
export * from './errors.js';
export * from './types/emulator-types.js';
export { default as Logger, rootLogger } from './logger.js';
export * from './utils/parity.js';
export { toHex, hex } from './utils/utils.js';
export { resolveServerConfig, resolveClientConfig, SERVER_ENV, CLIENT_ENV } from './config.js';

export { RegisterFile } from './emulator/register-file.js';
export { PipelineEngine } from './emulator/pipeline-engine.js';
export { HighSideSwitchEmulator } from './emulator/hss-emulator.js';

export { StreamReader } from './framers/stream-reader.js';
export * from './framers/message-framer.js';

export { DeviceSession } from './server/device-session.js';
export { Dispatcher, decodeRequest } from './server/dispatcher.js';
export { SpiSocketServer } from './server/socket-server.js';

export { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { SpiClient, validateSpiConfig } from './client.js';
export { HighSideSwitchDriver } from './driver/hss-driver.js';
