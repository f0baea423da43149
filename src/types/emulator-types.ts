// src/types/emulator-types.ts

// !=============================================================================
// ! SPI frame types
// !=============================================================================

/** Command frame fields, as decoded from 16 bits */
export interface DecodedCommand {
  /** Raw 2-bit command field; 0 = READ, 1 = WRITE, anything else is unknown */
  cmd: number;
  addr: number;
  data: number;
}

/** Response frame fields, as seen by the HAL side */
export interface DecodedResponse {
  addr: number;
  data: number;
  parityOk: boolean;
}

/** Result of the most recently completed register transaction */
export interface PendingResponse {
  addr: number;
  data: number;
}

// !=============================================================================
// ! Socket message types
// !=============================================================================

export interface MessageHeader {
  type: number;
  deviceId: number;
  length: number;
  sequence: number;
}

export interface SpiMessage {
  header: MessageHeader;
  payload: Uint8Array;
}

/** SPI bus parameters carried in INIT and SET_CONFIG payloads */
export interface SpiConfig {
  baudrate: number;
  /** Clock polarity/phase mode 0-3 */
  mode: number;
  /** 0 = MSB first, 1 = LSB first */
  bitOrder: number;
  dataBits: number;
}

export interface DeviceConfig extends SpiConfig {
  initialized: boolean;
}

/**
 * A request decoded from a socket message. `unknown` keeps the raw type so
 * the dispatcher can log it.
 */
export type SpiRequest =
  | { kind: 'init'; deviceId: number; config: SpiConfig | null }
  | { kind: 'deinit'; deviceId: number }
  | { kind: 'transfer'; deviceId: number; data: Uint8Array }
  | { kind: 'send'; deviceId: number; data: Uint8Array }
  | { kind: 'receive'; deviceId: number; length: number | null }
  | { kind: 'setConfig'; deviceId: number; config: SpiConfig | null }
  | { kind: 'getStatus'; deviceId: number }
  | { kind: 'unknown'; deviceId: number; type: number };

export type SpiRequestKind = SpiRequest['kind'];

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context attached to a log line */
export interface LogContext {
  deviceId?: number;
  msgType?: number;
  sequence?: number;
  address?: number;
  logger?: string;
  remote?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogFormatField = 'timestamp' | 'level' | 'logger' | 'deviceId' | 'msgType' | 'sequence' | 'address';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Category logger handed out by Logger.createLogger */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Server, transport and client options
// !=============================================================================

export interface ServerConfig {
  host: string;
  port: number;
}

export interface SpiSocketServerOptions extends Partial<ServerConfig> {
  logLevel?: LogLevel;
}

export interface NodeTcpTransportOptions {
  readTimeout?: number;
  writeTimeout?: number;
  maxBufferSize?: number;
}

/** Byte-stream transport used by the client */
export interface Transport {
  isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  read(length: number, timeout?: number): Promise<Uint8Array>;
  flush(): Promise<void>;
}

export interface ClientConfig extends ServerConfig {
  timeout: number;
}

export interface SpiClientOptions extends Partial<ClientConfig> {
  logLevel?: LogLevel;
}

/** Device state tracked by the client, as in the HAL status block */
export type HalState = 'reset' | 'ready' | 'busy' | 'error';

export interface DeviceStats {
  state: HalState;
  txCount: number;
  rxCount: number;
  errorCount: number;
  busy: boolean;
}

export interface StatusReply {
  ready: boolean;
  faults: number;
}
