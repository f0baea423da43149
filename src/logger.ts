// src/logger.ts

import { MESSAGE_TYPE_NAMES } from './constants/constants.js';
import type {
  LogContext,
  LogFormatField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/emulator-types.js';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const CONSOLE_METHODS: Record<LogLevel, ConsoleMethod> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

const VALID_FORMAT_FIELDS: LogFormatField[] = [
  'timestamp',
  'level',
  'logger',
  'deviceId',
  'msgType',
  'sequence',
  'address',
];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private countsByDevice: Record<number, number> = {};
  private countsByType: Record<number, number> = {};
  private logFormat: LogFormatField[] = ['timestamp', 'level', 'logger', 'deviceId', 'msgType'];
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log line for the console.
   * @param level - Log level
   * @param args - Arguments to be logged
   * @param context - Context object with additional information
   * @returns Console arguments: header first, then the formatted arguments
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color = this.useColors ? this.COLORS[level] : '';
    const reset = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    for (const field of this.logFormat) {
      switch (field) {
        case 'timestamp':
          headerParts.push(`[${this.getTimestamp()}]`);
          break;
        case 'level':
          headerParts.push(`[${level.toUpperCase()}]`);
          break;
        case 'logger':
          if (merged.logger) headerParts.push(`[${merged.logger}]`);
          break;
        case 'deviceId':
          if (merged.deviceId != null) headerParts.push(`[D:${merged.deviceId}]`);
          break;
        case 'msgType':
          if (merged.msgType != null) {
            const name = MESSAGE_TYPE_NAMES[merged.msgType] ?? 'UNKNOWN';
            headerParts.push(`[T:0x${merged.msgType.toString(16).padStart(2, '0')}/${name}]`);
          }
          break;
        case 'sequence':
          if (merged.sequence != null) headerParts.push(`[#${merged.sequence}]`);
          break;
        case 'address':
          if (merged.address != null) headerParts.push(`[A:0x${merged.address.toString(16)}]`);
          break;
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    for (const field of VALID_FORMAT_FIELDS) {
      if (this.logFormat.includes(field)) delete contextToPrint[field];
    }
    delete contextToPrint.logger;
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  /**
   * Determines whether a message passes the global and per-category levels.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel !== undefined) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (context.deviceId != null) {
      this.countsByDevice[context.deviceId] = (this.countsByDevice[context.deviceId] ?? 0) + 1;
    }
    if (context.msgType != null) {
      this.countsByType[context.msgType] = (this.countsByType[context.msgType] ?? 0) + 1;
    }

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now = Date.now();
    if (
      this.logRateLimit > 0 &&
      now - this.lastLogTime < this.logRateLimit &&
      level !== 'error' &&
      level !== 'warn'
    )
      return;
    this.lastLogTime = now;

    console[CONSOLE_METHODS[level]](...this.format(level, args, context));
  }

  /**
   * Splits the arguments into the message parts and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (!this.LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${level}`);
    }
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setRateLimit(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogFormatField[]): void {
    if (!fields.every(f => VALID_FORMAT_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FORMAT_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  summary(): void {
    console.log('\x1b[1;36m=== Logger Summary ===\x1b[0m');
    for (const level of this.LEVELS) {
      console.log(`${level.toUpperCase()} Messages: ${this.logCounts[level]}`);
    }
    console.log(
      `Total Messages: ${Object.values(this.logCounts).reduce((sum, count) => sum + count, 0)}`
    );
    console.log(`By Device ID: ${JSON.stringify(this.countsByDevice, null, 2)}`);
    console.log(
      `By Message Type: ${JSON.stringify(
        Object.entries(this.countsByType).reduce<Record<string, number>>((acc, [code, count]) => {
          acc[`${code}/${MESSAGE_TYPE_NAMES[Number(code)] ?? 'UNKNOWN'}`] = count;
          return acc;
        }, {}),
        null,
        2
      )}`
    );
    console.log(`Current Level: ${this.currentLevel}`);
    console.log(
      `Categories: ${Object.keys(this.categoryLevels).length ? JSON.stringify(this.categoryLevels) : 'None'}`
    );
    console.log('\x1b[1;36m=====================\x1b[0m');
  }

  /**
   * Creates a logger bound to a category name.
   * @param name - Category shown in the `logger` header field
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error || value instanceof Uint8Array) return false;
  return Object.values(value).every(
    v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

/** Process-wide logger every module derives its category logger from */
export const rootLogger = new Logger();

export default Logger;
