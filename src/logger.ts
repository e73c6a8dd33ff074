// src/logger.ts

import { ResultCode, RESULT_CODE_MESSAGES, isResultCode } from './constants/constants.js';
import type { LogContext, LoggerInstance, LogLevel } from './types/window-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'addr' | 'win' | 'resultCode' | 'responseTime';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const ALL_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'addr',
  'win',
  'resultCode',
  'responseTime',
];

class Logger {
  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'highlight' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    highlight: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = [...ALL_FIELDS];
  private watchCallback: WatchCallback | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log line: coloured header, message arguments and the remaining context as JSON.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color = this.useColors ? this.COLORS[level] : '';
    const reset = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) headerParts.push(`[${merged.logger}]`);
    if (this.logFormat.includes('addr') && merged.addr != null) headerParts.push(`[A:${merged.addr}]`);
    if (this.logFormat.includes('win') && merged.win != null) {
      headerParts.push(`[W:${String(merged.win).padStart(3, '0')}]`);
    }
    if (this.logFormat.includes('resultCode') && merged.resultCode != null) {
      const code = merged.resultCode;
      const name = isResultCode(code) ? ResultCode[code] : 'UNKNOWN';
      const highlight = this.useColors && code !== ResultCode.ACK ? this.COLORS.highlight : '';
      headerParts.push(`${highlight}[R:0x${code.toString(16).padStart(2, '0')}/${name}]${reset}${color}`);
    }
    if (this.logFormat.includes('responseTime') && merged.responseTime != null) {
      headerParts.push(`[RT:${merged.responseTime}ms]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    for (const field of ALL_FIELDS) delete contextToPrint[field];
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}`, ...formattedArgs, reset];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined && this.categoryLevels[category] !== undefined) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none' || categoryLevel === undefined) return false;
      return LEVELS.indexOf(level) >= LEVELS.indexOf(categoryLevel);
    }
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const formatted = this.format(level, args, context);
    const [head = '', ...rest] = formatted;
    // console.trace would append a stack trace
    console[level === 'trace' ? 'debug' : level](head, ...rest);
  }

  /**
   * Splits the trailing plain-object argument off as log context.
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

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, category ? { ...context, logger: category } : context);
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
    if (!LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${level}`);
    }
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !LEVELS.includes(level)) {
      throw new Error(`Unknown log level: ${level}`);
    }
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

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => ALL_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${ALL_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  watch(callback: WatchCallback): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  /**
   * Describes a result code for log messages.
   */
  static describeResultCode(code: number): string {
    return isResultCode(code) ? RESULT_CODE_MESSAGES[code] : `Unknown result code 0x${code.toString(16)}`;
  }

  /**
   * Creates a logger bound to a category; its level is set per category.
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
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
    v => v === null || v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

/** Root logger shared by the library's modules */
export const rootLogger = new Logger();

export function createLogger(name: string): LoggerInstance {
  return rootLogger.createLogger(name);
}

export default Logger;
export type { LogField, WatchCallback };
