// src/logger.ts

import { CIP_SERVICE_NAMES, ENCAPSULATION_COMMAND_NAMES } from './constants/constants.js';
import type { LogContext, LogField, LoggerInstance, LogLevel } from './types/eip-types.js';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const VALID_FIELDS: LogField[] = [
  'timestamp',
  'level',
  'logger',
  'session',
  'command',
  'service',
  'variable',
  'offset',
  'size',
  'responseTime',
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
  private logFormat: LogField[] = [
    'timestamp',
    'level',
    'logger',
    'session',
    'command',
    'service',
    'variable',
    'responseTime',
  ];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private filters: { command: Set<number>; service: Set<number> } = {
    command: new Set(),
    service: new Set(),
  };
  private watchCallback: WatchCallback | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private formatField(field: LogField, value: unknown, fallback: (v: unknown) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns header, then the formatted arguments
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) {
      headerParts.push(this.formatField('logger', merged.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('session') && merged.session != null) {
      const handle = `0x${merged.session.toString(16).padStart(8, '0')}`;
      headerParts.push(this.formatField('session', handle, v => `[S:${String(v)}]`));
    }
    if (this.logFormat.includes('command') && merged.command != null) {
      const name = ENCAPSULATION_COMMAND_NAMES[merged.command] ?? 'Unknown';
      const code = `0x${merged.command.toString(16).padStart(4, '0')}`;
      headerParts.push(this.formatField('command', code, v => `[C:${String(v)}/${name}]`));
    }
    if (this.logFormat.includes('service') && merged.service != null) {
      const name = CIP_SERVICE_NAMES[merged.service] ?? 'Unknown';
      const code = `0x${merged.service.toString(16).padStart(2, '0')}`;
      headerParts.push(this.formatField('service', code, v => `[SV:${String(v)}/${name}]`));
    }
    if (this.logFormat.includes('variable') && merged.variable != null) {
      headerParts.push(this.formatField('variable', merged.variable, v => `[V:${String(v)}]`));
    }
    if (this.logFormat.includes('offset') && merged.offset != null) {
      headerParts.push(this.formatField('offset', merged.offset, v => `[O:${String(v)}]`));
    }
    if (this.logFormat.includes('size') && merged.size != null) {
      headerParts.push(this.formatField('size', merged.size, v => `[N:${String(v)}]`));
    }
    if (this.logFormat.includes('responseTime') && merged.responseTime != null) {
      headerParts.push(
        this.formatField('responseTime', merged.responseTime, v => `[RT:${String(v)}ms]`)
      );
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // Поля, не попавшие в заголовок, печатаем как JSON
    const rest: LogContext = { ...context };
    for (const field of VALID_FIELDS) delete rest[field];
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [`${color}${headerParts.join('')}`, ...formattedArgs, reset];
  }

  /**
   * Determines whether a log message should be logged based on level, category and filters.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.command != null && this.filters.command.has(context.command)) return false;
    if (context.service != null && this.filters.service.has(context.service)) return false;
    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (category === 'none') return false;
    const threshold = category ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext, immediate: boolean): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (!immediate && this.logRateLimit > 0 && now - this.lastLogTime < this.logRateLimit) return;
    this.lastLogTime = now;

    const formatted: string[] = this.format(level, args, context);
    // console.trace печатает стек, поэтому trace идёт в debug
    console[level === 'trace' ? 'debug' : level](...formatted);
  }

  /**
   * Splits the arguments into the main arguments and the trailing context object.
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
    this.output(level, newArgs, { ...context, ...extra }, level === 'warn' || level === 'error');
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
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
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
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    if (!VALID_FIELDS.includes(field) || field === 'timestamp' || field === 'level') {
      throw new Error(`Invalid formatter field: ${String(field)}`);
    }
    this.customFormatters[field] = formatter;
  }

  mute({ command, service }: Pick<LogContext, 'command' | 'service'> = {}): void {
    if (command != null) this.filters.command.add(command);
    if (service != null) this.filters.service.add(service);
  }

  unmute({ command, service }: Pick<LogContext, 'command' | 'service'> = {}): void {
    if (command != null) this.filters.command.delete(command);
    if (service != null) this.filters.service.delete(service);
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
   * Creates a logger instance with category.
   * @param name - Logger name
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
    v =>
      v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

/** Общий логгер библиотеки, категории создаются через createLogger */
export const defaultLogger = new Logger();
defaultLogger.setLevel('error');

export default Logger;
