/* eslint-disable no-console */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerOptions {
  prefix?: string;
  timestamp?: boolean;
  minLevel?: LogLevel;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m',  // green
  warn: '\x1b[33m',  // yellow
  error: '\x1b[31m', // red
  reset: '\x1b[0m',
};

const isLogLevel = (value: unknown): value is LogLevel => (
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, value)
);

class Logger {
  private readonly prefix: string;
  private readonly timestamp: boolean;
  private readonly level: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '';
    this.timestamp = options.timestamp ?? true;
    this.level = options.minLevel || 'debug';
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', console.debug, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', console.info, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', console.warn, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', console.error, message, args);
  }

  child(prefix: string): Logger {
    return new Logger({
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      timestamp: this.timestamp,
      minLevel: this.level,
    });
  }

  private write(level: LogLevel, sink: (...data: unknown[]) => void, message: string, args: unknown[]): void {
    if (LEVELS[level] < LEVELS[this.level]) return;
    sink(`${COLORS[level]}${this.format(level, message)}${COLORS.reset}`, ...args);
  }

  private format(level: LogLevel, message: string): string {
    const parts: string[] = [];

    if (this.timestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.prefix) {
      parts.push(`[${this.prefix}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);

    return parts.join(' ');
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger({
  timestamp: true,
  minLevel: isLogLevel(envLevel) ? envLevel : (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
});
