/**
 * Structured logging utility for the piggdekk dashboard
 *
 * Levels, ISO timestamps and contextual metadata. JSON lines in production,
 * one readable line per entry elsewhere. Every level goes to stderr; stdout
 * carries command output only.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  readonly context?: LogMetadata;
  /** Sink for formatted lines (default: stderr) */
  readonly write?: (line: string) => void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly config: LoggerConfig;
  private readonly write: (line: string) => void;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.write = config.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const merged: LogMetadata = { ...this.config.context, ...metadata };
    const hasMeta = Object.keys(merged).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(merged)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...merged,
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    this.write(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    this.write(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    this.write(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    this.write(this.formatMessage('error', message, metadata));
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

/**
 * Create a module-scoped logger, e.g. `createLogger({ module: 'reader' })`
 */
export function createLogger(context: LogMetadata & { readonly module: string }): Logger {
  const { module, ...rest } = context;
  return new Logger({
    level: getLogLevel(),
    service: `piggdekk:${module}`,
    pretty: process.env.NODE_ENV !== 'production',
    context: rest,
  });
}
