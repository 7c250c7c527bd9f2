/**
 * Logger service - leveled console logging with timezone-aware timestamps
 */
import { config } from '../config/index';

/**
 * Log level severity ordering
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Parses log level string to enum value; unknown names mean INFO
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * `YYYY-MM-DD HH:mm:ss` in the given timezone
 */
export function formatTimestamp(date: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  return formatter.format(date).replace(',', '');
}

/**
 * Errors lose their fields under JSON.stringify, so flatten them first
 */
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  return data;
}

const SINKS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.log(line),
  [LogLevel.INFO]: (line) => console.log(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

export interface LoggerOptions {
  level?: string;
  timezone?: string;
  now?: () => Date;
}

/**
 * Console logger shared through the application context
 */
export class LoggerService {
  private readonly logLevel: LogLevel;
  private readonly timezone: string;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.logLevel = parseLogLevel(options.level ?? config.logging.logLevel);
    this.timezone = options.timezone ?? config.logging.timezone;
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string, data?: unknown): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown): void {
    this.write(LogLevel.ERROR, message, error);
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (level < this.logLevel) {
      return;
    }

    let line = `[${formatTimestamp(this.now(), this.timezone)}] [${LogLevel[level]}] ${message}`;
    if (data !== undefined) {
      line += `\n${JSON.stringify(serializeData(data), null, 2)}`;
    }
    SINKS[level](line);
  }
}
