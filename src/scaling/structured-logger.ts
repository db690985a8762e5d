/**
 * Structured Logger: JSON-formatted logging with levels, timestamps, and context
 *
 * - Machine-parseable JSON lines in production
 * - Human-readable lines in development
 * - Log levels (debug, info, warn, error)
 * - Context injection via child loggers (component, module address, etc.)
 *
 * Level comes from LEDGER_LOG_LEVEL; under Jest (NODE_ENV=test) the default is warn.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  [key: string]: unknown;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  return LEVELS_BY_NAME[value.toLowerCase()];
}

function stringifyValue(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export class StructuredLogger {
  private minLevel: LogLevel;
  private defaultContext: LogContext;
  private useJson: boolean;

  constructor(opts?: {
    minLevel?: LogLevel;
    context?: LogContext;
    json?: boolean;
  }) {
    const fallback = process.env.NODE_ENV === 'test' ? LogLevel.WARN : LogLevel.INFO;
    this.minLevel = opts?.minLevel ?? parseLogLevel(process.env.LEDGER_LOG_LEVEL) ?? fallback;
    this.defaultContext = opts?.context ?? {};
    // Default to JSON in production, pretty in development
    this.useJson = opts?.json ?? (process.env.NODE_ENV === 'production');
  }

  child(context: LogContext): StructuredLogger {
    return new StructuredLogger({
      minLevel: this.minLevel,
      context: { ...this.defaultContext, ...context },
      json: this.useJson,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: LogContext): void {
    this.log(LogLevel.ERROR, component, message, data);
  }

  private log(level: LogLevel, component: string, message: string, data?: LogContext): void {
    if (level < this.minLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      component,
      message,
      ...this.defaultContext,
      ...data,
    };

    if (this.useJson) {
      const output = JSON.stringify(entry, stringifyValue);
      if (level >= LogLevel.ERROR) {
        process.stderr.write(output + '\n');
      } else {
        process.stdout.write(output + '\n');
      }
      return;
    }

    const ts = entry.timestamp.substring(11, 23); // HH:MM:SS.mmm
    const lvl = LEVEL_NAMES[level].toUpperCase().padEnd(5);
    const extra = data ? ' ' + JSON.stringify(data, stringifyValue) : '';
    const line = `${ts} ${lvl} [${component}] ${message}${extra}`;
    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else if (level >= LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

// Singleton logger instance
export const logger = new StructuredLogger();
