/**
 * Structured Logger — JSON-formatted logging with levels, timestamps, and context
 *
 * - JSON lines in production, human-readable lines in development
 * - Levels: debug, info, warn, error (plus `silent` for tests)
 * - Per-component tags and a default context merged into every entry
 *
 * Diagnostic only: the check-in audit trail lives in the audit log, not here.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
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
  switch ((value || '').trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

export class StructuredLogger {
  private minLevel: LogLevel;
  private defaultContext: LogContext;
  private useJson: boolean;

  constructor(opts?: { minLevel?: LogLevel; context?: LogContext; json?: boolean }) {
    this.minLevel = opts?.minLevel ?? parseLogLevel(process.env.CHECKIN_LOG_LEVEL) ?? LogLevel.INFO;
    this.defaultContext = opts?.context ?? {};
    // Default to JSON in production, pretty in development
    this.useJson = opts?.json ?? process.env.NODE_ENV === 'production';
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
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
      const output = JSON.stringify(entry);
      if (level >= LogLevel.ERROR) {
        process.stderr.write(output + '\n');
      } else {
        process.stdout.write(output + '\n');
      }
      return;
    }

    const ts = entry.timestamp.substring(11, 23); // HH:MM:SS.mmm
    const lvl = LEVEL_NAMES[level].toUpperCase().padEnd(5);
    const extra = data ? ' ' + JSON.stringify(data) : '';
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

export const logger = new StructuredLogger();
