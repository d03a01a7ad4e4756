/**
 * Logger interfaces and implementations
 *
 * All output goes to stderr: stdout carries the MCP stdio transport.
 *
 * Security: credentials (bearer tokens, passwords, refresh tokens) are
 * redacted from log context before writing.
 */

import { isRecord } from './ref-resolver.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export type LogFormat = 'console' | 'json';

const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = new Set(['authorization', 'password', 'access', 'refresh', 'token', 'access_token', 'refresh_token']);

/**
 * Parse a LOG_LEVEL value, falling back to INFO for unknown input
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toUpperCase();
  switch (normalized) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Replace credential-bearing values in a log context
 *
 * Top-level keys are matched case-insensitively; a nested `headers` record is
 * scanned the same way so an outgoing `Authorization` header never reaches
 * the log.
 */
export function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      redacted[key] = REDACTED;
    } else if (key === 'headers' && isRecord(value)) {
      redacted[key] = redactHeaders(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

function redactHeaders(headers: Record<string, unknown>): Record<string, unknown> {
  const redacted = { ...headers };
  for (const key of Object.keys(redacted)) {
    if (key.toLowerCase() === 'authorization') {
      redacted[key] = REDACTED;
    }
  }
  return redacted;
}

export type Severity = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY_LEVEL: Record<Severity, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Level filtering shared by the concrete loggers; subclasses only format
 */
export abstract class LevelFilteredLogger implements Logger {
  readonly level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('error', message, error ? { error: error.message, stack: error.stack, ...context } : context);
  }

  private emit(severity: Severity, message: string, context?: Record<string, unknown>): void {
    if (this.level <= SEVERITY_LEVEL[severity]) {
      this.write(severity, message, context ? redactSensitive(context) : undefined);
    }
  }

  protected abstract write(severity: Severity, message: string, context?: Record<string, unknown>): void;
}

/**
 * Human-readable logger: `[timestamp] LEVEL: message {context}`
 */
export class ConsoleLogger extends LevelFilteredLogger {
  protected write(severity: Severity, message: string, context?: Record<string, unknown>): void {
    const ctx = context ? ` ${JSON.stringify(context)}` : '';
    console.error(`[${new Date().toISOString()}] ${severity.toUpperCase()}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger, one object per line
 */
export class JsonLogger extends LevelFilteredLogger {
  protected write(severity: Severity, message: string, context?: Record<string, unknown>): void {
    console.error(JSON.stringify({
      timestamp: new Date().toISOString(),
      level: severity,
      message,
      ...context,
    }));
  }
}

/**
 * Build a logger from LOG_FORMAT / LOG_LEVEL style settings
 */
export function createLogger(format: LogFormat = 'console', level?: LogLevel): Logger {
  return format === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}
