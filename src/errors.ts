/**
 * Structured error types for the Care MCP server
 *
 * Every error carries a machine-readable code and optional details so that
 * startup failures can be reported clearly and tool failures can be folded
 * into response envelopes.
 */

import { randomUUID } from 'node:crypto';

export class CareMcpError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CareMcpError';
  }
}

export class ConfigurationError extends CareMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised while loading the API schema (network, status or parse failure).
 * The parser reports it as a `false` return; the server aborts startup.
 */
export class SchemaFetchError extends CareMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCHEMA_FETCH_ERROR', details);
    this.name = 'SchemaFetchError';
  }
}

export class AuthenticationError extends CareMcpError {
  constructor(message: string = 'Authentication required', details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', details);
    this.name = 'AuthenticationError';
  }
}

/**
 * Non-2xx answer from the remote API. `body` holds the raw response text.
 */
export class HttpStatusError extends CareMcpError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    details?: Record<string, unknown>
  ) {
    super(`HTTP ${status}`, 'HTTP_STATUS_ERROR', { status, ...details });
    this.name = 'HttpStatusError';
  }
}

export class RequestTimeoutError extends CareMcpError {
  constructor(url: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'REQUEST_TIMEOUT', { url, timeoutMs });
    this.name = 'RequestTimeoutError';
  }
}

export class ToolNotFoundError extends CareMcpError {
  constructor(toolName: string) {
    super(`Tool not found: ${toolName}`, 'TOOL_NOT_FOUND', { toolName });
    this.name = 'ToolNotFoundError';
  }
}

export function isCareMcpError(error: unknown): error is CareMcpError {
  return error instanceof CareMcpError;
}

/**
 * Correlation id attached to MCP handler failures, so a client-visible
 * message can be matched with the server log line.
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Flatten an error into a plain record for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isCareMcpError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

/**
 * Normalize an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
