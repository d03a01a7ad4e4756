/**
 * In-process stand-ins for the HTTP, auth and tool-sink capabilities
 */

import type { AuthProvider } from '../auth.js';
import type { ApiClient, ApiRequest, ApiResponse } from '../http-client.js';
import { ConsoleLogger, LogLevel, type Logger } from '../logger.js';
import type { GeneratedTool } from '../tool-factory.js';
import type { ToolSink } from '../tool-generator.js';

export const silentLogger: Logger = new ConsoleLogger(LogLevel.SILENT);

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logger that keeps every entry for assertions
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context: { error: error?.message, ...context } });
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

export type FakeHandler = (request: ApiRequest) => ApiResponse | Promise<ApiResponse>;

/**
 * ApiClient answering from a handler function and recording each request
 */
export class FakeApiClient implements ApiClient {
  readonly requests: ApiRequest[] = [];

  constructor(private readonly handler: FakeHandler) {}

  async send(request: ApiRequest): Promise<ApiResponse> {
    this.requests.push(request);
    return this.handler(request);
  }
}

export function jsonResponse(data: unknown, status = 200): ApiResponse {
  return { status, headers: { 'content-type': 'application/json' }, data };
}

/**
 * AuthProvider with a fixed token
 */
export class StaticAuthProvider implements AuthProvider {
  headerCalls = 0;

  constructor(private readonly token?: string) {}

  async getHeaders(): Promise<Record<string, string>> {
    this.headerCalls++;
    const headers: Record<string, string> = { 'Content-Type': 'application/json', Accept: 'application/json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  async authenticate(): Promise<boolean> {
    return this.token !== undefined;
  }
}

export class RecordingSink implements ToolSink {
  readonly tools: GeneratedTool[] = [];

  registerTool(tool: GeneratedTool): void {
    this.tools.push(tool);
  }

  names(): string[] {
    return this.tools.map(tool => tool.name);
  }
}
