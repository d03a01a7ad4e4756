/**
 * HTTP capability used by the schema parser, the auth handler and every
 * generated tool
 *
 * Non-2xx answers are thrown as `HttpStatusError` so callers can translate
 * them; each call is bounded by its own timeout.
 */

import { HTTP_STATUS, TIMEOUTS } from './constants.js';
import { HttpStatusError, RequestTimeoutError } from './errors.js';
import type { Logger } from './logger.js';

export interface ApiRequest {
  method: string;
  /** Absolute URL, without query string parameters from `query` */
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, unknown>;
  /** JSON-encoded when present; `undefined` sends no body at all */
  body?: unknown;
  timeoutMs?: number;
}

export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  /** Parsed JSON, the raw text when it is not JSON, or null when empty */
  data: unknown;
}

export interface ApiClient {
  send(request: ApiRequest): Promise<ApiResponse>;
}

export interface HttpClientOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Parse a response body: JSON when possible, otherwise the text itself
 */
export function parseBody(text: string): unknown {
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Serialize query parameters; arrays repeat the key once per item
 *
 * `undefined` and `null` values are omitted.
 */
export function serializeQuery(params: Record<string, unknown>): URLSearchParams {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;

    const items: unknown[] = Array.isArray(value) ? value : [value];
    for (const item of items) {
      searchParams.append(key, stringifyValue(item));
    }
  }

  return searchParams;
}

export class HttpClient implements ApiClient {
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.TOOL_CALL_MS;
    this.logger = options.logger;
  }

  async send(request: ApiRequest): Promise<ApiResponse> {
    const url = this.buildUrl(request.url, request.query);
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;

    const init: RequestInit = {
      method: request.method,
      headers: request.headers ?? {},
      signal: AbortSignal.timeout(timeoutMs),
    };

    // GET/HEAD never carry a body
    if (request.body !== undefined && request.method !== 'GET' && request.method !== 'HEAD') {
      init.body = JSON.stringify(request.body);
    }

    this.logger?.debug('Sending HTTP request', { method: request.method, url });

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, init);
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new RequestTimeoutError(url, timeoutMs);
      }
      throw error;
    }

    this.logger?.debug('Received HTTP response', { method: request.method, url, status: response.status });

    if (response.status < HTTP_STATUS.OK || response.status >= HTTP_STATUS.MULTIPLE_CHOICES) {
      throw new HttpStatusError(response.status, text, { url, method: request.method });
    }

    return {
      status: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      data: parseBody(text),
    };
  }

  private buildUrl(url: string, query?: Record<string, unknown>): string {
    if (!query) return url;

    const search = serializeQuery(query).toString();
    if (!search) return url;

    return url + (url.includes('?') ? '&' : '?') + search;
  }
}
