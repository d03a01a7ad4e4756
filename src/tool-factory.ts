/**
 * Turns an Operation into a callable tool
 *
 * Every tool shares one generic dispatcher parameterized by its Operation:
 * arguments are classified by declared location, the path template is
 * filled in, and the HTTP result is folded into a response envelope.
 * `invoke` never throws.
 */

import { BODY_METHODS, ERROR_DETAIL_MAX_LENGTH, TIMEOUTS } from './constants.js';
import type { AuthProvider } from './auth.js';
import type { EnhancementCatalog } from './enhancements.js';
import { HttpStatusError, toError } from './errors.js';
import type { ApiClient } from './http-client.js';
import { ConsoleLogger, type Logger } from './logger.js';
import type { Operation, ParamSpec, ParamType } from './types/openapi.js';

export type ToolResponse =
  | { success: true; status: number; data: unknown }
  | { success: false; status?: number; error: string; detail?: string };

export type JsonSchemaProperty = {
  type: ParamType;
  description?: string;
};

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
};

export type ToolAnnotations = {
  title: string;
  readOnlyHint: boolean;
};

export interface GeneratedTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  annotations: ToolAnnotations;
  invoke(args: Record<string, unknown>): Promise<ToolResponse>;
}

export interface ToolFactoryOptions {
  baseUrl: string;
  client: ApiClient;
  auth: AuthProvider;
  catalog: EnhancementCatalog;
  logger?: Logger;
  timeoutMs?: number;
}

interface ClassifiedArguments {
  path: Record<string, unknown>;
  query: Record<string, unknown>;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

const PLACEHOLDER = /\{([^{}]+)\}/g;

/**
 * Names of the `{name}` placeholders in a path template
 */
export function getPlaceholders(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map(match => match[1]);
}

/**
 * Fill `{name}` placeholders with URI-encoded values
 *
 * @returns the path, or the first placeholder name without a value
 */
export function fillPathTemplate(
  template: string,
  values: Record<string, unknown>
): { path: string } | { missing: string } {
  for (const name of getPlaceholders(template)) {
    if (values[name] === undefined || values[name] === null) {
      return { missing: name };
    }
  }

  const path = template.replace(PLACEHOLDER, (_, name: string) => encodeURIComponent(String(values[name])));
  return { path };
}

/**
 * Split tool arguments into path, query, header and body sets
 *
 * Placeholders in the path template count as path parameters even when the
 * schema does not declare them. Undeclared keys go to the body when the
 * operation has one and are dropped otherwise.
 */
export function classifyArguments(operation: Operation, args: Record<string, unknown>): ClassifiedArguments {
  const pathNames = new Set([
    ...operation.parameters.path.map(p => p.name),
    ...getPlaceholders(operation.path),
  ]);
  const queryNames = new Set(operation.parameters.query.map(p => p.name));
  const headerNames = new Set(operation.parameters.header.map(p => p.name));

  const path = new Map<string, unknown>();
  const query = new Map<string, unknown>();
  const headers = new Map<string, string>();
  const body = new Map<string, unknown>();

  for (const [key, value] of Object.entries(args)) {
    if (value === undefined) continue;

    if (pathNames.has(key)) {
      path.set(key, value);
    } else if (queryNames.has(key)) {
      query.set(key, value);
    } else if (headerNames.has(key)) {
      headers.set(key, String(value));
    } else if (operation.requestBody) {
      body.set(key, value);
    }
  }

  // fromEntries defines own keys, so a `__proto__` argument stays a plain key
  return {
    path: Object.fromEntries(path),
    query: Object.fromEntries(query),
    headers: Object.fromEntries(headers),
    body: Object.fromEntries(body),
  };
}

export class ToolFactory {
  private readonly baseUrl: string;
  private readonly client: ApiClient;
  private readonly auth: AuthProvider;
  private readonly catalog: EnhancementCatalog;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: ToolFactoryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.client = options.client;
    this.auth = options.auth;
    this.catalog = options.catalog;
    this.logger = options.logger ?? new ConsoleLogger();
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.TOOL_CALL_MS;
  }

  build(operation: Operation): GeneratedTool {
    const enhancement = this.catalog.get(operation.operationId);

    return {
      name: operation.operationId,
      description: this.buildDescription(operation),
      inputSchema: this.buildInputSchema(operation),
      annotations: {
        title: enhancement?.title || operation.summary || operation.operationId,
        readOnlyHint: operation.method === 'GET',
      },
      invoke: args => this.invoke(operation, args),
    };
  }

  /**
   * Enhancement text when the catalog has an entry, otherwise the schema's
   * summary or description; always followed by the method and path.
   */
  buildDescription(operation: Operation): string {
    const enhancement = this.catalog.get(operation.operationId);
    let text: string;

    if (enhancement) {
      text = [enhancement.title, enhancement.description].filter(Boolean).join('\n\n');
      if (enhancement.examples.length > 0) {
        text += `\n\nExamples:\n${enhancement.examples.map(example => `- ${example}`).join('\n')}`;
      }
    } else {
      text = operation.summary || operation.description || `Execute ${operation.operationId}`;
    }

    return `${text}\n\nAPI: ${operation.method} ${operation.path}`;
  }

  /**
   * JSON Schema for the tool's arguments
   *
   * A name keeps the location that wins during classification
   * (path, then query, then header, then body); within one location the
   * last declaration wins.
   */
  buildInputSchema(operation: Operation): ToolInputSchema {
    const bodyRequired = operation.requestBody?.required === true;
    const groups: Array<{ specs: ParamSpec[]; requiredIfDeclared: boolean }> = [
      { specs: operation.parameters.path, requiredIfDeclared: true },
      { specs: operation.parameters.query, requiredIfDeclared: true },
      { specs: operation.parameters.header, requiredIfDeclared: true },
      { specs: Object.values(operation.requestBody?.properties ?? {}), requiredIfDeclared: bodyRequired },
    ];

    const properties: Record<string, JsonSchemaProperty> = {};
    const required = new Set<string>();
    const claimed = new Set<string>();

    for (const group of groups) {
      const names = new Set<string>();
      for (const spec of group.specs) {
        if (claimed.has(spec.name)) continue;
        names.add(spec.name);

        properties[spec.name] = spec.description
          ? { type: spec.type, description: spec.description }
          : { type: spec.type };

        if (spec.required && group.requiredIfDeclared) {
          required.add(spec.name);
        } else {
          required.delete(spec.name);
        }
      }
      names.forEach(name => claimed.add(name));
    }

    return required.size > 0
      ? { type: 'object', properties, required: [...required] }
      : { type: 'object', properties };
  }

  private async invoke(operation: Operation, args: Record<string, unknown>): Promise<ToolResponse> {
    const classified = classifyArguments(operation, args);

    const filled = fillPathTemplate(operation.path, classified.path);
    if ('missing' in filled) {
      return { success: false, error: 'Missing path parameter', detail: filled.missing };
    }

    const url = `${this.baseUrl}${filled.path}`;
    const hasBody = BODY_METHODS.has(operation.method) && Object.keys(classified.body).length > 0;

    try {
      const authHeaders = await this.auth.getHeaders();

      this.logger.debug('Invoking tool', {
        tool: operation.operationId,
        method: operation.method,
        url,
        hasBody,
      });

      const response = await this.client.send({
        method: operation.method,
        url,
        headers: { ...authHeaders, ...classified.headers },
        query: classified.query,
        body: hasBody ? classified.body : undefined,
        timeoutMs: this.timeoutMs,
      });

      return { success: true, status: response.status, data: response.data };
    } catch (error) {
      if (error instanceof HttpStatusError) {
        this.logger.warn('Tool call returned an error status', {
          tool: operation.operationId,
          status: error.status,
        });
        return {
          success: false,
          status: error.status,
          error: `HTTP ${error.status}`,
          detail: error.body.slice(0, ERROR_DETAIL_MAX_LENGTH),
        };
      }

      const failure = toError(error);
      this.logger.warn('Tool call failed', { tool: operation.operationId, error: failure.message });
      return { success: false, error: 'Request failed', detail: failure.message };
    }
  }
}
