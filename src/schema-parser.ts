/**
 * OpenAPI schema loader and operation extractor
 *
 * Walks every path × method of the loaded document and normalizes each
 * addressable entry into an `Operation` record. The document is read-only
 * once loaded; operations are recomputed on every `listOperations()` call.
 */

import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { TIMEOUTS, TOOL_METHODS } from './constants.js';
import { SchemaFetchError, getErrorDetails, toError } from './errors.js';
import { HttpClient, type ApiClient } from './http-client.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { RefResolver, isRecord, isReference } from './ref-resolver.js';
import type {
  HttpMethod,
  Operation,
  OperationParameters,
  ParamSpec,
  ParamType,
  RequestBodySpec,
  SchemaDocument,
  SchemaInfo,
} from './types/openapi.js';

const PARAM_TYPES: readonly ParamType[] = ['string', 'integer', 'number', 'boolean', 'array', 'object'];

const METHOD_NAMES: Record<(typeof TOOL_METHODS)[number], HttpMethod> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  patch: 'PATCH',
  delete: 'DELETE',
};

function isParamType(value: unknown): value is ParamType {
  return PARAM_TYPES.some(type => type === value);
}

const JSON_MEDIA_TYPES = ['application/json', 'application/json; charset=utf-8'] as const;

/**
 * Map a schema fragment's `type` to a parameter type; absent or unknown
 * types default to `string`. OpenAPI 3.1 type arrays use the first non-null entry.
 */
export function getParamType(schema: unknown): ParamType {
  if (!isRecord(schema)) return 'string';

  const declared = Array.isArray(schema.type)
    ? schema.type.find(t => t !== 'null')
    : schema.type;

  return isParamType(declared) ? declared : 'string';
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export interface SchemaParserOptions {
  schemaUrl?: string;
  client?: ApiClient;
  logger?: Logger;
  timeoutMs?: number;
}

export class SchemaParser {
  readonly schemaUrl?: string;
  private readonly client: ApiClient;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  private document?: SchemaDocument;
  private paths: Record<string, unknown> = {};
  private components: Record<string, unknown> = {};
  private resolver = new RefResolver({});

  constructor(options: SchemaParserOptions = {}) {
    this.schemaUrl = options.schemaUrl;
    this.logger = options.logger ?? new ConsoleLogger();
    this.client = options.client ?? new HttpClient({ logger: this.logger });
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.SCHEMA_FETCH_MS;
  }

  /**
   * Fetch the schema from `schemaUrl`
   *
   * Returns false on any status, transport or parse failure; the caller
   * decides whether startup can continue.
   */
  async fetch(): Promise<boolean> {
    const schemaUrl = this.schemaUrl;
    if (!schemaUrl) {
      this.logger.error('Failed to load schema', new SchemaFetchError('No schema URL configured'));
      return false;
    }

    try {
      this.logger.info('Fetching schema', { schemaUrl });

      const response = await this.client.send({
        method: 'GET',
        url: schemaUrl,
        headers: { Accept: 'application/json' },
        timeoutMs: this.timeoutMs,
      });

      // drf-spectacular serves YAML unless JSON is negotiated; YAML parses both
      const document: unknown = typeof response.data === 'string'
        ? parseYaml(response.data)
        : response.data;

      if (!isRecord(document)) {
        throw new SchemaFetchError('Schema document is not a mapping', { schemaUrl });
      }

      this.loadDocument(document);
      this.logger.info('Loaded schema', { ...this.getInfo() });
      return true;
    } catch (error) {
      const failure = error instanceof SchemaFetchError
        ? error
        : new SchemaFetchError(`Failed to load schema: ${toError(error).message}`, { schemaUrl });
      this.logger.error('Failed to load schema', failure, { schemaUrl, cause: getErrorDetails(error) });
      return false;
    }
  }

  /**
   * Load the schema from a local JSON or YAML file
   */
  async loadFile(schemaPath: string): Promise<void> {
    const content = await fs.readFile(schemaPath, 'utf-8');
    const document: unknown = schemaPath.endsWith('.yaml') || schemaPath.endsWith('.yml')
      ? parseYaml(content)
      : JSON.parse(content);

    if (!isRecord(document)) {
      throw new SchemaFetchError('Schema document is not a mapping', { schemaPath });
    }
    this.loadDocument(document);
  }

  loadDocument(document: SchemaDocument): void {
    this.document = document;
    this.paths = isRecord(document.paths) ? document.paths : {};
    this.components = isRecord(document.components) ? document.components : {};
    this.resolver = new RefResolver(document);
  }

  isLoaded(): boolean {
    return this.document !== undefined;
  }

  getPaths(): Record<string, unknown> {
    return this.paths;
  }

  getComponents(): Record<string, unknown> {
    return this.components;
  }

  resolveRef(ref: string): Record<string, unknown> {
    return this.resolver.resolve(ref);
  }

  getInfo(): SchemaInfo {
    const info = this.document && isRecord(this.document.info) ? this.document.info : {};
    return {
      title: asString(info.title) || 'API',
      version: asString(info.version) || 'unknown',
      pathCount: Object.keys(this.paths).length,
    };
  }

  /**
   * Enumerate all addressable operations: paths in document order, then
   * get, post, put, patch, delete. Entries without an operationId are skipped.
   */
  listOperations(): Operation[] {
    const operations: Operation[] = [];

    for (const [path, rawPathItem] of Object.entries(this.paths)) {
      const pathItem = this.resolver.deref(rawPathItem);

      for (const method of TOOL_METHODS) {
        const operation = pathItem[method];
        if (!isRecord(operation)) continue;

        const operationId = operation.operationId;
        if (typeof operationId !== 'string' || operationId.length === 0) continue;

        operations.push({
          operationId,
          path,
          method: METHOD_NAMES[method],
          parameters: this.extractParameters(pathItem.parameters, operation.parameters),
          requestBody: this.extractRequestBody(operation),
          summary: asString(operation.summary),
          description: asString(operation.description),
          tags: asList(operation.tags).filter((tag): tag is string => typeof tag === 'string'),
        });
      }
    }

    return operations;
  }

  getOperationById(operationId: string): Operation | undefined {
    return this.listOperations().find(op => op.operationId === operationId);
  }

  /**
   * Bucket parameters by location
   *
   * Path-item parameters are listed first and operation parameters after
   * them, so for a duplicated name the operation-level entry is last.
   * Locations other than path, query and header are dropped.
   */
  private extractParameters(pathLevel: unknown, operationLevel: unknown): OperationParameters {
    const buckets: OperationParameters = { path: [], query: [], header: [] };

    for (const raw of [...asList(pathLevel), ...asList(operationLevel)]) {
      const param = this.resolver.deref(raw);
      const name = asString(param.name);
      if (!name) continue;

      const spec: ParamSpec = {
        name,
        required: param.required === true,
        type: getParamType(this.resolver.deref(param.schema)),
        description: asString(param.description),
      };

      switch (param.in) {
        case 'path':
          buckets.path.push(spec);
          break;
        case 'query':
          buckets.query.push(spec);
          break;
        case 'header':
          buckets.header.push(spec);
          break;
      }
    }

    return buckets;
  }

  private extractRequestBody(operation: Record<string, unknown>): RequestBodySpec | undefined {
    if (operation.requestBody === undefined) return undefined;

    const body = this.resolver.deref(operation.requestBody);
    const content = isRecord(body.content) ? body.content : {};
    const media = JSON_MEDIA_TYPES.map(type => content[type]).find(isRecord);
    if (!media) return undefined;

    const schema = this.resolver.deref(media.schema);

    return {
      required: body.required === true,
      properties: schema.type === 'object' ? this.extractProperties(schema) : {},
    };
  }

  /**
   * One ParamSpec per declared property of an object schema
   */
  extractProperties(schema: Record<string, unknown>): Record<string, ParamSpec> {
    const properties = isRecord(schema.properties) ? schema.properties : {};
    const required = asList(schema.required).filter((name): name is string => typeof name === 'string');
    const result: Record<string, ParamSpec> = {};

    for (const [name, raw] of Object.entries(properties)) {
      const property = this.resolveProperty(raw);
      result[name] = {
        name,
        required: required.includes(name),
        type: getParamType(property),
        description: asString(property.description),
      };
    }

    return result;
  }

  /**
   * Resolve a property given as `$ref` or as a single-member `allOf`
   * wrapping one; the wrapper's own description takes precedence.
   */
  private resolveProperty(raw: unknown): Record<string, unknown> {
    if (isReference(raw)) {
      return this.resolver.resolve(raw.$ref);
    }
    if (!isRecord(raw)) return {};

    const allOf = asList(raw.allOf);
    const wrapped = allOf.length === 1 ? allOf[0] : undefined;
    if (isReference(wrapped)) {
      const target = this.resolver.resolve(wrapped.$ref);
      return {
        ...target,
        description: asString(raw.description) || asString(target.description),
      };
    }

    return raw;
  }
}
