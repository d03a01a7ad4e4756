/**
 * Normalized operation types
 *
 * The schema document itself stays a plain JSON mapping; these records are
 * what the parser extracts from it for the tool factory.
 */

export type SchemaDocument = Record<string, unknown>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type ParamType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

export type ParamLocation = 'path' | 'query' | 'header';

export interface ParamSpec {
  name: string;
  required: boolean;
  /** Informational only; argument values are forwarded as given */
  type: ParamType;
  description: string;
}

export interface RequestBodySpec {
  required: boolean;
  properties: Record<string, ParamSpec>;
}

export interface OperationParameters {
  path: ParamSpec[];
  query: ParamSpec[];
  header: ParamSpec[];
}

export interface Operation {
  operationId: string;
  /** Template with `{name}` placeholders */
  path: string;
  method: HttpMethod;
  parameters: OperationParameters;
  requestBody?: RequestBodySpec;
  summary: string;
  description: string;
  tags: string[];
}

export interface SchemaInfo {
  title: string;
  version: string;
  pathCount: number;
}
