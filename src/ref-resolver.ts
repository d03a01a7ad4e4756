/**
 * `$ref` resolution within a loaded schema document
 *
 * Only root-relative refs (`#/components/schemas/Facility`) are walked.
 * Anything that does not land on a mapping resolves to an empty mapping,
 * so parsing continues with degraded metadata for that fragment.
 */

import type { SchemaDocument } from './types/openapi.js';

export interface Reference {
  $ref: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Whether a schema fragment is a `{ "$ref": "..." }` pointer
 */
export function isReference(value: unknown): value is Reference {
  return isRecord(value) && typeof value.$ref === 'string';
}

/**
 * Decode a JSON-pointer segment (`~1` is `/`, `~0` is `~`)
 */
function decodeSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function resolveRef(document: SchemaDocument, ref: string): Record<string, unknown> {
  if (!ref.startsWith('#/')) return {};

  let current: unknown = document;
  for (const segment of ref.slice(2).split('/')) {
    if (!isRecord(current)) return {};
    current = current[decodeSegment(segment)];
  }

  return isRecord(current) ? current : {};
}

export class RefResolver {
  constructor(private readonly document: SchemaDocument) {}

  resolve(ref: string): Record<string, unknown> {
    return resolveRef(this.document, ref);
  }

  /**
   * Return the fragment itself, or its target when it is a `$ref`
   */
  deref(fragment: unknown): Record<string, unknown> {
    if (isReference(fragment)) {
      return this.resolve(fragment.$ref);
    }
    return isRecord(fragment) ? fragment : {};
  }
}
