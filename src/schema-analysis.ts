/**
 * Coverage report of a whitelist and enhancement catalog against a schema
 *
 * Used by `scripts/analyze-schema.ts` to check a policy before deploying it
 * against a new API version.
 */

import type { EnhancementCatalog } from './enhancements.js';
import type { HttpMethod, Operation, SchemaInfo } from './types/openapi.js';
import { matchesDenyPattern, type Whitelist } from './whitelist.js';

export interface EntityCount {
  entity: string;
  operations: number;
}

export interface SchemaAnalysis {
  totalOperations: number;
  byMethod: Record<HttpMethod, number>;
  /** Sorted by operation count, descending */
  entities: EntityCount[];
  whitelisted: {
    found: string[];
    missing: string[];
    /** Allow-listed ids that a deny pattern blocks anyway */
    blocked: string[];
  };
  enhancements: {
    found: string[];
    missing: string[];
  };
  /** Ids that generation would register, in schema order */
  toGenerate: string[];
}

/**
 * Resource name of an `api_v1_<entity>_<action>` id; undefined for other shapes
 */
export function getEntity(operationId: string): string | undefined {
  const parts = operationId.split('_');
  return parts.length >= 3 ? parts[2] : undefined;
}

export function analyzeSchema(
  operations: Operation[],
  whitelist: Whitelist,
  catalog: EnhancementCatalog
): SchemaAnalysis {
  const ids = new Set(operations.map(op => op.operationId));
  const byMethod: Record<HttpMethod, number> = { GET: 0, POST: 0, PUT: 0, PATCH: 0, DELETE: 0 };
  const entityCounts = new Map<string, number>();

  for (const operation of operations) {
    byMethod[operation.method]++;
    const entity = getEntity(operation.operationId);
    if (entity) {
      entityCounts.set(entity, (entityCounts.get(entity) ?? 0) + 1);
    }
  }

  const entities = [...entityCounts]
    .map(([entity, count]) => ({ entity, operations: count }))
    .sort((a, b) => b.operations - a.operations || a.entity.localeCompare(b.entity));

  const allowed = whitelist.getAllowedOperations();
  const enhanced = catalog.list().map(entry => entry.operationId).sort();

  return {
    totalOperations: operations.length,
    byMethod,
    entities,
    whitelisted: {
      found: allowed.filter(id => ids.has(id)),
      missing: allowed.filter(id => !ids.has(id)),
      blocked: allowed.filter(id => matchesDenyPattern(id, whitelist.getDenyPatterns())),
    },
    enhancements: {
      found: enhanced.filter(id => ids.has(id)),
      missing: enhanced.filter(id => !ids.has(id)),
    },
    toGenerate: operations.filter(op => whitelist.isAllowed(op.operationId)).map(op => op.operationId),
  };
}

/**
 * Plain-text rendering of an analysis
 *
 * @param topEntities - how many entities to list
 */
export function formatAnalysis(info: SchemaInfo, analysis: SchemaAnalysis, topEntities = 15): string {
  const lines: string[] = [
    `API: ${info.title} ${info.version}`,
    `Paths: ${info.pathCount}`,
    `Operations: ${analysis.totalOperations}`,
    `By method: ${Object.entries(analysis.byMethod).map(([method, count]) => `${method} ${count}`).join(', ')}`,
    '',
    'Top entities:',
    ...analysis.entities
      .slice(0, topEntities)
      .map((entry, i) => `${String(i + 1).padStart(2)}. ${entry.entity.padEnd(20)} ${entry.operations}`),
    '',
    `Whitelisted operations found in schema: ${analysis.whitelisted.found.length}/${analysis.whitelisted.found.length + analysis.whitelisted.missing.length}`,
  ];

  const section = (title: string, ids: string[]) => {
    if (ids.length > 0) {
      lines.push('', `${title}: ${ids.length}`, ...ids.map(id => `  - ${id}`));
    }
  };

  section('Whitelisted but missing from schema', analysis.whitelisted.missing);
  section('Whitelisted but blocked by deny patterns', analysis.whitelisted.blocked);
  section('Enhancements for missing operations', analysis.enhancements.missing);
  lines.push('', `Tools to generate: ${analysis.toGenerate.length}`, ...analysis.toGenerate.map(id => `  - ${id}`));

  return lines.join('\n');
}
