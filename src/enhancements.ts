/**
 * Presentation metadata for generated tools
 *
 * A catalog is built from an explicit table; supplying one replaces the
 * built-in defaults entirely.
 */

import fs from 'fs/promises';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_ENHANCEMENTS } from './defaults.js';
import { parseWithSchema } from './validation-utils.js';

export interface Enhancement {
  operationId: string;
  title: string;
  description: string;
  tags: string[];
  examples: string[];
}

const enhancementRecordSchema = z.object({
  operation_id: z.string().min(1),
  title: z.string(),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  examples: z.array(z.string()).default([]),
});

const enhancementFileSchema = z.object({
  enhancements: z.array(enhancementRecordSchema).default([]),
});

export class EnhancementCatalog {
  private readonly entries = new Map<string, Enhancement>();

  constructor(entries: Iterable<Enhancement> = DEFAULT_ENHANCEMENTS) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  static fromYaml(text: string, source = 'enhancements document'): EnhancementCatalog {
    const data = parseWithSchema(enhancementFileSchema, parseYaml(text) ?? {}, source);
    return new EnhancementCatalog(
      data.enhancements.map(record => ({
        operationId: record.operation_id,
        title: record.title,
        description: record.description,
        tags: record.tags,
        examples: record.examples,
      }))
    );
  }

  static async fromFile(filePath: string): Promise<EnhancementCatalog> {
    const content = await fs.readFile(filePath, 'utf-8');
    return EnhancementCatalog.fromYaml(content, `enhancements file ${filePath}`);
  }

  get(operationId: string): Enhancement | undefined {
    return this.entries.get(operationId);
  }

  has(operationId: string): boolean {
    return this.entries.has(operationId);
  }

  /**
   * Add or replace the entry for `enhancement.operationId`
   */
  add(enhancement: Enhancement): void {
    this.entries.set(enhancement.operationId, {
      ...enhancement,
      tags: [...enhancement.tags],
      examples: [...enhancement.examples],
    });
  }

  get size(): number {
    return this.entries.size;
  }

  list(): Enhancement[] {
    return [...this.entries.values()];
  }

  exportYaml(): string {
    return stringifyYaml({
      enhancements: this.list().map(entry => ({
        operation_id: entry.operationId,
        title: entry.title,
        description: entry.description,
        tags: entry.tags,
        examples: entry.examples,
      })),
    });
  }

  async exportToFile(filePath: string): Promise<void> {
    await fs.writeFile(filePath, this.exportYaml(), 'utf-8');
  }
}
