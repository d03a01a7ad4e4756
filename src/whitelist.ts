/**
 * Whitelist gate: decides which operations become tools
 *
 * Two checks composed in a fixed order: a deny-pattern match rejects the
 * operation outright, and only then is allow-list membership consulted.
 * Default is deny.
 */

import fs from 'fs/promises';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_ALLOWED_OPERATIONS, DEFAULT_DENY_PATTERNS } from './defaults.js';
import { parseWithSchema } from './validation-utils.js';

export interface WhitelistPolicy {
  allow: ReadonlySet<string>;
  /** Substrings; any match denies regardless of `allow` */
  denyPatterns: readonly string[];
}

const whitelistFileSchema = z.object({
  whitelist: z.array(z.string()).default([]),
  blocked_patterns: z.array(z.string()).default([...DEFAULT_DENY_PATTERNS]),
});

export function matchesDenyPattern(operationId: string, denyPatterns: readonly string[]): boolean {
  return denyPatterns.some(pattern => operationId.includes(pattern));
}

export function isInAllowList(operationId: string, allow: ReadonlySet<string>): boolean {
  return allow.has(operationId);
}

export function isOperationAllowed(policy: WhitelistPolicy, operationId: string): boolean {
  if (matchesDenyPattern(operationId, policy.denyPatterns)) {
    return false;
  }
  return isInAllowList(operationId, policy.allow);
}

export class Whitelist {
  private readonly allow: Set<string>;
  private readonly denyPatterns: readonly string[];

  constructor(
    allowed: Iterable<string> = DEFAULT_ALLOWED_OPERATIONS,
    denyPatterns: readonly string[] = DEFAULT_DENY_PATTERNS
  ) {
    this.allow = new Set(allowed);
    this.denyPatterns = [...denyPatterns];
  }

  /**
   * Import a policy document with `whitelist` and `blocked_patterns` keys
   *
   * The result replaces the built-in policy entirely. A document without
   * `blocked_patterns` keeps the default deny patterns.
   */
  static fromYaml(text: string, source = 'whitelist document'): Whitelist {
    const data = parseWithSchema(whitelistFileSchema, parseYaml(text) ?? {}, source);
    return new Whitelist(data.whitelist, data.blocked_patterns);
  }

  static async fromFile(filePath: string): Promise<Whitelist> {
    const content = await fs.readFile(filePath, 'utf-8');
    return Whitelist.fromYaml(content, `whitelist file ${filePath}`);
  }

  isAllowed(operationId: string): boolean {
    return isOperationAllowed(this.toPolicy(), operationId);
  }

  add(operationId: string): void {
    this.allow.add(operationId);
  }

  remove(operationId: string): void {
    this.allow.delete(operationId);
  }

  getAllowedOperations(): string[] {
    return [...this.allow].sort();
  }

  getDenyPatterns(): string[] {
    return [...this.denyPatterns];
  }

  toPolicy(): WhitelistPolicy {
    return { allow: this.allow, denyPatterns: this.denyPatterns };
  }

  exportYaml(): string {
    return stringifyYaml({
      whitelist: this.getAllowedOperations(),
      blocked_patterns: this.getDenyPatterns(),
    });
  }

  async exportToFile(filePath: string): Promise<void> {
    await fs.writeFile(filePath, this.exportYaml(), 'utf-8');
  }
}
