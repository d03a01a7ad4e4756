/**
 * Validation helpers shared by the config loader and the YAML importers
 */

import { ZodError, type ZodTypeAny, type output } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Render zod issues as `path: message` lines joined by `; `
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse `data` with a zod schema, reporting failures as ConfigurationError
 *
 * @param source - Label for the input (file path, "environment") used in the message
 */
export function parseWithSchema<Schema extends ZodTypeAny>(
  schema: Schema,
  data: unknown,
  source: string
): output<Schema> {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(`Invalid ${source}: ${formatZodIssues(error)}`, {
        source,
        issues: error.issues,
      });
    }
    throw error;
  }
}

