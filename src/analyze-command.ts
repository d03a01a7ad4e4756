/**
 * Command line definition of the schema analysis script
 */

import { Command } from 'commander';
import { SERVER_VERSION } from './constants.js';

export const DEFAULT_SCHEMA_FILE = 'care_api_swagger_schema.json';

export interface AnalyzeOptions {
  whitelist?: string;
  enhancements?: string;
}

export type AnalyzeAction = (schemaFile: string, options: AnalyzeOptions) => Promise<void>;

export function createAnalyzeCommand(action: AnalyzeAction): Command {
  return new Command()
    .name('analyze-schema')
    .description('Check whitelist and enhancement coverage against a Care API schema file')
    .version(SERVER_VERSION)
    .argument('[schema-file]', 'Path to the OpenAPI schema (JSON or YAML)', DEFAULT_SCHEMA_FILE)
    .option('-w, --whitelist <path>', 'Whitelist YAML file (defaults to the built-in allow-list)')
    .option('-e, --enhancements <path>', 'Enhancements YAML file (defaults to the built-in catalog)')
    .action(action);
}
