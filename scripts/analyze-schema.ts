#!/usr/bin/env node

/**
 * Report how the whitelist and enhancements line up with a Care API schema
 *
 * Usage: analyze-schema [schema-file] [--whitelist file.yaml] [--enhancements file.yaml]
 */

import path from 'path';
import { createAnalyzeCommand, type AnalyzeOptions } from '../src/analyze-command.js';
import { EnhancementCatalog } from '../src/enhancements.js';
import { toError } from '../src/errors.js';
import { ConsoleLogger } from '../src/logger.js';
import { formatAnalysis, analyzeSchema } from '../src/schema-analysis.js';
import { SchemaParser } from '../src/schema-parser.js';
import { Whitelist } from '../src/whitelist.js';

async function runAnalysis(schemaFile: string, options: AnalyzeOptions): Promise<void> {
  const schemaPath = path.resolve(process.cwd(), schemaFile);
  const parser = new SchemaParser({ logger: new ConsoleLogger() });
  await parser.loadFile(schemaPath);

  const whitelist = options.whitelist ? await Whitelist.fromFile(options.whitelist) : new Whitelist();
  const catalog = options.enhancements
    ? await EnhancementCatalog.fromFile(options.enhancements)
    : new EnhancementCatalog();

  const analysis = analyzeSchema(parser.listOperations(), whitelist, catalog);

  console.log('');
  console.log('═══════════════════════════════════════════════════');
  console.log('  CARE API SCHEMA ANALYSIS');
  console.log('═══════════════════════════════════════════════════');
  console.log('');
  console.log(`Schema: ${schemaPath}`);
  console.log(formatAnalysis(parser.getInfo(), analysis));
  console.log('');
}

const program = createAnalyzeCommand(async (schemaFile, options) => {
  try {
    await runAnalysis(schemaFile, options);
  } catch (error) {
    console.error(`❌ ${toError(error).message}`);
    process.exit(1);
  }
});

await program.parseAsync(process.argv);
