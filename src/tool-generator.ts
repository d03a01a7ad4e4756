/**
 * Generation driver: schema operations in, registered tools out
 *
 * Runs Parser → Whitelist → Factory for every operation, in the parser's
 * enumeration order, and hands each built tool to the sink.
 */

import type { Logger } from './logger.js';
import { ConsoleLogger } from './logger.js';
import type { SchemaParser } from './schema-parser.js';
import type { GeneratedTool, ToolFactory } from './tool-factory.js';
import type { Whitelist } from './whitelist.js';

export interface ToolSink {
  registerTool(tool: GeneratedTool): void;
}

export class ToolGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly parser: SchemaParser,
    private readonly whitelist: Whitelist,
    private readonly factory: ToolFactory,
    logger?: Logger
  ) {
    this.logger = logger ?? new ConsoleLogger();
  }

  /**
   * Register one tool per allowed operation
   *
   * @returns number of tools registered
   */
  generateAll(sink: ToolSink): number {
    const operations = this.parser.listOperations();
    let registered = 0;
    let denied = 0;

    for (const operation of operations) {
      if (!this.whitelist.isAllowed(operation.operationId)) {
        denied++;
        this.logger.debug('Operation not whitelisted', { operationId: operation.operationId });
        continue;
      }

      sink.registerTool(this.factory.build(operation));
      registered++;
    }

    this.logger.info('Generated tools', {
      registered,
      denied,
      operations: operations.length,
    });

    return registered;
  }
}
