#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Loads configuration, starts the server on stdio and exits with code 1
 * when configuration or the schema cannot be loaded.
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { toError } from './errors.js';
import { createLogger, parseLogLevel } from './logger.js';
import { CareMcpServer } from './mcp-server.js';

async function main(): Promise<void> {
  const logger = createLogger(
    process.env.LOG_FORMAT === 'json' ? 'json' : 'console',
    parseLogLevel(process.env.LOG_LEVEL)
  );

  try {
    const config = await loadConfig();
    logger.info('Starting Care MCP server', {
      baseUrl: config.baseUrl,
      schemaUrl: config.schemaUrl,
    });

    const server = new CareMcpServer({ config, logger });
    await server.initialize();
    await server.runStdio();

    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down`);
      try {
        await server.stop();
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', toError(error));
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error('Fatal error', toError(error));
    process.exit(1);
  }
}

void main();
