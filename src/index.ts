#!/usr/bin/env node
import { loadConfigFromDotenv } from './config.js';
import { createDispatcher } from './dispatcher.js';
import { ConfigurationError } from './errors.js';
import { HemisServer } from './hemisServer.js';
import { logger } from './logger.js';
import { catalogue } from './tools/index.js';

async function main() {
  const config = loadConfigFromDotenv();
  const server = new HemisServer(catalogue, createDispatcher(config));
  await server.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.fatal(error.message);
  } else {
    logger.fatal({ err: error }, 'HEMIS MCP server failed to start');
  }
  process.exit(1);
});
