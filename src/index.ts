#!/usr/bin/env node

import { createKrakenHttpClient, KrakenRestConnector } from './connectors/kraken-rest.js';
import { resolveRuntimeOptions, USAGE } from './cli.js';
import { createKrakenServer } from './server.js';
import { TickerService } from './ticker/service.js';
import { startHttpTransport, type RunningTransport } from './transports/http.js';
import { startStdioTransport } from './transports/stdio.js';
import { logger } from './utils/logger.js';

// Start the server
async function main() {
  const options = resolveRuntimeOptions(process.argv.slice(2));
  if (options === 'help') {
    process.stderr.write(`${USAGE}\n`);
    return;
  }

  // One HTTP client for the whole process, shared by every request
  const tickers = new TickerService(new KrakenRestConnector(createKrakenHttpClient()));
  const serverFactory = () => createKrakenServer(tickers);

  const running: RunningTransport = options.transport === 'http'
    ? await startHttpTransport(serverFactory, options)
    : await startStdioTransport(serverFactory());

  logger.info({ transport: options.transport }, 'Kraken MCP server started successfully');

  // Handle cleanup on shutdown
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down server...');
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error({ err: error }, 'Failed to start server');
  process.exit(1);
});
