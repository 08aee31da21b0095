import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logger } from '../utils/logger.js';
import type { RunningTransport } from './http.js';

export async function startStdioTransport(server: Server): Promise<RunningTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Kraken MCP server listening on stdio');

  return {
    close: async () => {
      await server.close();
    }
  };
}
