import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { config } from './config.js';
import { logger } from './utils/logger.js';
import type { TickerService } from './ticker/service.js';
import { toPromptResult, toToolResult } from './ticker/renderer.js';
import { UsageError, isRecord, requireTickerParams, toMcpError } from './types/api-types.js';

async function withErrorReporting<T>(
  operation: string,
  pair: string | undefined,
  handler: () => Promise<T>
): Promise<T> {
  try {
    return await handler();
  } catch (error) {
    const mcpError = toMcpError(error);
    logger.error({ operation, pair, code: mcpError.code, data: mcpError.data }, mcpError.message);
    throw mcpError;
  }
}

function pairOf(args: unknown): string | undefined {
  return isRecord(args) && typeof args.pair === 'string' ? args.pair : undefined;
}

/**
 * Builds an MCP server exposing the ticker pipeline as the `get_ticker` tool
 * and the `kraken-ticker` prompt. Transport is attached by the caller.
 */
export function createKrakenServer(tickers: TickerService): Server {
  const server = new Server(
    {
      name: config.NAME,
      version: config.VERSION,
    },
    {
      capabilities: {
        tools: { listChanged: true },
        prompts: { listChanged: true },
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: config.TOOL_NAME,
          description: "Get ticker information for a trading pair from Kraken",
          inputSchema: {
            type: "object",
            properties: {
              pair: {
                type: "string",
                description: config.PAIR_DESCRIPTION
              }
            },
            required: ["pair"]
          }
        }
      ]
    };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const args = request.params.arguments;
    return withErrorReporting(request.params.name, pairOf(args), async () => {
      if (request.params.name !== config.TOOL_NAME) {
        throw new UsageError(`Unknown tool: ${request.params.name}`);
      }
      const { pair } = requireTickerParams(args);
      const snapshot = await tickers.getSnapshot(pair);
      return toToolResult(snapshot);
    });
  });

  // List available prompts
  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: [
        {
          name: config.PROMPT_NAME,
          description: "Get ticker information for a trading pair from Kraken",
          arguments: [
            {
              name: "pair",
              description: config.PAIR_DESCRIPTION,
              required: true
            }
          ]
        }
      ]
    };
  });

  // Handle prompt requests
  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const args = request.params.arguments;
    return withErrorReporting(request.params.name, pairOf(args), async () => {
      if (request.params.name !== config.PROMPT_NAME) {
        throw new UsageError(`Unknown prompt: ${request.params.name}`);
      }
      const { pair } = requireTickerParams(args);
      const snapshot = await tickers.getSnapshot(pair);
      return toPromptResult(snapshot);
    });
  });

  return server;
}
