import { randomUUID } from 'node:crypto';
import type { Server as HttpServer } from 'node:http';
import express, { type Express, type Request, type Response } from 'express';
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { ErrorCode, isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

export interface RunningTransport {
  close(): Promise<void>;
}

export interface HttpTransportOptions {
  host: string;
  port: number;
  stateless: boolean;
  /** Stateful sessions with no request for this long are closed. */
  sessionIdleMs?: number;
}

export interface McpHttpApp {
  app: Express;
  /** Open sessions keyed by `mcp-session-id`; always empty in stateless mode. */
  sessions: Map<string, StreamableHTTPServerTransport>;
  /** Closes sessions idle since before `now - sessionIdleMs`; resolves to how many were closed. */
  sweepIdleSessions(now?: number): Promise<number>;
  closeSessions(): Promise<void>;
}

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

function reportFailure(res: Response, error: unknown): void {
  logger.error({ err: error }, 'Error handling MCP HTTP request');
  if (!res.headersSent) {
    res.status(500).json(jsonRpcError(ErrorCode.InternalError, 'Internal server error'));
  }
}

/**
 * Express app serving MCP over streamable HTTP at `/mcp`.
 *
 * Stateful mode keeps one transport (and one server from the factory) per
 * session. Stateless mode builds both for every POST and drops them once the
 * response closes.
 */
export function createHttpApp(
  serverFactory: () => Server,
  options: Pick<HttpTransportOptions, 'stateless' | 'sessionIdleMs'>
): McpHttpApp {
  const idleMs = options.sessionIdleMs ?? config.SESSION_IDLE_MS;
  const app = express();
  app.use(express.json());

  const sessions = new Map<string, StreamableHTTPServerTransport>();
  const lastSeen = new Map<string, number>();

  // Clients that vanish without DELETE would otherwise hold their session until shutdown.
  // An open GET stream counts as activity only when it starts.
  const sweepIdleSessions = async (now = Date.now()) => {
    const idle = [...lastSeen].filter(([, seen]) => now - seen > idleMs).map(([id]) => id);
    await Promise.all(idle.map(async (id) => {
      const transport = sessions.get(id);
      sessions.delete(id);
      lastSeen.delete(id);
      if (transport) {
        logger.info({ sessionId: id }, 'Closing idle MCP session');
        await transport.close();
      }
    }));
    return idle.length;
  };

  const sweeper = options.stateless
    ? undefined
    : setInterval(() => {
      sweepIdleSessions().catch((error: unknown) => {
        logger.warn({ err: error }, 'Failed to close idle MCP sessions');
      });
    }, Math.min(idleMs, config.SESSION_SWEEP_INTERVAL_MS));
  sweeper?.unref();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: config.NAME,
      version: config.VERSION,
      mode: options.stateless ? 'stateless' : 'stateful'
    });
  });

  if (options.stateless) {
    app.post(config.MCP_PATH, async (req: Request, res: Response) => {
      const server = serverFactory();
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
      res.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          logger.warn({ err: error }, 'Failed to release stateless MCP request');
        });
      });

      try {
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        reportFailure(res, error);
      }
    });

    const methodNotAllowed = (_req: Request, res: Response) => {
      res.status(405).json(jsonRpcError(ErrorCode.ConnectionClosed, 'Method not allowed.'));
    };
    app.get(config.MCP_PATH, methodNotAllowed);
    app.delete(config.MCP_PATH, methodNotAllowed);
  } else {
    app.post(config.MCP_PATH, async (req: Request, res: Response) => {
      try {
        const sessionId = req.header('mcp-session-id');
        let transport = sessionId ? sessions.get(sessionId) : undefined;
        if (sessionId && transport) {
          lastSeen.set(sessionId, Date.now());
        }

        if (!transport) {
          if (sessionId || !isInitializeRequest(req.body)) {
            res.status(400).json(jsonRpcError(ErrorCode.ConnectionClosed, config.ERRORS.INVALID_SESSION));
            return;
          }

          const created = new StreamableHTTPServerTransport({
            sessionIdGenerator: () => randomUUID(),
            onsessioninitialized: (id) => {
              sessions.set(id, created);
              lastSeen.set(id, Date.now());
              logger.info({ sessionId: id }, 'MCP session opened');
            }
          });
          created.onclose = () => {
            if (created.sessionId) {
              sessions.delete(created.sessionId);
              lastSeen.delete(created.sessionId);
              logger.info({ sessionId: created.sessionId }, 'MCP session closed');
            }
          };
          await serverFactory().connect(created);
          transport = created;
        }

        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        reportFailure(res, error);
      }
    });

    // SSE stream (GET) and session termination (DELETE)
    const sessionRequest = async (req: Request, res: Response) => {
      const sessionId = req.header('mcp-session-id');
      const transport = sessionId ? sessions.get(sessionId) : undefined;
      if (!sessionId || !transport) {
        res.status(400).json(jsonRpcError(ErrorCode.ConnectionClosed, config.ERRORS.INVALID_SESSION));
        return;
      }
      lastSeen.set(sessionId, Date.now());
      try {
        await transport.handleRequest(req, res);
      } catch (error) {
        reportFailure(res, error);
      }
    };
    app.get(config.MCP_PATH, sessionRequest);
    app.delete(config.MCP_PATH, sessionRequest);
  }

  return {
    app,
    sessions,
    sweepIdleSessions,
    closeSessions: async () => {
      if (sweeper) {
        clearInterval(sweeper);
      }
      await Promise.all([...sessions.values()].map((transport) => transport.close()));
      sessions.clear();
      lastSeen.clear();
    }
  };
}

export async function startHttpTransport(
  serverFactory: () => Server,
  options: HttpTransportOptions
): Promise<RunningTransport> {
  const { app, closeSessions } = createHttpApp(serverFactory, options);

  const httpServer = await new Promise<HttpServer>((resolve, reject) => {
    const listener = app.listen(options.port, options.host, () => resolve(listener));
    listener.once('error', reject);
  });

  logger.info(
    { host: options.host, port: options.port, stateless: options.stateless },
    `Kraken MCP server listening on http://${options.host}:${options.port}${config.MCP_PATH}`
  );

  return {
    close: async () => {
      await closeSessions();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    }
  };
}
