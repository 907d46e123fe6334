/**
 * Streamable HTTP front end for the MCP server.
 *
 *   POST   <path>  - JSON-RPC requests; an initialize request opens a session
 *   GET    <path>  - server-to-client event stream of an open session
 *   DELETE <path>  - closes a session
 *   GET /health, GET /api/health - Keep connectivity (503 when unhealthy)
 *
 * Each session gets its own McpServer + transport pair, keyed by the
 * mcp-session-id header. Sessions with no traffic for `sessionIdleMs` are
 * closed by a periodic sweep.
 */

import { randomUUID } from "node:crypto";
import cors from "cors";
import express, { type Request, type Response } from "express";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { checkHealth } from "./health.js";
import type { SessionProvider } from "./keep/session.js";
import type { Logger } from "./logger.js";

export interface McpHttpOptions {
  path: string;
  createServer: () => McpServer;
  getClient: SessionProvider;
  logger: Logger;
  /** Idle time after which a session is closed (default 30 minutes). */
  sessionIdleMs?: number;
  /** Clock used for idle tracking. */
  now?: () => number;
}

export interface McpHttpApp {
  app: express.Express;
  /** Closes sessions idle longer than `sessionIdleMs`; resolves to how many. */
  sweepIdle(): Promise<number>;
  /** Stops the idle sweep and closes every open MCP session. */
  closeAll(): Promise<void>;
}

export const DEFAULT_SESSION_IDLE_MS = 30 * 60 * 1000;

interface SessionEntry {
  transport: StreamableHTTPServerTransport;
  lastActivity: number;
}

function jsonRpcError(res: Response, status: number, message: string): void {
  res.status(status).json({
    jsonrpc: "2.0",
    error: { code: -32000, message },
    id: null,
  });
}

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

export function createMcpHttpApp(options: McpHttpOptions): McpHttpApp {
  const { path, createServer, getClient, logger } = options;
  const sessionIdleMs = options.sessionIdleMs ?? DEFAULT_SESSION_IDLE_MS;
  const now = options.now ?? Date.now;
  const sessions = new Map<string, SessionEntry>();

  const touch = (sessionId: string | undefined): StreamableHTTPServerTransport | undefined => {
    const entry = sessionId ? sessions.get(sessionId) : undefined;
    if (!entry) return undefined;
    entry.lastActivity = now();
    return entry.transport;
  };

  const app = express();
  app.use(express.json({ limit: "4mb" }));
  app.use(cors({ origin: "*", exposedHeaders: ["Mcp-Session-Id"] }));

  const health = async (_req: Request, res: Response): Promise<void> => {
    const report = await checkHealth(getClient, "google-keep-mcp");
    res.status(report.google_keep_connected ? 200 : 503).json(report);
  };
  app.get("/health", (req, res, next) => {
    health(req, res).catch(next);
  });
  app.get("/api/health", (req, res, next) => {
    health(req, res).catch(next);
  });

  const handlePost = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const existing = touch(sessionId);

    if (existing) {
      await existing.handleRequest(req, res, req.body);
      return;
    }
    if (sessionId || !isInitializeRequest(req.body)) {
      jsonRpcError(res, 400, "Bad Request: no valid session ID provided");
      return;
    }

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        sessions.set(id, { transport, lastActivity: now() });
        logger.info({ sessionId: id }, "MCP session opened");
      },
    });
    transport.onclose = () => {
      if (transport.sessionId && sessions.delete(transport.sessionId)) {
        logger.info({ sessionId: transport.sessionId }, "MCP session closed");
      }
    };

    await createServer().connect(transport);
    await transport.handleRequest(req, res, req.body);
  };

  const handleSession = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const transport = touch(sessionId);
    if (!transport) {
      jsonRpcError(res, 400, "Bad Request: invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.post(path, (req, res, next) => {
    handlePost(req, res).catch(next);
  });
  app.get(path, (req, res, next) => {
    handleSession(req, res).catch(next);
  });
  app.delete(path, (req, res, next) => {
    handleSession(req, res).catch(next);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: express.NextFunction) => {
    logger.error({ err }, "MCP HTTP request failed");
    if (!res.headersSent) {
      jsonRpcError(res, 500, "Internal server error");
    }
  });

  const sweepIdle = async (): Promise<number> => {
    const cutoff = now() - sessionIdleMs;
    const idle: Array<[string, StreamableHTTPServerTransport]> = [];
    for (const [sessionId, entry] of sessions) {
      if (entry.lastActivity <= cutoff) idle.push([sessionId, entry.transport]);
    }
    for (const [sessionId] of idle) sessions.delete(sessionId);
    await Promise.all(
      idle.map(async ([sessionId, transport]) => {
        logger.info({ sessionId }, "Closing idle MCP session");
        await transport.close();
      }),
    );
    return idle.length;
  };

  const sweeper = setInterval(() => {
    sweepIdle().catch((error: unknown) => logger.error({ err: error }, "Idle session sweep failed"));
  }, Math.min(sessionIdleMs, 60_000));
  sweeper.unref();

  return {
    app,
    sweepIdle,
    async closeAll(): Promise<void> {
      clearInterval(sweeper);
      const open = Array.from(sessions.values(), (entry) => entry.transport);
      sessions.clear();
      await Promise.all(open.map((transport) => transport.close()));
    },
  };
}
