#!/usr/bin/env node
/**
 * Google Keep MCP Server
 *
 * MCP tools for a Google Keep account:
 * - Finding and reading notes
 * - Creating notes (tagged with the keep-mcp label)
 * - Updating and deleting notes the server owns
 *
 * Configuration via environment variables (or a .env file):
 *   GOOGLE_EMAIL, GOOGLE_MASTER_TOKEN - Keep credentials
 *   UNSAFE_MODE                       - allow edits to notes without the keep-mcp label
 *   MCP_TRANSPORT                     - "http" (default) or "stdio"
 *   MCP_HOST, MCP_PORT, MCP_PATH      - HTTP bind address, port and endpoint path
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createSessionProvider, loginWithMasterToken } from "./keep/session.js";
import { createLogger } from "./logger.js";
import { createMcpHttpApp } from "./mcp-http.js";
import { NoteService } from "./notes/service.js";
import { createMcpServer } from "./server.js";

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, "keep-notes-mcp");

  if (!config.keep.email || !config.keep.masterToken) {
    logger.warn("GOOGLE_EMAIL or GOOGLE_MASTER_TOKEN is not set; Keep calls will fail until they are");
  }
  if (config.unsafeMode) {
    logger.warn("UNSAFE_MODE is enabled: notes without the keep-mcp label can be modified");
  }

  const getClient = createSessionProvider(() => loginWithMasterToken(config.keep, logger), logger);
  const service = new NoteService(getClient, { unsafeMode: config.unsafeMode, logger });

  if (config.mcp.transport === "stdio") {
    const server = createMcpServer(service, logger);
    await server.connect(new StdioServerTransport());
    logger.info("Keep MCP server running on stdio");
    return;
  }

  const { host, port, path } = config.mcp;
  const { app, closeAll } = createMcpHttpApp({
    path,
    createServer: () => createMcpServer(service, logger),
    getClient,
    logger,
  });

  const httpServer = app.listen(port, host, () => {
    logger.info(`MCP endpoint: http://${host}:${port}${path}`);
    logger.info(`Health check: http://${host}:${port}/health`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down");
    closeAll()
      .catch((error: unknown) => logger.error({ err: error }, "Error closing MCP sessions"))
      .finally(() => httpServer.close(() => process.exit(0)));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

// Handle errors
main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
