#!/usr/bin/env node
/**
 * Google Keep REST API
 *
 * Configuration via environment variables (or a .env file):
 *   GOOGLE_EMAIL, GOOGLE_MASTER_TOKEN - Keep credentials
 *   UNSAFE_MODE                       - allow edits to notes without the keep-mcp label
 *   REST_API_HOST, REST_API_PORT      - bind address and port
 */

import "dotenv/config";
import { loadConfig } from "./config.js";
import { createSessionProvider, loginWithMasterToken } from "./keep/session.js";
import { createLogger } from "./logger.js";
import { NoteService } from "./notes/service.js";
import { createRestApp } from "./rest/app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, "keep-notes-rest");

  if (config.unsafeMode) {
    logger.warn("UNSAFE_MODE is enabled: notes without the keep-mcp label can be modified");
  }

  const getClient = createSessionProvider(() => loginWithMasterToken(config.keep, logger), logger);
  const service = new NoteService(getClient, { unsafeMode: config.unsafeMode, logger });
  const app = createRestApp({ service, getClient, logger });

  const { host, port } = config.rest;
  const server = app.listen(port, host, () => {
    logger.info(`Google Keep REST API listening on http://${host}:${port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down");
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
