import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SERVICE_VERSION } from "./health.js";
import type { Logger } from "./logger.js";
import type { NoteService } from "./notes/service.js";
import { registerNoteTools } from "./tools/notes.js";

/** A fresh MCP server with the note tools registered. One per transport. */
export function createMcpServer(service: NoteService, logger: Logger): McpServer {
  const server = new McpServer({
    name: "keep-notes-mcp",
    version: SERVICE_VERSION
  });
  registerNoteTools(server, service, logger);
  return server;
}
