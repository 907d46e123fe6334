/**
 * Keep Note Tools
 *
 * MCP tools over the shared NoteService:
 * - Find notes (empty query lists everything active)
 * - Read a single note
 * - Create, update and delete notes
 *
 * Update and delete only touch notes carrying the keep-mcp label unless the
 * server runs with UNSAFE_MODE=true.
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { NoteService } from "../notes/service.js";

/**
 * Helper: wrap a JSON payload as tool text content.
 */
function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [{
      type: "text",
      text: JSON.stringify(payload, null, 2)
    }]
  };
}

/**
 * Helper: turn a thrown error into an error result the client can branch on.
 */
function errorResult(error: unknown, logger: Logger): CallToolResult {
  const { status, code, message } = describeError(error);
  if (status >= 500) {
    logger.error({ err: error }, "Tool call failed");
  }
  return {
    isError: true,
    content: [{
      type: "text",
      text: JSON.stringify({
        success: false,
        code,
        error: message
      }, null, 2)
    }]
  };
}

export function registerNoteTools(server: McpServer, service: NoteService, logger: Logger): void {

  // ============================================================
  // FIND NOTES
  // ============================================================

  server.tool(
    "find",
    `Find notes in Google Keep.

Args:
  - query (string, optional): Text to look for in titles and bodies (default: all notes)

Returns:
  JSON array of notes (id, title, text, pinned, color, labels). Archived and trashed notes are excluded.`,
    {
      query: z.string().default("").describe("Substring to match in note title or text")
    },
    async ({ query }) => {
      try {
        return jsonResult(await service.search(query));
      } catch (error) {
        return errorResult(error, logger);
      }
    }
  );

  // ============================================================
  // GET NOTE
  // ============================================================

  server.tool(
    "get_note",
    `Read one note from Google Keep.

Args:
  - note_id (string, required): ID of the note

Returns:
  The note as JSON, or a not_found error`,
    {
      note_id: z.string().min(1).describe("ID of the note")
    },
    async ({ note_id }) => {
      try {
        return jsonResult(await service.get(note_id));
      } catch (error) {
        return errorResult(error, logger);
      }
    }
  );

  // ============================================================
  // CREATE NOTE
  // ============================================================

  server.tool(
    "create_note",
    `Create a new note in Google Keep. The note is tagged with the keep-mcp label.

Args:
  - title (string, optional): Note title
  - text (string, optional): Note body

Returns:
  The created note as JSON`,
    {
      title: z.string().optional().describe("Note title"),
      text: z.string().optional().describe("Note body")
    },
    async ({ title, text }) => {
      try {
        return jsonResult(await service.create({ title, text }));
      } catch (error) {
        return errorResult(error, logger);
      }
    }
  );

  // ============================================================
  // UPDATE NOTE
  // ============================================================

  server.tool(
    "update_note",
    `Update a note's title and/or text. Omitted fields are left as they are.

Args:
  - note_id (string, required): ID of the note
  - title (string, optional): New title
  - text (string, optional): New body

Returns:
  The updated note as JSON. Fails with forbidden when the note lacks the keep-mcp label (unless UNSAFE_MODE is enabled),
  and with invalid_request when text is given for a checklist note.`,
    {
      note_id: z.string().min(1).describe("ID of the note"),
      title: z.string().optional().describe("New title"),
      text: z.string().optional().describe("New body")
    },
    async ({ note_id, title, text }) => {
      try {
        return jsonResult(await service.update(note_id, { title, text }));
      } catch (error) {
        return errorResult(error, logger);
      }
    }
  );

  // ============================================================
  // DELETE NOTE
  // ============================================================

  server.tool(
    "delete_note",
    `Delete a note (marks it for deletion in Google Keep).

Args:
  - note_id (string, required): ID of the note

Returns:
  Confirmation message. Same keep-mcp label rule as update_note.`,
    {
      note_id: z.string().min(1).describe("ID of the note")
    },
    async ({ note_id }) => {
      try {
        return jsonResult(await service.delete(note_id));
      } catch (error) {
        return errorResult(error, logger);
      }
    }
  );
}
