import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Structured JSON logger writing to stderr.
 *
 * stdout stays free for MCP protocol frames when the stdio transport is used.
 */
export function createLogger(level: string, name = "keep-notes-bridge"): Logger {
  return pino(
    {
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}
