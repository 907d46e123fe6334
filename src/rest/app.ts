/**
 * REST API over the same NoteService the MCP tools use.
 *
 *   GET    /                      - service description
 *   GET    /health, /api/health   - Keep connectivity (503 when unhealthy)
 *   GET    /api/notes/search?query=
 *   GET    /api/notes             - same as search with an empty query
 *   GET    /api/notes/:id
 *   POST   /api/notes             - { title?, text? }
 *   PUT    /api/notes/:id         - { title?, text? }, partial update
 *   DELETE /api/notes/:id
 *
 * Errors are returned as { detail } with the status from describeError().
 */

import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { describeError } from "../errors.js";
import { SERVICE_VERSION, checkHealth } from "../health.js";
import type { SessionProvider } from "../keep/session.js";
import type { Logger } from "../logger.js";
import type { NoteInput, NoteService } from "../notes/service.js";

export interface RestAppOptions {
  service: NoteService;
  getClient: SessionProvider;
  logger: Logger;
}

// null is accepted and treated like an omitted field.
const noteInputSchema = z.object({
  title: z.string().nullish(),
  text: z.string().nullish(),
});

class RequestValidationError extends Error {
  override readonly name = "RequestValidationError";

  constructor(readonly issues: z.ZodIssue[]) {
    super("Invalid request body");
  }
}

function parseNoteInput(body: unknown): NoteInput {
  const parsed = noteInputSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new RequestValidationError(parsed.error.issues);
  }
  return {
    title: parsed.data.title ?? undefined,
    text: parsed.data.text ?? undefined,
  };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createRestApp(options: RestAppOptions): express.Express {
  const { service, getClient, logger } = options;
  const app = express();

  app.use(cors());
  app.use(express.json());

  const health: AsyncHandler = async (_req, res) => {
    const report = await checkHealth(getClient, "google-keep-rest-api");
    res.status(report.google_keep_connected ? 200 : 503).json(report);
  };
  app.get("/health", route(health));
  app.get("/api/health", route(health));

  app.get("/", (_req, res) => {
    res.json({
      service: "Google Keep REST API",
      version: SERVICE_VERSION,
      endpoints: {
        health: "/health or /api/health",
        search: "GET /api/notes/search?query=...",
        create: "POST /api/notes",
        get: "GET /api/notes/{note_id}",
        update: "PUT /api/notes/{note_id}",
        delete: "DELETE /api/notes/{note_id}",
        list: "GET /api/notes",
      },
    });
  });

  const search = async (query: string, res: Response): Promise<void> => {
    const notes = await service.search(query);
    res.json({ notes, count: notes.length });
  };

  app.get("/api/notes/search", route(async (req, res) => {
    const { query } = req.query;
    await search(typeof query === "string" ? query : "", res);
  }));

  app.get("/api/notes", route(async (_req, res) => {
    await search("", res);
  }));

  app.get("/api/notes/:id", route(async (req, res) => {
    res.json(await service.get(req.params.id));
  }));

  app.post("/api/notes", route(async (req, res) => {
    res.json(await service.create(parseNoteInput(req.body)));
  }));

  app.put("/api/notes/:id", route(async (req, res) => {
    res.json(await service.update(req.params.id, parseNoteInput(req.body)));
  }));

  app.delete("/api/notes/:id", route(async (req, res) => {
    res.json(await service.delete(req.params.id));
  }));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RequestValidationError) {
      res.status(422).json({ detail: err.issues });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ detail: "Malformed JSON body" });
      return;
    }

    const { status, message } = describeError(err);
    if (status >= 500) {
      logger.error({ err, method: req.method, path: req.path }, "Request failed");
    }
    res.status(status).json({ detail: message });
  });

  return app;
}
