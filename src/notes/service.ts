/**
 * Note operations shared by the REST API and the MCP tools.
 *
 * Mutations (create, update, delete) run one at a time: each one edits the
 * session's note graph and syncs before the next starts, so two requests
 * never interleave their edits inside a single sync. Reads are not queued.
 */

import { InvalidNoteUpdateError, NoteForbiddenError, NoteNotFoundError } from "../errors.js";
import type { KeepSession } from "../keep/client.js";
import type { Note } from "../keep/nodes.js";
import type { SessionProvider } from "../keep/session.js";
import type { Logger } from "../logger.js";
import { OWNERSHIP_LABEL, canModifyNote } from "./gate.js";
import { serializeNote, type NoteRecord } from "./serialize.js";

export interface NoteInput {
  title?: string;
  text?: string;
}

export interface DeleteResult {
  message: string;
  status: "success";
}

export interface NoteServiceOptions {
  unsafeMode: boolean;
  logger: Logger;
}

export class NoteService {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly getClient: SessionProvider,
    private readonly options: NoteServiceOptions,
  ) {}

  /** Active (not archived, not trashed) notes matching `query`; "" lists all. */
  async search(query = ""): Promise<NoteRecord[]> {
    const keep = await this.getClient();
    return keep.find(query, { archived: false, trashed: false }).map(serializeNote);
  }

  async get(noteId: string): Promise<NoteRecord> {
    const keep = await this.getClient();
    return serializeNote(this.requireNote(keep, noteId));
  }

  create(input: NoteInput): Promise<NoteRecord> {
    return this.exclusive(async () => {
      const keep = await this.getClient();
      const note = keep.createNote(input.title, input.text);

      const label = keep.findLabel(OWNERSHIP_LABEL) ?? keep.createLabel(OWNERSHIP_LABEL);
      note.labels.add(label);

      await keep.sync();
      this.options.logger.info({ noteId: note.id }, "Created note");
      return serializeNote(note);
    });
  }

  /**
   * Partial update: only the fields present in `input` are written. Every
   * check runs before the first field changes, so a rejected update leaves
   * nothing behind for a later sync to send.
   */
  update(noteId: string, input: NoteInput): Promise<NoteRecord> {
    return this.exclusive(async () => {
      const keep = await this.getClient();
      const note = this.requireNote(keep, noteId);
      this.assertModifiable(note, noteId);
      if (input.text !== undefined && note.type === "LIST") {
        throw new InvalidNoteUpdateError(noteId, "it is a checklist and its text cannot be replaced");
      }

      if (input.title !== undefined) note.title = input.title;
      if (input.text !== undefined) note.text = input.text;

      await keep.sync();
      this.options.logger.info({ noteId }, "Updated note");
      return serializeNote(note);
    });
  }

  delete(noteId: string): Promise<DeleteResult> {
    return this.exclusive(async () => {
      const keep = await this.getClient();
      const note = this.requireNote(keep, noteId);
      this.assertModifiable(note, noteId);

      note.delete();
      await keep.sync();
      this.options.logger.info({ noteId }, "Deleted note");
      return { message: `Note ${noteId} marked for deletion`, status: "success" };
    });
  }

  private requireNote(keep: KeepSession, noteId: string): Note {
    const note = keep.get(noteId);
    if (!note) throw new NoteNotFoundError(noteId);
    return note;
  }

  private assertModifiable(note: Note, noteId: string): void {
    if (!canModifyNote(note, { unsafeMode: this.options.unsafeMode })) {
      throw new NoteForbiddenError(noteId, OWNERSHIP_LABEL);
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller sees the outcome through `run`; the queue only tracks completion.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
