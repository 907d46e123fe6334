/**
 * KeepClient: the account's note graph plus the sync loop that reconciles it
 * with the service.
 *
 * Local edits only touch the in-memory nodes. sync() sends every dirty node
 * (and the label list when any label changed), then folds the service's
 * response back in, following `truncated` pages until the account is current.
 */

import { randomInt } from "node:crypto";
import type { Logger } from "../logger.js";
import { KeepApiError } from "../errors.js";
import { Label, ListItem, Note, ROOT_ID } from "./nodes.js";
import {
  isTimestampSet,
  type ChangesRequest,
  type ChangesResponse,
  type RawLabel,
  type RawNode,
  type RequestHeader,
} from "./wire.js";

export interface ChangesApi {
  changes(request: ChangesRequest): Promise<ChangesResponse>;
}

export interface FindOptions {
  archived?: boolean;
  trashed?: boolean;
}

/** What the note service needs from an authenticated account. */
export interface KeepSession {
  find(query: string, options?: FindOptions): Note[];
  get(noteId: string): Note | undefined;
  createNote(title?: string, text?: string): Note;
  findLabel(name: string): Label | undefined;
  createLabel(name: string): Label;
  sync(): Promise<void>;
}

const CAPABILITIES = ["NC", "PI", "LB", "AN", "SH", "DR", "TR", "IN", "SNB", "MI", "CO"];

function createSessionId(): string {
  return `s--${Date.now()}--${randomInt(1_000_000_000, 9_999_999_999)}`;
}

export class KeepClient implements KeepSession {
  private readonly notes = new Map<string, Note>();
  private readonly items = new Map<string, ListItem>();
  private readonly labels = new Map<string, Label>();
  private readonly serverIds = new Map<string, string>();
  private readonly requestHeader: RequestHeader;
  private version: string | undefined;

  constructor(
    private readonly api: ChangesApi,
    private readonly logger: Logger,
  ) {
    this.requestHeader = {
      clientSessionId: createSessionId(),
      clientPlatform: "ANDROID",
      clientVersion: { major: "9", minor: "9", build: "9", revision: "9" },
      capabilities: CAPABILITIES.map((type) => ({ type })),
    };
  }

  /** Top-level notes in the order the account delivered or created them. */
  all(): Note[] {
    return Array.from(this.notes.values());
  }

  /**
   * Notes whose title or text contains `query`. An empty query matches every
   * note. Locally deleted notes never match.
   */
  find(query: string, options: FindOptions = {}): Note[] {
    const { archived, trashed } = options;
    return this.all().filter((note) => {
      if (note.deleted) return false;
      if (archived !== undefined && note.archived !== archived) return false;
      if (trashed !== undefined && note.trashed !== trashed) return false;
      return query === "" || note.title.includes(query) || note.text.includes(query);
    });
  }

  /** Looks a note up by client id, falling back to its server id. */
  get(noteId: string): Note | undefined {
    const direct = this.notes.get(noteId);
    if (direct) return direct;
    const mapped = this.serverIds.get(noteId);
    return mapped ? this.notes.get(mapped) : undefined;
  }

  createNote(title?: string, text?: string): Note {
    const note = Note.create();
    if (title !== undefined) note.title = title;
    if (text !== undefined) note.text = text;
    this.notes.set(note.id, note);
    return note;
  }

  /** Case-insensitive lookup over labels that are not deleted. */
  findLabel(name: string): Label | undefined {
    const wanted = name.toLowerCase();
    for (const label of this.labels.values()) {
      if (!label.deleted && label.name.toLowerCase() === wanted) return label;
    }
    return undefined;
  }

  createLabel(name: string): Label {
    if (this.findLabel(name)) {
      throw new Error(`Label already exists: ${name}`);
    }
    const label = Label.create(name);
    this.labels.set(label.id, label);
    return label;
  }

  getLabels(): Label[] {
    return Array.from(this.labels.values()).filter((label) => !label.deleted);
  }

  async sync(): Promise<void> {
    let page = 0;
    for (;;) {
      const pending = this.all()
        .map((note) => ({ note, nodes: note.dirtyNodes() }))
        .filter((entry) => entry.nodes.length > 0);
      const nodes = pending.flatMap((entry) => entry.nodes);
      const labelsChanged = Array.from(this.labels.values()).some((label) => label.dirty);

      const request: ChangesRequest = {
        nodes,
        clientTimestamp: new Date().toISOString(),
        requestHeader: this.requestHeader,
        ...(this.version ? { targetVersion: this.version } : {}),
        ...(labelsChanged
          ? { userInfo: { labels: Array.from(this.labels.values(), (label) => label.save()) } }
          : {}),
      };

      this.logger.debug({ page, nodes: nodes.length, labelsChanged }, "Sending Keep changes");
      const response = await this.api.changes(request);

      if (response.forceFullResync) {
        throw new KeepApiError("Keep requested a full resync; reconnect the session");
      }

      for (const { note } of pending) note.markClean();
      for (const label of this.labels.values()) label.markClean();

      this.applyLabels(response.userInfo?.labels ?? []);
      this.applyNodes(response.nodes);
      this.purgeDeleted();

      if (response.toVersion) this.version = response.toVersion;
      page++;

      if (!response.truncated) break;
    }
  }

  private applyLabels(rawLabels: RawLabel[]): void {
    for (const raw of rawLabels) {
      const existing = this.labels.get(raw.mainId);
      if (isTimestampSet(raw.timestamps.deleted)) {
        this.labels.delete(raw.mainId);
      } else if (existing) {
        existing.load(raw);
      } else {
        this.labels.set(raw.mainId, Label.fromRaw(raw));
      }
    }
  }

  private applyNodes(rawNodes: RawNode[]): void {
    const resolveLabel = (labelId: string) => this.labels.get(labelId);

    // Parents first so items can attach in the same pass.
    for (const raw of rawNodes) {
      if (raw.type !== "NOTE" && raw.type !== "LIST") continue;
      if (raw.serverId) this.serverIds.set(raw.serverId, raw.id);

      const existing = this.notes.get(raw.id);
      if (existing) {
        existing.load(raw, resolveLabel);
      } else if (raw.parentId === ROOT_ID) {
        this.notes.set(raw.id, Note.fromRaw(raw, resolveLabel));
      }
    }

    for (const raw of rawNodes) {
      if (raw.type !== "LIST_ITEM") continue;

      const existing = this.items.get(raw.id);
      if (existing) {
        existing.load(raw);
      } else {
        this.items.set(raw.id, ListItem.fromRaw(raw));
      }
    }

    for (const item of this.items.values()) {
      this.notes.get(item.parentId)?.attachItem(item);
    }
  }

  private purgeDeleted(): void {
    for (const [id, note] of this.notes) {
      if (!note.deleted) continue;
      this.notes.delete(id);
      if (note.serverId) this.serverIds.delete(note.serverId);
    }
    for (const [id, item] of this.items) {
      if (!item.deleted) continue;
      this.notes.get(item.parentId)?.detachItem(id);
      this.items.delete(id);
    }
  }
}
