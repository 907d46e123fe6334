/**
 * In-process stand-in for the Keep `changes` endpoint.
 *
 * Stores whatever nodes and labels it receives, assigns server ids to new
 * nodes and echoes them back. A request without targetVersion gets the whole
 * account, which is what a fresh session asks for.
 */

import { pino } from "pino";
import { KeepClient, type ChangesApi } from "../keep/client.js";
import type { Logger } from "../logger.js";
import { ZERO_TIMESTAMP, type ChangesRequest, type ChangesResponse, type RawLabel, type RawNode } from "../keep/wire.js";

export const silentLogger: Logger = pino({ level: "silent" });

const SEEDED_AT = "2024-05-01T10:00:00.000Z";

export interface SeedNote {
  id: string;
  title?: string;
  text?: string;
  labelIds?: string[];
  pinned?: boolean;
  color?: string;
  archived?: boolean;
  trashed?: boolean;
  /** Seed a checklist instead of a plain note. */
  list?: boolean;
}

/** A NOTE (or LIST) node and the list item holding its text. */
export function rawNote(seed: SeedNote): RawNode[] {
  const note: RawNode = {
    id: seed.id,
    serverId: `srv-${seed.id}`,
    kind: "notes#node",
    type: seed.list ? "LIST" : "NOTE",
    parentId: "root",
    title: seed.title ?? "",
    text: "",
    color: seed.color ?? "DEFAULT",
    isPinned: seed.pinned ?? false,
    isArchived: seed.archived ?? false,
    baseVersion: "1",
    timestamps: {
      kind: "notes#timestamps",
      created: SEEDED_AT,
      updated: SEEDED_AT,
      trashed: seed.trashed ? SEEDED_AT : ZERO_TIMESTAMP,
      deleted: ZERO_TIMESTAMP,
    },
    labelIds: (seed.labelIds ?? []).map((labelId) => ({ labelId, deleted: ZERO_TIMESTAMP })),
  };
  const item: RawNode = {
    id: `${seed.id}.item`,
    serverId: `srv-${seed.id}.item`,
    kind: "notes#node",
    type: "LIST_ITEM",
    parentId: seed.id,
    text: seed.text ?? "",
    checked: false,
    baseVersion: "1",
    timestamps: { kind: "notes#timestamps", created: SEEDED_AT, updated: SEEDED_AT, deleted: ZERO_TIMESTAMP },
  };
  return [note, item];
}

export function rawLabel(id: string, name: string): RawLabel {
  return {
    mainId: id,
    name,
    timestamps: { kind: "notes#timestamps", created: SEEDED_AT, updated: SEEDED_AT, deleted: ZERO_TIMESTAMP },
  };
}

export class FakeKeepApi implements ChangesApi {
  readonly requests: ChangesRequest[] = [];
  readonly nodes = new Map<string, RawNode>();
  readonly labels = new Map<string, RawLabel>();
  private version = 1;
  private nextServerId = 1;
  private failure: Error | undefined;

  constructor(seed: { nodes?: RawNode[]; labels?: RawLabel[] } = {}) {
    for (const node of seed.nodes ?? []) this.nodes.set(node.id, node);
    for (const label of seed.labels ?? []) this.labels.set(label.mainId, label);
  }

  /** Makes the next changes() call reject with `error`. */
  failNext(error: Error): void {
    this.failure = error;
  }

  async changes(request: ChangesRequest): Promise<ChangesResponse> {
    this.requests.push(request);
    if (this.failure) {
      const error = this.failure;
      this.failure = undefined;
      throw error;
    }

    const echoed: RawNode[] = request.nodes.map((node) => {
      const stored: RawNode = {
        ...node,
        serverId: node.serverId ?? this.nodes.get(node.id)?.serverId ?? `srv-${this.nextServerId++}`,
        baseVersion: String(this.version + 1),
      };
      this.nodes.set(stored.id, stored);
      return stored;
    });
    for (const label of request.userInfo?.labels ?? []) {
      this.labels.set(label.mainId, label);
    }

    this.version++;
    const full = request.targetVersion === undefined;
    return {
      nodes: full ? Array.from(this.nodes.values()) : echoed,
      userInfo: { labels: Array.from(this.labels.values()) },
      toVersion: String(this.version),
      truncated: false,
    };
  }

  /** Labels the fake account holds under `name`. */
  labelsNamed(name: string): RawLabel[] {
    return Array.from(this.labels.values()).filter((label) => label.name === name);
  }
}

/** A KeepClient that has completed its first sync against `api`. */
export async function connectedClient(api: FakeKeepApi): Promise<KeepClient> {
  const client = new KeepClient(api, silentLogger);
  await client.sync();
  return client;
}
