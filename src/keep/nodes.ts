/**
 * In-memory model of a Keep account: notes, their list items and labels.
 *
 * Every setter marks the node dirty; KeepClient.sync() sends dirty nodes and
 * clears the flag once the service has accepted them.
 */

import { randomBytes, randomInt } from "node:crypto";
import {
  ZERO_TIMESTAMP,
  isTimestampSet,
  type RawLabel,
  type RawLabelRef,
  type RawNode,
  type RawTimestamps,
} from "./wire.js";

export const ROOT_ID = "root";

export const NOTE_COLORS = [
  "DEFAULT",
  "RED",
  "ORANGE",
  "YELLOW",
  "GREEN",
  "TEAL",
  "BLUE",
  "CERULEAN",
  "PURPLE",
  "PINK",
  "BROWN",
  "GRAY",
] as const;

export type NoteColor = (typeof NOTE_COLORS)[number];

export type NoteType = "NOTE" | "LIST";

export function isNoteColor(value: unknown): value is NoteColor {
  return typeof value === "string" && NOTE_COLORS.some((color) => color === value);
}

/** Client-side node id: hex milliseconds, a dot, 16 random hex digits. */
export function generateNodeId(now = Date.now()): string {
  return `${now.toString(16)}.${randomBytes(8).toString("hex")}`;
}

export function generateLabelId(now = Date.now()): string {
  const alphabet = "abcdefghijklmnopqrstuvwxyz0123456789";
  let tag = "";
  for (let i = 0; i < 12; i++) {
    tag += alphabet[randomInt(alphabet.length)];
  }
  return `tag.${tag}.${now.toString(16)}`;
}

function randomSortValue(): number {
  return randomInt(1_000_000_000, 9_999_999_999);
}

function nowIso(): string {
  return new Date().toISOString();
}

function freshTimestamps(): RawTimestamps {
  const now = nowIso();
  return {
    kind: "notes#timestamps",
    created: now,
    updated: now,
    trashed: ZERO_TIMESTAMP,
    deleted: ZERO_TIMESTAMP,
    userEdited: now,
  };
}

// ============================================================
// LABEL
// ============================================================

export class Label {
  private _name: string;
  private timestamps: RawTimestamps;
  private raw: RawLabel | undefined;
  private _dirty: boolean;

  private constructor(readonly id: string, name: string, timestamps: RawTimestamps, dirty: boolean) {
    this._name = name;
    this.timestamps = timestamps;
    this._dirty = dirty;
  }

  static create(name: string): Label {
    const timestamps = freshTimestamps();
    return new Label(
      generateLabelId(),
      name,
      { kind: timestamps.kind, created: timestamps.created, updated: timestamps.updated, deleted: ZERO_TIMESTAMP },
      true,
    );
  }

  static fromRaw(raw: RawLabel): Label {
    const label = new Label(raw.mainId, raw.name, raw.timestamps, false);
    label.raw = raw;
    return label;
  }

  get name(): string {
    return this._name;
  }

  set name(value: string) {
    this._name = value;
    this.timestamps = { ...this.timestamps, updated: nowIso() };
    this._dirty = true;
  }

  get deleted(): boolean {
    return isTimestampSet(this.timestamps.deleted);
  }

  get dirty(): boolean {
    return this._dirty;
  }

  load(raw: RawLabel): void {
    this._name = raw.name;
    this.timestamps = raw.timestamps;
    this.raw = raw;
    this._dirty = false;
  }

  markClean(): void {
    this._dirty = false;
  }

  save(): RawLabel {
    return {
      ...this.raw,
      mainId: this.id,
      name: this._name,
      timestamps: { ...this.timestamps, kind: "notes#timestamps" },
      lastMerged: this.raw?.lastMerged ?? ZERO_TIMESTAMP,
    };
  }
}

// ============================================================
// LIST ITEM
// ============================================================

/** A child node holding text. Plain notes keep their body in a single item. */
export class ListItem {
  serverId: string | undefined;
  private _text: string;
  private _checked: boolean;
  private sortValue: number | string;
  private timestamps: RawTimestamps;
  private baseVersion: string | undefined;
  private raw: RawNode | undefined;
  private _dirty: boolean;

  private constructor(readonly id: string, readonly parentId: string, text: string, dirty: boolean) {
    this._text = text;
    this._checked = false;
    this.sortValue = randomSortValue();
    this.timestamps = freshTimestamps();
    this._dirty = dirty;
  }

  static create(parentId: string, text: string): ListItem {
    return new ListItem(generateNodeId(), parentId, text, true);
  }

  static fromRaw(raw: RawNode): ListItem {
    const item = new ListItem(raw.id, raw.parentId, raw.text ?? "", false);
    item.load(raw);
    return item;
  }

  get text(): string {
    return this._text;
  }

  set text(value: string) {
    this._text = value;
    this.touch();
  }

  get checked(): boolean {
    return this._checked;
  }

  get deleted(): boolean {
    return isTimestampSet(this.timestamps.deleted);
  }

  get dirty(): boolean {
    return this._dirty;
  }

  load(raw: RawNode): void {
    this.serverId = raw.serverId ?? this.serverId;
    this._text = raw.text ?? "";
    this._checked = raw.checked ?? false;
    this.sortValue = raw.sortValue ?? this.sortValue;
    this.timestamps = raw.timestamps;
    this.baseVersion = raw.baseVersion ?? this.baseVersion;
    this.raw = raw;
    this._dirty = false;
  }

  markClean(): void {
    this._dirty = false;
  }

  save(parentServerId: string | undefined): RawNode {
    return {
      ...this.raw,
      id: this.id,
      kind: "notes#node",
      type: "LIST_ITEM",
      parentId: this.parentId,
      ...(parentServerId ? { parentServerId } : {}),
      ...(this.serverId ? { serverId: this.serverId } : {}),
      ...(this.baseVersion ? { baseVersion: this.baseVersion } : {}),
      sortValue: this.sortValue,
      text: this._text,
      checked: this._checked,
      timestamps: { ...this.timestamps, kind: "notes#timestamps" },
    };
  }

  private touch(): void {
    const now = nowIso();
    this.timestamps = { ...this.timestamps, updated: now, userEdited: now };
    this._dirty = true;
  }
}

// ============================================================
// NOTE LABELS
// ============================================================

interface LabelEntry {
  labelId: string;
  label: Label | undefined;
  deleted: string;
}

/** Label associations of one note, in the order they were attached. */
export class NoteLabels {
  private readonly entries = new Map<string, LabelEntry>();

  constructor(private readonly onChange: () => void) {}

  add(label: Label): void {
    this.entries.set(label.id, { labelId: label.id, label, deleted: ZERO_TIMESTAMP });
    this.onChange();
  }

  remove(label: Label): void {
    const entry = this.entries.get(label.id);
    if (!entry) return;
    this.entries.set(label.id, { ...entry, deleted: nowIso() });
    this.onChange();
  }

  /** Membership test over active labels; names compare case-insensitively, as Keep does. */
  has(name: string): boolean {
    const wanted = name.toLowerCase();
    return this.all().some((label) => label.name.toLowerCase() === wanted);
  }

  all(): Label[] {
    const labels: Label[] = [];
    for (const entry of this.entries.values()) {
      if (entry.label && !isTimestampSet(entry.deleted) && !entry.label.deleted) {
        labels.push(entry.label);
      }
    }
    return labels;
  }

  load(refs: RawLabelRef[], resolve: (labelId: string) => Label | undefined): void {
    this.entries.clear();
    for (const ref of refs) {
      this.entries.set(ref.labelId, {
        labelId: ref.labelId,
        label: resolve(ref.labelId),
        deleted: ref.deleted ?? ZERO_TIMESTAMP,
      });
    }
  }

  save(): RawLabelRef[] {
    return Array.from(this.entries.values(), (entry) => ({
      labelId: entry.labelId,
      deleted: entry.deleted,
    }));
  }
}

// ============================================================
// NOTE
// ============================================================

const NEW_NODE_DEFAULTS = {
  nodeSettings: {
    newListItemPlacement: "BOTTOM",
    graveyardState: "COLLAPSED",
    checkedListItemsPolicy: "GRAVEYARD",
  },
  annotationsGroup: {},
} as const;

/** A top-level note, either a plain text note or a checklist. */
export class Note {
  serverId: string | undefined;
  readonly labels: NoteLabels;
  private _title = "";
  private _color: NoteColor | null = "DEFAULT";
  private _pinned = false;
  private _archived = false;
  private sortValue: number | string;
  private timestamps: RawTimestamps;
  private baseVersion: string | undefined;
  private raw: RawNode | undefined;
  private readonly items = new Map<string, ListItem>();
  private _dirty: boolean;

  private constructor(readonly id: string, readonly type: NoteType, dirty: boolean) {
    this.labels = new NoteLabels(() => this.touch());
    this.sortValue = randomSortValue();
    this.timestamps = freshTimestamps();
    this._dirty = dirty;
  }

  static create(type: NoteType = "NOTE"): Note {
    return new Note(generateNodeId(), type, true);
  }

  static fromRaw(raw: RawNode, resolveLabel: (labelId: string) => Label | undefined): Note {
    const note = new Note(raw.id, raw.type === "LIST" ? "LIST" : "NOTE", false);
    note.load(raw, resolveLabel);
    return note;
  }

  get title(): string {
    return this._title;
  }

  set title(value: string) {
    this._title = value;
    this.touch();
  }

  /**
   * Body text. Plain notes store it in their first list item; checklists
   * render every item on its own line with a checkbox.
   */
  get text(): string {
    const items = this.activeItems();
    if (this.type === "LIST") {
      return items.map((item) => `${item.checked ? "☑" : "☐"} ${item.text}`).join("\n");
    }
    return items[0]?.text ?? "";
  }

  set text(value: string) {
    if (this.type === "LIST") {
      throw new Error(`Note ${this.id} is a checklist; its text cannot be replaced`);
    }
    const [first] = this.activeItems();
    if (first) {
      first.text = value;
    } else {
      const item = ListItem.create(this.id, value);
      this.items.set(item.id, item);
    }
    this.touch();
  }

  get color(): NoteColor | null {
    return this._color;
  }

  set color(value: NoteColor) {
    this._color = value;
    this.touch();
  }

  get pinned(): boolean {
    return this._pinned;
  }

  set pinned(value: boolean) {
    this._pinned = value;
    this.touch();
  }

  get archived(): boolean {
    return this._archived;
  }

  set archived(value: boolean) {
    this._archived = value;
    this.touch();
  }

  get trashed(): boolean {
    return isTimestampSet(this.timestamps.trashed);
  }

  get deleted(): boolean {
    return isTimestampSet(this.timestamps.deleted);
  }

  /** Marks the note deleted; the service drops it on the next sync. */
  delete(): void {
    this.timestamps = { ...this.timestamps, deleted: nowIso() };
    this._dirty = true;
  }

  get dirty(): boolean {
    return this._dirty;
  }

  /** This note and any of its items with unsent changes. */
  dirtyNodes(): RawNode[] {
    const nodes: RawNode[] = [];
    if (this._dirty) nodes.push(this.save());
    for (const item of this.items.values()) {
      if (item.dirty) nodes.push(item.save(this.serverId));
    }
    return nodes;
  }

  markClean(): void {
    this._dirty = false;
    for (const item of this.items.values()) {
      item.markClean();
    }
  }

  attachItem(item: ListItem): void {
    this.items.set(item.id, item);
  }

  detachItem(itemId: string): void {
    this.items.delete(itemId);
  }

  load(raw: RawNode, resolveLabel: (labelId: string) => Label | undefined): void {
    this.serverId = raw.serverId ?? this.serverId;
    this._title = raw.title ?? "";
    this._color = isNoteColor(raw.color) ? raw.color : null;
    this._pinned = raw.isPinned ?? false;
    this._archived = raw.isArchived ?? false;
    this.sortValue = raw.sortValue ?? this.sortValue;
    this.timestamps = raw.timestamps;
    this.baseVersion = raw.baseVersion ?? this.baseVersion;
    this.labels.load(raw.labelIds ?? [], resolveLabel);
    this.raw = raw;
    this._dirty = false;
  }

  save(): RawNode {
    return {
      ...(this.raw ? {} : NEW_NODE_DEFAULTS),
      ...this.raw,
      id: this.id,
      kind: "notes#node",
      type: this.type,
      parentId: ROOT_ID,
      ...(this.serverId ? { serverId: this.serverId } : {}),
      ...(this.baseVersion ? { baseVersion: this.baseVersion } : {}),
      sortValue: this.sortValue,
      title: this._title,
      text: "",
      color: this._color ?? "DEFAULT",
      isArchived: this._archived,
      isPinned: this._pinned,
      timestamps: { ...this.timestamps, kind: "notes#timestamps" },
      labelIds: this.labels.save(),
    };
  }

  private activeItems(): ListItem[] {
    return Array.from(this.items.values()).filter((item) => !item.deleted);
  }

  private touch(): void {
    const now = nowIso();
    this.timestamps = { ...this.timestamps, updated: now, userEdited: now };
    this._dirty = true;
  }
}
