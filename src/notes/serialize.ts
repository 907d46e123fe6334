import type { Note, NoteColor } from "../keep/nodes.js";

export interface NoteRecord {
  id: string;
  title: string | null;
  text: string | null;
  pinned: boolean;
  color: NoteColor | null;
  labels: Array<{ name: string }>;
}

type SerializableNote = Pick<Note, "id" | "title" | "text" | "pinned" | "color" | "labels">;

/** Transport shape shared by the REST API and the MCP tools. Empty strings read as null. */
export function serializeNote(note: SerializableNote): NoteRecord {
  return {
    id: note.id,
    title: note.title || null,
    text: note.text || null,
    pinned: note.pinned,
    color: note.color,
    labels: note.labels.all().map((label) => ({ name: label.name })),
  };
}
