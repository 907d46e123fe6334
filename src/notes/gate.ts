import type { Note } from "../keep/nodes.js";

/** Label that marks a note as created by, and editable through, this bridge. */
export const OWNERSHIP_LABEL = "keep-mcp";

export interface GateOptions {
  /** Operator override; when set, ownership is not checked. */
  unsafeMode: boolean;
}

/**
 * Whether update/delete may touch this note: always in unsafe mode, otherwise
 * only when the note carries the ownership label.
 */
export function canModifyNote(note: Pick<Note, "labels">, options: GateOptions): boolean {
  return options.unsafeMode || note.labels.has(OWNERSHIP_LABEL);
}
