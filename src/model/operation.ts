import type { AuthorId, EntryId, Timestamp } from "../types/brands";

/* ── operations ──────────────────────────────────────────── */

interface OpBase {
  readonly entryId: EntryId;
  readonly authorId: AuthorId;
  readonly timestamp: Timestamp; // caller-supplied, not wall-clock
}

export interface AddName extends OpBase {
  readonly kind: "addName";
  readonly name: string;
}

export interface RemoveName extends OpBase {
  readonly kind: "removeName";
}

export interface MarkDone extends OpBase {
  readonly kind: "markDone";
}

export interface MarkUndone extends OpBase {
  readonly kind: "markUndone";
}

export type NameOp = AddName | RemoveName;
export type StateOp = MarkDone | MarkUndone;
export type Operation = NameOp | StateOp;
export type OpKind = Operation["kind"];

/* ── slots ───────────────────────────────────────────────── */

// name and state are resolved independently of each other
export type Slot = "name" | "state";

export const slotOf = (op: Operation): Slot => {
  switch (op.kind) {
    case "addName":
    case "removeName":
      return "name";
    case "markDone":
    case "markUndone":
      return "state";
  }
};

export const isNameOp = (op: Operation): op is NameOp =>
  op.kind === "addName" || op.kind === "removeName";

export const isStateOp = (op: Operation): op is StateOp =>
  op.kind === "markDone" || op.kind === "markUndone";

/* ── derived entry ───────────────────────────────────────── */

export type EntryState = "undone" | "done";

export interface Entry {
  readonly id: EntryId;
  readonly name: string;
  readonly state: EntryState;
}
