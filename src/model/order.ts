import { invariant } from "../errors";
import type { NameOp, Operation, StateOp } from "./operation";

/*
 * Comparators return > 0 when `a` outranks `b`, < 0 when `b` outranks `a`
 * and 0 only for operations with identical effect. The slot winner is the
 * maximal operation.
 */

// higher rank wins a timestamp tie
const NAME_TIE_RANK: Record<NameOp["kind"], number> = {
  removeName: 1,
  addName: 0,
};

// Undone < Done and the lower value wins the tie. This is the opposite
// direction from the name slot; see DESIGN.md before changing it.
const STATE_TIE_RANK: Record<StateOp["kind"], number> = {
  markUndone: 1,
  markDone: 0,
};

const cmp = (a: number, b: number) => (a < b ? -1 : a > b ? 1 : 0);

const cmpText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const assertSameEntry = (a: Operation, b: Operation) =>
  invariant(
    a.entryId === b.entryId,
    `cannot order operations of entry ${a.entryId} against entry ${b.entryId}`,
  );

// Order: timestamp → kind rank → lower author → lower name
export const compareNameOps = (a: NameOp, b: NameOp): number => {
  assertSameEntry(a, b);
  if (a.timestamp !== b.timestamp) return cmp(a.timestamp, b.timestamp);
  if (a.kind !== b.kind) return NAME_TIE_RANK[a.kind] - NAME_TIE_RANK[b.kind];
  if (a.authorId !== b.authorId) return cmp(b.authorId, a.authorId);
  if (a.kind === "addName" && b.kind === "addName") return cmpText(b.name, a.name);
  return 0;
};

// Order: timestamp → kind rank → lower author
export const compareStateOps = (a: StateOp, b: StateOp): number => {
  assertSameEntry(a, b);
  if (a.timestamp !== b.timestamp) return cmp(a.timestamp, b.timestamp);
  if (a.kind !== b.kind) return STATE_TIE_RANK[a.kind] - STATE_TIE_RANK[b.kind];
  return cmp(b.authorId, a.authorId);
};
