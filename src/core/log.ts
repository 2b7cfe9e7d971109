import { slotOf, type Operation, type Slot } from "../model/operation";
import type { AuthorId, EntryId } from "../types/brands";

const NONE: readonly Operation[] = Object.freeze([]);

const push = <K>(index: Map<K, Operation[]>, key: K, op: Operation) => {
  const bucket = index.get(key);
  if (bucket) bucket.push(op);
  else index.set(key, [op]);
};

/**
 * Append-only operation store with two derived indexes. Order inside an
 * index bucket carries no meaning; the resolver ranks by timestamp.
 *
 * Operations of banned authors stay here so that allowing them again is
 * lossless.
 */
export class OperationLog {
  private readonly byEntry = new Map<EntryId, Operation[]>();
  private readonly byAuthor = new Map<AuthorId, Operation[]>();
  private total = 0;
  private gen = 0;

  record(op: Operation): void {
    push(this.byEntry, op.entryId, op);
    push(this.byAuthor, op.authorId, op);
    this.total++;
    this.gen++;
  }

  /** Bumped on every append; lets lazy readers detect staleness. */
  get generation(): number {
    return this.gen;
  }

  get size(): number {
    return this.total;
  }

  historyOf(entryId: EntryId): readonly Operation[] {
    return this.byEntry.get(entryId) ?? NONE;
  }

  authoredBy(authorId: AuthorId): readonly Operation[] {
    return this.byAuthor.get(authorId) ?? NONE;
  }

  entryIds(): IterableIterator<EntryId> {
    return this.byEntry.keys();
  }

  /** Every slot an author has ever written to, grouped by entry. */
  touchedBy(authorId: AuthorId): Map<EntryId, Set<Slot>> {
    const touched = new Map<EntryId, Set<Slot>>();
    for (const op of this.authoredBy(authorId)) {
      const slots = touched.get(op.entryId);
      if (slots) slots.add(slotOf(op));
      else touched.set(op.entryId, new Set([slotOf(op)]));
    }
    return touched;
  }
}
