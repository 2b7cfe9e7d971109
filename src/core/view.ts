import { compareNameOps, compareStateOps } from "../model/order";
import type { Entry, NameOp, Operation, Slot, StateOp } from "../model/operation";
import type { EntryId } from "../types/brands";
import type { BanSet } from "./banSet";
import type { OperationLog } from "./log";
import {
  challenge,
  effectiveNameOp,
  effectiveStateOp,
  materialize,
  nameFrom,
  resolveEntry,
  stateFrom,
} from "./resolver";

export type ViewStrategy = "incremental" | "snapshot";

/**
 * Materialized entry id → entry mapping. The facade notifies the view
 * after the log or the ban set has changed.
 */
export interface MaterializedView {
  onRecord(op: Operation): void;
  onBanChange(touched: ReadonlyMap<EntryId, ReadonlySet<Slot>>): void;
  get(entryId: EntryId): Entry | undefined;
  entries(): Entry[];
  count(): number;
}

const byId = (a: Entry, b: Entry) => a.id - b.id;

/* ── eager, per-slot ─────────────────────────────────────── */

type Winners = { name?: NameOp; state?: StateOp };

export class IncrementalView implements MaterializedView {
  private readonly winners = new Map<EntryId, Winners>();
  private readonly visible = new Map<EntryId, Entry>();

  constructor(
    private readonly log: OperationLog,
    private readonly bans: BanSet,
  ) {}

  onRecord(op: Operation): void {
    if (this.bans.has(op.authorId)) return;
    const slot = this.slotsOf(op.entryId);
    switch (op.kind) {
      case "addName":
      case "removeName":
        slot.name = challenge(slot.name, op, compareNameOps);
        break;
      case "markDone":
      case "markUndone":
        slot.state = challenge(slot.state, op, compareStateOps);
        break;
    }
    this.refresh(op.entryId, slot);
  }

  // Any touched slot may lose or regain its winner, so each is rescanned.
  onBanChange(touched: ReadonlyMap<EntryId, ReadonlySet<Slot>>): void {
    for (const [entryId, slots] of touched) {
      const slot = this.slotsOf(entryId);
      const history = this.log.historyOf(entryId);
      if (slots.has("name")) slot.name = effectiveNameOp(history, this.bans);
      if (slots.has("state")) slot.state = effectiveStateOp(history, this.bans);
      this.refresh(entryId, slot);
    }
  }

  get(entryId: EntryId): Entry | undefined {
    return this.visible.get(entryId);
  }

  entries(): Entry[] {
    return [...this.visible.values()].sort(byId);
  }

  count(): number {
    return this.visible.size;
  }

  private slotsOf(entryId: EntryId): Winners {
    let slot = this.winners.get(entryId);
    if (!slot) {
      slot = {};
      this.winners.set(entryId, slot);
    }
    return slot;
  }

  private refresh(entryId: EntryId, slot: Winners) {
    const entry = materialize(entryId, nameFrom(slot.name), stateFrom(slot.state));
    if (entry) this.visible.set(entryId, entry);
    else this.visible.delete(entryId);
  }
}

/* ── lazy, rebuilt when the version stamp moves ──────────── */

export class SnapshotView implements MaterializedView {
  private cache = new Map<EntryId, Entry>();
  private stamp = "";

  constructor(
    private readonly log: OperationLog,
    private readonly bans: BanSet,
  ) {}

  onRecord(): void {}

  onBanChange(): void {}

  get(entryId: EntryId): Entry | undefined {
    return this.current().get(entryId);
  }

  entries(): Entry[] {
    return [...this.current().values()].sort(byId);
  }

  count(): number {
    return this.current().size;
  }

  private current(): Map<EntryId, Entry> {
    const stamp = `${this.log.generation}:${this.bans.version}`;
    if (stamp !== this.stamp) {
      const next = new Map<EntryId, Entry>();
      for (const entryId of this.log.entryIds()) {
        const entry = resolveEntry(entryId, this.log.historyOf(entryId), this.bans);
        if (entry) next.set(entryId, entry);
      }
      this.cache = next;
      this.stamp = stamp;
    }
    return this.cache;
  }
}

export const createView = (
  strategy: ViewStrategy,
  log: OperationLog,
  bans: BanSet,
): MaterializedView =>
  strategy === "snapshot"
    ? new SnapshotView(log, bans)
    : new IncrementalView(log, bans);
