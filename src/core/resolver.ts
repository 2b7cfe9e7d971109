import { compareNameOps, compareStateOps } from "../model/order";
import {
  isNameOp,
  isStateOp,
  type Entry,
  type EntryState,
  type NameOp,
  type Operation,
  type StateOp,
} from "../model/operation";
import type { EntryId } from "../types/brands";
import type { BanLookup } from "./banSet";

/* ── incremental rule ────────────────────────────────────── */

/** Keeps the current winner unless `incoming` outranks it. */
export const challenge = <T extends Operation>(
  current: T | undefined,
  incoming: T,
  compare: (a: T, b: T) => number,
): T =>
  current === undefined || compare(incoming, current) > 0 ? incoming : current;

/* ── full scans ──────────────────────────────────────────── */

const scan = <T extends Operation>(
  history: Iterable<Operation>,
  bans: BanLookup,
  accept: (op: Operation) => op is T,
  compare: (a: T, b: T) => number,
): T | undefined => {
  let winner: T | undefined;
  for (const op of history) {
    if (!accept(op) || bans.has(op.authorId)) continue;
    winner = challenge(winner, op, compare);
  }
  return winner;
};

export const effectiveNameOp = (
  history: Iterable<Operation>,
  bans: BanLookup,
): NameOp | undefined => scan(history, bans, isNameOp, compareNameOps);

export const effectiveStateOp = (
  history: Iterable<Operation>,
  bans: BanLookup,
): StateOp | undefined => scan(history, bans, isStateOp, compareStateOps);

/* ── slot values ─────────────────────────────────────────── */

export const nameFrom = (winner: NameOp | undefined): string | undefined =>
  winner?.kind === "addName" ? winner.name : undefined;

export const stateFrom = (winner: StateOp | undefined): EntryState =>
  winner?.kind === "markDone" ? "done" : "undone";

export const effectiveName = (
  history: Iterable<Operation>,
  bans: BanLookup,
): string | undefined => nameFrom(effectiveNameOp(history, bans));

export const effectiveState = (
  history: Iterable<Operation>,
  bans: BanLookup,
): EntryState => stateFrom(effectiveStateOp(history, bans));

export const materialize = (
  id: EntryId,
  name: string | undefined,
  state: EntryState,
): Entry | undefined => (name === undefined ? undefined : { id, name, state });

/**
 * Resolves one entry from its full history. State is resolved over the
 * whole history, so a re-created entry can surface a state operation that
 * predates the re-creation.
 */
export const resolveEntry = (
  id: EntryId,
  history: readonly Operation[],
  bans: BanLookup,
): Entry | undefined =>
  materialize(id, effectiveName(history, bans), effectiveState(history, bans));
