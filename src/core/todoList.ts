import type { LevelWithSilent } from "pino";
import { loadConfig } from "../config";
import { makeLogger, type ILogger } from "../logging";
import type { Entry, EntryState, Operation } from "../model/operation";
import { parseAuthorId, parseOperation } from "../model/validation";
import { asEntryId, type AuthorId } from "../types/brands";
import { BanSet } from "./banSet";
import { computeViewRoot, type Hex } from "./hash";
import { OperationLog } from "./log";
import { effectiveName, effectiveState } from "./resolver";
import { createView, type MaterializedView, type ViewStrategy } from "./view";

export interface ToDoListOptions {
  strategy?: ViewStrategy;
  logLevel?: LevelWithSilent;
  logger?: ILogger;
}

// Variables an explicit option replaces are not validated.
const unclaimedEnv = (opts: ToDoListOptions): Record<string, string | undefined> => {
  const env: Record<string, string | undefined> = { ...process.env };
  if (opts.strategy) delete env.TODO_VIEW_STRATEGY;
  if (opts.logger || opts.logLevel) delete env.LOG_LEVEL;
  if (opts.logger) delete env.LOG_PRETTY;
  return env;
};

/* ──────────── shared to-do list ──────────── */
export class ToDoList implements Iterable<Entry> {
  private readonly log = new OperationLog();
  private readonly bans = new BanSet();
  private readonly view: MaterializedView;
  private readonly logger: ILogger;
  readonly strategy: ViewStrategy;

  constructor(opts: ToDoListOptions = {}) {
    const config = loadConfig(unclaimedEnv(opts));
    this.strategy = opts.strategy ?? config.strategy;
    this.logger =
      opts.logger ??
      makeLogger(opts.logLevel ?? config.logLevel, config.prettyLogs);
    this.view = createView(this.strategy, this.log, this.bans);
  }

  /* ---------- operations ----------------------------------------- */

  addEntry(entryId: number, userId: number, name: string, timestamp: number): void {
    this.record({ kind: "addName", entryId, authorId: userId, name, timestamp });
  }

  removeEntry(entryId: number, userId: number, timestamp: number): void {
    this.record({ kind: "removeName", entryId, authorId: userId, timestamp });
  }

  markDone(entryId: number, userId: number, timestamp: number): void {
    this.record({ kind: "markDone", entryId, authorId: userId, timestamp });
  }

  markUndone(entryId: number, userId: number, timestamp: number): void {
    this.record({ kind: "markUndone", entryId, authorId: userId, timestamp });
  }

  /** Appends any operation-shaped value; throws MalformedOperation otherwise. */
  record(input: unknown): Operation {
    const op = parseOperation(input);
    this.log.record(op);
    this.view.onRecord(op);
    this.logger.debug(
      { kind: op.kind, entryId: op.entryId, authorId: op.authorId, ts: op.timestamp },
      "operation recorded",
    );
    return op;
  }

  /* ---------- ban set -------------------------------------------- */

  dismissUser(userId: number): void {
    const author = parseAuthorId(userId);
    if (this.bans.dismiss(author)) this.rescan(author, "dismissed");
  }

  allowUser(userId: number): void {
    const author = parseAuthorId(userId);
    if (this.bans.allow(author)) this.rescan(author, "allowed");
  }

  isDismissed(userId: number): boolean {
    return this.bans.has(parseAuthorId(userId));
  }

  private rescan(author: AuthorId, change: "dismissed" | "allowed") {
    const touched = this.log.touchedBy(author);
    this.view.onBanChange(touched);
    this.logger.info(
      { authorId: author, entries: touched.size, banned: this.bans.size },
      `user ${change}`,
    );
  }

  /* ---------- reads ---------------------------------------------- */

  /** Fresh snapshot of the visible entries, ordered by id. */
  enumerate(): Entry[] {
    return this.view.entries();
  }

  count(): number {
    return this.view.count();
  }

  get(entryId: number): Entry | undefined {
    return this.view.get(asEntryId(entryId));
  }

  effectiveName(entryId: number): string | undefined {
    return effectiveName(this.log.historyOf(asEntryId(entryId)), this.bans);
  }

  effectiveState(entryId: number): EntryState {
    return effectiveState(this.log.historyOf(asEntryId(entryId)), this.bans);
  }

  /** Digest of the visible list; equal for converged replicas. */
  root(): Hex {
    return computeViewRoot(this.view.entries());
  }

  [Symbol.iterator](): Iterator<Entry> {
    return this.enumerate()[Symbol.iterator]();
  }
}
