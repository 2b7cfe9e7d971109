export { ToDoList, type ToDoListOptions } from "./core/todoList";
export { OperationLog } from "./core/log";
export { BanSet, type BanLookup } from "./core/banSet";
export {
  challenge,
  effectiveName,
  effectiveNameOp,
  effectiveState,
  effectiveStateOp,
  resolveEntry,
} from "./core/resolver";
export {
  createView,
  IncrementalView,
  SnapshotView,
  type MaterializedView,
  type ViewStrategy,
} from "./core/view";
export { canonicalize, computeViewRoot, type Hex } from "./core/hash";
export { compareNameOps, compareStateOps } from "./model/order";
export { operationSchema, parseAuthorId, parseOperation, type OperationInput } from "./model/validation";
export type {
  AddName,
  Entry,
  EntryState,
  MarkDone,
  MarkUndone,
  NameOp,
  OpKind,
  Operation,
  RemoveName,
  Slot,
  StateOp,
} from "./model/operation";
export { isNameOp, isStateOp, slotOf } from "./model/operation";
export type { AuthorId, Brand, EntryId, Timestamp } from "./types/brands";
export { asAuthorId, asEntryId, asTimestamp } from "./types/brands";
export { loadConfig, type Config } from "./config";
export { makeLogger, type ILogger } from "./logging";
export {
  ConfigError,
  ContractViolation,
  InvariantViolation,
  MalformedOperation,
} from "./errors";
