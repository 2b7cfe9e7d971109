import { describe, it, expect } from "vitest";
import {
  challenge,
  effectiveName,
  effectiveNameOp,
  effectiveState,
  resolveEntry,
} from "../src/core/resolver";
import { compareNameOps } from "../src/model/order";
import { asAuthorId, asEntryId, type AuthorId } from "../src/types/brands";
import type { NameOp } from "../src/model/operation";
import { add, done, remove, undone } from "./helpers/ops";

const none = new Set<AuthorId>();
const banned = (...ids: number[]) => new Set(ids.map(asAuthorId));

describe("effectiveName", () => {
  it("is absent for an empty history", () => {
    expect(effectiveName([], none)).toBeUndefined();
  });

  it("takes the payload of the latest add", () => {
    expect(effectiveName([add(1, 1, "old", 1), add(1, 2, "new", 3)], none)).toBe("new");
  });

  it("is absent when a remove wins", () => {
    expect(effectiveName([add(1, 1, "X", 2), remove(1, 1, 4)], none)).toBeUndefined();
  });

  it("ignores state operations", () => {
    expect(effectiveName([done(1, 1, 9), add(1, 1, "X", 2)], none)).toBe("X");
  });

  it("skips banned authors", () => {
    const history = [add(1, 1, "mine", 1), add(1, 2, "theirs", 2), remove(1, 3, 5)];
    expect(effectiveName(history, banned(3))).toBe("theirs");
    expect(effectiveName(history, banned(2, 3))).toBe("mine");
    expect(effectiveName(history, banned(1, 2, 3))).toBeUndefined();
  });

  it("returns the winning operation itself", () => {
    const winner = add(1, 1, "A", 5);
    expect(effectiveNameOp([add(1, 2, "B", 5), winner], none)).toBe(winner);
  });
});

describe("effectiveState", () => {
  it("defaults to undone", () => {
    expect(effectiveState([add(1, 1, "X", 1)], none)).toBe("undone");
  });

  it("follows the latest state operation", () => {
    expect(effectiveState([undone(1, 1, 1), done(1, 2, 2)], none)).toBe("done");
    expect(effectiveState([done(1, 1, 1), undone(1, 2, 2)], none)).toBe("undone");
  });

  it("resolves an equal-timestamp clash to undone", () => {
    expect(effectiveState([done(1, 1, 4), undone(1, 2, 4)], none)).toBe("undone");
  });

  it("falls back to the default once the only writer is banned", () => {
    expect(effectiveState([done(1, 7, 4)], banned(7))).toBe("undone");
  });
});

describe("resolveEntry", () => {
  it("materializes a visible entry", () => {
    const history = [add(3, 1, "Buy milk", 10), done(3, 1, 20)];
    expect(resolveEntry(asEntryId(3), history, none)).toEqual({
      id: 3,
      name: "Buy milk",
      state: "done",
    });
  });

  it("surfaces state written before the entry was re-created", () => {
    const history = [add(1, 1, "X", 1), done(1, 1, 2), remove(1, 1, 3), add(1, 1, "Y", 4)];
    expect(resolveEntry(asEntryId(1), history, none)).toEqual({ id: 1, name: "Y", state: "done" });
  });

  it("is undefined when only state operations exist", () => {
    expect(resolveEntry(asEntryId(1), [done(1, 1, 1)], none)).toBeUndefined();
  });
});

describe("challenge", () => {
  const nameOp = (op: ReturnType<typeof add>): NameOp => {
    if (op.kind !== "addName" && op.kind !== "removeName") throw new Error("not a name op");
    return op;
  };

  it("installs the first operation", () => {
    const op = nameOp(add(1, 1, "A", 1));
    expect(challenge(undefined, op, compareNameOps)).toBe(op);
  });

  it("keeps the incumbent against a weaker challenger", () => {
    const incumbent = nameOp(remove(1, 1, 5));
    expect(challenge(incumbent, nameOp(add(1, 1, "A", 5)), compareNameOps)).toBe(incumbent);
  });

  it("replaces the incumbent when outranked", () => {
    const incumbent = nameOp(add(1, 2, "B", 5));
    const challenger = nameOp(add(1, 1, "A", 5));
    expect(challenge(incumbent, challenger, compareNameOps)).toBe(challenger);
  });
});
