import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { makeList, operationArb } from "./helpers/ops";

// Two replicas receive the same operations interleaved with their own
// arrival order and must agree once both have seen everything.
describe("replica determinism", () => {
  it("replicas exchanging operations in different orders converge", () =>
    fc.assert(
      fc.property(
        fc.array(operationArb, { maxLength: 30 }),
        fc.array(operationArb, { maxLength: 30 }),
        (local, remote) => {
          const left = makeList({ strategy: "incremental" });
          const right = makeList({ strategy: "snapshot" });
          for (const op of local) left.record(op);
          for (const op of remote) right.record(op);
          for (const op of remote) left.record(op);
          for (const op of local) right.record(op);
          expect(left.root()).toBe(right.root());
        },
      ),
      { numRuns: 50 },
    ));
});
