import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import type { Entry } from "../model/operation";

export type Hex = `0x${string}`;

type Canonical = null | boolean | number | string | Canonical[];

/** Objects become key-sorted [key, value] pairs so encoding is order-free. */
export const canonicalize = (v: unknown, seen = new WeakSet<object>()): Canonical => {
  if (v === null || v === undefined) return null;
  if (typeof v === "boolean" || typeof v === "number" || typeof v === "string")
    return v;
  if (typeof v !== "object") throw new TypeError(`cannot canonicalize ${typeof v}`);
  if (seen.has(v)) throw new TypeError("cannot canonicalize circular structure");
  seen.add(v);
  const out: Canonical[] = Array.isArray(v)
    ? v.map((x: unknown) => canonicalize(x, seen))
    : Object.keys(v)
        .sort()
        .map((k) => [k, canonicalize(Reflect.get(v, k), seen)]);
  seen.delete(v);
  return out;
};

/* ── visible-view digest ─────────────────────────────────── */

// Replicas that converged produce the same root.
export const computeViewRoot = (entries: Iterable<Entry>): Hex => {
  const leaves = [...entries].sort((a, b) => a.id - b.id).map((e) => canonicalize(e));
  return `0x${bytesToHex(sha256(utf8ToBytes(JSON.stringify(leaves))))}`;
};
