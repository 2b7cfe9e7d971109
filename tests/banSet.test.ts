import { describe, it, expect } from "vitest";
import { BanSet } from "../src/core/banSet";
import { asAuthorId } from "../src/types/brands";

const u = asAuthorId(7);

describe("BanSet", () => {
  it("reports membership changes", () => {
    const bans = new BanSet();
    expect(bans.dismiss(u)).toBe(true);
    expect(bans.dismiss(u)).toBe(false);
    expect(bans.has(u)).toBe(true);
    expect(bans.allow(u)).toBe(true);
    expect(bans.allow(u)).toBe(false);
    expect(bans.has(u)).toBe(false);
  });

  it("versions only real changes", () => {
    const bans = new BanSet();
    bans.dismiss(u);
    bans.dismiss(u);
    bans.allow(asAuthorId(99));
    expect(bans.version).toBe(1);
    bans.allow(u);
    expect(bans.version).toBe(2);
  });

  it("iterates current members", () => {
    const bans = new BanSet();
    bans.dismiss(asAuthorId(1));
    bans.dismiss(asAuthorId(2));
    bans.allow(asAuthorId(1));
    expect([...bans]).toEqual([2]);
    expect(bans.size).toBe(1);
  });
});
