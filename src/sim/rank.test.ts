import { describe, expect, it } from "vitest";

import { lruSlot, touch } from "./rank.js";
import type { CacheSet } from "./types.js";

const full = (...ranks: number[]): CacheSet => ({
  lines: ranks.map((rank, i) => ({ valid: true, tag: BigInt(i), rank })),
});

const ranks = (set: CacheSet) => set.lines.map((l) => l.rank);

describe("touch", () => {
  it("moves the least recent line to the front", () => {
    const set = full(2, 0, 1);
    touch(set, 0);
    expect(ranks(set)).toEqual([0, 1, 2]);
  });

  it("leaves older lines alone", () => {
    const set = full(2, 0, 1);
    touch(set, 2);
    expect(ranks(set)).toEqual([2, 1, 0]);
  });

  it("is a no-op on the most recent line", () => {
    const set = full(1, 0, 2);
    touch(set, 1);
    expect(ranks(set)).toEqual([1, 0, 2]);
  });

  it("skips invalid lines", () => {
    const set: CacheSet = {
      lines: [
        { valid: true, tag: 7n, rank: 0 },
        { valid: false, tag: 0n, rank: 1 },
        { valid: false, tag: 0n, rank: 2 },
      ],
    };
    set.lines[1] = { valid: true, tag: 8n, rank: 1 };
    touch(set, 1);
    expect(ranks(set)).toEqual([1, 0, 2]);
    expect(set.lines[2]?.valid).toBe(false);
  });

  it("rejects a slot outside the set", () => {
    expect(() => touch(full(0), 3)).toThrow(RangeError);
  });
});

describe("lruSlot", () => {
  it("finds the line ranked last", () => {
    expect(lruSlot(full(1, 3, 0, 2))).toBe(1);
  });
});
