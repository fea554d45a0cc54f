import { describe, expect, it } from "vitest";

import { MalformedRecordError } from "./errors.js";
import { formatAccess, formatSummary } from "./format.js";
import { parseTraceLine } from "./trace.js";

describe("parseTraceLine", () => {
  it("reads data accesses with a leading space", () => {
    expect(parseTraceLine(" L 7ff000398,8")).toEqual({
      kind: "L",
      address: 0x7ff000398n,
      size: 8,
    });
    expect(parseTraceLine(" M 0421c7f0,4")).toEqual({
      kind: "M",
      address: 0x421c7f0n,
      size: 4,
    });
  });

  it("reads instruction fetches", () => {
    expect(parseTraceLine("I  0400d7d4,8")).toEqual({
      kind: "I",
      address: 0x400d7d4n,
      size: 8,
    });
  });

  it("accepts the full 64-bit range", () => {
    expect(parseTraceLine(" S ffffffffffffffff,1")?.address).toBe(2n ** 64n - 1n);
  });

  it("returns null for blank lines", () => {
    expect(parseTraceLine("")).toBeNull();
    expect(parseTraceLine("   \t")).toBeNull();
  });

  it.each([
    ["X 10,1", 'unknown access kind "X"'],
    ["L 10", "expected <kind> <hex address>,<size>"],
    ["L zz,1", "expected <kind> <hex address>,<size>"],
    ["L 10,0", "size must be a positive integer"],
    ["L 10000000000000000,1", "address outside 64-bit range"],
  ])("rejects %j", (line, reason) => {
    let error: unknown;
    try {
      parseTraceLine(line);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(MalformedRecordError);
    expect(error).toMatchObject({ text: line, reason });
  });
});

describe("format", () => {
  it("prints each resolution of an access", () => {
    expect(
      formatAccess({
        kind: "M",
        address: 0x20n,
        size: 1,
        results: [
          { type: "eviction", set: 0, slot: 0 },
          { type: "hit", set: 0, slot: 0 },
        ],
      })
    ).toBe("M 20,1 miss eviction hit");

    expect(
      formatAccess({
        kind: "L",
        address: 0x7ff0005c8n,
        size: 8,
        results: [{ type: "miss", set: 3, slot: 1 }],
      })
    ).toBe("L 7ff0005c8,8 miss");
  });

  it("prints the summary line", () => {
    expect(formatSummary({ hits: 4, misses: 5, evictions: 3 })).toBe(
      "hits:4 misses:5 evictions:3"
    );
  });
});
