import { describe, expect, it } from "vitest";

import {
  ConfigError,
  MalformedRecordError,
  newSimulation,
  process,
  summary,
  teardown,
  type AccessRecord,
} from "../src/index.js";

const load = (address: bigint): AccessRecord => ({ kind: "L", address, size: 8 });

describe("simulation handle", () => {
  it("runs a simulation end to end", () => {
    const sim = newSimulation(4, 4, 2);

    // same set (index 1), three distinct tags
    process(sim, load(0x010n));
    process(sim, load(0x110n));
    process(sim, load(0x018n)); // same block as 0x010
    const evicting = process(sim, load(0x210n));

    expect(evicting.results).toEqual([{ type: "eviction", set: 1, slot: 1 }]);
    expect(summary(sim)).toEqual({ hits: 1, misses: 3, evictions: 1 });

    teardown(sim);
    expect(() => process(sim, load(0n))).toThrow("already closed");
  });

  it("fails fast on bad geometry", () => {
    expect(() => newSimulation(-1, 4, 2)).toThrow(ConfigError);
    expect(() => newSimulation(4, 4, 0)).toThrow(ConfigError);
    expect(() => newSimulation(32, 33, 1)).toThrow(ConfigError);
  });

  it("keeps counters intact after a rejected record", () => {
    const sim = newSimulation(0, 0, 1);
    process(sim, load(5n));

    expect(() =>
      process(sim, { kind: "L", address: 5n, size: 1.5 })
    ).toThrow(MalformedRecordError);
    expect(summary(sim)).toEqual({ hits: 0, misses: 1, evictions: 0 });
  });
});
