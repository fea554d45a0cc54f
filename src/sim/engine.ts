import { ADDRESS_BITS, MAX_ADDRESS, decode } from "./address.js";
import { ConfigError, ConsistencyError, MalformedRecordError } from "./errors.js";
import { lruSlot, touch } from "./rank.js";
import { CacheStore } from "./store.js";
import type {
  AccessKind,
  AccessOutcome,
  AccessRecord,
  Geometry,
  Resolution,
  Summary,
} from "./types.js";

/** Upper bound on `2^s * E`, every line is allocated up front */
export const MAX_LINES = 1 << 24;

/**
 * Resolver calls per access kind. Modify is a load followed by a store to the
 * same address.
 */
const POLICY: Record<AccessKind, number> = {
  L: 1,
  S: 1,
  M: 2,
  I: 0,
};

export class Engine {
  private store: CacheStore;
  private counters: Summary = { hits: 0, misses: 0, evictions: 0 };

  constructor(private geometry: Readonly<Geometry>) {
    validateGeometry(geometry);
    this.store = new CacheStore(
      2 ** geometry.setIndexBits,
      geometry.linesPerSet
    );
  }

  /**
   * Classify one access and apply it to the cache
   *
   * the record is checked first, a rejected record leaves the cache untouched
   */
  run(record: AccessRecord): AccessOutcome {
    validateRecord(record);

    const { setIndexBits, blockOffsetBits } = this.geometry;
    const { tag, setIndex } = decode(
      record.address,
      setIndexBits,
      blockOffsetBits
    );

    const calls = POLICY[record.kind];
    const results: Resolution[] = [];

    if (calls > 0) {
      const set = this.store.set(setIndex);
      const saved = set.lines.map((l) => ({ ...l }));
      try {
        for (let i = 0; i < calls; i++) {
          results.push(this.resolve(setIndex, tag));
        }
        if (record.kind === "M" && results[1]?.type !== "hit") {
          throw new ConsistencyError(
            `store half of modify at 0x${record.address.toString(16)} missed`
          );
        }
      } catch (e) {
        set.lines.splice(0, set.lines.length, ...saved);
        throw e;
      }
    }

    for (const r of results) this.count(r);

    return { ...record, results };
  }

  /**
   * Hit, else fill the first empty slot, else evict the LRU slot.
   * Scans go in ascending slot order.
   */
  resolve(setIndex: number, tag: bigint): Resolution {
    const set = this.store.set(setIndex);
    const lines = set.lines;

    const hit = lines.findIndex((l) => l.valid && l.tag === tag);
    if (hit !== -1) {
      touch(set, hit);
      return { type: "hit", set: setIndex, slot: hit };
    }

    const empty = lines.findIndex((l) => !l.valid);
    if (empty !== -1) {
      const line = lines[empty];
      if (line) {
        line.valid = true;
        line.tag = tag;
        touch(set, empty);
        return { type: "miss", set: setIndex, slot: empty };
      }
    }

    const victim = lruSlot(set);
    const line = lines[victim];
    if (!line) {
      throw new ConsistencyError(
        `set ${setIndex} is full but no line has rank ${lines.length - 1}`
      );
    }
    line.tag = tag;
    touch(set, victim);
    return { type: "eviction", set: setIndex, slot: victim };
  }

  summary(): Summary {
    return { ...this.counters };
  }

  getStore(): CacheStore {
    return this.store;
  }

  close(): void {
    this.store.release();
  }

  private count(r: Resolution): void {
    if (r.type === "hit") {
      this.counters.hits++;
      return;
    }
    this.counters.misses++;
    if (r.type === "eviction") this.counters.evictions++;
  }
}

export function validateGeometry(g: Geometry): void {
  const { setIndexBits: s, blockOffsetBits: b, linesPerSet: E } = g;

  if (!Number.isInteger(s) || s < 0) {
    throw new ConfigError(`set index bits must be a non-negative integer, got ${s}`);
  }
  if (!Number.isInteger(b) || b < 0) {
    throw new ConfigError(`block offset bits must be a non-negative integer, got ${b}`);
  }
  if (!Number.isInteger(E) || E < 1) {
    throw new ConfigError(`lines per set must be a positive integer, got ${E}`);
  }
  if (s + b > ADDRESS_BITS) {
    throw new ConfigError(
      `s + b = ${s + b} exceeds the ${ADDRESS_BITS}-bit address width`
    );
  }
  if (2 ** s * E > MAX_LINES) {
    throw new ConfigError(
      `2^${s} sets x ${E} lines is more than ${MAX_LINES} lines`
    );
  }
}

export function validateRecord(record: AccessRecord): void {
  const text = `${record.kind} ${String(record.address)},${record.size}`;

  if (!Object.hasOwn(POLICY, record.kind)) {
    throw new MalformedRecordError(text, `unknown access kind "${record.kind}"`);
  }
  if (typeof record.address !== "bigint") {
    throw new MalformedRecordError(text, "address must be a bigint");
  }
  if (record.address < 0n || record.address > MAX_ADDRESS) {
    throw new MalformedRecordError(text, "address outside 64-bit range");
  }
  if (!Number.isInteger(record.size) || record.size < 1) {
    throw new MalformedRecordError(text, "size must be a positive integer");
  }
}
