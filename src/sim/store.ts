import type { CacheSet, Line } from "./types.js";

export class CacheStore {
  private sets: CacheSet[];

  constructor(
    readonly numSets: number,
    readonly linesPerSet: number
  ) {
    this.sets = Array.from({ length: numSets }, () => ({
      lines: Array.from(
        { length: linesPerSet },
        (_, slot): Line => ({ valid: false, tag: 0n, rank: slot })
      ),
    }));
  }

  set(index: number): CacheSet {
    const set = this.sets[index];
    if (!set) {
      throw new RangeError(
        `set ${index} out of range (cache has ${this.sets.length} sets)`
      );
    }
    return set;
  }

  /**
   * read-only copy of every set, for inspection and tests
   */
  snapshot(): Line[][] {
    return this.sets.map((s) => s.lines.map((l) => ({ ...l })));
  }

  /**
   * drop all storage, the store is unusable afterwards
   */
  release(): void {
    this.sets = [];
  }
}
