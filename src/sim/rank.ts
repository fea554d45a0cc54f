import type { CacheSet } from "./types.js";

/**
 * Mark `slot` as most recently used.
 *
 * Valid lines that were more recent than the touched one move down by one,
 * the touched line goes to rank 0, older lines keep their rank. Ranks of the
 * valid lines stay a permutation of `0..k-1`.
 */
export function touch(set: CacheSet, slot: number): void {
  const line = set.lines[slot];
  if (!line) {
    throw new RangeError(`slot ${slot} out of range`);
  }
  const prev = line.rank;

  for (const l of set.lines) {
    if (!l.valid || l.rank > prev) continue;

    if (l.rank === prev) {
      l.rank = 0;
    } else {
      l.rank++;
    }
  }
}

/**
 * Slot holding the least recently used line of a full set
 */
export function lruSlot(set: CacheSet): number {
  const last = set.lines.length - 1;
  return set.lines.findIndex((l) => l.rank === last);
}
