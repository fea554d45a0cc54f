export type AccessKind = "L" | "S" | "M" | "I";

export type Geometry = {
  /**
   * Number of set-index bits (s)
   *
   * the cache has `2^s` sets, `0` means a single fully-associative set
   */
  setIndexBits: number;
  /**
   * Number of block-offset bits (b)
   *
   * stripped from the address before set and tag are taken
   */
  blockOffsetBits: number;
  /**
   * Lines per set (E), the associativity
   */
  linesPerSet: number;
};

export type AccessRecord = {
  kind: AccessKind;
  /**
   * Unsigned 64-bit address
   */
  address: bigint;
  /**
   * Bytes touched, informational only
   */
  size: number;
};

export interface Line {
  valid: boolean;
  tag: bigint;
  /**
   * 0 = most recently used, `linesPerSet - 1` = next to evict
   */
  rank: number;
}

export interface CacheSet {
  readonly lines: Line[];
}

export type ResolutionType = "hit" | "miss" | "eviction";

export type Resolution = {
  type: ResolutionType;
  set: number;
  slot: number;
};

export type AccessOutcome = AccessRecord & {
  /**
   * One entry per resolver call, in order
   *
   * Load/Store → 1, Modify → 2, Ignore → 0
   */
  results: Resolution[];
};

export type Summary = {
  hits: number;
  misses: number;
  evictions: number;
};

export interface Codec<Wire> {
  encode(summary: Summary): Wire;
  decode(data: Wire): Summary;
}

export type SimEvents = {
  access: AccessOutcome;
  close: Summary;
};

export type SimEventName = keyof SimEvents;
