import type { AccessOutcome, ResolutionType, Summary } from "./types.js";

const WORDS: Record<ResolutionType, string> = {
  hit: "hit",
  miss: "miss",
  eviction: "miss eviction",
};

/**
 * One verbose trace line, e.g. `M 20,1 miss eviction hit`
 */
export function formatAccess(outcome: AccessOutcome): string {
  const head = `${outcome.kind} ${outcome.address.toString(16)},${outcome.size}`;
  const words = outcome.results.map((r) => WORDS[r.type]);
  return words.length ? `${head} ${words.join(" ")}` : head;
}

export function formatSummary({ hits, misses, evictions }: Summary): string {
  return `hits:${hits} misses:${misses} evictions:${evictions}`;
}
