import CacheSim from "./csim.js";
import { formatAccess } from "./format.js";
import { silentLogger } from "./log.js";
import type { Logger } from "./log.js";
import { readTrace } from "./trace.js";
import type { Geometry, Summary } from "./types.js";

export type RunOptions = {
  /**
   * print one line per data access
   */
  verbose?: boolean;
  logger?: Logger;
  /**
   * where verbose lines go, stdout by default
   */
  write?: (line: string) => void;
};

/**
 * Replay a whole trace file against a fresh cache.
 *
 * Malformed lines are reported and skipped. The cache is released whether the
 * run finishes or fails.
 */
export async function simulateTrace(
  path: string,
  geometry: Geometry,
  options: RunOptions = {}
): Promise<Summary> {
  const logger = options.logger ?? silentLogger;
  const write = options.write ?? ((line: string) => console.log(line));

  const sim = new CacheSim(geometry);

  if (options.verbose) {
    sim.subscribe("access", (outcome) => {
      if (outcome.kind !== "I") write(formatAccess(outcome));
    });
  }

  logger.info(
    `${sim.numSets} sets x ${geometry.linesPerSet} lines, ` +
      `${2 ** geometry.blockOffsetBits}-byte blocks, trace ${path}`
  );

  let skipped = 0;
  try {
    for await (const entry of readTrace(path)) {
      if (!entry.ok) {
        skipped++;
        logger.warn(
          `line ${entry.line}: skipping "${entry.error.text}" (${entry.error.reason})`
        );
        continue;
      }
      sim.access(entry.record);
    }
  } finally {
    sim.close();
  }

  if (skipped) logger.warn(`${skipped} malformed record(s) skipped`);

  return sim.summary();
}
