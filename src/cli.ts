import { parseArgs } from "node:util";

import { ConfigError, InputSourceError } from "./sim/errors.js";
import { formatSummary } from "./sim/format.js";
import { createLogger } from "./sim/log.js";
import type { Logger } from "./sim/log.js";
import { DEFAULT_RESULTS_FILE, writeResults } from "./sim/results.js";
import { simulateTrace } from "./sim/run.js";
import type { Geometry } from "./sim/types.js";

export type CliIO = {
  out: (line: string) => void;
  logger: Logger;
};

export const USAGE = `Usage: cachesim [-hv] -s <s> -E <E> -b <b> -t <tracefile> [--results <file>]
Options:
  -h               Print this help message.
  -v               Print one line per memory access.
  -s <num>         Number of set index bits.
  -E <num>         Number of lines per set.
  -b <num>         Number of block offset bits.
  -t <file>        Trace file.
  --results <file> Where to write "<hits> <misses> <evictions>" (default ${DEFAULT_RESULTS_FILE}).`;

const OPTIONS = {
  help: { type: "boolean", short: "h" },
  verbose: { type: "boolean", short: "v" },
  sets: { type: "string", short: "s" },
  lines: { type: "string", short: "E" },
  block: { type: "string", short: "b" },
  trace: { type: "string", short: "t" },
  results: { type: "string" },
} as const;

const parseCli = (args: string[]) =>
  parseArgs({ args, options: OPTIONS, strict: true });

/**
 * Run the simulator from command-line arguments.
 *
 * @returns process exit code
 */
export async function main(
  argv: string[],
  io: Partial<CliIO> = {}
): Promise<number> {
  const out = io.out ?? ((line: string) => console.log(line));

  let values: ReturnType<typeof parseCli>["values"];
  try {
    values = parseCli(argv).values;
  } catch (e) {
    (io.logger ?? createLogger()).error(e instanceof Error ? e.message : String(e));
    out(USAGE);
    return 1;
  }

  // setup chatter only in verbose mode
  const logger = io.logger ?? createLogger({ quiet: !values.verbose });

  if (values.help) {
    out(USAGE);
    return 1;
  }

  const { sets, lines, block, trace } = values;
  if (sets === undefined || lines === undefined || block === undefined || !trace) {
    out(USAGE);
    return 1;
  }

  let geometry: Geometry;
  try {
    geometry = {
      setIndexBits: toInt("-s", sets),
      linesPerSet: toInt("-E", lines),
      blockOffsetBits: toInt("-b", block),
    };
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    logger.error(e.detail);
    out(USAGE);
    return 1;
  }

  try {
    const summary = await simulateTrace(trace, geometry, {
      verbose: values.verbose,
      logger,
      write: out,
    });

    out(formatSummary(summary));

    const path = values.results ?? DEFAULT_RESULTS_FILE;
    try {
      await writeResults(path, summary);
    } catch (e) {
      logger.error(
        `Cannot write results "${path}" : ${e instanceof Error ? e.message : String(e)}`
      );
      return 1;
    }
    return 0;
  } catch (e) {
    if (e instanceof ConfigError || e instanceof InputSourceError) {
      logger.error(e.detail);
      return 1;
    }
    throw e;
  }
}

function toInt(flag: string, raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
}
