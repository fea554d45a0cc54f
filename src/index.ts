import CacheSim from "./sim/csim.js";
import type { AccessOutcome, AccessRecord, Summary } from "./sim/types.js";

export { CacheSim };
export { decode, ADDRESS_BITS, MAX_ADDRESS } from "./sim/address.js";
export { MAX_LINES } from "./sim/engine.js";
export {
  SimError,
  ConfigError,
  InputSourceError,
  MalformedRecordError,
  ConsistencyError,
} from "./sim/errors.js";
export { formatAccess, formatSummary } from "./sim/format.js";
export { createLogger, silentLogger } from "./sim/log.js";
export type { Logger, LoggerOptions } from "./sim/log.js";
export {
  DEFAULT_RESULTS_FILE,
  textCodec,
  writeResults,
  readResults,
  readBinaryResults,
} from "./sim/results.js";
export { simulateTrace } from "./sim/run.js";
export type { RunOptions } from "./sim/run.js";
export { parseTraceLine, readTrace } from "./sim/trace.js";
export type { TraceEntry } from "./sim/trace.js";
export type * from "./sim/types.js";

export function newSimulation(
  setIndexBits: number,
  blockOffsetBits: number,
  linesPerSet: number
): CacheSim {
  return new CacheSim({ setIndexBits, blockOffsetBits, linesPerSet });
}

export function process(sim: CacheSim, record: AccessRecord): AccessOutcome {
  return sim.access(record);
}

export function summary(sim: CacheSim): Summary {
  return sim.summary();
}

export function teardown(sim: CacheSim): void {
  sim.close();
}
