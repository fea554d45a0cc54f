import { readFile, writeFile } from "node:fs/promises";

import { SimError } from "./errors.js";
import type { Codec, Summary } from "./types.js";

export const DEFAULT_RESULTS_FILE = ".csim_results";

/**
 * `"<hits> <misses> <evictions>\n"`, the format graders read back
 */
export const textCodec: Codec<string> = {
  encode({ hits, misses, evictions }) {
    return `${hits} ${misses} ${evictions}\n`;
  },
  decode(data) {
    const parts = data.trim().split(/\s+/).map(Number);
    const [hits, misses, evictions] = parts;
    if (
      parts.length !== 3 ||
      hits === undefined ||
      misses === undefined ||
      evictions === undefined ||
      !parts.every((n) => Number.isInteger(n) && n >= 0)
    ) {
      throw new SimError(`Results "${data.trim()}" are not three counters`);
    }
    return { hits, misses, evictions };
  },
};

/**
 * write the counters, in the grader text format unless another codec is given
 */
export async function writeResults(path: string, summary: Summary): Promise<void>;
export async function writeResults<Wire extends string | Uint8Array>(
  path: string,
  summary: Summary,
  codec: Codec<Wire>
): Promise<void>;

export async function writeResults(
  path: string,
  summary: Summary,
  codec: Codec<string | Uint8Array> = textCodec
): Promise<void> {
  await writeFile(path, codec.encode(summary));
}

export async function readResults(
  path: string,
  codec: Codec<string> = textCodec
): Promise<Summary> {
  return codec.decode(await readFile(path, "utf8"));
}

/**
 * for codecs with a binary wire format (msgpack, cbor, ...)
 */
export async function readBinaryResults(
  path: string,
  codec: Codec<Uint8Array>
): Promise<Summary> {
  return codec.decode(new Uint8Array(await readFile(path)));
}
