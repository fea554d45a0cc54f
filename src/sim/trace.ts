import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";

import { MAX_ADDRESS } from "./address.js";
import { InputSourceError, MalformedRecordError } from "./errors.js";
import type { AccessKind, AccessRecord } from "./types.js";

export type TraceEntry =
  | { ok: true; line: number; record: AccessRecord }
  | { ok: false; line: number; error: MalformedRecordError };

// " L 7ff000398,8" / "I  0400d7d4,8"
const RECORD = /^\s*([A-Za-z])\s+([0-9a-fA-F]+),(\d+)\s*$/;

const KINDS: ReadonlySet<string> = new Set<AccessKind>(["L", "S", "M", "I"]);

function isKind(value: string): value is AccessKind {
  return KINDS.has(value);
}

/**
 * Parse one trace line
 *
 * @returns `null` for blank lines
 * @throws MalformedRecordError when the line is not `<kind> <hex address>,<size>`
 */
export function parseTraceLine(text: string): AccessRecord | null {
  if (text.trim() === "") return null;

  const match = RECORD.exec(text);
  if (!match) {
    throw new MalformedRecordError(text, "expected <kind> <hex address>,<size>");
  }
  const [, kind = "", hex = "", digits = ""] = match;

  if (!isKind(kind)) {
    throw new MalformedRecordError(text, `unknown access kind "${kind}"`);
  }

  const address = BigInt(`0x${hex}`);
  if (address > MAX_ADDRESS) {
    throw new MalformedRecordError(text, "address outside 64-bit range");
  }

  const size = Number(digits);
  if (!Number.isSafeInteger(size) || size < 1) {
    throw new MalformedRecordError(text, "size must be a positive integer");
  }

  return { kind, address, size };
}

/**
 * Stream the records of a trace file. Malformed lines are yielded as errors
 * and reading goes on.
 *
 * @throws InputSourceError if the file cannot be opened or read
 */
export async function* readTrace(path: string): AsyncGenerator<TraceEntry> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (e) {
    throw new InputSourceError(path, e);
  }

  try {
    let line = 0;
    for await (const text of readLines(handle, path)) {
      line++;
      try {
        const record = parseTraceLine(text);
        if (record) yield { ok: true, line, record };
      } catch (e) {
        if (!(e instanceof MalformedRecordError)) throw e;
        yield { ok: false, line, error: e };
      }
    }
  } finally {
    await handle.close();
  }
}

async function* readLines(
  handle: FileHandle,
  path: string
): AsyncGenerator<string> {
  try {
    for await (const text of handle.readLines({ autoClose: false })) {
      yield text;
    }
  } catch (e) {
    throw new InputSourceError(path, e);
  }
}
