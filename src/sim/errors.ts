const PREFIX = "[cachesim]:";

export class SimError extends Error {
  constructor(readonly detail: string) {
    super(`${PREFIX} ${detail}`);
    this.name = new.target.name;
  }
}

/**
 * Cache geometry that cannot be simulated
 */
export class ConfigError extends SimError {}

/**
 * Trace source could not be opened or read
 */
export class InputSourceError extends SimError {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Cannot read trace "${path}" : ${describe(cause)}`);
    this.cause = cause;
  }
}

/**
 * A record that is not a valid kind/address/size triple
 */
export class MalformedRecordError extends SimError {
  constructor(
    readonly text: string,
    readonly reason: string
  ) {
    super(`Malformed record "${text}" , ${reason}`);
  }
}

/**
 * Internal cache state broke an invariant. Never expected on valid input.
 */
export class ConsistencyError extends SimError {}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
