import { EventEmitter } from "node:events";

import { Engine } from "./engine.js";
import { SimError } from "./errors.js";
import type {
  AccessOutcome,
  AccessRecord,
  Geometry,
  Line,
  SimEventName,
  SimEvents,
  Summary,
} from "./types.js";

export default class CacheSim {
  private engine: Engine;
  private events: EventEmitter;
  private closed = false;

  readonly geometry: Readonly<Geometry>;

  /**
   * Allocate every set and line for the given geometry, a frozen copy is kept
   *
   * @throws ConfigError when the geometry cannot be simulated
   */
  constructor(geometry: Geometry) {
    this.geometry = Object.freeze({ ...geometry });
    this.engine = new Engine(this.geometry);
    this.events = new EventEmitter();
  }

  get numSets(): number {
    return this.engine.getStore().numSets;
  }

  /**
   * run one record through the cache
   *
   * emits `access` with the outcome, Ignore records included
   */
  access(record: AccessRecord): AccessOutcome {
    this.assertOpen();

    const outcome = this.engine.run(record);
    this.emit("access", outcome);

    return outcome;
  }

  /**
   * counters so far, a copy
   */
  summary(): Summary {
    return this.engine.summary();
  }

  /**
   * copy of the line metadata of every set
   */
  inspect(): Line[][] {
    this.assertOpen();
    return this.engine.getStore().snapshot();
  }

  /**
   * release cache storage, the counters stay readable
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.engine.close();
    this.emit("close", this.engine.summary());
    this.events.removeAllListeners();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Subscribe to simulation events.
   *
   * - `access` → outcome of every processed record
   * - `close`  → final counters
   *
   * @returns Cleanup function to unsubscribe.
   */
  subscribe<E extends SimEventName>(
    event: E,
    listener: (data: SimEvents[E]) => void
  ): () => void {
    this.events.on(event, listener);

    return () => {
      this.events.off(event, listener);
    };
  }

  private emit<E extends SimEventName>(event: E, data: SimEvents[E]): void {
    this.events.emit(event, data);
  }

  private assertOpen(): void {
    if (this.closed) throw new SimError("Simulation already closed");
  }
}
