/**
 * @lanekeeper/event-store — Lamport clock.
 *
 * Each emitter keeps a counter. Before emitting it takes
 * max(local counter, highest clock seen in the log) + 1, so an event is
 * always ordered after everything its emitter had observed.
 */

import type { StatusEvent } from "@lanekeeper/types";

export class LamportClock {
  private _value: number;

  constructor(initial = 0) {
    if (!Number.isInteger(initial) || initial < 0) {
      throw new RangeError(`Lamport clock must start at a non-negative integer, got ${initial}`);
    }
    this._value = initial;
  }

  get value(): number {
    return this._value;
  }

  /** Fold in a clock value seen elsewhere without advancing past it. */
  observe(clock: number): void {
    if (clock > this._value) {
      this._value = clock;
    }
  }

  /**
   * Advance for a new local event.
   *
   * @param maxSeen - Highest clock value present in the log
   */
  tick(maxSeen = 0): number {
    this._value = Math.max(this._value, maxSeen) + 1;
    return this._value;
  }
}

/** Highest Lamport clock among the events, 0 for an empty log. */
export function maxLamportClock(events: readonly StatusEvent[]): number {
  let max = 0;
  for (const event of events) {
    if (event.lamportClock > max) max = event.lamportClock;
  }
  return max;
}
