/**
 * Profiling hook: a begin/end bracket around each run of a node's work,
 * keyed by the node's name and debug color. The collector is injected.
 */

/** RGB components in [0, 1]. */
export type DebugColor = readonly [number, number, number];

/** Opaque white, the color of a node constructed without one. */
export const DEFAULT_DEBUG_COLOR: DebugColor = [1, 1, 1];

/** Handle returned by {@link TimeIntervalCollector.begin}, passed back to `end`. */
export type IntervalToken = {
  readonly name: string;
  readonly color: DebugColor;
  readonly start: number;
};

/** External interval collector. Nodes share it; none of them owns it. */
export interface TimeIntervalCollector {
  begin(name: string, color: DebugColor): IntervalToken;
  end(token: IntervalToken): void;
}

/** Runs `fn` inside a begin/end bracket. Without a collector, just runs `fn`. */
export function scopedTimeInterval<R>(
  collector: TimeIntervalCollector | undefined,
  name: string,
  color: DebugColor,
  fn: () => R,
): R {
  if (!collector) return fn();
  const token = collector.begin(name, color);
  try {
    return fn();
  } finally {
    collector.end(token);
  }
}

/** A closed interval recorded by {@link IntervalRecorder}. Times are `performance.now()` ms. */
export type TimeInterval = {
  readonly name: string;
  readonly color: DebugColor;
  readonly start: number;
  readonly end: number;
};

/**
 * In-memory collector that keeps every closed interval in the order it closed.
 */
export class IntervalRecorder implements TimeIntervalCollector {
  #intervals: TimeInterval[] = [];
  readonly #now: () => number;

  constructor(now: () => number = () => performance.now()) {
    this.#now = now;
  }

  begin(name: string, color: DebugColor): IntervalToken {
    return { name, color, start: this.#now() };
  }

  end(token: IntervalToken): void {
    this.#intervals.push({ ...token, end: this.#now() });
  }

  getIntervals(): readonly TimeInterval[] {
    return this.#intervals;
  }

  clear(): void {
    this.#intervals = [];
  }
}
