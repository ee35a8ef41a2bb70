/**
 * CooperativeScheduler – a single-threaded consumer of the task interface.
 * Each cycle invokes the queued nodes whose dependencies are all done, in
 * queue order. Continuations are never queued; they run inline.
 */

import { invariant } from "./errors.js";
import type { TimeIntervalCollector } from "./profiling.js";
import type { TaskBase } from "./task.js";

/** `once` runs a node a single time; `polling` runs it again on every cycle. */
export type ScheduleMode = "once" | "polling";

export type SchedulerOptions = {
  /** Set on every scheduled node that has no collector of its own. */
  collector?: TimeIntervalCollector;
};

type QueueEntry = {
  task: TaskBase;
  mode: ScheduleMode;
};

const DEFAULT_MAX_CYCLES = 1000;

function isReady(task: TaskBase): boolean {
  return task.getDependencies().every((dep) => dep.getStatus() === "done");
}

export class CooperativeScheduler {
  #queue: QueueEntry[] = [];
  #inCycle: Set<QueueEntry> | undefined;
  readonly #collector: TimeIntervalCollector | undefined;

  constructor(options: SchedulerOptions = {}) {
    this.#collector = options.collector;
  }

  /** Queues `task`, setting it to `scheduledOnce` or `scheduledPolling`. */
  schedule(task: TaskBase, mode: ScheduleMode = "once"): void {
    invariant(!task.isDisposed(), `task#${task.id} is disposed and cannot be scheduled`);
    invariant(
      !task.isContinuation,
      `task#${task.id} is a continuation; it runs when its antecedent completes`,
    );
    if (this.#collector && !task.getProfilingCollector()) {
      task.setProfilingCollector(this.#collector);
    }
    task.setStatus(mode === "once" ? "scheduledOnce" : "scheduledPolling");
    this.#queue.push({ task, mode });
  }

  /**
   * Takes `task` off the queue. Its status is left as is. Safe to call from a
   * node's work while a cycle runs.
   * @returns whether the task was queued
   */
  remove(task: TaskBase): boolean {
    const index = this.#queue.findIndex((entry) => entry.task === task);
    if (index !== -1) {
      this.#queue.splice(index, 1);
      return true;
    }
    const inCycle = this.#inCycle;
    if (!inCycle) return false;
    for (const entry of inCycle) {
      if (entry.task === task) {
        inCycle.delete(entry);
        return true;
      }
    }
    return false;
  }

  /**
   * One pass over the queue. A polling node that already ran is re-armed
   * (which resets its result) right before it runs again. Nodes scheduled
   * during the pass wait for the next one.
   * @returns the number of nodes invoked
   */
  runCycle(): number {
    const queue = this.#queue;
    // Entries of this pass that are still scheduled; remove() deletes from it.
    const inCycle = new Set(queue);
    this.#queue = [];
    this.#inCycle = inCycle;
    const kept: QueueEntry[] = [];
    let invoked = 0;
    let index = 0;
    try {
      for (; index < queue.length; index++) {
        const entry = queue[index];
        if (!inCycle.has(entry)) continue;
        if (!isReady(entry.task)) {
          kept.push(entry);
          continue;
        }
        if (entry.mode === "once") {
          inCycle.delete(entry);
        } else {
          entry.task.setStatus("scheduledPolling");
        }
        invoked++;
        entry.task.invoke();
        if (entry.mode === "polling") kept.push(entry);
      }
    } finally {
      // A node whose work threw is dropped; the rest stay queued.
      const remaining = kept
        .concat(queue.slice(index + 1))
        .filter((entry) => inCycle.has(entry));
      this.#queue = remaining.concat(this.#queue);
      this.#inCycle = undefined;
    }
    return invoked;
  }

  /**
   * Cycles until no `once` node is left queued.
   * @returns the number of cycles run
   */
  runUntilIdle(maxCycles: number = DEFAULT_MAX_CYCLES): number {
    let cycles = 0;
    while (this.#queue.some((entry) => entry.mode === "once")) {
      invariant(cycles < maxCycles, `scheduler did not settle within ${maxCycles} cycles`);
      const invoked = this.runCycle();
      cycles++;
      invariant(invoked > 0, `scheduler stalled: ${this.#describeBlocked()}`);
    }
    return cycles;
  }

  pendingCount(): number {
    return this.#queue.length + (this.#inCycle?.size ?? 0);
  }

  #describeBlocked(): string {
    const ids = this.#queue.map((entry) => `task#${entry.task.id}`);
    return `${ids.join(", ")} wait on dependencies that never complete`;
  }
}
