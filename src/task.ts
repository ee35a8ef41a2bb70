/**
 * Task – a unit of deferred work with a typed result. A node can depend on
 * other nodes, chain one continuation that runs inline once it completes,
 * and reports each run to an optional profiling collector.
 */

import { emitTaskDebugEvent, isTaskDebugEnabled, reportViolation } from "./debug.js";
import { invariant } from "./errors.js";
import { decrementInstanceCount, incrementInstanceCount } from "./instance-count.js";
import {
  DEFAULT_DEBUG_COLOR,
  scopedTimeInterval,
  type DebugColor,
  type TimeIntervalCollector,
} from "./profiling.js";
import { ResultCell, type ResultHandle } from "./result-cell.js";
import { isSchedulingStatus, type TaskStatus } from "./status.js";

/** Marker published by a node whose function returns nothing. */
export const UNIT: unique symbol = Symbol("taskgraph.unit");
export type Unit = typeof UNIT;

/**
 * Result type of a node built from a function returning `R`: `void` and
 * `undefined` become {@link Unit}, everything else is kept.
 */
export type VoidToUnit<R> = Exclude<R, void | undefined> | (undefined extends R ? Unit : never);

/** Zero-argument work closure. It publishes into the node's result cell and marks the node done. */
export type TaskWork = () => void;

/**
 * Capability surface shared by every node regardless of result type, so a
 * scheduler can hold and drive a heterogeneous set of nodes.
 */
export interface TaskBase {
  readonly id: number;
  readonly name: string;
  /** Set at construction; true only for nodes created by {@link Task.then}. */
  readonly isContinuation: boolean;
  invoke(): void;
  getStatus(): TaskStatus;
  setStatus(status: TaskStatus): void;
  /** Antecedents in the order they were added. Stable until the next addDependencies. */
  getDependencies(): readonly TaskBase[];
  getProfilingCollector(): TimeIntervalCollector | undefined;
  setProfilingCollector(collector: TimeIntervalCollector | undefined): void;
  isDisposed(): boolean;
  dispose(): void;
}

/** A node whose result can be read, whatever its concrete class. */
export interface ResultSource<T> extends TaskBase {
  getResult(): ResultHandle<T>;
}

export type TaskOptions = {
  name?: string;
  /** Defaults to opaque white. */
  color?: DebugColor;
  isContinuation?: boolean;
};

export type ContinuationOptions = Omit<TaskOptions, "isContinuation">;

let nextTaskId = 0;

/** Maps `undefined` (a function that returned nothing) to {@link UNIT}. */
export function unitIfVoid<R>(value: R): VoidToUnit<R>;
export function unitIfVoid(value: unknown): unknown {
  return value === undefined ? UNIT : value;
}

function isNullary<A, R>(fn: (arg: A) => R): fn is () => R {
  return fn.length === 0;
}

/**
 * Calls a continuation function with the antecedent's published value.
 * A function declaring no parameter does not see a published error: it is
 * called without an argument instead.
 */
function callWithResult<T, R>(f: (value: T) => R, result: ResultHandle<T>): R {
  const outcome = result.peek();
  if (outcome?.ok) return f(outcome.value);
  if (isNullary(f)) return f();
  return f(result.get());
}

/**
 * Runs `compute`, publishes its value (or the error it threw) into the
 * node's current cell, then marks the node done.
 * @internal
 */
export function completeWith<R>(task: Task<VoidToUnit<R>>, compute: () => R): void {
  const cell = task.getResultCell();
  let value: VoidToUnit<R>;
  try {
    value = unitIfVoid(compute());
  } catch (error) {
    cell.reject(error);
    task.setStatus("done");
    return;
  }
  cell.resolve(value);
  task.setStatus("done");
}

export class Task<T> implements ResultSource<T> {
  readonly id = ++nextTaskId;
  readonly name: string;
  readonly isContinuation: boolean;
  #work: TaskWork | undefined;
  #cell = new ResultCell<T>();
  #continuation: WeakRef<TaskBase> | undefined;
  #dependencies: TaskBase[] = [];
  #collector: TimeIntervalCollector | undefined;
  #color: DebugColor;
  #status: TaskStatus = "invalid";
  #disposed = false;

  constructor(options: TaskOptions = {}) {
    this.name = options.name ?? "";
    this.#color = options.color ?? DEFAULT_DEBUG_COLOR;
    this.isContinuation = options.isContinuation ?? false;
    incrementInstanceCount();
    if (isTaskDebugEnabled()) {
      emitTaskDebugEvent({
        kind: "taskCreated",
        taskId: this.id,
        name: this.name,
        isContinuation: this.isContinuation,
      });
    }
  }

  /**
   * Runs the work inside the profiling bracket. When the work leaves the node
   * done, the continuation (if still linked) runs before this returns.
   */
  invoke(): void {
    invariant(!this.#disposed, `${this.#describe()} invoked after dispose`);
    const work = this.#work;
    invariant(work, `${this.#describe()} invoked without work`);

    const start = performance.now();
    try {
      scopedTimeInterval(this.#collector, this.name, this.#color, work);
    } finally {
      if (isTaskDebugEnabled()) {
        emitTaskDebugEvent({
          kind: "taskInvoked",
          taskId: this.id,
          name: this.name,
          status: this.#status,
          duration: performance.now() - start,
        });
      }
    }

    if (this.#status === "invalid") {
      reportViolation(`${this.#describe()} is still invalid after its work ran`);
    }
    if (this.#status !== "done") return;

    const continuation = this.getContinuation();
    if (continuation === undefined) return;
    if (isTaskDebugEnabled()) {
      emitTaskDebugEvent({
        kind: "continuationTriggered",
        taskId: this.id,
        name: this.name,
        continuationId: continuation.id,
      });
    }
    // Re-arms a continuation that completed on an earlier run.
    continuation.setStatus("scheduledOnce");
    continuation.invoke();
  }

  getStatus(): TaskStatus {
    return this.#status;
  }

  /** Leaving `done` for any other status resets the node for another run. */
  setStatus(status: TaskStatus): void {
    const from = this.#status;
    if (from === "done" && status !== "done") {
      this.reset();
    }
    this.#status = status;
    if (isTaskDebugEnabled()) {
      emitTaskDebugEvent({ kind: "statusChanged", taskId: this.id, name: this.name, from, to: status });
    }
  }

  getDependencies(): readonly TaskBase[] {
    return this.#dependencies;
  }

  getProfilingCollector(): TimeIntervalCollector | undefined {
    return this.#collector;
  }

  setProfilingCollector(collector: TimeIntervalCollector | undefined): void {
    this.#collector = collector;
  }

  isDisposed(): boolean {
    return this.#disposed;
  }

  /**
   * Releases the node: drops its work, dependencies and continuation link and
   * takes it off the live count. A node a scheduler still owns must not be disposed.
   */
  dispose(): void {
    if (this.#disposed) return;
    if (isSchedulingStatus(this.#status)) {
      reportViolation(`${this.#describe()} disposed while ${this.#status}`);
    }
    this.#disposed = true;
    this.#work = undefined;
    this.#dependencies = [];
    this.#continuation = undefined;
    this.#collector = undefined;
    decrementInstanceCount();
    if (isTaskDebugEnabled()) {
      emitTaskDebugEvent({ kind: "taskDisposed", taskId: this.id, name: this.name });
    }
  }

  /** Replaces the result cell. Handles taken earlier keep reading the old one. */
  reset(): void {
    this.#cell = new ResultCell<T>();
    if (isTaskDebugEnabled()) {
      emitTaskDebugEvent({ kind: "taskReset", taskId: this.id, name: this.name });
    }
  }

  getWork(): TaskWork | undefined {
    return this.#work;
  }

  setWork(work: TaskWork): void {
    this.#work = work;
  }

  getDebugColor(): DebugColor {
    return this.#color;
  }

  setDebugColor(color: DebugColor): void {
    this.#color = color;
  }

  /** The linked continuation, or undefined once it is unlinked, collected or disposed. */
  getContinuation(): TaskBase | undefined {
    const continuation = this.#continuation?.deref();
    return continuation && !continuation.isDisposed() ? continuation : undefined;
  }

  /** Links a continuation without keeping it alive. */
  setContinuation(continuation: TaskBase | undefined): void {
    this.#continuation = continuation ? new WeakRef(continuation) : undefined;
  }

  /** Write side of the current run's cell. */
  getResultCell(): ResultCell<T> {
    return this.#cell;
  }

  /** Read side of the current run's cell. */
  getResult(): ResultHandle<T> {
    return this.#cell.handle();
  }

  /**
   * Appends antecedents, in order, to the dependency list: either one
   * sequence of nodes or any number of nodes of differing result types.
   */
  addDependencies(deps: readonly TaskBase[]): void;
  addDependencies(...deps: TaskBase[]): void;
  addDependencies(...deps: Array<TaskBase | readonly TaskBase[]>): void {
    for (const dep of deps) {
      if (isTaskSequence(dep)) {
        this.#dependencies.push(...dep);
      } else {
        this.#dependencies.push(dep);
      }
    }
  }

  /**
   * Builds the continuation of this node: a new node, depending on this one,
   * that runs `f` inline as soon as this node completes. `f` may ignore the
   * result (`() => ...`) or take it (`(value) => ...`); a function returning
   * nothing yields a {@link Unit} result. Replaces any earlier continuation.
   * The caller owns the returned node; this node only holds a weak link to it.
   */
  then<R>(f: (value: T) => R, options: ContinuationOptions = {}): Task<VoidToUnit<R>> {
    const next = new Task<VoidToUnit<R>>({ ...options, isContinuation: true });
    next.setWork(() =>
      completeWith<R>(next, () => callWithResult(f, this.getResult())),
    );
    next.addDependencies(this);
    this.setContinuation(next);
    return next;
  }

  #describe(): string {
    return this.name ? `task#${this.id} "${this.name}"` : `task#${this.id}`;
  }
}

function isTaskSequence(value: TaskBase | readonly TaskBase[]): value is readonly TaskBase[] {
  return Array.isArray(value);
}
