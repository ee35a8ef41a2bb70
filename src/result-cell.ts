/**
 * Result cell – single-write, multi-read slot for one run of a task node.
 * Readers hold a {@link ResultHandle}; a reset gives the node a new cell and
 * leaves old handles reading the old one.
 */

import { InvariantViolationError } from "./errors.js";

type CellState<T> =
  | { kind: "empty" }
  | { kind: "value"; value: T }
  | { kind: "error"; error: unknown };

/** A published result: the value, or the error the run failed with. */
export type ResultOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

type Waiter<T> = {
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

/**
 * Read side of a {@link ResultCell}. Awaitable by any number of consumers; reading never consumes the value.
 */
export interface ResultHandle<T> extends PromiseLike<T> {
  /** True once a value or an error has been published. */
  isReady(): boolean;
  /** Synchronous read: the value, or the published error rethrown. Throws if nothing is published yet. */
  get(): T;
  /** What has been published so far, without throwing; undefined before publication. */
  peek(): ResultOutcome<T> | undefined;
}

export class ResultCell<T> {
  #state: CellState<T> = { kind: "empty" };
  #settled: Promise<T> | undefined;
  #waiter: Waiter<T> | undefined;
  readonly #handle: ResultHandle<T>;

  constructor() {
    this.#handle = {
      isReady: () => this.isSettled(),
      get: () => this.#read(),
      peek: () => this.#peek(),
      then: <TResult1 = T, TResult2 = never>(
        onFulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
        onRejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
      ): PromiseLike<TResult1 | TResult2> => this.#promise().then(onFulfilled, onRejected),
    };
  }

  /** Publishes the value for this run. */
  resolve(value: T): void {
    this.#publish({ kind: "value", value });
    this.#waiter?.resolve(value);
  }

  /** Publishes a failure for this run; readers see `error` thrown or rejected. */
  reject(error: unknown): void {
    this.#publish({ kind: "error", error });
    this.#waiter?.reject(error);
  }

  isSettled(): boolean {
    return this.#state.kind !== "empty";
  }

  handle(): ResultHandle<T> {
    return this.#handle;
  }

  #publish(state: Exclude<CellState<T>, { kind: "empty" }>): void {
    if (this.#state.kind !== "empty") {
      throw new InvariantViolationError("result already published for this run");
    }
    this.#state = state;
  }

  #read(): T {
    const state = this.#state;
    switch (state.kind) {
      case "value":
        return state.value;
      case "error":
        throw state.error;
      case "empty":
        throw new InvariantViolationError("result read before it was published");
    }
  }

  #peek(): ResultOutcome<T> | undefined {
    const state = this.#state;
    if (state.kind === "value") return { ok: true, value: state.value };
    if (state.kind === "error") return { ok: false, error: state.error };
    return undefined;
  }

  // The promise is created on first await so an unread error never becomes an unhandled rejection.
  #promise(): Promise<T> {
    if (this.#settled) return this.#settled;
    const state = this.#state;
    if (state.kind === "value") {
      this.#settled = Promise.resolve(state.value);
    } else if (state.kind === "error") {
      this.#settled = Promise.reject(state.error);
    } else {
      this.#settled = new Promise<T>((resolve, reject) => {
        this.#waiter = { resolve, reject };
      });
    }
    return this.#settled;
  }
}
