/**
 * Factories for nodes whose work publishes a function's result and marks the
 * node done, so they can be handed straight to a scheduler.
 */

import {
  completeWith,
  Task,
  type ContinuationOptions,
  type ResultSource,
  type VoidToUnit,
} from "./task.js";

/** Result type of a node. */
export type ResultOf<D> = D extends ResultSource<infer U> ? U : never;

/** Result types of a tuple of nodes, position by position. */
export type ResultsOf<D extends readonly ResultSource<unknown>[]> = {
  [K in keyof D]: ResultOf<D[K]>;
};

/**
 * Creates a root node that runs `f`. Whatever `f` returns (or throws) is
 * published and the node is marked done.
 *
 * @example
 * const fetchUser = createTask(() => loadUser(id), { name: "fetchUser" });
 * const greet = fetchUser.then((user) => `hello ${user.name}`);
 */
export function createTask<R>(f: () => R, options?: ContinuationOptions): Task<VoidToUnit<R>> {
  const task = new Task<VoidToUnit<R>>(options);
  task.setWork(() => completeWith<R>(task, f));
  return task;
}

function readAll<const D extends readonly ResultSource<unknown>[]>(deps: D): ResultsOf<D>;
function readAll(deps: readonly ResultSource<unknown>[]): unknown {
  return deps.map((dep) => dep.getResult().get());
}

/**
 * Creates a fan-in node: it depends on every node in `deps` and, once run,
 * passes their results to `f` in the same order. Readiness is the
 * scheduler's call; an antecedent's published error is published by this
 * node in turn.
 *
 * @example
 * const total = whenAll([price, quantity], (p, q) => p * q, { name: "total" });
 */
export function whenAll<const D extends readonly ResultSource<unknown>[], R>(
  deps: D,
  f: (...values: ResultsOf<D>) => R,
  options?: ContinuationOptions,
): Task<VoidToUnit<R>> {
  const task = new Task<VoidToUnit<R>>(options);
  task.addDependencies(deps);
  task.setWork(() => completeWith<R>(task, () => f(...readAll(deps))));
  return task;
}
