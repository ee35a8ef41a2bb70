/**
 * Errors for programming mistakes in a task graph. These are not meant to be
 * caught and recovered from; they signal a broken graph or a misused node.
 */

/**
 * Thrown when a task-graph invariant is broken: invoking a node with no work,
 * writing a result twice in one run, scheduling a continuation directly, or a
 * scheduler that can no longer make progress.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
    Object.setPrototypeOf(this, InvariantViolationError.prototype);
  }
}

/** Throws {@link InvariantViolationError} with `message` unless `condition` holds. */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}
