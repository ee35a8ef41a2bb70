/**
 * Strict mode – opt-in diagnostic checks that throw when a node breaks an
 * invariant that is only reported as a warning otherwise: a continuation link
 * that cannot be resolved, a node left `invalid` by its work, or a node
 * disposed while a scheduler still owns it.
 */

import { InvariantViolationError } from "./errors.js";

let strictModeEnabled = false;
let onWarnCallback: ((message: string) => void) | undefined;

/**
 * Error thrown when strict mode is enabled and a diagnostic invariant is broken.
 */
export class StrictModeError extends InvariantViolationError {
  constructor(message: string) {
    super(message);
    this.name = "StrictModeError";
    Object.setPrototypeOf(this, StrictModeError.prototype);
  }
}

/**
 * Options for {@link enableStrictMode}. When `onWarn` is provided, it is called
 * with the message before throwing, so tests or loggers can capture the violation.
 */
export type StrictModeOptions = {
  /** When provided, called with the violation message before the library throws. */
  onWarn?: (message: string) => void;
};

/**
 * Enables strict diagnostic checks for the process. When enabled, the library
 * throws {@link StrictModeError} instead of logging a warning. Call once at
 * startup or in tests.
 */
export function enableStrictMode(options?: StrictModeOptions): void {
  strictModeEnabled = true;
  onWarnCallback = options?.onWarn;
}

/** Internal use for tests only; not part of public API. */
export function disableStrictMode(): void {
  strictModeEnabled = false;
  onWarnCallback = undefined;
}

/** @internal */
export function isStrictModeEnabled(): boolean {
  return strictModeEnabled;
}

/**
 * When strict mode is on, calls onWarn (if set) then throws {@link StrictModeError}.
 * No-op when strict mode is off.
 * @internal
 */
export function strictModeWarn(message: string): void {
  if (!strictModeEnabled) return;
  onWarnCallback?.(message);
  throw new StrictModeError(message);
}
