/**
 * Lifecycle state of a task node.
 *
 * - `invalid`: freshly constructed, not yet handed to a scheduler.
 * - `pending`: known to a scheduler, not yet queued.
 * - `scheduledOnce`: queued for a single run.
 * - `scheduledPolling`: queued to run again on every scheduling cycle.
 * - `done`: the result of the current run is published.
 */
export type TaskStatus =
  | "pending"
  | "scheduledOnce"
  | "scheduledPolling"
  | "done"
  | "invalid";

/** Named constants for each {@link TaskStatus}. */
export const TaskStatus = {
  Pending: "pending",
  ScheduledOnce: "scheduledOnce",
  ScheduledPolling: "scheduledPolling",
  Done: "done",
  Invalid: "invalid",
} as const satisfies Record<string, TaskStatus>;

/** True for the states in which a scheduler still owns the node. */
export function isSchedulingStatus(status: TaskStatus): boolean {
  return (
    status === "pending" ||
    status === "scheduledOnce" ||
    status === "scheduledPolling"
  );
}
