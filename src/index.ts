/**
 * taskgraph – task nodes with typed results, inline continuations and
 * fan-in dependencies, driven by a scheduler through a uniform interface.
 * @module
 */
export {
  Task,
  UNIT,
  unitIfVoid,
  type TaskBase,
  type ResultSource,
  type TaskOptions,
  type ContinuationOptions,
  type TaskWork,
  type Unit,
  type VoidToUnit,
} from "./task.js";
export { TaskStatus, isSchedulingStatus } from "./status.js";
export { ResultCell, type ResultHandle, type ResultOutcome } from "./result-cell.js";
export { createTask, whenAll, type ResultOf, type ResultsOf } from "./factories.js";
export {
  CooperativeScheduler,
  type ScheduleMode,
  type SchedulerOptions,
} from "./scheduler.js";
export {
  DEFAULT_DEBUG_COLOR,
  IntervalRecorder,
  scopedTimeInterval,
  type DebugColor,
  type IntervalToken,
  type TimeInterval,
  type TimeIntervalCollector,
} from "./profiling.js";
export { getInstanceCount, getInstanceCounterBuffer } from "./instance-count.js";
export { InvariantViolationError, invariant } from "./errors.js";
export {
  enableTaskDebug,
  subscribeTaskDebug,
  setTaskLogger,
  formatTaskDebugEvent,
  TaskGraphDebugger,
  taskGraphDebugger,
  type Logger,
  type TaskDebugEvent,
} from "./debug.js";
export {
  enableStrictMode,
  StrictModeError,
  type StrictModeOptions,
} from "./strict-mode.js";
