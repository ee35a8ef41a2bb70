/**
 * Debug event stream for task-graph introspection: node creation, status
 * changes, resets, invocations, continuation hand-offs and disposal.
 * No allocations when debug is disabled.
 */

import type { TaskStatus } from "./status.js";
import { strictModeWarn } from "./strict-mode.js";

/**
 * Pluggable logger for task-debug output. Pass to enableTaskDebug(logger) to
 * route event lines, violation warnings and subscriber-throw reports to your
 * logger instead of console. Optional meta supports structured loggers.
 */
export interface Logger {
  debug(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;
}

/** Event payload for task debug (discriminated union). */
export type TaskDebugEvent =
  | { kind: "taskCreated"; taskId: number; name: string; isContinuation: boolean }
  | { kind: "statusChanged"; taskId: number; name: string; from: TaskStatus; to: TaskStatus }
  | { kind: "taskReset"; taskId: number; name: string }
  | { kind: "taskInvoked"; taskId: number; name: string; status: TaskStatus; duration: number }
  | {
      kind: "continuationTriggered";
      taskId: number;
      name: string;
      continuationId: number;
    }
  | { kind: "taskDisposed"; taskId: number; name: string };

type TaskDebugSubscriber = (event: TaskDebugEvent) => void;

function label(taskId: number, name: string): string {
  return name ? `task#${taskId} ${name}` : `task#${taskId}`;
}

/** One-line rendering of an event, as printed by the default visualizer. */
export function formatTaskDebugEvent(event: TaskDebugEvent): string {
  const head = label(event.taskId, event.name);
  switch (event.kind) {
    case "taskCreated":
      return `${head}: created${event.isContinuation ? " (continuation)" : ""}`;
    case "statusChanged":
      return `${head}: ${event.from} -> ${event.to}`;
    case "taskReset":
      return `${head}: reset`;
    case "taskInvoked":
      return `${head}: invoked (${event.status} in ${event.duration.toFixed(3)}ms)`;
    case "continuationTriggered":
      return `${head}: continues with task#${event.continuationId}`;
    case "taskDisposed":
      return `${head}: disposed`;
  }
}

/**
 * Instance-based debugger for task-graph events. One default instance backs
 * the public API; create your own for isolated tests.
 */
export class TaskGraphDebugger {
  #debugEnabled = false;
  #logger: Logger | null = null;
  #subscribers: TaskDebugSubscriber[] | null = null;
  #defaultVisualizerUnsubscribe: (() => void) | null = null;

  /** Routes a line to the logger, falling back to console if there is none or it throws. */
  sink(level: "debug" | "warn" | "error", msg: string, meta?: object): void {
    const logger = this.#logger;
    if (logger) {
      try {
        logger[level](msg, meta);
        return;
      } catch {
        // Fall back to console if logger throws
      }
    }
    if (level === "debug") {
      // eslint-disable-next-line no-console
      console.log(msg);
    } else if (level === "warn") {
      // eslint-disable-next-line no-console
      console.warn(msg);
    } else {
      // eslint-disable-next-line no-console
      console.error(msg);
    }
  }

  /** Keeps the logger for violation warnings without turning on the event stream. */
  setLogger(logger: Logger | undefined): void {
    this.#logger = logger ?? null;
  }

  enable(logger?: Logger): void {
    if (logger) this.#logger = logger;
    this.#debugEnabled = true;
    if (!this.#defaultVisualizerUnsubscribe) {
      this.#defaultVisualizerUnsubscribe = this.subscribe((event) =>
        this.sink("debug", formatTaskDebugEvent(event), event),
      );
    }
  }

  disable(): void {
    this.#debugEnabled = false;
    this.#logger = null;
    this.#defaultVisualizerUnsubscribe = null;
    this.#subscribers = null;
  }

  /** Adds a subscriber and returns its unsubscribe function. No-op while disabled. */
  subscribe(callback: TaskDebugSubscriber): () => void {
    if (!this.#debugEnabled) return () => {};
    this.#subscribers ??= [];
    this.#subscribers.push(callback);
    return () => {
      if (this.#subscribers === null) return;
      const i = this.#subscribers.indexOf(callback);
      if (i !== -1) this.#subscribers.splice(i, 1);
    };
  }

  isEnabled(): boolean {
    return this.#debugEnabled;
  }

  emit(event: TaskDebugEvent): void {
    const subscribers = this.#subscribers;
    if (!this.#debugEnabled || subscribers === null || subscribers.length === 0) return;
    for (const fn of subscribers.slice()) {
      try {
        fn(event);
      } catch (err) {
        this.sink("error", "[taskgraph] subscribeTaskDebug subscriber threw:", { error: err });
      }
    }
  }
}

const defaultDebugger = new TaskGraphDebugger();

/**
 * Default singleton debugger used by the public API. Advanced use only;
 * prefer enableTaskDebug() and subscribeTaskDebug().
 */
export const taskGraphDebugger = defaultDebugger;

/**
 * Enables the task-graph event stream on the default debugger. Each event is
 * printed as one line through `logger.debug`, or console when no logger is given.
 */
export function enableTaskDebug(logger?: Logger): void {
  defaultDebugger.enable(logger);
}

/** Internal use for tests only; not part of public API. */
export function disableTaskDebug(): void {
  defaultDebugger.disable();
}

export function subscribeTaskDebug(callback: (event: TaskDebugEvent) => void): () => void {
  return defaultDebugger.subscribe(callback);
}

/** Sets the logger used for violation warnings, independent of the event stream. */
export function setTaskLogger(logger: Logger | undefined): void {
  defaultDebugger.setLogger(logger);
}

export function isTaskDebugEnabled(): boolean {
  return defaultDebugger.isEnabled();
}

/** @internal */
export function emitTaskDebugEvent(event: TaskDebugEvent): void {
  defaultDebugger.emit(event);
}

/**
 * Reports a broken diagnostic invariant: throws in strict mode, otherwise
 * warns through the configured logger.
 * @internal
 */
export function reportViolation(message: string): void {
  strictModeWarn(message);
  defaultDebugger.sink("warn", message);
}
