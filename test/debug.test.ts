/**
 * Task debug tests: nothing is emitted while disabled; when enabled, every
 * lifecycle step produces an event and a one-line log entry.
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createTask,
  enableTaskDebug,
  formatTaskDebugEvent,
  subscribeTaskDebug,
  taskGraphDebugger,
  Task,
  TaskGraphDebugger,
  type Logger,
  type TaskDebugEvent,
} from "taskgraph";
// Internal hook for tests only (not from barrel)
import { disableTaskDebug } from "../src/debug.js";

afterEach(() => {
  disableTaskDebug();
  vi.restoreAllMocks();
});

function mockLogger(): Logger & { debug: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("when debug is disabled", () => {
  it("logs nothing and does not call subscribers", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const events: TaskDebugEvent[] = [];
    const unsubscribe = subscribeTaskDebug((e) => events.push(e));
    const task = createTask(() => 1);
    task.invoke();
    task.dispose();
    unsubscribe();
    expect(events).toEqual([]);
    expect(logSpy).not.toHaveBeenCalled();
    expect(taskGraphDebugger.isEnabled()).toBe(false);
  });
});

describe("when debug is enabled", () => {
  it("writes one line per lifecycle step to the logger", () => {
    const logger = mockLogger();
    enableTaskDebug(logger);
    const task = createTask(() => 1, { name: "fetch" });
    task.invoke();
    task.dispose();
    const lines = logger.debug.mock.calls.map((args) => String(args[0]));
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(`task#${task.id} fetch: created`);
    expect(lines[1]).toBe(`task#${task.id} fetch: invalid -> done`);
    expect(lines[2]).toMatch(new RegExp(`^task#${task.id} fetch: invoked \\(done in \\d+\\.\\d{3}ms\\)$`));
    expect(lines[3]).toBe(`task#${task.id} fetch: disposed`);
  });

  it("prints to console when no logger is given", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    enableTaskDebug();
    const task = new Task<number>();
    expect(logSpy).toHaveBeenCalledWith(`task#${task.id}: created`);
    task.dispose();
  });

  it("emits the events of a continuation hand-off in order", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    enableTaskDebug();
    const events: TaskDebugEvent[] = [];
    subscribeTaskDebug((e) => events.push(e));
    const a = createTask(() => 1);
    const b = a.then((v) => v);
    a.invoke();
    expect(events.map((e) => `${e.kind}#${e.taskId}`)).toEqual([
      `taskCreated#${a.id}`,
      `taskCreated#${b.id}`,
      `statusChanged#${a.id}`,
      `taskInvoked#${a.id}`,
      `continuationTriggered#${a.id}`,
      `statusChanged#${b.id}`,
      `statusChanged#${b.id}`,
      `taskInvoked#${b.id}`,
    ]);
    expect(events[4]).toEqual({
      kind: "continuationTriggered",
      taskId: a.id,
      name: "",
      continuationId: b.id,
    });
  });

  it("emits a reset before the status change that leaves done", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    enableTaskDebug();
    const task = createTask(() => 1);
    task.invoke();
    const events: TaskDebugEvent[] = [];
    subscribeTaskDebug((e) => events.push(e));
    task.setStatus("pending");
    expect(events).toEqual([
      { kind: "taskReset", taskId: task.id, name: "" },
      { kind: "statusChanged", taskId: task.id, name: "", from: "done", to: "pending" },
    ]);
  });

  it("emits taskInvoked for a run whose work throws", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    enableTaskDebug();
    const task = new Task<number>({ name: "broken" });
    task.setWork(() => {
      throw new Error("boom");
    });
    const events: TaskDebugEvent[] = [];
    subscribeTaskDebug((e) => events.push(e));
    expect(() => task.invoke()).toThrow("boom");
    expect(events.map((e) => e.kind)).toEqual(["taskInvoked"]);
    expect(events[0]).toMatchObject({ taskId: task.id, name: "broken", status: "invalid" });
  });

  it("reports a throwing subscriber through the logger and keeps going", () => {
    const logger = mockLogger();
    enableTaskDebug(logger);
    subscribeTaskDebug(() => {
      throw new Error("subscriber bug");
    });
    const task = createTask(() => 2);
    task.invoke();
    expect(task.getResult().get()).toBe(2);
    expect(logger.error).toHaveBeenCalledWith(
      "[taskgraph] subscribeTaskDebug subscriber threw:",
      expect.objectContaining({ error: expect.any(Error) }),
    );
  });

  it("stops calling a subscriber after it unsubscribes", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    enableTaskDebug();
    const events: TaskDebugEvent[] = [];
    const unsubscribe = subscribeTaskDebug((e) => events.push(e));
    const first = new Task<number>();
    unsubscribe();
    new Task<number>().dispose();
    expect(events).toEqual([
      { kind: "taskCreated", taskId: first.id, name: "", isContinuation: false },
    ]);
    first.dispose();
  });
});

describe("TaskGraphDebugger instances", () => {
  it("keep their own subscribers", () => {
    const own = new TaskGraphDebugger();
    const seen: string[] = [];
    own.enable({ debug: (msg) => seen.push(msg), warn: () => {}, error: () => {} });
    own.emit({ kind: "taskReset", taskId: 99, name: "job" });
    expect(seen).toEqual(["task#99 job: reset"]);
    expect(taskGraphDebugger.isEnabled()).toBe(false);
  });
});

describe("formatTaskDebugEvent", () => {
  it("marks continuations and names the next node", () => {
    expect(
      formatTaskDebugEvent({ kind: "taskCreated", taskId: 5, name: "", isContinuation: true }),
    ).toBe("task#5: created (continuation)");
    expect(
      formatTaskDebugEvent({ kind: "continuationTriggered", taskId: 5, name: "a", continuationId: 6 }),
    ).toBe("task#5 a: continues with task#6");
  });
});
