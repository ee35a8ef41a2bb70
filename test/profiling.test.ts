import { describe, it, expect } from "vitest";
import { createTask, IntervalRecorder, scopedTimeInterval, Task } from "taskgraph";

/** Recorder on a clock that advances by one on every reading. */
function steppingRecorder(): IntervalRecorder {
  let now = 0;
  return new IntervalRecorder(() => ++now);
}

describe("scopedTimeInterval", () => {
  it("just runs the function when there is no collector", () => {
    expect(scopedTimeInterval(undefined, "plain", [1, 1, 1], () => "value")).toBe("value");
  });

  it("closes the interval when the function throws", () => {
    const recorder = steppingRecorder();
    expect(() =>
      scopedTimeInterval(recorder, "failing", [1, 0, 0], () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(recorder.getIntervals()).toEqual([
      { name: "failing", color: [1, 0, 0], start: 1, end: 2 },
    ]);
  });
});

describe("task profiling", () => {
  it("brackets each run with the node's name and color", () => {
    const recorder = steppingRecorder();
    const task = createTask(() => 1, { name: "load", color: [1, 0, 0] });
    task.setProfilingCollector(recorder);
    expect(task.getProfilingCollector()).toBe(recorder);
    task.invoke();
    expect(recorder.getIntervals()).toEqual([
      { name: "load", color: [1, 0, 0], start: 1, end: 2 },
    ]);
  });

  it("uses opaque white for a node built without a color", () => {
    const recorder = steppingRecorder();
    const task = createTask(() => 1);
    task.setProfilingCollector(recorder);
    task.invoke();
    expect(recorder.getIntervals()[0]?.color).toEqual([1, 1, 1]);
    expect(recorder.getIntervals()[0]?.name).toBe("");
  });

  it("closes the antecedent's interval before its continuation starts", () => {
    const recorder = steppingRecorder();
    const a = createTask(() => 1, { name: "A" });
    const b = a.then((v) => v + 1, { name: "B" });
    a.setProfilingCollector(recorder);
    b.setProfilingCollector(recorder);
    a.invoke();
    expect(recorder.getIntervals().map((i) => [i.name, i.start, i.end])).toEqual([
      ["A", 1, 2],
      ["B", 3, 4],
    ]);
  });

  it("records nothing for a continuation without a collector", () => {
    const recorder = steppingRecorder();
    const a = createTask(() => 1, { name: "A" });
    a.then((v) => v + 1, { name: "B" });
    a.setProfilingCollector(recorder);
    a.invoke();
    expect(recorder.getIntervals().map((i) => i.name)).toEqual(["A"]);
  });

  it("records a run whose work throws", () => {
    const recorder = steppingRecorder();
    const task = new Task<number>({ name: "broken" });
    task.setWork(() => {
      throw new Error("boom");
    });
    task.setProfilingCollector(recorder);
    expect(() => task.invoke()).toThrow("boom");
    expect(recorder.getIntervals()).toHaveLength(1);
    recorder.clear();
    expect(recorder.getIntervals()).toEqual([]);
  });
});
