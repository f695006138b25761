import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError } from "../errors";
import { renderStatusLine } from "../statusLine";
import { TaskStore } from "../taskStore";
import { TimeEntryStore } from "../timeEntryStore";
import { Tracker } from "../tracker";
import type { Task } from "../types";
import {
  createClock,
  makeTempDir,
  recordingLogger,
  removeDir,
  sequentialIds,
  type TestClock,
  writeJson,
} from "./helpers";

describe("Tracker", () => {
  let dir: string;
  let clock: TestClock;
  let tasks: TaskStore;
  let entries: TimeEntryStore;
  let tracker: Tracker;
  let task: Task;
  let other: Task;

  beforeEach(async () => {
    dir = await makeTempDir();
    clock = createClock();
    tasks = new TaskStore({
      file: path.join(dir, "tasks.json"),
      clock: clock.now,
      idFactory: sequentialIds("task"),
    });
    entries = new TimeEntryStore({
      file: path.join(dir, "time_entries.json"),
      clock: clock.now,
      idFactory: sequentialIds("entry"),
    });
    await tasks.load();
    await entries.load();
    task = await tasks.create({
      customer_id: "c1",
      department_id: "d1",
      date: "2024-01-01",
      hours: 2,
      description: "design",
    });
    other = await tasks.create({
      customer_id: "c1",
      department_id: "d1",
      date: "2024-01-02",
      hours: 1,
      description: "review",
    });
    tracker = new Tracker({ entries, tasks, clock: clock.now });
    tracker.init();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("starts and stops a session", async () => {
    const started = await tracker.start(task.id, "sketching");
    expect(started).toMatchObject({
      task_id: task.id,
      start_time: "2024-01-01T09:00:00.000Z",
      end_time: null,
      description: "sketching",
      duration_seconds: 0,
    });
    expect(tracker.isRunning()).toBe(true);

    clock.advance(125);
    const stopped = await tracker.stop();

    expect(stopped).toMatchObject({
      id: started.id,
      end_time: "2024-01-01T09:02:05.000Z",
      duration_seconds: 125,
    });
    expect(tracker.isRunning()).toBe(false);
    expect(tracker.getActive()).toBeUndefined();
  });

  it("returns undefined when stopping with nothing running", async () => {
    expect(await tracker.stop()).toBeUndefined();
  });

  it("refuses to start a timer for an unknown task", async () => {
    await expect(tracker.start("missing")).rejects.toThrow(NotFoundError);
    expect(entries.count()).toBe(0);
  });

  it("closes the running entry when another one starts", async () => {
    const first = await tracker.start(task.id, "design");
    clock.advance(90);
    const second = await tracker.start(task.id, "coding");

    expect(entries.get(first.id)).toMatchObject({
      end_time: "2024-01-01T09:01:30.000Z",
      duration_seconds: 90,
    });
    expect(second.start_time).toBe("2024-01-01T09:01:30.000Z");
    expect(entries.listOpen().map((entry) => entry.id)).toEqual([second.id]);
    expect(tracker.getActive()?.id).toBe(second.id);

    clock.advance(30);
    expect(tracker.elapsed(task.id)).toBe(120);

    await tracker.stop();
    expect(tracker.elapsed(task.id)).toBe(120);
    expect(tracker.entriesFor(task.id)).toHaveLength(2);
  });

  it("switches tasks without leaving two entries open", async () => {
    await tracker.start(task.id);
    clock.advance(60);
    await tracker.start(other.id);
    clock.advance(45);

    expect(tracker.elapsed(task.id)).toBe(60);
    expect(tracker.elapsed(other.id)).toBe(45);
    expect(tracker.runningSeconds()).toBe(45);
    expect(entries.listOpen()).toHaveLength(1);
  });

  it("keeps at most one open entry across any sequence of starts and stops", async () => {
    const targets = [task.id, other.id];
    for (let step = 0; step < 24; step++) {
      clock.advance(7 + step);
      if (step % 5 === 3) {
        await tracker.stop();
      } else {
        await tracker.start(targets[step % 2], `step ${step}`);
      }
      expect(entries.listOpen()).toHaveLength(tracker.isRunning() ? 1 : 0);
    }
  });

  it("counts only closed durations plus the live session", async () => {
    expect(tracker.elapsed(task.id)).toBe(0);
    await tracker.start(task.id);
    clock.advance(10);
    expect(tracker.elapsed(task.id)).toBe(10);
    expect(tracker.elapsed(other.id)).toBe(0);
  });

  it("recomputes durations when an entry is edited", async () => {
    const entry = await tracker.start(task.id);
    clock.advance(60);
    await tracker.stop();

    const longer = await tracker.updateEntry(entry.id, { end_time: "2024-01-01T09:05:00.000Z" });
    expect(longer?.duration_seconds).toBe(300);

    const earlier = await tracker.updateEntry(entry.id, {
      start_time: "2024-01-01T08:59:00.000Z",
    });
    expect(earlier?.duration_seconds).toBe(360);
    expect(tracker.elapsed(task.id)).toBe(360);
  });

  it("rejects an edit whose end precedes its start", async () => {
    const entry = await tracker.start(task.id);
    clock.advance(60);
    await tracker.stop();

    await expect(
      tracker.updateEntry(entry.id, { end_time: "2024-01-01T08:00:00.000Z" })
    ).rejects.toThrow("End time cannot be before start time");
  });

  it("stops tracking when the running entry is closed by an edit", async () => {
    const entry = await tracker.start(task.id);
    clock.advance(60);

    await tracker.updateEntry(entry.id, { end_time: "2024-01-01T09:00:30.000Z" });

    expect(tracker.isRunning()).toBe(false);
    expect(tracker.getEntry(entry.id)?.duration_seconds).toBe(30);
  });

  it("forgets the running entry when it is deleted", async () => {
    const entry = await tracker.start(task.id);

    expect(await tracker.deleteEntry(entry.id)).toBe(true);
    expect(tracker.isRunning()).toBe(false);
    expect(await tracker.deleteEntry(entry.id)).toBe(false);
  });

  it("deletes every entry of a task", async () => {
    await tracker.start(task.id);
    clock.advance(10);
    await tracker.start(other.id);
    clock.advance(10);
    await tracker.start(task.id);

    expect(await tracker.deleteEntriesForTask(task.id)).toBe(2);
    expect(tracker.isRunning()).toBe(false);
    expect(tracker.listEntries().map((entry) => entry.task_id)).toEqual([other.id]);
  });

  it("picks up an entry left running by an earlier process", async () => {
    const started = await tracker.start(task.id, "carried over");
    clock.advance(600);

    const reloaded = new TimeEntryStore({ file: entries.file });
    await reloaded.load();
    const next = new Tracker({ entries: reloaded, tasks, clock: clock.now });
    next.init();

    expect(next.getActive()?.id).toBe(started.id);
    expect(next.runningSeconds()).toBe(600);
  });

  it("resumes the most recent of several open entries and warns", async () => {
    await writeJson(entries.file, {
      e1: {
        id: "e1",
        task_id: task.id,
        start_time: "2024-01-01T08:00:00.000Z",
        end_time: null,
        description: "",
        duration_seconds: 0,
      },
      e2: {
        id: "e2",
        task_id: other.id,
        start_time: "2024-01-01T08:30:00.000Z",
        end_time: null,
        description: "",
        duration_seconds: 0,
      },
    });
    const reloaded = new TimeEntryStore({ file: entries.file });
    await reloaded.load();
    const { logger, sink } = recordingLogger();
    const next = new Tracker({ entries: reloaded, tasks, logger, clock: clock.now });

    next.init();

    expect(next.getActive()?.id).toBe("e2");
    expect(sink).toHaveBeenCalledWith(
      "warn",
      `2 open time entries detected. Using most recent: e2 (task ${other.id})`,
      []
    );
  });
});

describe("renderStatusLine", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("shows idle and running states", async () => {
    const clock = createClock();
    const tasks = new TaskStore({ file: path.join(dir, "tasks.json"), clock: clock.now });
    const entries = new TimeEntryStore({ file: path.join(dir, "time_entries.json") });
    await tasks.load();
    await entries.load();
    const tracker = new Tracker({ entries, tasks, clock: clock.now });
    tracker.init();
    const task = await tasks.create({
      customer_id: "c1",
      department_id: "d1",
      date: "2024-01-01",
      hours: 1,
      description: "",
    });
    const render = () =>
      renderStatusLine(
        tracker,
        (item) => `Task ${item.date}`,
        (taskId) => tasks.get(taskId)
      );

    expect(render()).toBe("🕒 hourbook: idle");

    await tracker.start(task.id, "pairing");
    clock.advance(3725);
    expect(render()).toBe("🕑 Task 2024-01-01 — pairing (01:02:05)");

    await tracker.start(task.id);
    clock.advance(5);
    expect(render()).toBe("🕑 Task 2024-01-01 (00:00:05)");
  });
});
