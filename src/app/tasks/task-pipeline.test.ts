import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { createTempDirTracker, FakeDecompilerEngine, touchArchive, type FakeClass, type FakeEngineOptions } from "../../../test/fakes.js";
import { TaskBusyError } from "../../core/errors.js";
import { MemoryLogger } from "../../core/logger.js";
import { buildNamespaceTree } from "../../core/namespace-tree.js";
import { ResultStore } from "../../core/result-store.js";
import type { ExportWriter, ExportWriterFactory } from "../export/export-writer.js";

import { CANCELLED_REASON, TaskPipeline } from "./task-pipeline.js";
import type { ProgressEvent, TaskEvent, TaskHandle } from "./types.js";

const tempDirs = createTempDirTracker("jarscope-pipeline-");

afterEach(() => {
  tempDirs.cleanup();
});

// =============================================================================
// HELPERS
// =============================================================================

class RecordingWriter implements ExportWriter {
  readonly target = "/virtual/export";
  readonly written: Array<[string, string]> = [];
  closeCount = 0;

  constructor(private readonly beforeWrite?: (index: number) => void) {}

  async write(qualifiedName: string, text: string): Promise<void> {
    this.beforeWrite?.(this.written.length);
    this.written.push([qualifiedName, text]);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }
}

function writerFactoryFor(writer: ExportWriter): ExportWriterFactory {
  return async () => writer;
}

function createPipeline(
  classes: FakeClass[] = [],
  engineOptions: FakeEngineOptions = {},
  writer?: ExportWriter,
): { pipeline: TaskPipeline; store: ResultStore; logger: MemoryLogger; engines: FakeDecompilerEngine[] } {
  const store = new ResultStore();
  const logger = new MemoryLogger({ sessionId: "test-session" });
  const engines: FakeDecompilerEngine[] = [];
  const pipeline = new TaskPipeline({
    store,
    logger,
    engineFactory: () => {
      const engine = new FakeDecompilerEngine(classes, engineOptions);
      engines.push(engine);
      return engine;
    },
    writerFactory: writer ? writerFactoryFor(writer) : undefined,
  });
  return { pipeline, store, logger, engines };
}

async function drain(handle: TaskHandle): Promise<TaskEvent[]> {
  const events: TaskEvent[] = [];
  for await (const event of handle.events) events.push(event);
  return events;
}

function progressOf(events: TaskEvent[]): ProgressEvent[] {
  return events.flatMap((event) => (event.type === "progress" ? [event.progress] : []));
}

function fillStore(store: ResultStore, count: number): void {
  for (let index = 1; index <= count; index += 1) {
    store.put(`pkg/C${index}`, `class C${index} {}`);
  }
}

const THREE_CLASSES: FakeClass[] = [
  { name: "a/B", source: "class B {}" },
  { name: "a/C", source: "class C {}" },
  { name: "a/b/D", source: "class D {}" },
];

// =============================================================================
// DECOMPILE
// =============================================================================

describe("TaskPipeline decompile-archive", () => {
  it("streams one progress event per source, then the tree", async () => {
    const dir = tempDirs.make();
    const archivePath = touchArchive(dir);
    const { pipeline, store, engines } = createPipeline(THREE_CLASSES);

    const handle = pipeline.run({ kind: "decompile-archive", archivePath });
    const events = await drain(handle);

    expect(handle.id).toBe("decompile-archive-1");
    expect(progressOf(events)).toEqual([
      { completed: 1, total: 3, message: "Decompiled a/B" },
      { completed: 2, total: 3, message: "Decompiled a/C" },
      { completed: 3, total: 3, message: "Decompiled a/b/D" },
    ]);
    expect(events[events.length - 1]).toEqual({
      type: "outcome",
      taskId: "decompile-archive-1",
      outcome: { status: "success", tree: buildNamespaceTree(["a/B", "a/C", "a/b/D"]) },
    });
    expect(store.allNames()).toEqual(["a/B", "a/C", "a/b/D"]);
    expect(store.get("a/b/D")).toBe("class D {}");
    expect(engines[0].sources).toEqual([archivePath]);
  });

  it("returns before any work happens", async () => {
    const dir = tempDirs.make();
    const { pipeline } = createPipeline(THREE_CLASSES);

    const handle = pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) });

    expect(handle.poll(0)).toEqual({ events: [], nextCursor: 0, done: false });
    expect(pipeline.isBusy).toBe(true);
    await handle.outcome;
    expect(pipeline.isBusy).toBe(false);
    expect(handle.poll(0).done).toBe(true);
    expect(handle.poll(0).events).toHaveLength(4);
  });

  it("reports an indeterminate total when the engine gives none", async () => {
    const dir = tempDirs.make();
    const { pipeline } = createPipeline(THREE_CLASSES.slice(0, 2), { expectedTotal: null });

    const events = await drain(pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) }));

    expect(progressOf(events).map((progress) => progress.total)).toEqual([null, null]);
  });

  it("grows the total when the engine produces more than it announced", async () => {
    const dir = tempDirs.make();
    const { pipeline } = createPipeline(THREE_CLASSES.slice(0, 2), { expectedTotal: 1 });

    const events = await drain(pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) }));

    expect(progressOf(events).map(({ completed, total }) => [completed, total])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it("surfaces engine warnings as progress and logs every engine message", async () => {
    const dir = tempDirs.make();
    const { pipeline, logger } = createPipeline(THREE_CLASSES.slice(0, 1), {
      messages: [
        { text: "Loading classpath", severity: "info" },
        { text: "Could not resolve Util", severity: "warn" },
      ],
    });

    const events = await drain(pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) }));

    expect(progressOf(events)).toEqual([
      { completed: 0, total: 1, message: "Could not resolve Util" },
      { completed: 1, total: 1, message: "Decompiled a/B" },
    ]);
    expect(
      logger.events
        .filter((event) => event.type === "task.progress")
        .map((event) => event.payload),
    ).toEqual([
      { severity: "info", message: "Loading classpath" },
      { severity: "warn", message: "Could not resolve Util" },
    ]);
  });

  it("fails without progress when the archive does not exist", async () => {
    const dir = tempDirs.make();
    const missing = path.join(dir, "missing.jar");
    const { pipeline, engines } = createPipeline(THREE_CLASSES);

    const events = await drain(pipeline.run({ kind: "decompile-archive", archivePath: missing }));

    expect(events).toEqual([
      {
        type: "outcome",
        taskId: "decompile-archive-1",
        outcome: { status: "failure", reason: `Archive not found: ${missing}` },
      },
    ]);
    expect(engines).toHaveLength(0);
  });

  it("turns engine errors into a failure outcome", async () => {
    const dir = tempDirs.make();
    const { pipeline, logger } = createPipeline(THREE_CLASSES, {
      failWith: new Error("Unable to access jarfile fernflower.jar"),
    });

    const handle = pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) });

    await expect(handle.outcome).resolves.toEqual({
      status: "failure",
      reason: "Unable to access jarfile fernflower.jar",
    });
    expect(logger.events.map((event) => event.type)).toEqual(["task.start", "task.failed"]);
  });

  it("clears the previous archive's results", async () => {
    const dir = tempDirs.make();
    const { pipeline, store } = createPipeline(THREE_CLASSES.slice(0, 1));
    store.put("old/Stale", "class Stale {}");

    await pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) }).outcome;

    expect(store.allNames()).toEqual(["a/B"]);
  });

  it("clears the previous archive's results even when the next archive is missing", async () => {
    const dir = tempDirs.make();
    const { pipeline, store } = createPipeline(THREE_CLASSES.slice(0, 1));
    await pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) }).outcome;

    const missing = path.join(dir, "next.jar");
    await pipeline.run({ kind: "decompile-archive", archivePath: missing }).outcome;

    expect(store.allNames()).toEqual([]);
  });

  it("clears the previous archive's results when cancelled before starting", async () => {
    const dir = tempDirs.make();
    const { pipeline, store } = createPipeline();
    store.put("old/Stale", "class Stale {}");
    const controller = new AbortController();
    controller.abort();

    await pipeline.run(
      { kind: "decompile-archive", archivePath: touchArchive(dir) },
      { signal: controller.signal },
    ).outcome;

    expect(store.allNames()).toEqual([]);
  });
});

// =============================================================================
// EXPORT
// =============================================================================

describe("TaskPipeline export", () => {
  it("emits progress 1..N and then one success outcome", async () => {
    const dir = tempDirs.make();
    const { pipeline, store, logger } = createPipeline();
    fillStore(store, 3);

    const target = path.join(dir, "out");
    const handle = pipeline.run({ kind: "export-to-directory", directory: target });
    const events = await drain(handle);

    expect(events.map((event) => event.type)).toEqual(["progress", "progress", "progress", "outcome"]);
    expect(progressOf(events)).toEqual([
      { completed: 1, total: 3, message: "Saved 1 of 3 classes" },
      { completed: 2, total: 3, message: "Saved 2 of 3 classes" },
      { completed: 3, total: 3, message: "Saved 3 of 3 classes" },
    ]);
    await expect(handle.outcome).resolves.toEqual({
      status: "success",
      export: { written: 3, skipped: 0, target },
    });
    expect(fs.readFileSync(path.join(target, "pkg", "C2.java"), "utf8")).toBe("class C2 {}");
    expect(logger.events.map((event) => [event.type, event.payload])).toEqual([
      ["task.start", { kind: "export-to-directory", target }],
      ["task.complete", { status: "success", written: 3, skipped: 0 }],
    ]);
  });

  it("stops at the first failing entry after k progress events", async () => {
    const writer = new RecordingWriter((index) => {
      if (index === 2) throw new Error("No space left on device");
    });
    const { pipeline, store } = createPipeline([], {}, writer);
    fillStore(store, 5);

    const events = await drain(pipeline.run({ kind: "export-to-archive", archivePath: "/virtual/out.zip" }));

    expect(progressOf(events).map((progress) => progress.completed)).toEqual([1, 2]);
    expect(events[events.length - 1]).toEqual({
      type: "outcome",
      taskId: "export-to-archive-1",
      outcome: { status: "failure", reason: "No space left on device" },
    });
    expect(writer.written.map(([name]) => name)).toEqual(["pkg/C1", "pkg/C2"]);
    expect(writer.closeCount).toBe(1);
  });

  it("logs, but does not mask, a close failure after an entry fails", async () => {
    const writer = new RecordingWriter(() => {
      throw new Error("write failed");
    });
    writer.close = async () => {
      throw new Error("close failed");
    };
    const { pipeline, store, logger } = createPipeline([], {}, writer);
    fillStore(store, 1);

    const outcome = await pipeline.run({ kind: "export-to-archive", archivePath: "/virtual/out.zip" }).outcome;

    expect(outcome).toEqual({ status: "failure", reason: "write failed" });
    expect(logger.events.map((event) => event.type)).toEqual([
      "task.start",
      "task.export.close_failed",
      "task.failed",
    ]);
  });

  it("skips units with no text and no engine to render them", async () => {
    const writer = new RecordingWriter();
    const { pipeline, store } = createPipeline([], {}, writer);
    store.put("a/Ready", "class Ready {}");
    store.register("a/Pending", { archivePath: "/virtual/app.jar", memberPath: "a/Pending.class" });

    const handle = pipeline.run({ kind: "export-to-directory", directory: "/virtual/out" });
    const events = await drain(handle);

    expect(progressOf(events).map((progress) => progress.message)).toEqual([
      "Saved 1 of 2 classes",
      "Saved 2 of 2 classes",
    ]);
    await expect(handle.outcome).resolves.toEqual({
      status: "success",
      export: { written: 1, skipped: 1, target: "/virtual/export" },
    });
  });

  it("re-renders units through the engine and caches the text", async () => {
    const dir = tempDirs.make();
    const writer = new RecordingWriter();
    const { pipeline, store, engines } = createPipeline(
      [{ name: "a/Lazy", renderedSource: "class Lazy {}" }],
      {},
      writer,
    );

    await pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) }).outcome;
    expect(store.get("a/Lazy")).toBeUndefined();

    await pipeline.run({ kind: "export-to-directory", directory: "/virtual/out" }).outcome;

    expect(writer.written).toEqual([["a/Lazy", "class Lazy {}"]]);
    expect(store.get("a/Lazy")).toBe("class Lazy {}");
    expect(engines[0].renderedHandles).toEqual([
      { archivePath: path.join(dir, "app.jar"), memberPath: "a/Lazy.class" },
    ]);
  });

  it("writes nothing for an empty store", async () => {
    const writer = new RecordingWriter();
    const { pipeline } = createPipeline([], {}, writer);

    const events = await drain(pipeline.run({ kind: "export-to-directory", directory: "/virtual/out" }));

    expect(events).toEqual([
      {
        type: "outcome",
        taskId: "export-to-directory-1",
        outcome: { status: "success", export: { written: 0, skipped: 0, target: "/virtual/export" } },
      },
    ]);
    expect(writer.closeCount).toBe(1);
  });
});

// =============================================================================
// CONCURRENCY AND CANCELLATION
// =============================================================================

describe("TaskPipeline scheduling", () => {
  it("rejects a second task while one is active", async () => {
    const dir = tempDirs.make();
    const { pipeline, store } = createPipeline(THREE_CLASSES);
    const archivePath = touchArchive(dir);

    const first = pipeline.run({ kind: "decompile-archive", archivePath });

    expect(() => pipeline.run({ kind: "export-to-directory", directory: dir })).toThrow(TaskBusyError);
    expect(() => pipeline.run({ kind: "decompile-archive", archivePath })).toThrow(
      "Task decompile-archive-1 is still running",
    );

    await first.outcome;
    expect(store.size).toBe(3);

    const second = pipeline.run({ kind: "decompile-archive", archivePath });
    expect(second.id).toBe("decompile-archive-2");
    await second.outcome;
  });

  it("cancels before starting when the signal is already aborted", async () => {
    const dir = tempDirs.make();
    const { pipeline, engines } = createPipeline(THREE_CLASSES);
    const controller = new AbortController();
    controller.abort();

    const events = await drain(
      pipeline.run({ kind: "decompile-archive", archivePath: touchArchive(dir) }, { signal: controller.signal }),
    );

    expect(events).toEqual([
      {
        type: "outcome",
        taskId: "decompile-archive-1",
        outcome: { status: "failure", reason: CANCELLED_REASON },
      },
    ]);
    expect(engines).toHaveLength(0);
  });

  it("hands the signal to the engine and reports a running decompile as cancelled", async () => {
    const dir = tempDirs.make();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { pipeline, engines } = createPipeline(THREE_CLASSES, { gate });
    const controller = new AbortController();

    const handle = pipeline.run(
      { kind: "decompile-archive", archivePath: touchArchive(dir) },
      { signal: controller.signal },
    );
    await vi.waitFor(() => expect(engines).toHaveLength(1));
    controller.abort();
    release();

    await expect(handle.outcome).resolves.toEqual({ status: "failure", reason: CANCELLED_REASON });
  });

  it("stops an export between entries once cancelled", async () => {
    const controller = new AbortController();
    const writer = new RecordingWriter(() => controller.abort());
    const { pipeline, store } = createPipeline([], {}, writer);
    fillStore(store, 4);

    const events = await drain(
      pipeline.run({ kind: "export-to-directory", directory: "/virtual/out" }, { signal: controller.signal }),
    );

    expect(progressOf(events).map((progress) => progress.completed)).toEqual([1]);
    expect(events[events.length - 1]).toMatchObject({
      type: "outcome",
      outcome: { status: "failure", reason: "Task cancelled" },
    });
    expect(writer.written).toHaveLength(1);
    expect(writer.closeCount).toBe(1);
  });
});
