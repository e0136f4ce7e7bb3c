/**
 * TaskPipeline runs decompile and export work in the background.
 * Purpose: keep long operations off the interactive side and hand back progress through a channel.
 * Assumptions: one task at a time; a second `run` while one is active is a caller error.
 * Usage: const handle = pipeline.run({ kind: "decompile-archive", archivePath }); for await (const e of handle.events) ...
 */

import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "../../core/error-format.js";
import { EngineError, TaskBusyError, TaskError } from "../../core/errors.js";
import { logTaskEvent, type EventLogger, type JsonObject } from "../../core/logger.js";
import { buildNamespaceTree } from "../../core/namespace-tree.js";
import {
  normalizeQualifiedName,
  type DecompiledUnit,
  type ResultStore,
} from "../../core/result-store.js";
import type {
  DecompilerEngine,
  DecompilerEngineFactory,
  EngineResultSink,
} from "../../engine/engine.js";
import {
  openExportWriter,
  type ExportRequest,
  type ExportWriter,
  type ExportWriterFactory,
  type ExportWriterOptions,
} from "../export/export-writer.js";

import { TaskChannel } from "./task-channel.js";
import type {
  DecompileArchiveRequest,
  ProgressEvent,
  RunTaskOptions,
  TaskEvent,
  TaskHandle,
  TaskOutcome,
  TaskRequest,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskPipelineOptions = {
  store: ResultStore;
  engineFactory: DecompilerEngineFactory;
  logger: EventLogger;
  writerFactory?: ExportWriterFactory;
  exportOptions?: ExportWriterOptions;
};

type Emit = (progress: ProgressEvent) => void;

export const CANCELLED_REASON = "Task cancelled";

// =============================================================================
// PIPELINE
// =============================================================================

export class TaskPipeline {
  private readonly store: ResultStore;
  private readonly engineFactory: DecompilerEngineFactory;
  private readonly logger: EventLogger;
  private readonly writerFactory: ExportWriterFactory;
  private readonly exportOptions: ExportWriterOptions;

  private activeTaskId: string | null = null;
  // Engine of the last decompile; re-renders units that have no cached text.
  private engine: DecompilerEngine | null = null;
  private sequence = 0;

  constructor(options: TaskPipelineOptions) {
    this.store = options.store;
    this.engineFactory = options.engineFactory;
    this.logger = options.logger;
    this.writerFactory = options.writerFactory ?? openExportWriter;
    this.exportOptions = options.exportOptions ?? {};
  }

  get isBusy(): boolean {
    return this.activeTaskId !== null;
  }

  run(request: TaskRequest, options: RunTaskOptions = {}): TaskHandle {
    if (this.activeTaskId) {
      throw new TaskBusyError(this.activeTaskId);
    }

    this.sequence += 1;
    const id = `${request.kind}-${this.sequence}`;
    this.activeTaskId = id;

    const channel = new TaskChannel<TaskEvent>();
    const outcome = new Promise<TaskOutcome>((resolve) => {
      // Start on a later turn so `run` returns before any work happens.
      setImmediate(() => {
        this.execute(id, request, channel, options).then(resolve, (err: unknown) =>
          resolve({ status: "failure", reason: formatErrorMessage(err) }),
        );
      });
    });

    return {
      id,
      kind: request.kind,
      events: channel,
      outcome,
      poll: (cursor) => {
        const { items, nextCursor, closed } = channel.since(cursor);
        return { events: items, nextCursor, done: closed };
      },
    };
  }

  async renderUnit(unit: DecompiledUnit): Promise<string | undefined> {
    if (unit.source !== undefined) return unit.source;
    if (!unit.handle || !this.engine) return undefined;

    const text = await this.engine.getClassContent(unit.handle);
    if (text !== undefined) {
      this.store.put(unit.qualifiedName, text);
    }
    return text;
  }

  // ===========================================================================
  // EXECUTION
  // ===========================================================================

  private async execute(
    id: string,
    request: TaskRequest,
    channel: TaskChannel<TaskEvent>,
    options: RunTaskOptions,
  ): Promise<TaskOutcome> {
    const emit = createProgressEmitter((progress) =>
      channel.push({ type: "progress", taskId: id, progress }),
    );
    logTaskEvent(this.logger, "task.start", id, { kind: request.kind, ...describeRequest(request) });

    let outcome: TaskOutcome;
    try {
      // A new archive replaces the old one even when opening it fails.
      if (request.kind === "decompile-archive") this.resetArchive();
      throwIfAborted(options.signal);
      outcome =
        request.kind === "decompile-archive"
          ? await this.decompile(id, request, emit, options.signal)
          : await this.exportAll(id, request, emit, options.signal);
      logTaskEvent(this.logger, "task.complete", id, summarizeOutcome(outcome));
    } catch (err) {
      const reason = formatErrorMessage(err);
      outcome = { status: "failure", reason };
      logTaskEvent(this.logger, "task.failed", id, { reason });
    } finally {
      this.activeTaskId = null;
    }

    channel.push({ type: "outcome", taskId: id, outcome });
    channel.close();
    return outcome;
  }

  private async decompile(
    id: string,
    request: DecompileArchiveRequest,
    emit: Emit,
    signal: AbortSignal | undefined,
  ): Promise<TaskOutcome> {
    const archivePath = path.resolve(request.archivePath);
    if (!(await fse.pathExists(archivePath))) {
      throw new EngineError(`Archive not found: ${archivePath}`);
    }

    const engine = this.engineFactory();
    this.engine = engine;
    engine.addSource(archivePath);

    let completed = 0;
    let total: number | null = null;

    const sink: EngineResultSink = {
      acceptClass: (name, handle) => this.store.register(name, handle),
      acceptSource: (name, source) => {
        this.store.put(name, source);
        completed += 1;
        if (total !== null && completed > total) total = completed;
        emit({ completed, total, message: `Decompiled ${normalizeQualifiedName(name)}` });
      },
      expectTotal: (expected) => {
        total = Math.max(expected, completed);
      },
      message: (text, severity) => {
        logTaskEvent(this.logger, "task.progress", id, { severity, message: text });
        if (severity === "warn" || severity === "error") {
          emit({ completed, total, message: text });
        }
      },
    };

    try {
      await engine.decompileContext(sink, signal);
    } catch (err) {
      throwIfAborted(signal);
      throw err;
    }

    const tree = buildNamespaceTree(this.store.allNames());
    return { status: "success", tree };
  }

  private resetArchive(): void {
    this.store.clear();
    this.engine = null;
  }

  private async exportAll(
    id: string,
    request: ExportRequest,
    emit: Emit,
    signal: AbortSignal | undefined,
  ): Promise<TaskOutcome> {
    const units = this.store.entries();
    const total = units.length;
    const writer = await this.writerFactory(request, this.exportOptions);

    let completed = 0;
    let written = 0;
    let skipped = 0;

    try {
      for (const unit of units) {
        throwIfAborted(signal);

        const text = await this.renderUnit(unit);
        if (text === undefined) {
          skipped += 1;
        } else {
          await writer.write(unit.qualifiedName, text);
          written += 1;
        }

        completed += 1;
        emit({ completed, total, message: `Saved ${completed} of ${total} classes` });
      }
    } catch (err) {
      // Entries already written stay where they are.
      await this.closeAfterFailure(id, writer);
      throw err;
    }

    await writer.close();
    return { status: "success", export: { written, skipped, target: writer.target } };
  }

  private async closeAfterFailure(id: string, writer: ExportWriter): Promise<void> {
    try {
      await writer.close();
    } catch (closeErr) {
      logTaskEvent(this.logger, "task.export.close_failed", id, {
        target: writer.target,
        message: formatErrorMessage(closeErr),
      });
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function createProgressEmitter(push: (progress: ProgressEvent) => void): Emit {
  let lastCompleted = 0;
  return (progress) => {
    if (progress.completed < lastCompleted) {
      throw new TaskError(`Progress went backwards (${progress.completed} < ${lastCompleted})`);
    }
    if (progress.total !== null && progress.completed > progress.total) {
      throw new TaskError(`Progress ${progress.completed} exceeds total ${progress.total}`);
    }
    lastCompleted = progress.completed;
    push({ ...progress });
  };
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new TaskError(CANCELLED_REASON);
  }
}

function describeRequest(request: TaskRequest): { target: string } {
  switch (request.kind) {
    case "decompile-archive":
      return { target: request.archivePath };
    case "export-to-directory":
      return { target: request.directory };
    case "export-to-archive":
      return { target: request.archivePath };
  }
}

function summarizeOutcome(outcome: TaskOutcome): JsonObject {
  if (outcome.status === "failure" || !outcome.export) return { status: outcome.status };
  return {
    status: outcome.status,
    written: outcome.export.written,
    skipped: outcome.export.skipped,
  };
}
