/**
 * ViewerSession is the interactive side of the viewer.
 * Purpose: own the store, the pipeline and the current tree; turn task outcomes into
 * viewer state (status line, tree) and serve class selection.
 * Assumptions: callers start at most one task at a time and read state between tasks.
 * Usage: const task = session.openArchive(jar); await session.whenIdle(); session.select("a/B").
 */

import path from "node:path";

import { formatErrorMessage } from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { highlight, type Span } from "../core/highlighter.js";
import { loadKeywordSet } from "../core/keywords.js";
import type { EventLogger } from "../core/logger.js";
import { buildNamespaceTree, countMembers, type PackageNode } from "../core/namespace-tree.js";
import { normalizeQualifiedName, ResultStore } from "../core/result-store.js";
import type { DecompilerEngineFactory } from "../engine/engine.js";

import {
  defaultArchiveExportName,
  type ExportWriterFactory,
  type ExportWriterOptions,
} from "./export/export-writer.js";
import { TaskPipeline } from "./tasks/task-pipeline.js";
import type { ProgressEvent, TaskHandle, TaskKind, TaskOutcome, TaskRequest } from "./tasks/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ViewerSessionOptions = {
  engineFactory: DecompilerEngineFactory;
  logger: EventLogger;
  writerFactory?: ExportWriterFactory;
  exportOptions?: ExportWriterOptions;
  keywords?: ReadonlySet<string>;
  cwd?: string;
};

export type ViewerStatus = {
  text: string;
  busy: boolean;
  archivePath: string | null;
  classCount: number;
  task: { id: string; kind: TaskKind; progress: ProgressEvent | null } | null;
};

export type Selection = {
  qualifiedName: string;
  /** False when `text` is a placeholder diagnostic rather than decompiled source. */
  found: boolean;
  text: string;
  spans: Span[];
};

// =============================================================================
// SESSION
// =============================================================================

export class ViewerSession {
  readonly store = new ResultStore();
  private readonly pipeline: TaskPipeline;
  private readonly logger: EventLogger;
  private readonly keywords: ReadonlySet<string>;
  private readonly cwd: string;

  private tree: PackageNode = buildNamespaceTree([]);
  private archivePath: string | null = null;
  private statusText = "Ready";
  private currentTask: TaskHandle | null = null;
  private lastProgress: ProgressEvent | null = null;
  private following: Promise<void> = Promise.resolve();

  constructor(options: ViewerSessionOptions) {
    this.logger = options.logger;
    this.keywords = options.keywords ?? loadKeywordSet();
    this.cwd = options.cwd ?? process.cwd();
    this.pipeline = new TaskPipeline({
      store: this.store,
      engineFactory: options.engineFactory,
      logger: options.logger,
      writerFactory: options.writerFactory,
      exportOptions: options.exportOptions,
    });
  }

  // ===========================================================================
  // TASKS
  // ===========================================================================

  openArchive(archivePath: string, signal?: AbortSignal): TaskHandle {
    const resolved = path.resolve(this.cwd, archivePath);
    const handle = this.start({ kind: "decompile-archive", archivePath: resolved }, signal);
    this.archivePath = resolved;
    this.tree = buildNamespaceTree([]);
    this.statusText = `Decompiling ${path.basename(resolved)}...`;
    return handle;
  }

  exportToDirectory(directory: string, signal?: AbortSignal): TaskHandle {
    this.ensureExportable();
    const target = path.resolve(this.cwd, directory);
    const handle = this.start({ kind: "export-to-directory", directory: target }, signal);
    this.statusText = "Saving classes to folder...";
    return handle;
  }

  exportToArchive(archivePath?: string, signal?: AbortSignal): TaskHandle {
    this.ensureExportable();
    const target = path.resolve(this.cwd, archivePath ?? defaultArchiveExportName(this.archivePath));
    const handle = this.start({ kind: "export-to-archive", archivePath: target }, signal);
    this.statusText = "Saving classes to ZIP...";
    return handle;
  }

  /** Resolves once the current task's outcome has been applied to the session. */
  whenIdle(): Promise<void> {
    return this.following;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  async select(qualifiedName: string): Promise<Selection> {
    const name = normalizeQualifiedName(qualifiedName);
    const unit = this.store.getUnit(name);
    if (!unit) {
      return this.placeholder(name, `// Class not found: ${name}`);
    }

    let text: string | undefined;
    try {
      text = await this.pipeline.renderUnit(unit);
    } catch (err) {
      this.logger.log({
        type: "session.render_failed",
        payload: { name, message: formatErrorMessage(err) },
      });
    }

    if (text === undefined) {
      return this.placeholder(name, `// Error decompiling class: ${name}`);
    }

    return { qualifiedName: name, found: true, text, spans: highlight(text, { keywords: this.keywords }) };
  }

  getTree(): PackageNode {
    return this.tree;
  }

  getStatus(): ViewerStatus {
    const task = this.currentTask;
    return {
      text: this.statusText,
      busy: this.pipeline.isBusy,
      archivePath: this.archivePath,
      classCount: countMembers(this.tree),
      task: task ? { id: task.id, kind: task.kind, progress: this.lastProgress } : null,
    };
  }

  getCurrentTask(): TaskHandle | null {
    return this.currentTask;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private start(request: TaskRequest, signal?: AbortSignal): TaskHandle {
    const handle = this.pipeline.run(request, { signal });
    this.currentTask = handle;
    this.lastProgress = null;
    this.following = this.follow(handle);
    return handle;
  }

  private async follow(handle: TaskHandle): Promise<void> {
    for await (const event of handle.events) {
      if (event.type === "progress") {
        this.lastProgress = event.progress;
        this.statusText = event.progress.message;
        continue;
      }
      this.applyOutcome(handle.kind, event.outcome);
    }
  }

  private applyOutcome(kind: TaskKind, outcome: TaskOutcome): void {
    if (outcome.status === "failure") {
      this.statusText = `Error: ${outcome.reason}`;
      return;
    }

    if (kind === "decompile-archive") {
      this.tree = outcome.tree ?? buildNamespaceTree(this.store.allNames());
      this.statusText = "Ready";
      return;
    }

    this.statusText = `Saved all classes to ${outcome.export?.target ?? "target"}`;
  }

  private ensureExportable(): void {
    if (this.store.size === 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.input,
        title: "Nothing to export",
        message: "No decompiled classes to save",
        hint: "Open an archive and wait for decompilation to finish.",
      });
    }
  }

  private placeholder(qualifiedName: string, text: string): Selection {
    return { qualifiedName, found: false, text, spans: highlight(text, { keywords: this.keywords }) };
  }
}
