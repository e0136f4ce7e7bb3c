import type { PackageNode } from "../../core/namespace-tree.js";

// =============================================================================
// REQUESTS
// =============================================================================

export type DecompileArchiveRequest = {
  kind: "decompile-archive";
  archivePath: string;
};

export type ExportToDirectoryRequest = {
  kind: "export-to-directory";
  directory: string;
};

export type ExportToArchiveRequest = {
  kind: "export-to-archive";
  archivePath: string;
};

export type TaskRequest = DecompileArchiveRequest | ExportToDirectoryRequest | ExportToArchiveRequest;

export type TaskKind = TaskRequest["kind"];

// =============================================================================
// EVENTS
// =============================================================================

export type ProgressEvent = {
  completed: number;
  /** null while the total is unknown (indeterminate progress). */
  total: number | null;
  message: string;
};

export type ExportSummary = {
  written: number;
  skipped: number;
  target: string;
};

export type TaskOutcome =
  | { status: "success"; tree?: PackageNode; export?: ExportSummary }
  | { status: "failure"; reason: string };

export type TaskEvent =
  | { type: "progress"; taskId: string; progress: ProgressEvent }
  | { type: "outcome"; taskId: string; outcome: TaskOutcome };

export type TaskHandle = {
  id: string;
  kind: TaskKind;
  /** Progress events in emission order, then exactly one outcome event. */
  events: AsyncIterable<TaskEvent>;
  outcome: Promise<TaskOutcome>;
  poll(cursor: number): { events: TaskEvent[]; nextCursor: number; done: boolean };
};

export type RunTaskOptions = {
  /** Checked before the engine starts and between export entries. */
  signal?: AbortSignal;
};
