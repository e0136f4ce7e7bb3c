/*
 * Progress output for background tasks.
 * Interactive terminals get a single rewritten status line; pipes and CI logs get nothing until the end.
 */

import type { TaskHandle, TaskOutcome } from "../app/tasks/types.js";

export type ProgressStream = {
  isTTY?: boolean;
  write(chunk: string): unknown;
};

export function formatProgressLine(message: string, completed: number, total: number | null): string {
  const counter = total === null ? `${completed}` : `${completed}/${total}`;
  return `[${counter}] ${message}`;
}

export async function reportTaskProgress(
  handle: TaskHandle,
  stream: ProgressStream = process.stderr,
): Promise<TaskOutcome> {
  const interactive = Boolean(stream.isTTY);
  let wroteLine = false;

  for await (const event of handle.events) {
    if (event.type !== "progress" || !interactive) continue;
    const { completed, total, message } = event.progress;
    stream.write(`\r\x1b[2K${formatProgressLine(message, completed, total)}`);
    wroteLine = true;
  }

  if (wroteLine) {
    stream.write("\n");
  }

  return handle.outcome;
}
