/*
 * Shared archive loading for CLI commands.
 * Every command starts by decompiling the archive it was given and waits for the tree.
 */

import type { ViewerSession } from "../app/session.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { reportTaskProgress, type ProgressStream } from "./progress.js";

export async function loadArchiveForCli(
  session: ViewerSession,
  archivePath: string,
  progress?: ProgressStream,
): Promise<void> {
  const handle = session.openArchive(archivePath);
  const outcome = await reportTaskProgress(handle, progress);
  await session.whenIdle();

  if (outcome.status === "failure") {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.engine,
      title: "Decompiler failed",
      message: outcome.reason,
      hint: "Check engine.command and engine.args in jarscope.yaml.",
      next: "Re-run with --debug and inspect the session log under ~/.jarscope/logs.",
    });
  }
}
