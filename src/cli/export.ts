import type { ViewerSession } from "../app/session.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { loadArchiveForCli } from "./archive.js";
import { reportTaskProgress, type ProgressStream } from "./progress.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExportCommandOptions = {
  dir?: string;
  /** `true` for `--zip` without a path: use `<archive stem>_decompiled.zip`. */
  zip?: string | boolean;
  progress?: ProgressStream;
};

// =============================================================================
// EXPORT COMMAND
// =============================================================================

export async function exportCommand(
  session: ViewerSession,
  archivePath: string,
  opts: ExportCommandOptions,
): Promise<void> {
  const wantsZip = opts.zip !== undefined && opts.zip !== false;
  if (Boolean(opts.dir) === wantsZip) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Choose one export target",
      message: "Pass exactly one of --dir <path> or --zip [path].",
    });
  }

  await loadArchiveForCli(session, archivePath, opts.progress);

  const handle = opts.dir
    ? session.exportToDirectory(opts.dir)
    : session.exportToArchive(typeof opts.zip === "string" ? opts.zip : undefined);
  const outcome = await reportTaskProgress(handle, opts.progress);
  await session.whenIdle();

  if (outcome.status === "failure") {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.export,
      title: "Export failed",
      message: outcome.reason,
    });
  }

  console.log(session.getStatus().text);
  if (outcome.export && outcome.export.skipped > 0) {
    console.log(`Skipped ${outcome.export.skipped} classes with no decompiled source.`);
  }
}
