import type { ViewerSession } from "../app/session.js";
import { createAnsiFormatter, resolveColorEnabled } from "../core/error-format.js";

import { loadArchiveForCli } from "./archive.js";
import type { ProgressStream } from "./progress.js";
import { renderSpans } from "./render.js";

export type ShowCommandOptions = {
  color?: boolean;
  progress?: ProgressStream;
};

export async function showCommand(
  session: ViewerSession,
  archivePath: string,
  className: string,
  opts: ShowCommandOptions = {},
): Promise<void> {
  await loadArchiveForCli(session, archivePath, opts.progress);

  const selection = await session.select(className);
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: process.stdout, useColor: opts.color }),
  );

  console.log(renderSpans(selection.spans, format));
  if (!selection.found) {
    process.exitCode = 1;
  }
}
