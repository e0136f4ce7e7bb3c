import type { ViewerSession } from "../app/session.js";
import { createAnsiFormatter, resolveColorEnabled } from "../core/error-format.js";
import { countMembers } from "../core/namespace-tree.js";

import { loadArchiveForCli } from "./archive.js";
import type { ProgressStream } from "./progress.js";
import { renderTree } from "./render.js";

export type TreeCommandOptions = {
  color?: boolean;
  progress?: ProgressStream;
};

export async function treeCommand(
  session: ViewerSession,
  archivePath: string,
  opts: TreeCommandOptions = {},
): Promise<void> {
  await loadArchiveForCli(session, archivePath, opts.progress);

  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: process.stdout, useColor: opts.color }),
  );
  const tree = session.getTree();

  for (const line of renderTree(tree, format)) {
    console.log(line);
  }
  console.log(`${countMembers(tree)} classes`);
}
