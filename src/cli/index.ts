import { Command, InvalidArgumentError } from "commander";

import { createAppContext, createViewerSession, type AppContext } from "../app/context.js";
import type { ViewerSession } from "../app/session.js";

import { exportCommand } from "./export.js";
import { showCommand } from "./show.js";
import { treeCommand } from "./tree.js";
import { uiCommand } from "./ui.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliGlobals = {
  config?: string;
  debug?: boolean;
};

type ColorOptions = { color: boolean };
type ExportOptions = { dir?: string; zip?: string | boolean };
type UiOptions = { port?: number };

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  const withSession = async (
    run: (session: ViewerSession, appContext: AppContext) => Promise<void>,
  ): Promise<void> => {
    const globals = program.opts<CliGlobals>();
    const appContext = createAppContext({
      explicitConfigPath: globals.config,
      debug: globals.debug,
    });

    try {
      await run(createViewerSession(appContext), appContext);
    } finally {
      appContext.logger.close();
    }
  };

  program
    .name("jarscope")
    .description("Browse, highlight and export decompiled sources from JAR archives")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override config path (defaults to ./jarscope.yaml or ~/.jarscope/config.yaml)",
    )
    .option("--debug", "Show stack traces and error causes", false);

  program
    .command("tree")
    .description("Decompile an archive and print its package tree")
    .argument("<archive>", "Path to a .jar or .zip archive")
    .option("--no-color", "Disable colored output")
    .action(async (archive: string, opts: ColorOptions) => {
      await withSession((session) => treeCommand(session, archive, { color: opts.color }));
    });

  program
    .command("show")
    .description("Decompile an archive and print one class with syntax highlighting")
    .argument("<archive>", "Path to a .jar or .zip archive")
    .argument("<class>", "Qualified class name (org/example/Foo or org.example.Foo)")
    .option("--no-color", "Disable colored output")
    .action(async (archive: string, className: string, opts: ColorOptions) => {
      await withSession((session) =>
        showCommand(session, archive, className, { color: opts.color }),
      );
    });

  program
    .command("export")
    .description("Decompile an archive and save every class to a folder or a ZIP")
    .argument("<archive>", "Path to a .jar or .zip archive")
    .option("--dir <path>", "Write sources into this folder")
    .option("--zip [path]", "Write sources into a ZIP (default: <archive>_decompiled.zip)")
    .action(async (archive: string, opts: ExportOptions) => {
      await withSession((session) => exportCommand(session, archive, opts));
    });

  program
    .command("ui")
    .description("Serve the viewer over HTTP on localhost")
    .argument("<archive>", "Path to a .jar or .zip archive")
    .option("--port <n>", "Port to listen on (0 picks a free port)", parsePort)
    .action(async (archive: string, opts: UiOptions) => {
      await withSession((session, appContext) =>
        uiCommand(session, archive, {
          port: opts.port ?? appContext.config.ui.port,
          logger: appContext.logger,
        }),
      );
    });

  return program;
}

// =============================================================================
// PARSERS
// =============================================================================

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}
