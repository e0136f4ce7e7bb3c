#!/usr/bin/env node
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli, type CliGlobals } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  for (const command of [program, ...program.commands]) {
    command.configureOutput({
      outputError: (_message: string, _write: (chunk: string) => void) => undefined,
    });
    command.exitOverride();
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return Boolean(program.opts<CliGlobals>().debug);
}

function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }
  }

  return debugFlag;
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugEnabled(argv, program);
    console.error(renderCliError(error, { debug }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

/**
 * True when `scriptPath` (argv[1]) is the module at `moduleUrl`. npm runs the bin through a
 * symlink, and file URLs are percent-encoded, so both sides are compared as real paths.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) return false;

  try {
    return fs.realpathSync(fileURLToPath(moduleUrl)) === fs.realpathSync(scriptPath);
  } catch {
    // argv[1] names no file (REPL, `node -e`).
    return false;
  }
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  void main(process.argv);
}
