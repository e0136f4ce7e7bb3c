/*
 * UI CLI helpers for serving a session over localhost HTTP.
 * Assumptions: localhost-only server; the archive decompiles in the background while the server is up.
 * Common usage: `jarscope ui app.jar --port 8080`.
 */

import type { ViewerSession } from "../app/session.js";
import type { EventLogger } from "../core/logger.js";
import { startUiServer, type UiServerHandle } from "../ui/server.js";

// =============================================================================
// TYPES
// =============================================================================

export type UiCommandOptions = {
  port: number;
  logger?: EventLogger;
  /** Resolves when the server should stop; defaults to SIGINT/SIGTERM. */
  until?: Promise<void>;
};

// =============================================================================
// UI COMMAND
// =============================================================================

export async function uiCommand(
  session: ViewerSession,
  archivePath: string,
  opts: UiCommandOptions,
): Promise<void> {
  let handle: UiServerHandle;
  try {
    handle = await startUiServer({ session, port: opts.port, logger: opts.logger });
  } catch (err) {
    console.error(formatUiStartError(err, opts.port));
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  session.openArchive(archivePath, controller.signal);
  console.log(`UI server running at ${handle.url}`);

  try {
    await (opts.until ?? waitForStopSignal());
  } finally {
    controller.abort();
    await closeUiServer(handle);
  }
}

export async function closeUiServer(handle: UiServerHandle): Promise<void> {
  try {
    await handle.close();
  } catch (err) {
    const detail = describeUiServerError(err);
    const suffix = detail ? ` ${detail}` : "";
    console.warn(`Warning: failed to close UI server.${suffix}`);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function waitForStopSignal(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      console.log(`Received ${signal}. Shutting down UI server.`);
      resolve();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

function formatUiStartError(err: unknown, port: number): string {
  const detail = describeUiServerError(err);
  const suffix = detail ? ` ${detail}` : "";
  return `Failed to start UI server on port ${port}.${suffix}`;
}

function describeUiServerError(err: unknown): string | null {
  if (err && typeof err === "object" && "code" in err) {
    const code = err.code;
    if (code === "EADDRINUSE") {
      return "Port is already in use.";
    }
    if (code === "EACCES") {
      return "Permission denied binding the port.";
    }
    if (typeof code === "string") {
      return `Error code ${code}.`;
    }
  }

  if (err instanceof Error && err.message) {
    return err.message;
  }

  return err ? String(err) : null;
}
