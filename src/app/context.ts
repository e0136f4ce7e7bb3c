/**
 * AppContext resolves config, paths and the session log without mutating globals.
 * Purpose: give CLI and UI entry points one place to build a ViewerSession.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ explicitConfigPath }); const session = createViewerSession(ctx);
 */

import { resolveViewerConfig, type EngineConfig, type ViewerConfig } from "../core/config.js";
import { JsonlLogger, type EventLogger } from "../core/logger.js";
import {
  createPathsContext,
  sessionLogPath,
  sessionLogsDir,
  type PathsContext,
} from "../core/paths.js";
import { defaultSessionId } from "../core/utils.js";
import { CommandDecompilerEngine } from "../engine/command-engine.js";
import type { DecompilerEngineFactory } from "../engine/engine.js";

import { ViewerSession } from "./session.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  config: ViewerConfig;
  configPath: string | null;
  paths: PathsContext;
  sessionId: string;
  logger: EventLogger;
};

export type CreateAppContextInput = {
  explicitConfigPath?: string;
  jarscopeHome?: string;
  cwd?: string;
  sessionId?: string;
  debug?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput = {}): AppContext {
  const paths = createPathsContext({ jarscopeHome: input.jarscopeHome });
  const { config, configPath } = resolveViewerConfig({
    explicitPath: input.explicitConfigPath,
    cwd: input.cwd,
    paths,
  });

  const sessionId = input.sessionId ?? defaultSessionId();
  const logPath = sessionLogPath(sessionLogsDir(paths, config.log_dir), sessionId);
  const logger = new JsonlLogger(logPath, { sessionId }, input.debug ?? false);
  logger.log({
    type: "session.start",
    payload: configPath ? { config_path: configPath } : {},
  });

  return { config, configPath, paths, sessionId, logger };
}

export function createEngineFactory(engine: EngineConfig): DecompilerEngineFactory {
  return () =>
    new CommandDecompilerEngine({
      command: engine.command,
      args: engine.args,
      options: engine.options,
      timeoutSeconds: engine.timeout_seconds,
    });
}

export function createViewerSession(
  context: AppContext,
  overrides: { engineFactory?: DecompilerEngineFactory; cwd?: string } = {},
): ViewerSession {
  return new ViewerSession({
    engineFactory: overrides.engineFactory ?? createEngineFactory(context.config.engine),
    logger: context.logger,
    exportOptions: { extension: context.config.export.extension },
    cwd: overrides.cwd,
  });
}
