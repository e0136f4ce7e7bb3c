import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  jarscopeHome: string;
};

export type ResolveJarscopeHomeOptions = {
  jarscopeHome?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveJarscopeHome(opts: ResolveJarscopeHomeOptions = {}): string {
  if (opts.jarscopeHome) {
    return path.resolve(opts.jarscopeHome);
  }

  const env = opts.env ?? process.env;
  if (env.JARSCOPE_HOME) {
    return path.resolve(env.JARSCOPE_HOME);
  }

  return path.join(os.homedir(), ".jarscope");
}

export function createPathsContext(opts: ResolveJarscopeHomeOptions = {}): PathsContext {
  return { jarscopeHome: resolveJarscopeHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function globalConfigPath(paths: PathsContext): string {
  return path.join(paths.jarscopeHome, "config.yaml");
}

export function sessionLogsDir(paths: PathsContext, override?: string): string {
  return override ? path.resolve(override) : path.join(paths.jarscopeHome, "logs");
}

export function sessionLogPath(logsDir: string, sessionId: string): string {
  return path.join(logsDir, `session-${sessionId}.jsonl`);
}

export function keywordsPath(language: string): string {
  return path.join(findPackageRoot(), "assets", "keywords", `${language}.json`);
}

// Walk upward from this module so both src/ and dist/src/ resolve the bundled assets.
export function findPackageRoot(startDir?: string): string {
  let current = startDir ?? path.dirname(fileURLToPath(import.meta.url));

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new Error("package.json not found while resolving package assets");
}
