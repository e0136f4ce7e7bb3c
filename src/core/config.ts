import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigError } from "./errors.js";
import { globalConfigPath, type PathsContext } from "./paths.js";

// Fernflower toggles: 3-space indent, inner classes and generic signatures on,
// empty super() calls and default constructors hidden.
export const DEFAULT_ENGINE_OPTIONS: Record<string, string> = {
  ind: "   ",
  din: "1",
  dgs: "1",
  hes: "1",
  hdc: "1",
};

const EngineSchema = z.object({
  command: z.string().min(1).default("java"),
  args: z.array(z.string()).default([]),
  // Opaque pass-through toggles; rendered as -<name>=<value>.
  options: z.record(z.string(), z.string()).default(DEFAULT_ENGINE_OPTIONS),
  timeout_seconds: z.number().int().positive().optional(),
});

const ExportSchema = z.object({
  extension: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, "extension must look like .java")
    .default(".java"),
});

const UiSchema = z.object({
  port: z.number().int().min(0).max(65535).default(0),
});

export const ViewerConfigSchema = z.object({
  engine: EngineSchema.default({}),
  export: ExportSchema.default({}),
  ui: UiSchema.default({}),
  log_dir: z.string().min(1).optional(),
});

export type ViewerConfig = z.infer<typeof ViewerConfigSchema>;
export type EngineConfig = ViewerConfig["engine"];

export const REPO_CONFIG_FILENAME = "jarscope.yaml";

// =============================================================================
// LOADING
// =============================================================================

export function defaultViewerConfig(): ViewerConfig {
  return ViewerConfigSchema.parse({});
}

export function loadViewerConfig(configPath: string): ViewerConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config not found at: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML config: ${configPath}`, err);
  }

  // An empty file means "all defaults".
  const expanded = expandEnv(doc ?? {});

  const parsed = ViewerConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config: ${configPath}\n${parsed.error.toString()}`);
  }

  const cfg = parsed.data;
  if (!cfg.log_dir) return cfg;

  return { ...cfg, log_dir: path.resolve(path.dirname(configPath), cfg.log_dir) };
}

export type ResolvedConfig = {
  config: ViewerConfig;
  configPath: string | null;
};

export function resolveViewerConfig(args: {
  explicitPath?: string;
  cwd?: string;
  paths: PathsContext;
}): ResolvedConfig {
  if (args.explicitPath) {
    const configPath = path.resolve(args.cwd ?? process.cwd(), args.explicitPath);
    return { config: loadViewerConfig(configPath), configPath };
  }

  const candidates = [
    path.join(args.cwd ?? process.cwd(), REPO_CONFIG_FILENAME),
    globalConfigPath(args.paths),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return { config: loadViewerConfig(candidate), configPath: candidate };
    }
  }

  return { config: defaultViewerConfig(), configPath: null };
}

// =============================================================================
// INTERNALS
// =============================================================================

function expandEnv(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_, varName: string) => {
      const v = process.env[varName];
      if (v === undefined) {
        throw new ConfigError(`Environment variable ${varName} is not set but is referenced in config.`);
      }
      return v;
    });
  }
  if (Array.isArray(value)) {
    return value.map(expandEnv);
  }
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnv(v);
    }
    return out;
  }
  return value;
}
