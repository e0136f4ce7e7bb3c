/**
 * CommandDecompilerEngine drives an external decompiler process.
 * Purpose: adapt a Fernflower-style command line (`[-opt=value]... <sources>... <outDir>`)
 * to the DecompilerEngine port.
 * Assumptions: the command writes `.java` files, or jars of them, into the output directory.
 * Usage: new CommandDecompilerEngine({ command: "java", args: ["-jar", "vineflower.jar"], options }).
 */

import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import fg from "fast-glob";
import { strFromU8, unzipSync } from "fflate";
import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { EngineError } from "../core/errors.js";
import type { UnitHandle } from "../core/result-store.js";

import { ArchiveByteSource, type ByteSource } from "./archive-source.js";
import {
  CLASS_FILE_EXTENSION,
  qualifiedNameForMember,
  type DecompilerEngine,
  type EngineMessageSeverity,
  type EngineResultSink,
} from "./engine.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandOutput = {
  stdout: string;
  stderr: string;
};

/** Runs a command to completion; throws when it cannot start or exits non-zero. */
export type CommandRunner = (
  command: string,
  args: string[],
  options: { timeoutMs?: number; signal?: AbortSignal },
) => Promise<CommandOutput>;

export type CommandEngineOptions = {
  command: string;
  args?: string[];
  options?: Record<string, string>;
  timeoutSeconds?: number;
  byteSource?: ByteSource;
  runner?: CommandRunner;
  tempRoot?: string;
};

const SOURCE_EXTENSION = ".java";
const OUTPUT_ARCHIVE_PATTERN = /\.(jar|zip)$/i;

const ENGINE_LOG_LEVELS: Record<string, EngineMessageSeverity> = {
  TRACE: "trace",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
};

// =============================================================================
// ENGINE
// =============================================================================

export class CommandDecompilerEngine implements DecompilerEngine {
  private readonly sources: string[] = [];
  private readonly byteSource: ByteSource;
  private readonly runner: CommandRunner;

  constructor(private readonly config: CommandEngineOptions) {
    this.byteSource = config.byteSource ?? new ArchiveByteSource();
    this.runner = config.runner ?? runCommand;
  }

  addSource(archivePath: string): void {
    this.sources.push(path.resolve(archivePath));
  }

  async decompileContext(sink: EngineResultSink, signal?: AbortSignal): Promise<void> {
    if (this.sources.length === 0) {
      throw new EngineError("No sources were added to the decompiler");
    }

    let expected = 0;
    for (const archivePath of this.sources) {
      const members = await this.byteSource.listMembers(archivePath);
      for (const memberPath of members) {
        const qualifiedName = qualifiedNameForMember(memberPath);
        if (!qualifiedName) continue;
        sink.acceptClass(qualifiedName, { archivePath, memberPath });
        expected += 1;
      }
    }
    sink.expectTotal(expected);

    await this.withOutputDir(async (outputDir) => {
      const output = await this.invoke(this.sources, outputDir, signal);
      forwardEngineLog(output, sink);
      await emitSources(outputDir, sink);
    });
  }

  async getClassContent(handle: UnitHandle): Promise<string | undefined> {
    const bytes = await this.byteSource.getBytes(handle.archivePath, handle.memberPath);
    const simpleName = path.posix.basename(handle.memberPath, CLASS_FILE_EXTENSION);

    return this.withOutputDir(async (outputDir) => {
      const inputPath = path.join(outputDir, "in", `${simpleName}${CLASS_FILE_EXTENSION}`);
      const resultDir = path.join(outputDir, "out");
      await fse.outputFile(inputPath, bytes);
      await fse.ensureDir(resultDir);

      await this.invoke([inputPath], resultDir);

      const matches = await fg(`**/${simpleName}${SOURCE_EXTENSION}`, {
        cwd: resultDir,
        absolute: true,
        onlyFiles: true,
      });
      const first = matches[0];
      return first === undefined ? undefined : fse.readFile(first, "utf8");
    });
  }

  private async invoke(
    inputs: string[],
    outputDir: string,
    signal?: AbortSignal,
  ): Promise<CommandOutput> {
    const optionArgs = Object.entries(this.config.options ?? {}).map(
      ([name, value]) => `-${name}=${value}`,
    );
    const args = [...(this.config.args ?? []), ...optionArgs, ...inputs, outputDir];
    const timeoutMs =
      this.config.timeoutSeconds === undefined ? undefined : this.config.timeoutSeconds * 1000;

    return this.runner(this.config.command, args, { timeoutMs, signal });
  }

  private async withOutputDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
    const root = this.config.tempRoot ?? os.tmpdir();
    await fse.ensureDir(root);
    const dir = await fse.mkdtemp(path.join(root, "jarscope-"));
    try {
      return await fn(dir);
    } finally {
      await fse.remove(dir);
    }
  }
}

// =============================================================================
// COMMAND RUNNER
// =============================================================================

export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const res = await execa(command, args, {
      stdio: "pipe",
      env: process.env,
      timeout: options.timeoutMs,
      signal: options.signal,
    });
    return { stdout: res.stdout, stderr: res.stderr };
  } catch (err) {
    throw new EngineError(`${command} failed: ${describeCommandFailure(err)}`, err);
  }
};

function describeCommandFailure(err: unknown): string {
  if (err && typeof err === "object" && "stderr" in err) {
    const stderr = err.stderr;
    if (typeof stderr === "string" && stderr.trim()) {
      return stderr.trim();
    }
  }
  return formatErrorMessage(err);
}

// =============================================================================
// OUTPUT
// =============================================================================

async function emitSources(outputDir: string, sink: EngineResultSink): Promise<void> {
  const produced = await fg(["**/*.java", "**/*.jar", "**/*.zip"], {
    cwd: outputDir,
    onlyFiles: true,
  });
  produced.sort();

  for (const relativePath of produced) {
    const absolutePath = path.join(outputDir, relativePath);

    if (!OUTPUT_ARCHIVE_PATTERN.test(relativePath)) {
      const source = await fse.readFile(absolutePath, "utf8");
      sink.acceptSource(stripSourceExtension(relativePath), source);
      continue;
    }

    const data = await fse.readFile(absolutePath);
    let entries: Record<string, Uint8Array>;
    try {
      entries = unzipSync(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), {
        filter: (file) => file.name.endsWith(SOURCE_EXTENSION),
      });
    } catch (err) {
      throw new EngineError(`Unable to read decompiler output ${relativePath}`, err);
    }

    for (const name of Object.keys(entries).sort()) {
      sink.acceptSource(stripSourceExtension(name), strFromU8(entries[name]));
    }
  }
}

function forwardEngineLog(output: CommandOutput, sink: EngineResultSink): void {
  const lines = `${output.stdout}\n${output.stderr}`.split(/\r?\n/);
  for (const line of lines) {
    const match = /^\s*(TRACE|INFO|WARN|ERROR):\s*(.*)$/.exec(line);
    if (!match) continue;
    const severity = ENGINE_LOG_LEVELS[match[1]];
    if (severity === "warn" || severity === "error") {
      sink.message(match[2].trim(), severity);
    }
  }
}

function stripSourceExtension(name: string): string {
  return name.endsWith(SOURCE_EXTENSION) ? name.slice(0, -SOURCE_EXTENSION.length) : name;
}
