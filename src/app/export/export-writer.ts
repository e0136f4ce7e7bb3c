/**
 * Export writers serialize decompiled units to a directory tree or a zip archive.
 * Purpose: one `write` per qualified name, using the same segment-to-path convention for both targets.
 * Assumptions: callers never write the same name twice in one run (Result Store keys are unique).
 * Usage: const writer = await openExportWriter(request, { extension }); await writer.write(name, text); await writer.close();
 */

import { once } from "node:events";
import path from "node:path";
import type { Writable } from "node:stream";
import { finished } from "node:stream/promises";

import { Zip, ZipDeflate, strToU8 } from "fflate";
import fse from "fs-extra";

import { ExportError } from "../../core/errors.js";
import { QUALIFIED_NAME_DELIMITER } from "../../core/result-store.js";
import type { ExportToArchiveRequest, ExportToDirectoryRequest } from "../tasks/types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface ExportWriter {
  readonly target: string;
  write(qualifiedName: string, text: string): Promise<void>;
  /** Finishes the target; an archive is not readable until this resolves. */
  close(): Promise<void>;
}

export type ExportRequest = ExportToDirectoryRequest | ExportToArchiveRequest;

export type ExportWriterOptions = {
  extension?: string;
};

export type ExportWriterFactory = (
  request: ExportRequest,
  options: ExportWriterOptions,
) => Promise<ExportWriter>;

export const DEFAULT_SOURCE_EXTENSION = ".java";

// =============================================================================
// NAMING
// =============================================================================

export function entryPathFor(
  qualifiedName: string,
  options: { extension?: string; separator?: string } = {},
): string {
  const extension = options.extension ?? DEFAULT_SOURCE_EXTENSION;
  const separator = options.separator ?? "/";
  const segments = qualifiedName.split(QUALIFIED_NAME_DELIMITER);

  for (const segment of segments) {
    if (!segment || segment === "." || segment === ".." || /[\\\0]/.test(segment)) {
      throw new ExportError(`Refusing to export unsafe name: ${JSON.stringify(qualifiedName)}`);
    }
  }

  return `${segments.join(separator)}${extension}`;
}

export function defaultArchiveExportName(archivePath: string | null): string {
  if (!archivePath) return "decompiled.zip";
  const base = path.basename(archivePath);
  const stem = base.toLowerCase().endsWith(".jar") ? base.slice(0, -".jar".length) : base;
  return `${stem}_decompiled.zip`;
}

// =============================================================================
// DIRECTORY
// =============================================================================

export class DirectoryExportWriter implements ExportWriter {
  readonly target: string;

  constructor(directory: string, private readonly options: ExportWriterOptions = {}) {
    this.target = path.resolve(directory);
  }

  async write(qualifiedName: string, text: string): Promise<void> {
    const relativePath = entryPathFor(qualifiedName, {
      extension: this.options.extension,
      separator: path.sep,
    });
    const filePath = path.join(this.target, relativePath);

    try {
      await fse.outputFile(filePath, text, "utf8");
    } catch (err) {
      throw new ExportError(`Failed to write ${filePath}`, err);
    }
  }

  async close(): Promise<void> {
    // Files are complete as soon as each write resolves.
  }
}

// =============================================================================
// ARCHIVE
// =============================================================================

export class ArchiveExportWriter implements ExportWriter {
  private readonly names = new Set<string>();
  private readonly zip: Zip;
  private failure: Error | null = null;
  private closed = false;
  private draining: Promise<void> | null = null;

  private constructor(
    readonly target: string,
    private readonly stream: Writable,
    private readonly options: ExportWriterOptions,
  ) {
    this.stream.on("error", (err) => this.fail(err));
    this.zip = new Zip((err, chunk, final) => {
      if (err) {
        this.fail(err);
        return;
      }
      if (!this.stream.write(chunk)) this.waitForDrain();
      if (final) this.stream.end();
    });
  }

  /** Writes the archive to `stream`; `target` is only reported back. */
  static fromStream(target: string, stream: Writable, options: ExportWriterOptions = {}): ArchiveExportWriter {
    return new ArchiveExportWriter(target, stream, options);
  }

  static async open(archivePath: string, options: ExportWriterOptions = {}): Promise<ArchiveExportWriter> {
    const target = path.resolve(archivePath);
    try {
      await fse.ensureDir(path.dirname(target));
    } catch (err) {
      throw new ExportError(`Unable to create directory for ${target}`, err);
    }
    return ArchiveExportWriter.fromStream(target, fse.createWriteStream(target), options);
  }

  async write(qualifiedName: string, text: string): Promise<void> {
    this.throwIfFailed();
    if (this.closed) {
      throw new ExportError(`Archive ${this.target} is already closed`);
    }

    const entryName = entryPathFor(qualifiedName, { extension: this.options.extension });
    if (this.names.has(entryName)) {
      throw new ExportError(`Duplicate archive entry: ${entryName}`);
    }
    this.names.add(entryName);

    // Begin, write and end one entry before the next is added.
    const entry = new ZipDeflate(entryName, { level: 6 });
    this.zip.add(entry);
    entry.push(strToU8(text), true);

    // Let pending stream errors surface before reporting this entry as written.
    await new Promise<void>((resolve) => setImmediate(resolve));
    if (this.draining) await this.draining;
    this.throwIfFailed();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (!this.failure) {
      this.zip.end();
    } else {
      this.stream.end();
    }

    try {
      await finished(this.stream);
    } catch (err) {
      this.fail(err instanceof Error ? err : new Error(String(err)));
    }
    this.throwIfFailed();
  }

  private waitForDrain(): void {
    if (this.draining) return;
    this.draining = once(this.stream, "drain").then(
      () => {
        this.draining = null;
      },
      (err: unknown) => {
        this.fail(err instanceof Error ? err : new Error(String(err)));
        this.draining = null;
      },
    );
  }

  private fail(err: Error): void {
    if (!this.failure) this.failure = err;
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw new ExportError(`Failed to write archive ${this.target}: ${this.failure.message}`, this.failure);
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export const openExportWriter: ExportWriterFactory = async (request, options) => {
  if (request.kind === "export-to-directory") {
    return new DirectoryExportWriter(request.directory, options);
  }
  return ArchiveExportWriter.open(request.archivePath, options);
};
