import fse from "fs-extra";
import { unzipSync } from "fflate";

import { EngineError } from "../core/errors.js";

// =============================================================================
// BYTE SOURCE
// =============================================================================

export interface ByteSource {
  /** Whole file when `memberPath` is omitted, otherwise one member of the archive. */
  getBytes(archivePath: string, memberPath?: string): Promise<Uint8Array>;
  listMembers(archivePath: string): Promise<string[]>;
}

export class ArchiveByteSource implements ByteSource {
  async getBytes(archivePath: string, memberPath?: string): Promise<Uint8Array> {
    const data = await readArchive(archivePath);
    if (memberPath === undefined) {
      return data;
    }

    const entries = unzipArchive(archivePath, data, (name) => name === memberPath);
    const member = entries[memberPath];
    if (!member) {
      throw new EngineError(`Entry not found: ${memberPath} (archive=${archivePath})`);
    }
    return member;
  }

  async listMembers(archivePath: string): Promise<string[]> {
    const data = await readArchive(archivePath);
    const names: string[] = [];
    // The filter sees every central-directory entry; returning false skips inflating it.
    unzipArchive(archivePath, data, (name) => {
      if (!name.endsWith("/")) names.push(name);
      return false;
    });
    return names;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readArchive(archivePath: string): Promise<Uint8Array> {
  try {
    const buffer = await fse.readFile(archivePath);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (err) {
    throw new EngineError(`Unable to read archive ${archivePath}`, err);
  }
}

function unzipArchive(
  archivePath: string,
  data: Uint8Array,
  keep: (name: string) => boolean,
): Record<string, Uint8Array> {
  try {
    return unzipSync(data, { filter: (file) => keep(file.name) });
  } catch (err) {
    throw new EngineError(`Unable to read ${archivePath} as a zip archive`, err);
  }
}
