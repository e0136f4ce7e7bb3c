/**
 * DecompilerEngine port.
 * Purpose: the boundary between the viewer and whatever turns bytecode into source.
 * Assumptions: an engine instance serves one archive; sources are added before decompileContext.
 * Usage: engine.addSource(jar); await engine.decompileContext(sink); engine.getClassContent(handle).
 */

import type { UnitHandle } from "../core/result-store.js";

// =============================================================================
// TYPES
// =============================================================================

export type EngineMessageSeverity = "trace" | "info" | "warn" | "error";

/** Receives results while the engine runs; results stream in, they are not returned in bulk. */
export interface EngineResultSink {
  /** A class the engine will decompile, with the handle needed to re-render it later. */
  acceptClass(qualifiedName: string, handle: UnitHandle): void;
  acceptSource(qualifiedName: string, source: string): void;
  /** Optional: the number of sources the engine expects to produce. */
  expectTotal(total: number): void;
  message(text: string, severity: EngineMessageSeverity): void;
}

export interface DecompilerEngine {
  addSource(archivePath: string): void;
  /** Engines stop early, and reject, once `signal` aborts. */
  decompileContext(sink: EngineResultSink, signal?: AbortSignal): Promise<void>;
  getClassContent(handle: UnitHandle): Promise<string | undefined>;
}

export type DecompilerEngineFactory = () => DecompilerEngine;

export const CLASS_FILE_EXTENSION = ".class";

// =============================================================================
// HELPERS
// =============================================================================

/** `org/example/Foo.class` -> `org/example/Foo`; null for non-class entries and inner classes. */
export function qualifiedNameForMember(memberPath: string): string | null {
  if (!memberPath.endsWith(CLASS_FILE_EXTENSION)) return null;
  const name = memberPath.slice(0, -CLASS_FILE_EXTENSION.length);
  if (!name || name.endsWith("/")) return null;

  const simpleName = name.slice(name.lastIndexOf("/") + 1);
  // Inner classes are written into their outer class's source.
  if (simpleName.includes("$")) return null;
  // module-info and package-info carry no class body worth browsing.
  if (simpleName === "module-info" || simpleName === "package-info") return null;

  return name;
}
