/**
 * ResultStore holds decompiled units for the archive currently open.
 * Purpose: the single source of truth read by tree building, highlighting and export.
 * Assumptions: the background task writes while the interactive side reads; every
 * accessor returns copies so a reader never holds a view of a map being mutated.
 * Usage: store.register(name, handle); store.put(name, text); store.get(name).
 */

// =============================================================================
// TYPES
// =============================================================================

export type UnitHandle = {
  archivePath: string;
  memberPath: string;
};

export type DecompiledUnit = {
  qualifiedName: string;
  source?: string;
  handle?: UnitHandle;
};

export const QUALIFIED_NAME_DELIMITER = "/";

// =============================================================================
// STORE
// =============================================================================

export class ResultStore {
  private units = new Map<string, DecompiledUnit>();
  private revision = 0;

  /** Records a unit the engine knows about before (or without) producing its text. */
  register(qualifiedName: string, handle: UnitHandle): void {
    const name = normalizeQualifiedName(qualifiedName);
    const existing = this.units.get(name);
    this.write(name, { ...existing, qualifiedName: name, handle: { ...handle } });
  }

  put(qualifiedName: string, text: string): void {
    const name = normalizeQualifiedName(qualifiedName);
    const existing = this.units.get(name);
    this.write(name, { ...existing, qualifiedName: name, source: text });
  }

  get(qualifiedName: string): string | undefined {
    return this.units.get(normalizeQualifiedName(qualifiedName))?.source;
  }

  getUnit(qualifiedName: string): DecompiledUnit | undefined {
    const unit = this.units.get(normalizeQualifiedName(qualifiedName));
    return unit ? copyUnit(unit) : undefined;
  }

  has(qualifiedName: string): boolean {
    return this.units.has(normalizeQualifiedName(qualifiedName));
  }

  clear(): void {
    // Swap rather than mutate so snapshots taken earlier stay intact.
    this.units = new Map();
    this.revision += 1;
  }

  allNames(): string[] {
    return Array.from(this.units.keys());
  }

  entries(): DecompiledUnit[] {
    return Array.from(this.units.values(), copyUnit);
  }

  get size(): number {
    return this.units.size;
  }

  /** Bumped on every write; lets pollers detect change without diffing. */
  get version(): number {
    return this.revision;
  }

  private write(name: string, unit: DecompiledUnit): void {
    this.units.set(name, unit);
    this.revision += 1;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Engines report `a.b.C`; the store keys everything as `a/b/C`. */
export function normalizeQualifiedName(qualifiedName: string): string {
  return qualifiedName.includes(QUALIFIED_NAME_DELIMITER)
    ? qualifiedName
    : qualifiedName.replace(/\./g, QUALIFIED_NAME_DELIMITER);
}

function copyUnit(unit: DecompiledUnit): DecompiledUnit {
  return unit.handle ? { ...unit, handle: { ...unit.handle } } : { ...unit };
}
