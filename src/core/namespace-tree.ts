/**
 * Builds the package/class tree shown in the viewer from flat qualified names.
 * Package nodes are created once per distinct prefix; members are leaves keyed by
 * their full qualified name.
 */

import { QUALIFIED_NAME_DELIMITER } from "./result-store.js";

// =============================================================================
// TYPES
// =============================================================================

export type PackageNode = {
  kind: "package";
  segment: string;
  /** Full prefix, e.g. `org/example`; empty for the root. */
  path: string;
  children: NamespaceNode[];
};

export type MemberNode = {
  kind: "member";
  displayName: string;
  qualifiedName: string;
};

export type NamespaceNode = PackageNode | MemberNode;

export type BuildNamespaceTreeOptions = {
  delimiter?: string;
  /** Sort names before building so sibling order is stable across inputs. */
  sort?: boolean;
};

export type FlattenedRow = {
  depth: number;
  node: NamespaceNode;
};

// =============================================================================
// BUILDER
// =============================================================================

export function buildNamespaceTree(
  names: Iterable<string>,
  options: BuildNamespaceTreeOptions = {},
): PackageNode {
  const delimiter = options.delimiter ?? QUALIFIED_NAME_DELIMITER;
  const ordered = Array.from(names);
  if (options.sort ?? true) {
    ordered.sort(compareCodeUnits);
  }

  const root = createPackage("", "");
  const packages = new Map<string, PackageNode>();
  const members = new Map<string, { parent: PackageNode; index: number }>();

  for (const qualifiedName of ordered) {
    const segments = qualifiedName.split(delimiter).filter((segment) => segment.length > 0);
    if (segments.length === 0) continue;

    let current = root;
    let prefix = "";
    for (const segment of segments.slice(0, -1)) {
      prefix = prefix ? `${prefix}${delimiter}${segment}` : segment;

      let pkg = packages.get(prefix);
      if (!pkg) {
        pkg = createPackage(segment, prefix);
        current.children.push(pkg);
        packages.set(prefix, pkg);
      }
      current = pkg;
    }

    const displayName = segments[segments.length - 1];
    const memberKey = prefix ? `${prefix}${delimiter}${displayName}` : displayName;
    const member: MemberNode = { kind: "member", displayName, qualifiedName };

    const existing = members.get(memberKey);
    if (existing) {
      existing.parent.children[existing.index] = member;
      continue;
    }

    members.set(memberKey, { parent: current, index: current.children.length });
    current.children.push(member);
  }

  return root;
}

// =============================================================================
// QUERIES
// =============================================================================

export function findMember(root: PackageNode, qualifiedName: string): MemberNode | undefined {
  for (const child of root.children) {
    if (child.kind === "member") {
      if (child.qualifiedName === qualifiedName) return child;
      continue;
    }
    const found = findMember(child, qualifiedName);
    if (found) return found;
  }
  return undefined;
}

export function countMembers(root: PackageNode): number {
  let count = 0;
  for (const child of root.children) {
    count += child.kind === "member" ? 1 : countMembers(child);
  }
  return count;
}

export function flattenTree(root: PackageNode): FlattenedRow[] {
  const rows: FlattenedRow[] = [];
  const visit = (node: PackageNode, depth: number): void => {
    for (const child of node.children) {
      rows.push({ depth, node: child });
      if (child.kind === "package") visit(child, depth + 1);
    }
  };
  visit(root, 0);
  return rows;
}

// =============================================================================
// INTERNALS
// =============================================================================

function createPackage(segment: string, path: string): PackageNode {
  return { kind: "package", segment, path, children: [] };
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
