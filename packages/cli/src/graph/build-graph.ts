// pattern: Functional Core

import {
  type Lockfile,
  type LockDependency,
  type LockPackage,
  resolveDeclaration,
  toDeclaration,
} from "../lockfile/index.js";
import type { InstalledPackage, InstalledPackages } from "../metadata/types.js";
import { canonicalizeName, type PackageName } from "../python/names.js";
import { parseRequirement, type Requirement } from "../python/requirement.js";

import { type LockedPackage, MAIN_GROUP, type PackageGraph } from "./types.js";

/** Version shown for lock entries that record none (dynamic workspace members) */
export const UNKNOWN_VERSION = "unknown";

function declaredGroups(
  entry: LockPackage
): [group: string, dependencies: readonly LockDependency[]][] {
  return [
    [MAIN_GROUP, entry.dependencies ?? []],
    ...Object.entries(entry["optional-dependencies"] ?? {}),
    ...Object.entries(entry["dev-dependencies"] ?? {}),
  ];
}

/**
 * The requirement as the owning package's installed metadata states it, so the
 * version constraint survives; the bare name otherwise
 */
function requirementFor(
  dependencyName: PackageName,
  owner: InstalledPackage | undefined
): Requirement {
  for (const raw of owner?.requiresDist ?? []) {
    const requirement = parseRequirement(raw);
    if (requirement.name === dependencyName) {
      return requirement;
    }
  }
  return parseRequirement(dependencyName);
}

/**
 * Builds the locked package graph from uv.lock, overlaying installed metadata
 * where it is available.
 *
 * Nodes are created for every lock entry before any edge is added, so edges can
 * point at entries that appear later in the file. Edges to names that have no
 * lock entry are kept as requirements but produce no dependent.
 */
export function buildGraph(
  lockfile: Lockfile,
  metadata: InstalledPackages
): PackageGraph {
  const graph = new Map<PackageName, LockedPackage>();
  const entries = lockfile.package ?? [];

  for (const entry of entries) {
    const name = canonicalizeName(entry.name);
    graph.set(name, {
      name,
      version: entry.version ?? UNKNOWN_VERSION,
      summary: metadata.get(name)?.summary ?? "",
      requires: new Map(),
      dependents: [],
    });
  }

  for (const entry of entries) {
    const name = canonicalizeName(entry.name);
    const pkg = graph.get(name);
    if (!pkg) {
      continue;
    }
    const owner = metadata.get(name);

    for (const [groupName, dependencies] of declaredGroups(entry)) {
      const requirements: Requirement[] = [];

      for (const dependency of dependencies) {
        const dependencyName = resolveDeclaration(toDeclaration(dependency));
        if (!dependencyName) {
          continue;
        }
        requirements.push(requirementFor(dependencyName, owner));
        graph
          .get(dependencyName)
          ?.dependents.push({ through: groupName, packageName: name });
      }

      if (requirements.length === 0) {
        continue;
      }
      const existing = pkg.requires.get(groupName);
      if (existing) {
        existing.dependencies.push(...requirements);
      } else {
        pkg.requires.set(groupName, {
          name: groupName,
          dependencies: requirements,
        });
      }
    }
  }

  return graph;
}
