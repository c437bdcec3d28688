// pattern: Functional Core

import type { PackageName } from "../python/names.js";

import type { LockedPackage, PackageGraph } from "./types.js";

/**
 * Finds the direct dependencies through which `target` is pulled in.
 *
 * Walks dependent edges breadth-first from the target. A dependent that is a
 * direct dependency is recorded and not walked further; any other dependent is
 * queued, so every path up to a direct dependency is found.
 */
export function findDirectAncestors(
  target: PackageName,
  graph: PackageGraph,
  directSet: ReadonlySet<PackageName>
): Set<PackageName> {
  const ancestors = new Set<PackageName>();
  const visited = new Set<PackageName>();
  const queue: PackageName[] = [target];

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    if (visited.has(next)) {
      continue;
    }
    visited.add(next);

    const pkg = graph.get(next);
    if (!pkg) {
      continue;
    }

    for (const dependent of pkg.dependents) {
      if (directSet.has(dependent.packageName)) {
        ancestors.add(dependent.packageName);
      } else {
        queue.push(dependent.packageName);
      }
    }
  }

  return ancestors;
}

/**
 * Distinct names of the packages depending on `pkg`, sorted
 */
export function dependentNames(pkg: LockedPackage): PackageName[] {
  const names = new Set(pkg.dependents.map(dependent => dependent.packageName));
  return [...names].sort();
}
