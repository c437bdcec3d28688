// pattern: Functional Core
// Version constraints on record for each package

import type { Lockfile } from "../lockfile/index.js";
import type { InstalledPackages } from "../metadata/types.js";
import { canonicalizeExtra, canonicalizeName, type PackageName } from "../python/names.js";
import {
  hasEnvironmentMarker,
  markerExtras,
  parseRequirement,
} from "../python/requirement.js";
import { isSatisfied, parseSpecifierSet } from "../python/specifier.js";

/** Canonical name → comma-joined specifier clauses */
export type SpecifierIndex = ReadonlyMap<PackageName, string>;

function addConstraint(
  clausesByName: Map<PackageName, string[]>,
  name: PackageName,
  specifier: string
): void {
  const set = parseSpecifierSet(specifier);
  if (!set || set.clauses.length === 0) {
    return;
  }
  const clauses = clausesByName.get(name) ?? [];
  for (const clause of set.toString().split(",")) {
    if (!clauses.includes(clause)) {
      clauses.push(clause);
    }
  }
  clausesByName.set(name, clauses);
}

/**
 * Collects the constraints that can hold a package back.
 *
 * Sources are the `metadata.requires-dist` tables of uv.lock entries and the
 * `Requires-Dist` lines of installed distributions. A requirement that only
 * applies under extras counts when one of those extras is installed for the
 * owning package. Constraints from several sources are combined, so all must hold.
 * Requirements whose marker tests the environment are left out: a distribution
 * may list mutually exclusive alternatives for different Python versions or
 * platforms. Malformed specifiers are skipped.
 */
export function collectSpecifiers(
  lockfile: Lockfile,
  installed: InstalledPackages
): SpecifierIndex {
  const clausesByName = new Map<PackageName, string[]>();
  const installedExtras = new Map<PackageName, Set<string>>();

  for (const entry of lockfile.package ?? []) {
    const owner = canonicalizeName(entry.name);
    const extras = installedExtras.get(owner) ?? new Set<string>();
    for (const extra of entry.extra ?? []) {
      extras.add(canonicalizeExtra(extra));
    }
    installedExtras.set(owner, extras);

    for (const constraint of entry.metadata?.["requires-dist"] ?? []) {
      const name = canonicalizeName(constraint.name);
      if (
        name.length > 0 &&
        constraint.specifier &&
        !hasEnvironmentMarker({ marker: constraint.marker ?? null })
      ) {
        addConstraint(clausesByName, name, constraint.specifier);
      }
    }
  }

  for (const pkg of installed.values()) {
    const extrasInstalled = installedExtras.get(pkg.name) ?? new Set<string>();

    for (const raw of pkg.requiresDist) {
      const requirement = parseRequirement(raw);
      if (!requirement.specifier || hasEnvironmentMarker(requirement)) {
        continue;
      }
      const conditionalOn = markerExtras(requirement);
      if (
        conditionalOn.length > 0 &&
        !conditionalOn.some(extra => extrasInstalled.has(extra))
      ) {
        continue;
      }
      addConstraint(clausesByName, requirement.name, requirement.specifier);
    }
  }

  const index = new Map<PackageName, string>();
  for (const [name, clauses] of clausesByName) {
    index.set(name, clauses.join(","));
  }
  return index;
}

/**
 * True when a constraint is on record for `name` and `candidate` does not
 * satisfy it, i.e. something pins the package below that version
 */
export function isLockedBySpecifier(
  index: SpecifierIndex,
  name: PackageName,
  candidate: string
): boolean {
  const constraint = index.get(name);
  if (!constraint) {
    return false;
  }
  return !isSatisfied(constraint, candidate);
}
