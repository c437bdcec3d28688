// pattern: Functional Core
// Package name normalization shared by the lockfile, manifest and resolver views

declare const packageNameBrand: unique symbol;

/**
 * A normalized package name. The only valid key for joining the lockfile graph,
 * the manifest's direct dependencies and the resolver's outdated report.
 */
export type PackageName = string & { readonly [packageNameBrand]: true };

const SEPARATOR_RUN = /[-_.]+/g;

/**
 * Normalize a distribution name: runs of "-", "_" and "." become a single "-",
 * and the result is lowercased.
 */
export function canonicalizeName(name: string): PackageName {
  const normalized = name.trim().replace(SEPARATOR_RUN, "-").toLowerCase();
  return normalized as PackageName;
}

/**
 * Normalize an extra or dependency-group name the same way as package names
 */
export function canonicalizeExtra(name: string): string {
  return name.trim().replace(SEPARATOR_RUN, "-").toLowerCase();
}
