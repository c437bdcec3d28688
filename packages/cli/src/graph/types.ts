import type { PackageName } from "../python/names.js";
import type { Requirement } from "../python/requirement.js";

/** Name of the main (unconditional) dependency group */
export const MAIN_GROUP = "";

/**
 * An edge pointing back at a package that depends on this one.
 * `through` is the group of the depending package that declares the edge.
 */
export interface Dependent {
  through: string;
  packageName: PackageName;
}

export interface DependencyGroup {
  name: string;
  dependencies: Requirement[];
}

export interface LockedPackage {
  name: PackageName;
  version: string;
  summary: string;
  requires: Map<string, DependencyGroup>;
  dependents: Dependent[];
}

/**
 * Every locked package keyed by canonical name, in lockfile order
 */
export type PackageGraph = ReadonlyMap<PackageName, LockedPackage>;
