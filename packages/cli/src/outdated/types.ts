import type { LockedPackage } from "../graph/types.js";
import type { PackageName } from "../python/names.js";
import type { OutdatedPackage } from "../resolver/uv-outdated.js";

export type ReconcileFilter = "all" | "direct" | "transitive";

/** A locked package the resolver reports a newer release for */
export interface OutdatedEntry {
  name: PackageName;
  pkg: LockedPackage;
  outdated: OutdatedPackage;
  isDirect: boolean;
}

/**
 * - current: the reported latest equals the locked version
 * - upgradable: a newer release fits every constraint on record
 * - constrained: a constraint on record excludes the newer release
 */
export type LatestStatus = "current" | "upgradable" | "constrained";

/** Display-ready view of an outdated package */
export interface DescribedEntry {
  name: PackageName;
  current: string;
  latest: string;
  isDirect: boolean;
  latestStatus: LatestStatus;
  /** The constraint holding the package back, when constrained */
  constraint: string | null;
  /** Names of depending packages; always empty for direct dependencies */
  dependents: PackageName[];
  summary: string;
}

export interface AncestorGrouping {
  /** Direct dependency name (or UNKNOWN_ANCESTOR) → entries attributed to it */
  buckets: Map<string, OutdatedEntry[]>;
  /** Ancestors that have at least one transitive member */
  withTransitive: Set<string>;
}

export type AncestorBucketView =
  | { kind: "lone"; entry: DescribedEntry }
  | {
      kind: "ancestor";
      ancestor: string;
      /** The ancestor's own entry, null when the ancestor itself is not listed */
      head: DescribedEntry | null;
      members: DescribedEntry[];
    }
  | { kind: "unknown"; members: DescribedEntry[] };

export interface OutdatedSection {
  /** Dependency group name; "" is the main group */
  group: string;
  entries: DescribedEntry[];
  /** Present when grouping by ancestor was requested */
  ancestorBuckets?: AncestorBucketView[];
}

export interface OutdatedCheckResult {
  projectDir: string;
  lockedPackageCount: number;
  /** False when the resolver could not be run or its output read */
  outdatedKnown: boolean;
  /** Number of packages the resolver reported on */
  checkedCount: number;
  metadataAvailable: boolean;
  entries: DescribedEntry[];
  sections: OutdatedSection[];
}
