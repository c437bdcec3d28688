// pattern: Functional Core
// Joins the resolver report with the locked graph and buckets the result

import { dependentNames, findDirectAncestors } from "../graph/ancestors.js";
import { MAIN_GROUP, type PackageGraph } from "../graph/types.js";
import type { PackageName } from "../python/names.js";
import type { OutdatedPackage } from "../resolver/uv-outdated.js";

import { isLockedBySpecifier, type SpecifierIndex } from "./specifiers.js";

import type {
  AncestorBucketView,
  AncestorGrouping,
  DescribedEntry,
  OutdatedEntry,
  ReconcileFilter,
} from "./types.js";

/** Bucket for transitive packages no direct dependency leads to */
export const UNKNOWN_ANCESTOR = "_unknown";

/**
 * Locked packages the resolver reports on, in lockfile order
 */
export function reconcile(
  graph: PackageGraph,
  report: ReadonlyMap<PackageName, OutdatedPackage>,
  directSet: ReadonlySet<PackageName>,
  filter: ReconcileFilter = "all"
): OutdatedEntry[] {
  const entries: OutdatedEntry[] = [];

  for (const [name, pkg] of graph) {
    const outdated = report.get(name);
    if (!outdated) {
      continue;
    }
    const isDirect = directSet.has(name);
    if ((filter === "direct" && !isDirect) || (filter === "transitive" && isDirect)) {
      continue;
    }
    entries.push({ name, pkg, outdated, isDirect });
  }

  return entries;
}

function groupsContaining(
  name: PackageName,
  groups: ReadonlyMap<string, ReadonlySet<PackageName>>
): string[] {
  const found: string[] = [];
  for (const [group, members] of groups) {
    if (members.has(name)) {
      found.push(group);
    }
  }
  return found;
}

/**
 * Buckets entries by dependency group. A direct dependency lands in every group
 * declaring it; a transitive one in every group declaring one of its immediate
 * dependents. Either falls back to the main group.
 */
export function groupByDependencyGroup(
  entries: readonly OutdatedEntry[],
  groups: ReadonlyMap<string, ReadonlySet<PackageName>>
): Map<string, OutdatedEntry[]> {
  const result = new Map<string, OutdatedEntry[]>();

  for (const entry of entries) {
    const found = new Set<string>();
    if (entry.isDirect) {
      groupsContaining(entry.name, groups).forEach(group => found.add(group));
    } else {
      for (const dependent of entry.pkg.dependents) {
        groupsContaining(dependent.packageName, groups).forEach(group =>
          found.add(group)
        );
      }
    }
    if (found.size === 0) {
      found.add(MAIN_GROUP);
    }

    for (const group of found) {
      const bucket = result.get(group) ?? [];
      bucket.push(entry);
      result.set(group, bucket);
    }
  }

  return result;
}

/**
 * Buckets entries under the direct dependencies that pull them in. Direct
 * entries key their own bucket; transitive ones join the bucket of every
 * ancestor, or UNKNOWN_ANCESTOR when none is found.
 */
export function groupByAncestor(
  entries: readonly OutdatedEntry[],
  graph: PackageGraph,
  directSet: ReadonlySet<PackageName>
): AncestorGrouping {
  const buckets = new Map<string, OutdatedEntry[]>();
  const withTransitive = new Set<string>();

  const addTo = (key: string, entry: OutdatedEntry): void => {
    const bucket = buckets.get(key) ?? [];
    bucket.push(entry);
    buckets.set(key, bucket);
  };

  for (const entry of entries) {
    if (entry.isDirect) {
      addTo(entry.name, entry);
      continue;
    }

    const ancestors = [...findDirectAncestors(entry.name, graph, directSet)].sort();
    if (ancestors.length === 0) {
      addTo(UNKNOWN_ANCESTOR, entry);
      continue;
    }
    for (const ancestor of ancestors) {
      addTo(ancestor, entry);
      withTransitive.add(ancestor);
    }
  }

  return { buckets, withTransitive };
}

/**
 * Makes an entry display-ready: whether the latest release is reachable under
 * the constraints on record, and who depends on it
 */
export function describeEntry(
  entry: OutdatedEntry,
  specifiers: SpecifierIndex
): DescribedEntry {
  const current = entry.pkg.version;
  const latest = entry.outdated.latestVersion;

  let latestStatus: DescribedEntry["latestStatus"] = "upgradable";
  let constraint: string | null = null;
  if (latest === current) {
    latestStatus = "current";
  } else if (isLockedBySpecifier(specifiers, entry.name, latest)) {
    latestStatus = "constrained";
    constraint = specifiers.get(entry.name) ?? null;
  }

  return {
    name: entry.name,
    current,
    latest,
    isDirect: entry.isDirect,
    latestStatus,
    constraint,
    dependents: entry.isDirect ? [] : dependentNames(entry.pkg),
    summary: entry.pkg.summary,
  };
}

/**
 * Orders ancestor buckets for display. Keys sort by code point, so the unknown
 * bucket sorts ahead of every name that starts with a letter.
 */
export function layoutAncestorBuckets(
  grouping: AncestorGrouping,
  describe: (entry: OutdatedEntry) => DescribedEntry
): AncestorBucketView[] {
  const views: AncestorBucketView[] = [];

  for (const key of [...grouping.buckets.keys()].sort()) {
    const bucket = grouping.buckets.get(key) ?? [];

    if (key === UNKNOWN_ANCESTOR) {
      views.push({ kind: "unknown", members: bucket.map(describe) });
      continue;
    }

    const head = bucket.find(entry => entry.isDirect);
    if (!grouping.withTransitive.has(key)) {
      if (head) {
        views.push({ kind: "lone", entry: describe(head) });
      }
      continue;
    }

    views.push({
      kind: "ancestor",
      ancestor: key,
      head: head ? describe(head) : null,
      members: bucket.filter(entry => !entry.isDirect).map(describe),
    });
  }

  return views;
}
