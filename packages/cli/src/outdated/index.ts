// pattern: Imperative Shell
// Outdated-package check for a uv project

import { buildGraph } from "../graph/build-graph.js";
import { MAIN_GROUP } from "../graph/types.js";
import { loadLockfile } from "../lockfile/index.js";
import { loadManifest } from "../manifest/pyproject.js";
import {
  createMetadataProvider,
  type InstalledMetadataProvider,
  installedPackagesOf,
} from "../metadata/index.js";
import type { PackageName } from "../python/names.js";
import {
  fetchOutdatedReport,
  type OutdatedPackage,
  type OutdatedReport,
} from "../resolver/uv-outdated.js";

import {
  describeEntry,
  groupByAncestor,
  groupByDependencyGroup,
  layoutAncestorBuckets,
  reconcile,
} from "./reconcile.js";
import { collectSpecifiers } from "./specifiers.js";

import type {
  DescribedEntry,
  OutdatedCheckResult,
  OutdatedEntry,
  OutdatedSection,
  ReconcileFilter,
} from "./types.js";
import type { Logger } from "pino";

export * from "./reconcile.js";
export * from "./specifiers.js";
export * from "./types.js";

export interface CheckOutdatedOptions {
  filter?: ReconcileFilter;
  groupByAncestor?: boolean;
  /** Read installed metadata from the project's environment (default true) */
  useMetadata?: boolean;
  /** uv executable (default "uv") */
  uvBin?: string;
  /** Replaces the site-packages metadata provider */
  metadataProvider?: InstalledMetadataProvider;
  /** Replaces the `uv pip list --outdated` call */
  fetchReport?: () => Promise<OutdatedReport>;
}

/** Main group first, then the rest alphabetically */
export function orderGroups(groups: Iterable<string>): string[] {
  const all = [...groups];
  const named = all.filter(group => group !== MAIN_GROUP).sort();
  return all.includes(MAIN_GROUP) ? [MAIN_GROUP, ...named] : named;
}

/**
 * Loads pyproject.toml and uv.lock (both required), overlays installed
 * metadata when it can be read, asks uv for newer releases and reconciles
 * the answer against the locked graph.
 *
 * @throws ConfigurationError when pyproject.toml or uv.lock is missing or malformed
 */
export async function checkOutdated(
  projectDir: string,
  logger: Logger,
  options: CheckOutdatedOptions = {}
): Promise<OutdatedCheckResult> {
  const uvBin = options.uvBin ?? "uv";

  const manifest = await loadManifest(projectDir);
  const lockfile = await loadLockfile(projectDir);
  logger.debug(
    {
      direct: manifest.direct.size,
      locked: lockfile.package?.length ?? 0,
    },
    "Loaded project files"
  );

  const provider =
    options.metadataProvider ??
    createMetadataProvider({
      projectDir,
      logger,
      uvBin,
      enabled: options.useMetadata ?? true,
    });
  const lookup = await provider.load();
  if (!lookup.available) {
    logger.debug(
      { reason: lookup.reason },
      "Continuing without installed package metadata"
    );
  }
  const installed = installedPackagesOf(lookup);

  const fetchReport =
    options.fetchReport ?? (() => fetchOutdatedReport(projectDir, logger, uvBin));
  const report = await fetchReport();
  if (!report.available) {
    logger.debug({ reason: report.reason }, "No outdated information available");
  }
  const outdatedPackages: ReadonlyMap<PackageName, OutdatedPackage> =
    report.available ? report.packages : new Map();

  const graph = buildGraph(lockfile, installed);
  const specifiers = collectSpecifiers(lockfile, installed);
  const directSet = new Set(manifest.direct.keys());

  const entries = reconcile(
    graph,
    outdatedPackages,
    directSet,
    options.filter ?? "all"
  );
  const describe = (entry: OutdatedEntry): DescribedEntry =>
    describeEntry(entry, specifiers);

  const byGroup = groupByDependencyGroup(entries, manifest.groups);
  const sections: OutdatedSection[] = orderGroups(byGroup.keys()).map(group => {
    const groupEntries = byGroup.get(group) ?? [];
    const section: OutdatedSection = {
      group,
      entries: groupEntries.map(describe),
    };
    if (options.groupByAncestor) {
      section.ancestorBuckets = layoutAncestorBuckets(
        groupByAncestor(groupEntries, graph, directSet),
        describe
      );
    }
    return section;
  });

  return {
    projectDir,
    lockedPackageCount: graph.size,
    outdatedKnown: report.available,
    checkedCount: outdatedPackages.size,
    metadataAvailable: lookup.available,
    entries: entries.map(describe),
    sections,
  };
}
