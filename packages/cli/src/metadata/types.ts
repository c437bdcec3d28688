import type { PackageName } from "../python/names.js";

/**
 * Metadata of one distribution installed in the project's environment,
 * read from its `*.dist-info/METADATA`
 */
export interface InstalledPackage {
  name: PackageName;
  version: string;
  summary: string;
  /** Raw `Requires-Dist` requirement strings */
  requiresDist: readonly string[];
  providesExtra: readonly string[];
}

export type InstalledPackages = ReadonlyMap<PackageName, InstalledPackage>;

export type MetadataLookup =
  | {
      available: true;
      sitePackagesDir: string;
      packages: InstalledPackages;
    }
  | { available: false; reason: string };

export interface InstalledMetadataProvider {
  load(): Promise<MetadataLookup>;
}

/** Packages of a lookup, empty when metadata is unavailable */
export function installedPackagesOf(lookup: MetadataLookup): InstalledPackages {
  return lookup.available ? lookup.packages : new Map();
}
