// pattern: Imperative Shell
// Reads installed package metadata from the project's virtual environment

import { readdir, readFile, stat } from "fs/promises";
import { dirname, join } from "path";

import { createCommand } from "../utils/command/index.js";
import { PythonEnvironmentError } from "../utils/errors.js";

import { parseDistInfoMetadata } from "./dist-info.js";

import type { PackageName } from "../python/names.js";
import type {
  InstalledMetadataProvider,
  InstalledPackage,
  MetadataLookup,
} from "./types.js";
import type { Logger } from "pino";

export interface SitePackagesProviderOptions {
  projectDir: string;
  logger: Logger;
  /** uv executable used to locate the project interpreter */
  uvBin?: string;
}

/**
 * Pulls `version` (or `version_info`) out of pyvenv.cfg as "X.Y"
 */
export function pythonVersionFromPyvenvCfg(content: string): string | null {
  for (const line of content.split(/\r?\n/)) {
    const separator = line.indexOf("=");
    if (separator < 0) {
      continue;
    }
    const key = line.slice(0, separator).trim().toLowerCase();
    if (key !== "version" && key !== "version_info") {
      continue;
    }
    const match = /^(\d+)\.(\d+)/.exec(line.slice(separator + 1).trim());
    if (match) {
      return `${match[1]}.${match[2]}`;
    }
  }
  return null;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export class SitePackagesMetadataProvider implements InstalledMetadataProvider {
  private readonly projectDir: string;
  private readonly logger: Logger;
  private readonly uvBin: string;

  constructor(options: SitePackagesProviderOptions) {
    this.projectDir = options.projectDir;
    this.logger = options.logger;
    this.uvBin = options.uvBin ?? "uv";
  }

  async load(): Promise<MetadataLookup> {
    try {
      const sitePackagesDir = await this.locateSitePackages();
      const packages = await this.readSitePackages(sitePackagesDir);
      this.logger.debug(
        { sitePackagesDir, count: packages.size },
        "Loaded installed package metadata"
      );
      return { available: true, sitePackagesDir, packages };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug({ reason }, "Installed package metadata unavailable");
      return { available: false, reason };
    }
  }

  /**
   * Resolves the site-packages directory of the interpreter `uv python find` reports
   * @throws PythonEnvironmentError or ProcessError when it cannot be located
   */
  async locateSitePackages(): Promise<string> {
    const pythonPath = await createCommand(this.uvBin, this.logger)
      .addArgs(["python", "find"])
      .envs({ VIRTUAL_ENV: "" })
      .currentDir(this.projectDir)
      .output();

    const venvDir = dirname(dirname(pythonPath));
    const pyvenvCfg = join(venvDir, "pyvenv.cfg");

    let cfgContent: string;
    try {
      cfgContent = await readFile(pyvenvCfg, "utf8");
    } catch {
      throw new PythonEnvironmentError(
        `Could not read ${pyvenvCfg}; ${pythonPath} is not inside a virtual environment`
      );
    }

    const pythonVersion = pythonVersionFromPyvenvCfg(cfgContent);
    if (!pythonVersion) {
      throw new PythonEnvironmentError(
        `Could not find the Python version in ${pyvenvCfg}`
      );
    }

    const candidates = [
      join(venvDir, "lib", `python${pythonVersion}`, "site-packages"),
      join(venvDir, "Lib", "site-packages"),
    ];
    for (const candidate of candidates) {
      if (await isDirectory(candidate)) {
        return candidate;
      }
    }

    throw new PythonEnvironmentError(
      `Could not find site-packages at ${candidates[0] ?? venvDir}`,
      candidates[0]
    );
  }

  async readSitePackages(
    sitePackagesDir: string
  ): Promise<Map<PackageName, InstalledPackage>> {
    const packages = new Map<PackageName, InstalledPackage>();
    const entries = await readdir(sitePackagesDir);

    for (const entry of entries.filter(e => e.endsWith(".dist-info")).sort()) {
      const metadataPath = join(sitePackagesDir, entry, "METADATA");
      let content: string;
      try {
        content = await readFile(metadataPath, "utf8");
      } catch (error) {
        this.logger.debug({ err: error, metadataPath }, "Skipping unreadable METADATA");
        continue;
      }

      const pkg = parseDistInfoMetadata(content);
      if (pkg) {
        packages.set(pkg.name, pkg);
      }
    }

    return packages;
  }
}
