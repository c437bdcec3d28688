// pattern: Imperative Shell

import { NoopMetadataProvider } from "./noop-provider.js";
import { SitePackagesMetadataProvider } from "./site-packages-provider.js";

import type { InstalledMetadataProvider } from "./types.js";
import type { Logger } from "pino";

export * from "./dist-info.js";
export * from "./noop-provider.js";
export * from "./site-packages-provider.js";
export * from "./types.js";

export interface MetadataProviderSelection {
  projectDir: string;
  logger: Logger;
  uvBin: string;
  /** false when metadata reading was turned off on the command line */
  enabled: boolean;
}

/**
 * Picks the installed-metadata provider: none when disabled by flag or by
 * LOCKDRIFT_METADATA=none, the project's site-packages otherwise
 */
export function createMetadataProvider(
  selection: MetadataProviderSelection,
  env: NodeJS.ProcessEnv = process.env
): InstalledMetadataProvider {
  if (!selection.enabled || env["LOCKDRIFT_METADATA"] === "none") {
    return new NoopMetadataProvider();
  }
  return new SitePackagesMetadataProvider({
    projectDir: selection.projectDir,
    logger: selection.logger,
    uvBin: selection.uvBin,
  });
}
