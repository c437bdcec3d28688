import type { InstalledMetadataProvider, MetadataLookup } from "./types.js";

export class NoopMetadataProvider implements InstalledMetadataProvider {
  async load(): Promise<MetadataLookup> {
    return { available: false, reason: "disabled" };
  }
}
