// pattern: Functional Core
// Parser for the RFC 822 style headers of a *.dist-info/METADATA file

import { canonicalizeName } from "../python/names.js";

import type { InstalledPackage } from "./types.js";

/**
 * Reads the header block (everything before the first blank line) into
 * name → values, folding continuation lines into the previous value
 */
export function parseMetadataHeaders(content: string): Map<string, string[]> {
  const headers = new Map<string, string[]>();
  let current: string[] | undefined;

  for (const line of content.split(/\r?\n/)) {
    if (line.trim() === "") {
      break;
    }

    if (/^[ \t]/.test(line)) {
      if (current) {
        const last = current.length - 1;
        current[last] = `${current[last] ?? ""} ${line.trim()}`;
      }
      continue;
    }

    const separator = line.indexOf(":");
    if (separator <= 0) {
      current = undefined;
      continue;
    }

    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    const values = headers.get(key) ?? [];
    values.push(value);
    headers.set(key, values);
    current = values;
  }

  return headers;
}

/**
 * Extracts package metadata from a METADATA file. Returns null when the file
 * does not name a distribution.
 */
export function parseDistInfoMetadata(content: string): InstalledPackage | null {
  const headers = parseMetadataHeaders(content);
  const first = (key: string): string => headers.get(key)?.[0] ?? "";

  const rawName = first("name");
  if (!rawName) {
    return null;
  }

  return {
    name: canonicalizeName(rawName),
    version: first("version"),
    summary: first("summary"),
    requiresDist: headers.get("requires-dist") ?? [],
    providesExtra: headers.get("provides-extra") ?? [],
  };
}
