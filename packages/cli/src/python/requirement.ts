// pattern: Functional Core
// Dependency requirement strings: name, extras, version specifier and marker

import { canonicalizeExtra, canonicalizeName, type PackageName } from "./names.js";

export interface Requirement {
  /** Canonical package name */
  name: PackageName;
  /** Name as written in the requirement */
  rawName: string;
  /** Canonical extra names requested in brackets */
  extras: readonly string[];
  /** Comma-joined specifier clauses, "" when unconstrained */
  specifier: string;
  /** Environment marker text after ";", null when absent */
  marker: string | null;
  raw: string;
}

const REQUIREMENT_PATTERN =
  /^\s*(?<name>[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[(?<extras>[^\]]*)\])?\s*(?<rest>.*)$/s;

const LEADING_NAME_PATTERN = /^\s*([A-Za-z0-9._-]+)/;

function normalizeSpecifier(text: string): string {
  let body = text.trim();
  if (body.startsWith("(") && body.endsWith(")")) {
    body = body.slice(1, -1);
  }
  return body
    .split(",")
    .map(clause => clause.replace(/\s+/g, ""))
    .filter(clause => clause.length > 0)
    .join(",");
}

/**
 * Parse a requirement string such as `requests[socks]>=2.31,<3; python_version >= "3.9"`.
 * Never throws: input that cannot be read as a requirement falls back to its
 * leading name with no constraint.
 */
export function parseRequirement(raw: string): Requirement {
  const groups = REQUIREMENT_PATTERN.exec(raw)?.groups;
  const rawName = groups?.["name"];

  if (!groups || rawName === undefined) {
    const fallbackName = LEADING_NAME_PATTERN.exec(raw)?.[1] ?? raw.trim();
    return {
      name: canonicalizeName(fallbackName),
      rawName: fallbackName,
      extras: [],
      specifier: "",
      marker: null,
      raw,
    };
  }

  const extras = (groups["extras"] ?? "")
    .split(",")
    .map(extra => extra.trim())
    .filter(extra => extra.length > 0)
    .map(canonicalizeExtra);

  let rest = groups["rest"] ?? "";
  let marker: string | null = null;

  if (rest.trimStart().startsWith("@")) {
    // Direct reference: the URL may itself contain ";", so only " ;" separates a marker
    const markerIndex = rest.search(/\s;/);
    if (markerIndex >= 0) {
      marker = rest.slice(markerIndex).replace(/^\s*;/, "").trim() || null;
    }
    rest = "";
  } else {
    const markerIndex = rest.indexOf(";");
    if (markerIndex >= 0) {
      marker = rest.slice(markerIndex + 1).trim() || null;
      rest = rest.slice(0, markerIndex);
    }
  }

  return {
    name: canonicalizeName(rawName),
    rawName,
    extras,
    specifier: normalizeSpecifier(rest),
    marker,
    raw,
  };
}

const EXTRA_MARKER_PATTERNS = [
  /\bextra\s*==\s*(["'])(.*?)\1/g,
  /(["'])(.*?)\1\s*==\s*extra\b/g,
];

/**
 * Canonical names of every extra the requirement's marker is conditional on
 */
export function markerExtras(requirement: Pick<Requirement, "marker">): string[] {
  const marker = requirement.marker;
  if (!marker) {
    return [];
  }

  const found = new Set<string>();
  for (const pattern of EXTRA_MARKER_PATTERNS) {
    for (const match of marker.matchAll(pattern)) {
      const extra = match[2];
      if (extra !== undefined && extra.length > 0) {
        found.add(canonicalizeExtra(extra));
      }
    }
  }
  return [...found];
}

/**
 * True when the marker tests anything besides `extra`, such as the Python
 * version or platform
 */
export function hasEnvironmentMarker(
  requirement: Pick<Requirement, "marker">
): boolean {
  let rest = requirement.marker ?? "";
  for (const pattern of EXTRA_MARKER_PATTERNS) {
    rest = rest.replace(pattern, "");
  }
  return rest.replace(/\band\b|\bor\b|[()\s]/g, "").length > 0;
}
