// pattern: Functional Core
// PEP 440 version specifiers ("~=1.4", ">=2,<3", "==1.2.*")

import {
  baseVersion,
  compareVersions,
  isPostrelease,
  isPrerelease,
  parseVersion,
  publicVersion,
  type PythonVersion,
} from "./version.js";

export type SpecifierOperator =
  | "~="
  | "=="
  | "!="
  | "<="
  | ">="
  | "<"
  | ">"
  | "===";

export interface SpecifierClause {
  operator: SpecifierOperator;
  /** The version text exactly as written, without the operator */
  version: string;
  /** Parsed bound; null only for "===" clauses, which compare text */
  parsed: PythonVersion | null;
  /** True for "==X.*" and "!=X.*" */
  wildcard: boolean;
}

// Longest operators first so "===" is not read as "==" followed by "="
const CLAUSE_PATTERN = /^(~=|===|==|!=|<=|>=|<|>)\s*(\S+)$/;

function parseClause(raw: string): SpecifierClause | null {
  const match = CLAUSE_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }
  const [, operatorText, versionText] = match;
  if (operatorText === undefined || versionText === undefined) {
    return null;
  }
  const operator = toOperator(operatorText);
  if (!operator) {
    return null;
  }

  if (operator === "===") {
    return { operator, version: versionText, parsed: null, wildcard: false };
  }

  const wildcard = versionText.endsWith(".*");
  if (wildcard && operator !== "==" && operator !== "!=") {
    return null;
  }

  const parsed = parseVersion(wildcard ? versionText.slice(0, -2) : versionText);
  if (!parsed) {
    return null;
  }
  if (wildcard && !isReleaseOnly(parsed)) {
    return null;
  }
  if (parsed.local !== null && operator !== "==" && operator !== "!=") {
    return null;
  }
  if (operator === "~=" && parsed.release.length < 2) {
    return null;
  }

  return { operator, version: versionText, parsed, wildcard };
}

function toOperator(text: string): SpecifierOperator | undefined {
  switch (text) {
    case "~=":
    case "==":
    case "!=":
    case "<=":
    case ">=":
    case "<":
    case ">":
    case "===":
      return text;
    default:
      return undefined;
  }
}

function isReleaseOnly(version: PythonVersion): boolean {
  return (
    version.pre === null &&
    version.post === null &&
    version.dev === null &&
    version.local === null
  );
}

// Release-segment prefix match: "1.4.2" matches prefix "1.4", "1.40" does not
function matchesPrefix(candidate: PythonVersion, prefix: PythonVersion): boolean {
  if (candidate.epoch !== prefix.epoch) {
    return false;
  }
  return prefix.release.every(
    (segment, index) => (candidate.release[index] ?? 0) === segment
  );
}

function matchesEqual(candidate: PythonVersion, bound: PythonVersion): boolean {
  const comparable = bound.local === null ? publicVersion(candidate) : candidate;
  return compareVersions(comparable, bound) === 0;
}

function sameBase(a: PythonVersion, b: PythonVersion): boolean {
  return compareVersions(baseVersion(a), baseVersion(b)) === 0;
}

function clauseContains(clause: SpecifierClause, candidate: PythonVersion, rawCandidate: string): boolean {
  const bound = clause.parsed;
  if (clause.operator === "===" || bound === null) {
    return rawCandidate.trim().toLowerCase() === clause.version.toLowerCase();
  }

  switch (clause.operator) {
    case "==":
      return clause.wildcard ? matchesPrefix(candidate, bound) : matchesEqual(candidate, bound);
    case "!=":
      return clause.wildcard ? !matchesPrefix(candidate, bound) : !matchesEqual(candidate, bound);
    case "<=":
      return compareVersions(publicVersion(candidate), bound) <= 0;
    case ">=":
      return compareVersions(publicVersion(candidate), bound) >= 0;
    case "<":
      if (compareVersions(candidate, bound) >= 0) {
        return false;
      }
      // "<2.0" must not admit 2.0rc1
      return isPrerelease(bound) || !isPrerelease(candidate) || !sameBase(candidate, bound);
    case ">":
      if (compareVersions(candidate, bound) <= 0) {
        return false;
      }
      // ">2.0" must not admit 2.0.post1 or 2.0+local
      if (!isPostrelease(bound) && isPostrelease(candidate) && sameBase(candidate, bound)) {
        return false;
      }
      return candidate.local === null || !sameBase(candidate, bound);
    case "~=": {
      const prefix: PythonVersion = {
        epoch: bound.epoch,
        release: bound.release.slice(0, -1),
        pre: null,
        post: null,
        dev: null,
        local: null,
      };
      return compareVersions(publicVersion(candidate), bound) >= 0 && matchesPrefix(candidate, prefix);
    }
  }
}

/**
 * A parsed, comma-separated set of specifier clauses. All clauses must match.
 */
export class SpecifierSet {
  readonly clauses: readonly SpecifierClause[];

  constructor(clauses: readonly SpecifierClause[]) {
    this.clauses = clauses;
  }

  /** Whether any inclusive clause names a pre-release, which opts pre-release candidates in */
  get admitsPrereleases(): boolean {
    return this.clauses.some(
      clause =>
        clause.operator !== "!=" && clause.parsed !== null && isPrerelease(clause.parsed)
    );
  }

  contains(rawVersion: string): boolean {
    const candidate = parseVersion(rawVersion);
    if (!candidate) {
      return false;
    }
    if (isPrerelease(candidate) && !this.admitsPrereleases) {
      return false;
    }
    return this.clauses.every(clause => clauseContains(clause, candidate, rawVersion));
  }

  toString(): string {
    return this.clauses.map(clause => `${clause.operator}${clause.version}`).join(",");
  }
}

/**
 * Parse a comma-separated specifier string. Returns null when any clause is malformed.
 * An empty string yields an empty set.
 */
export function parseSpecifierSet(raw: string): SpecifierSet | null {
  const parts = raw
    .split(",")
    .map(part => part.trim())
    .filter(part => part.length > 0);

  const clauses: SpecifierClause[] = [];
  for (const part of parts) {
    const clause = parseClause(part);
    if (!clause) {
      return null;
    }
    clauses.push(clause);
  }
  return new SpecifierSet(clauses);
}

/**
 * Whether `version` satisfies `constraint`.
 * A malformed or empty constraint is unconstrained, as is a version that cannot be parsed.
 */
export function isSatisfied(constraint: string, version: string): boolean {
  const set = parseSpecifierSet(constraint);
  if (!set || set.clauses.length === 0) {
    return true;
  }
  if (!parseVersion(version)) {
    return true;
  }
  return set.contains(version);
}
