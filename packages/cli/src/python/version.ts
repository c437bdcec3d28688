// pattern: Functional Core
// PEP 440 version parsing and ordering

export type PreReleaseLabel = "a" | "b" | "rc";

export interface PythonVersion {
  epoch: number;
  release: readonly number[];
  pre: { label: PreReleaseLabel; number: number } | null;
  post: number | null;
  dev: number | null;
  /** Local version label segments; numeric segments are stored as numbers */
  local: readonly (string | number)[] | null;
}

const VERSION_PATTERN = new RegExp(
  "^\\s*v?" +
    "(?:(?<epoch>[0-9]+)!)?" +
    "(?<release>[0-9]+(?:\\.[0-9]+)*)" +
    "(?<pre>[-_.]?(?<preL>alpha|a|beta|b|preview|pre|c|rc)[-_.]?(?<preN>[0-9]+)?)?" +
    "(?<post>(?:-(?<postN1>[0-9]+))|(?:[-_.]?(?<postL>post|rev|r)[-_.]?(?<postN2>[0-9]+)?))?" +
    "(?<dev>[-_.]?(?<devL>dev)[-_.]?(?<devN>[0-9]+)?)?" +
    "(?:\\+(?<local>[a-z0-9]+(?:[-_.][a-z0-9]+)*))?" +
    "\\s*$",
  "i"
);

function normalizePreLabel(label: string): PreReleaseLabel {
  switch (label.toLowerCase()) {
    case "a":
    case "alpha":
      return "a";
    case "b":
    case "beta":
      return "b";
    default:
      // c, pre, preview, rc
      return "rc";
  }
}

function toInt(raw: string | undefined): number {
  return raw === undefined ? 0 : Number.parseInt(raw, 10);
}

/**
 * Parse a PEP 440 version string. Returns null for anything that is not a valid version.
 */
export function parseVersion(raw: string): PythonVersion | null {
  const match = VERSION_PATTERN.exec(raw);
  const groups = match?.groups;
  if (!groups) {
    return null;
  }

  const release = (groups["release"] ?? "")
    .split(".")
    .map(part => Number.parseInt(part, 10));

  const preLabel = groups["preL"];
  const pre =
    groups["pre"] !== undefined && preLabel !== undefined
      ? { label: normalizePreLabel(preLabel), number: toInt(groups["preN"]) }
      : null;

  let post: number | null = null;
  if (groups["post"] !== undefined) {
    post = toInt(groups["postN1"] ?? groups["postN2"]);
  }

  const dev = groups["dev"] !== undefined ? toInt(groups["devN"]) : null;

  const localRaw = groups["local"];
  const local =
    localRaw === undefined
      ? null
      : localRaw
          .toLowerCase()
          .split(/[-_.]/)
          .map(segment =>
            /^[0-9]+$/.test(segment) ? Number.parseInt(segment, 10) : segment
          );

  return {
    epoch: toInt(groups["epoch"]),
    release,
    pre,
    post,
    dev,
    local,
  };
}

export function isPrerelease(version: PythonVersion): boolean {
  return version.pre !== null || version.dev !== null;
}

export function isPostrelease(version: PythonVersion): boolean {
  return version.post !== null;
}

/** The epoch and release segments only ("1.2.3rc1.post2+abc" → "1.2.3") */
export function baseVersion(version: PythonVersion): PythonVersion {
  return {
    epoch: version.epoch,
    release: version.release,
    pre: null,
    post: null,
    dev: null,
    local: null,
  };
}

/** The version without its local label */
export function publicVersion(version: PythonVersion): PythonVersion {
  return { ...version, local: null };
}

type Ordering = -1 | 0 | 1;

function sign(value: number): Ordering {
  if (value < 0) return -1;
  if (value > 0) return 1;
  return 0;
}

function compareRelease(a: readonly number[], b: readonly number[]): Ordering {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = sign((a[i] ?? 0) - (b[i] ?? 0));
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

const PRE_LABEL_ORDER: Readonly<Record<PreReleaseLabel, number>> = {
  a: 0,
  b: 1,
  rc: 2,
};

// A dev release of a final version sorts before its pre-releases;
// a final version sorts after all of them.
function preRank(version: PythonVersion): number {
  if (version.pre === null) {
    return version.post === null && version.dev !== null
      ? Number.NEGATIVE_INFINITY
      : Number.POSITIVE_INFINITY;
  }
  return PRE_LABEL_ORDER[version.pre.label] * 1_000_000_000 + version.pre.number;
}

function compareLocal(
  a: readonly (string | number)[] | null,
  b: readonly (string | number)[] | null
): Ordering {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? -1 : 1;
  }

  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined) return -1;
    if (right === undefined) return 1;
    if (typeof left === "number" && typeof right === "number") {
      const diff = sign(left - right);
      if (diff !== 0) return diff;
      continue;
    }
    // Numeric segments sort after alphanumeric ones
    if (typeof left === "number") return 1;
    if (typeof right === "number") return -1;
    if (left !== right) return left < right ? -1 : 1;
  }
  return 0;
}

/**
 * Total order over PEP 440 versions
 */
export function compareVersions(a: PythonVersion, b: PythonVersion): Ordering {
  const epoch = sign(a.epoch - b.epoch);
  if (epoch !== 0) return epoch;

  const release = compareRelease(a.release, b.release);
  if (release !== 0) return release;

  const preA = preRank(a);
  const preB = preRank(b);
  if (preA !== preB) return preA < preB ? -1 : 1;

  const postA = a.post ?? Number.NEGATIVE_INFINITY;
  const postB = b.post ?? Number.NEGATIVE_INFINITY;
  if (postA !== postB) return postA < postB ? -1 : 1;

  const devA = a.dev ?? Number.POSITIVE_INFINITY;
  const devB = b.dev ?? Number.POSITIVE_INFINITY;
  if (devA !== devB) return devA < devB ? -1 : 1;

  return compareLocal(a.local, b.local);
}
