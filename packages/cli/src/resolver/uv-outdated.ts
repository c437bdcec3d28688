// pattern: Mixed (unavoidable)
// Latest-version report from `uv pip list --outdated`

import { type Static, Type } from "@sinclair/typebox";

import { canonicalizeName, type PackageName } from "../python/names.js";
import { ajv, formatAjvErrors } from "../utils/ajv.js";
import { createCommand } from "../utils/command/index.js";

import type { Logger } from "pino";

const UvOutdatedEntry = Type.Object({
  name: Type.String(),
  version: Type.String(),
  latest_version: Type.String(),
});

const UvOutdatedOutput = Type.Array(UvOutdatedEntry);
type UvOutdatedOutput = Static<typeof UvOutdatedOutput>;

const validateOutput = ajv.compile<UvOutdatedOutput>(UvOutdatedOutput);

export interface OutdatedPackage {
  name: PackageName;
  version: string;
  latestVersion: string;
}

export type OutdatedReport =
  | { available: true; packages: Map<PackageName, OutdatedPackage> }
  | { available: false; reason: string };

/**
 * Parses the JSON printed by `uv pip list --outdated --format=json`
 */
export function parseOutdatedReport(stdout: string): OutdatedReport {
  const text = stdout.trim();
  if (text === "") {
    return { available: true, packages: new Map() };
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { available: false, reason: `invalid JSON from uv: ${reason}` };
  }

  if (!validateOutput(data)) {
    const errors = formatAjvErrors(validateOutput.errors);
    return {
      available: false,
      reason: `unexpected uv output: ${errors.join(", ")}`,
    };
  }

  const packages = new Map<PackageName, OutdatedPackage>();
  for (const entry of data) {
    const name = canonicalizeName(entry.name);
    packages.set(name, {
      name,
      version: entry.version,
      latestVersion: entry.latest_version,
    });
  }
  return { available: true, packages };
}

/**
 * Asks uv which installed packages have newer releases. VIRTUAL_ENV is
 * cleared so uv resolves the project's own environment. Every failure is
 * reported as an unavailable report, never thrown.
 */
export async function fetchOutdatedReport(
  projectDir: string,
  logger: Logger,
  uvBin = "uv"
): Promise<OutdatedReport> {
  const outcome = await createCommand(uvBin, logger)
    .addArgs(["pip", "list", "--outdated", "--format=json"])
    .envs({ VIRTUAL_ENV: "" })
    .currentDir(projectDir)
    .run();

  if (outcome.failed) {
    const detail =
      outcome.stderr.trim() ||
      (outcome.exitCode === null
        ? `could not run ${uvBin}`
        : `exit code ${outcome.exitCode}`);
    logger.debug({ exitCode: outcome.exitCode }, "uv pip list failed");
    return { available: false, reason: detail };
  }

  const report = parseOutdatedReport(outcome.stdout);
  if (!report.available) {
    logger.debug({ reason: report.reason }, "Could not read uv pip list output");
  }
  return report;
}
