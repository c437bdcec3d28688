// pattern: Imperative Shell
// CLI command for checking outdated packages in a uv project

import { Command, Option } from "@commander-js/extra-typings";
import chalk, { Chalk } from "chalk";

import { checkOutdated, type ReconcileFilter } from "../outdated/index.js";
import {
  renderOutdatedJson,
  renderOutdatedReport,
} from "../outdated/render.js";

import { CLI_LOGGER } from "./_deps.js";
import { getProjectDir, isNonInteractiveMode } from "./_globals.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

interface OutdatedCommandOptions {
  showHeaders: boolean;
  headers: boolean;
  why: boolean;
  direct?: true;
  transitive?: true;
  groupByAncestor: boolean;
  metadata: boolean;
  json: boolean;
}

function filterFrom(options: OutdatedCommandOptions): ReconcileFilter {
  if (options.direct) {
    return "direct";
  }
  if (options.transitive) {
    return "transitive";
  }
  return "all";
}

/**
 * Create the 'lockdrift outdated' command
 */
export function makeOutdatedCommand() {
  return new Command("outdated")
    .description("Show outdated packages in a uv project")
    .addHelpText(
      "before",
      `
Reads pyproject.toml and uv.lock, asks uv which locked packages have newer
releases and explains, for each one, whether a constraint holds it back and
which packages depend on it.
      `
    )
    .addHelpText(
      "after",
      `
Examples:
  lockdrift                          Check the project in the current directory
  lockdrift outdated --direct        Only packages named in pyproject.toml
  lockdrift outdated --group-by-ancestor
                                     Group transitive packages under the direct dependency that pulls them in
  lockdrift outdated --json          Output as JSON
      `
    )
    .option("--show-headers", "Show table headers", false)
    .option("--no-headers", "Hide table headers (default)")
    .option("--why", "Show Constraint and Dependents columns (default)", true)
    .option("--no-why", "Hide Constraint and Dependents columns")
    .addOption(
      new Option("--direct", "Only show direct dependencies").conflicts(
        "transitive"
      )
    )
    .addOption(
      new Option("--transitive", "Only show transitive dependencies").conflicts(
        "direct"
      )
    )
    .option(
      "--group-by-ancestor",
      "Group transitive packages under their direct ancestors",
      false
    )
    .option(
      "--no-metadata",
      "Do not read installed package metadata from the environment"
    )
    .option("--json", "Output results as JSON instead of table format", false)
    .action(
      withErrorHandling(async (options: OutdatedCommandOptions) => {
        await runOutdated(options);
      })
    );
}

async function runOutdated(options: OutdatedCommandOptions): Promise<void> {
  const projectDir = getProjectDir();
  const uvBin = process.env["LOCKDRIFT_UV_BIN"] ?? "uv";

  CLI_LOGGER.debug({ projectDir, uvBin }, "Checking for outdated packages");

  const result = await checkOutdated(projectDir, CLI_LOGGER, {
    filter: filterFrom(options),
    groupByAncestor: options.groupByAncestor,
    useMetadata: options.metadata,
    uvBin,
  });

  if (options.json) {
    process.stdout.write(`${renderOutdatedJson(result)}\n`);
    return;
  }

  const paint = new Chalk({ level: isNonInteractiveMode() ? 0 : chalk.level });
  const output = renderOutdatedReport(result, {
    showHeaders: options.showHeaders && options.headers,
    showWhy: options.why,
    paint,
  });
  process.stdout.write(`${output}\n`);
}
